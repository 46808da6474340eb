import { Module } from '@nestjs/common';
import { EVENT_PUBLISHER_PORT } from '../application/ports/tokens';

// Adapters (implementations)
import { LoggingEventPublisherAdapter } from './adapters/events/logging-event-publisher.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for the output ports that are not the
 * worker pool itself
 */
@Module({
  providers: [
    LoggingEventPublisherAdapter,
    {
      provide: EVENT_PUBLISHER_PORT,
      useExisting: LoggingEventPublisherAdapter,
    },
  ],
  exports: [EVENT_PUBLISHER_PORT],
})
export class InfrastructureModule {}
