import { Injectable } from '@nestjs/common';
import type { EventPublisherPort } from '../../../application/ports/output/event-publisher.port';
import type { DomainEvent } from '../../../domain/events/base.event';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * Logging Event Publisher Adapter
 * Implements EventPublisherPort by writing each event as a structured log line
 */
@Injectable()
export class LoggingEventPublisherAdapter implements EventPublisherPort {
  constructor(private readonly logger: PinoLoggerService) {
    this.logger.setContext(LoggingEventPublisherAdapter.name);
  }

  async publish(event: DomainEvent): Promise<void> {
    this.logger.withJobId(event.jobId).info({ event: event.toJSON() }, `[EVENT] ${event.eventName}`);
  }
}
