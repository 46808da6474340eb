import { Module } from '@nestjs/common';
import { WorkerPoolModule } from '../worker-pool/worker-pool.module';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { PROCESS_DOCUMENT_PORT } from './ports/tokens';

// Use Cases
import { ProcessDocumentUseCase } from './use-cases';

/**
 * Application Module
 * Contains all use cases and application services
 *
 * Use cases depend on output ports (interfaces) only. The implementations
 * come from WorkerPoolModule and InfrastructureModule.
 */
@Module({
  imports: [WorkerPoolModule, InfrastructureModule],
  providers: [
    ProcessDocumentUseCase,
    {
      provide: PROCESS_DOCUMENT_PORT,
      useExisting: ProcessDocumentUseCase,
    },
  ],
  exports: [PROCESS_DOCUMENT_PORT],
})
export class ApplicationModule {}
