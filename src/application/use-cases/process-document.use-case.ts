import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../config/configuration';
import type {
  ProcessDocumentCommand,
  ProcessDocumentPort,
  ProcessDocumentResult,
} from '../ports/input/process-document.port';
import type { WorkerPoolPort } from '../ports/output/worker-pool.port';
import type { EventPublisherPort } from '../ports/output/event-publisher.port';
import { EVENT_PUBLISHER_PORT, WORKER_POOL_PORT } from '../ports/tokens';
import { DocumentJobEntity } from '../../domain/entities/document-job.entity';
import {
  JobAbortedEvent,
  JobAcceptedEvent,
  JobCompletedEvent,
  JobFailedEvent,
  JobTimedOutEvent,
} from '../../domain/events';
import {
  JobError,
  JobTimeoutError,
  ProcessingFailedError,
  TransportError,
} from '../../shared/errors/job.errors';
import type { JobOutcome } from '../../shared/interfaces/processing-result.interface';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';

/**
 * Process Document Use Case
 *
 * Validates the payload, hands it to the worker pool and turns the pool's
 * outcome into either a result or a JobError:
 *
 * | Outcome     | Error                              |
 * |-------------|------------------------------------|
 * | completed   | none                               |
 * | failed      | ProcessingFailedError (422 / 500)  |
 * | timed_out   | JobTimeoutError (504)              |
 * | aborted     | TransportError CLIENT_ABORTED      |
 *
 * Pool rejections (backlog full, queue wait expired, shutting down) pass
 * through unchanged.
 */
@Injectable()
export class ProcessDocumentUseCase implements ProcessDocumentPort {
  private readonly maxDocumentBytes: number;

  constructor(
    @Inject(WORKER_POOL_PORT) private readonly workerPool: WorkerPoolPort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(ProcessDocumentUseCase.name);
    this.maxDocumentBytes = this.configService.get('jobs', { infer: true }).maxDocumentBytes;
  }

  async execute(command: ProcessDocumentCommand): Promise<ProcessDocumentResult> {
    const logger = this.logger.withJobId(command.jobId);

    this.validate(command);

    let job = DocumentJobEntity.create({
      jobId: command.jobId,
      fileName: command.fileName,
      sizeBytes: command.document.byteLength,
      options: command.options,
    });

    await this.eventPublisher.publish(
      new JobAcceptedEvent({
        jobId: job.jobId,
        fileName: job.fileName,
        sizeBytes: job.sizeBytes,
        options: command.options,
      }),
    );

    let outcome: JobOutcome;
    try {
      outcome = await this.workerPool.submitJob(
        {
          jobId: command.jobId,
          document: command.document,
          fileName: command.fileName,
          options: command.options,
        },
        { signal: command.signal },
      );
    } catch (error) {
      const code = error instanceof JobError ? error.code : 'INTERNAL_ERROR';
      const message = error instanceof Error ? error.message : String(error);

      job = job.fail(code, message);
      logger.warn({ job: job.toJSON() }, 'Job was not run');
      await this.eventPublisher.publish(
        new JobFailedEvent({
          jobId: job.jobId,
          errorCode: code,
          errorMessage: message,
          rejected: false,
          processingTimeMs: 0,
        }),
      );
      throw error;
    }

    switch (outcome.status) {
      case 'completed': {
        job = job.complete();
        logger.info(
          {
            job: job.toJSON(),
            workerId: outcome.workerId,
            artifactSizeBytes: outcome.artifact.byteLength,
            processingTimeMs: outcome.processingTimeMs,
            queueTimeMs: outcome.queueTimeMs,
          },
          'Job completed',
        );
        await this.eventPublisher.publish(
          new JobCompletedEvent({
            jobId: job.jobId,
            workerId: outcome.workerId,
            artifactSizeBytes: outcome.artifact.byteLength,
            contentType: outcome.contentType,
            processingTimeMs: outcome.processingTimeMs,
            queueTimeMs: outcome.queueTimeMs,
          }),
        );

        return {
          jobId: job.jobId,
          artifact: outcome.artifact,
          contentType: outcome.contentType,
          metadata: outcome.metadata,
          processingTimeMs: outcome.processingTimeMs,
          queueTimeMs: outcome.queueTimeMs,
        };
      }

      case 'failed': {
        const { error } = outcome;
        job = job.fail(error.code, error.message);
        logger.warn({ job: job.toJSON(), workerId: outcome.workerId }, 'Job failed');
        await this.eventPublisher.publish(
          new JobFailedEvent({
            jobId: job.jobId,
            workerId: outcome.workerId,
            errorCode: error.code,
            errorMessage: error.message,
            rejected: error.rejected,
            processingTimeMs: outcome.processingTimeMs,
          }),
        );
        throw new ProcessingFailedError(job.jobId, error.code, error.message, error.rejected);
      }

      case 'timed_out': {
        const timeoutError = new JobTimeoutError(job.jobId, outcome.timeoutMs);
        job = job.timeOut(timeoutError.message);
        logger.warn({ job: job.toJSON(), workerId: outcome.workerId }, 'Job timed out');
        await this.eventPublisher.publish(
          new JobTimedOutEvent({
            jobId: job.jobId,
            workerId: outcome.workerId,
            timeoutMs: outcome.timeoutMs,
          }),
        );
        throw timeoutError;
      }

      case 'aborted': {
        job = job.abort();
        logger.warn({ job: job.toJSON(), stage: outcome.stage }, 'Job aborted by client');
        await this.eventPublisher.publish(
          new JobAbortedEvent({ jobId: job.jobId, stage: outcome.stage }),
        );
        throw new TransportError(
          'CLIENT_ABORTED',
          'Client closed the connection before the job finished',
          job.jobId,
        );
      }
    }
  }

  private validate(command: ProcessDocumentCommand): void {
    const size = command.document.byteLength;

    if (size === 0) {
      throw new TransportError('EMPTY_DOCUMENT', 'Document is empty', command.jobId);
    }

    if (size > this.maxDocumentBytes) {
      throw new TransportError(
        'DOCUMENT_TOO_LARGE',
        `Document is ${size} bytes; the limit is ${this.maxDocumentBytes} bytes`,
        command.jobId,
      );
    }
  }
}
