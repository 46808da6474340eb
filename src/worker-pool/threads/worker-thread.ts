/**
 * Worker Thread Entry Point
 *
 * Runs in its own V8 isolate, spawned by PoolManagerService. Loads the
 * configured document processor once, then runs PROCESS_JOB messages one at a
 * time and answers each with JOB_COMPLETED or JOB_FAILED.
 *
 * The thread is long-lived and serves many jobs. It is only replaced when it
 * crashes, or when the main thread terminates it for overrunning a deadline or
 * for a job whose client went away.
 *
 * @module WorkerThread
 */

import { parentPort, workerData } from 'worker_threads';
import { z } from 'zod';
import { createPinoLogger } from '../../shared/logging/pino.factory';
import { ProcessingErrorCode } from '../../shared/interfaces/processing-result.interface';
import type { DocumentJob } from '../../shared/interfaces/document-job.interface';
import type { DocumentProcessor } from '../interfaces/document-processor.interface';
import {
  MainToWorkerMessage,
  WorkerMessageType,
  WorkerToMainMessage,
} from '../interfaces/worker-message.interface';
import { loadProcessor } from './processor-loader';
import { runJob } from './job-runner';

const bootSchema = z.object({
  workerId: z.number().int().nonnegative(),
  processor: z.string().min(1),
  logLevel: z.string().default('info'),
  nodeEnv: z.string().default('production'),
});

const boot = bootSchema.parse(workerData);

const logger = createPinoLogger({
  logLevel: boot.logLevel,
  nodeEnv: boot.nodeEnv,
  bindings: { workerId: boot.workerId, context: 'WorkerThread' },
});

const processorReady = loadProcessor(boot.processor);

void processorReady.then(
  (processor) => logger.info({ processor: processor.name }, 'Document processor loaded'),
  (error: unknown) =>
    logger.error(
      { processor: boot.processor, error: error instanceof Error ? error.message : String(error) },
      'Failed to load document processor',
    ),
);

function send(message: WorkerToMainMessage): void {
  parentPort?.postMessage(message);
}

async function handleProcessJob(job: DocumentJob): Promise<void> {
  let processor: DocumentProcessor;
  try {
    processor = await processorReady;
  } catch (error) {
    send({
      type: WorkerMessageType.JOB_FAILED,
      payload: {
        jobId: job.jobId,
        error: {
          code: ProcessingErrorCode.PROCESSOR_UNAVAILABLE,
          message: `Document processor "${boot.processor}" could not be loaded: ${
            error instanceof Error ? error.message : String(error)
          }`,
          rejected: false,
        },
        processingTimeMs: 0,
      },
      timestamp: Date.now(),
    });
    return;
  }

  logger.debug({ jobId: job.jobId, sizeBytes: job.document.byteLength }, 'Job started');
  send(await runJob(processor, job));
}

parentPort?.on('message', (message: MainToWorkerMessage) => {
  switch (message.type) {
    case WorkerMessageType.PROCESS_JOB:
      handleProcessJob(message.payload).catch((error: unknown) => {
        logger.error(
          { jobId: message.payload.jobId, error: error instanceof Error ? error.message : String(error) },
          'Failed to report job result',
        );
        process.exit(1);
      });
      break;

    case WorkerMessageType.SHUTDOWN:
      logger.flush();
      process.exit(0);
  }
});

// A thread in an unknown state is not reused; the pool spawns a replacement.
process.on('uncaughtException', (error) => {
  logger.fatal({ error: error.message, stack: error.stack }, 'Uncaught exception in worker thread');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason: String(reason) }, 'Unhandled rejection in worker thread');
  process.exit(1);
});

logger.debug('Worker started');
