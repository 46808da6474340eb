import type { DocumentJob } from '../../shared/interfaces/document-job.interface';
import {
  ProcessingError,
  ProcessingErrorCode,
} from '../../shared/interfaces/processing-result.interface';
import type { DocumentProcessor } from '../interfaces/document-processor.interface';
import {
  WorkerMessageType,
  WorkerToMainMessage,
} from '../interfaces/worker-message.interface';

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

export function toProcessingError(error: unknown): ProcessingError {
  const message = error instanceof Error ? error.message : String(error);

  if (typeof error !== 'object' || error === null) {
    return { code: ProcessingErrorCode.PROCESSING_FAILED, message, rejected: false };
  }

  const rejected = 'rejected' in error && error.rejected === true;
  const code =
    'code' in error && typeof error.code === 'string' && error.code.length > 0
      ? error.code
      : rejected
        ? ProcessingErrorCode.DOCUMENT_REJECTED
        : ProcessingErrorCode.PROCESSING_FAILED;

  return { code, message, rejected };
}

/**
 * Run one job through the processor and build the reply for the main thread.
 * Never throws: every failure becomes a JOB_FAILED message.
 */
export async function runJob(
  processor: DocumentProcessor,
  job: DocumentJob,
): Promise<WorkerToMainMessage> {
  const startTime = Date.now();

  const failed = (error: ProcessingError): WorkerToMainMessage => ({
    type: WorkerMessageType.JOB_FAILED,
    payload: { jobId: job.jobId, error, processingTimeMs: Date.now() - startTime },
    timestamp: Date.now(),
  });

  try {
    const artifact = await processor.process(job.document, job.options, {
      jobId: job.jobId,
      fileName: job.fileName,
    });

    if (!artifact || !(artifact.data instanceof Uint8Array)) {
      return failed({
        code: ProcessingErrorCode.PROCESSING_FAILED,
        message: `Processor ${processor.name} returned no artifact data`,
        rejected: false,
      });
    }

    return {
      type: WorkerMessageType.JOB_COMPLETED,
      payload: {
        jobId: job.jobId,
        artifact: artifact.data,
        contentType: artifact.contentType ?? DEFAULT_CONTENT_TYPE,
        metadata: artifact.metadata,
        processingTimeMs: Date.now() - startTime,
      },
      timestamp: Date.now(),
    };
  } catch (error) {
    return failed(toProcessingError(error));
  }
}
