import type { ArtifactMetadata } from './document-job.interface';

export interface ProcessingError {
  code: string;
  message: string;
  /** The processor refused the input, as opposed to failing internally. */
  rejected: boolean;
}

export enum ProcessingErrorCode {
  PROCESSING_FAILED = 'PROCESSING_FAILED',
  DOCUMENT_REJECTED = 'DOCUMENT_REJECTED',
  PROCESSOR_UNAVAILABLE = 'PROCESSOR_UNAVAILABLE',
  WORKER_CRASHED = 'WORKER_CRASHED',
}

interface OutcomeTimings {
  jobId: string;
  queueTimeMs: number;
  processingTimeMs: number;
}

export interface JobCompletedOutcome extends OutcomeTimings {
  status: 'completed';
  workerId: number;
  artifact: Buffer;
  contentType: string;
  metadata?: ArtifactMetadata;
}

export interface JobFailedOutcome extends OutcomeTimings {
  status: 'failed';
  workerId: number;
  error: ProcessingError;
}

export interface JobTimedOutOutcome extends OutcomeTimings {
  status: 'timed_out';
  workerId: number;
  timeoutMs: number;
}

export interface JobAbortedOutcome extends OutcomeTimings {
  status: 'aborted';
  stage: 'queued' | 'processing';
}

export type JobOutcome =
  | JobCompletedOutcome
  | JobFailedOutcome
  | JobTimedOutOutcome
  | JobAbortedOutcome;
