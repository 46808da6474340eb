/**
 * Worker Thread Communication Protocol
 *
 * Messages exchanged between the main thread (PoolManagerService) and the
 * worker threads that run document processors.
 *
 * - **Main → Worker**: PROCESS_JOB, SHUTDOWN
 * - **Worker → Main**: JOB_COMPLETED, JOB_FAILED
 *
 * ```
 * Main Thread                Worker Thread
 *     |                           |
 *     |---PROCESS_JOB------------>|
 *     |                           | (runs the processor)
 *     |<-------JOB_COMPLETED------|
 *     |                           |
 *     |---SHUTDOWN--------------->|
 *     |                           | (exits)
 * ```
 *
 * A worker that overruns its deadline never answers; the main thread
 * terminates it instead of waiting for a message.
 *
 * All messages go through the structured clone algorithm, so document and
 * artifact bytes arrive as plain `Uint8Array`s on the other side.
 *
 * @module WorkerMessageInterface
 */

import type { DocumentJob, ArtifactMetadata } from '../../shared/interfaces/document-job.interface';
import type { ProcessingError } from '../../shared/interfaces/processing-result.interface';

export enum WorkerMessageType {
  PROCESS_JOB = 'PROCESS_JOB',
  JOB_COMPLETED = 'JOB_COMPLETED',
  JOB_FAILED = 'JOB_FAILED',
  SHUTDOWN = 'SHUTDOWN',
}

interface Envelope<T extends WorkerMessageType, P> {
  type: T;
  payload: P;
  /** Unix timestamp (ms) when the message was created. */
  timestamp: number;
}

export type ProcessJobPayload = DocumentJob;

export interface JobCompletedPayload {
  jobId: string;
  artifact: Uint8Array;
  contentType: string;
  metadata?: ArtifactMetadata;
  processingTimeMs: number;
}

export interface JobFailedPayload {
  jobId: string;
  error: ProcessingError;
  processingTimeMs: number;
}

export type ProcessJobMessage = Envelope<WorkerMessageType.PROCESS_JOB, ProcessJobPayload>;
export type JobCompletedMessage = Envelope<WorkerMessageType.JOB_COMPLETED, JobCompletedPayload>;
export type JobFailedMessage = Envelope<WorkerMessageType.JOB_FAILED, JobFailedPayload>;
export type ShutdownMessage = Envelope<WorkerMessageType.SHUTDOWN, null>;

export type MainToWorkerMessage = ProcessJobMessage | ShutdownMessage;
export type WorkerToMainMessage = JobCompletedMessage | JobFailedMessage;

/** Data handed to every worker thread at construction. */
export interface WorkerBootData {
  workerId: number;
  processor: string;
  logLevel: string;
  nodeEnv: string;
}
