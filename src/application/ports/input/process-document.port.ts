import type { ArtifactMetadata, JobOptions } from '../../../shared/interfaces/document-job.interface';

/**
 * Process Document Command
 */
export interface ProcessDocumentCommand {
  jobId: string;
  document: Uint8Array;
  fileName?: string;
  options: JobOptions;
  /** Fires when the client goes away before the response is written. */
  signal?: AbortSignal;
}

/**
 * Process Document Result
 */
export interface ProcessDocumentResult {
  jobId: string;
  artifact: Buffer;
  contentType: string;
  metadata?: ArtifactMetadata;
  processingTimeMs: number;
  queueTimeMs: number;
}

/**
 * Process Document Port (Driving Port / Use Case Interface)
 * Runs one document through the processor under the job deadline
 */
export interface ProcessDocumentPort {
  /**
   * Resolves with the artifact, or rejects with a JobError describing why
   * there is none
   */
  execute(command: ProcessDocumentCommand): Promise<ProcessDocumentResult>;
}
