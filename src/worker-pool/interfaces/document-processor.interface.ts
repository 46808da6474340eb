import type {
  ArtifactMetadata,
  JobOptions,
} from '../../shared/interfaces/document-job.interface';

export interface ProcessedArtifact {
  data: Uint8Array;
  /** Defaults to `application/octet-stream`. */
  contentType?: string;
  metadata?: ArtifactMetadata;
}

export interface ProcessorContext {
  jobId: string;
  fileName?: string;
}

/**
 * The document transformation itself. Runs inside a worker thread, one job at
 * a time; it may block the thread for as long as it likes, the pool enforces
 * the deadline from outside.
 *
 * Throw a `DocumentRejectedError` to refuse the input (reported as 422); any
 * other error is treated as an internal processing failure.
 */
export interface DocumentProcessor {
  readonly name: string;
  process(
    document: Uint8Array,
    options: JobOptions,
    context: ProcessorContext,
  ): ProcessedArtifact | Promise<ProcessedArtifact>;
}

export class DocumentRejectedError extends Error {
  readonly rejected = true;

  constructor(
    message: string,
    public readonly code = 'DOCUMENT_REJECTED',
  ) {
    super(message);
    this.name = 'DocumentRejectedError';
  }
}
