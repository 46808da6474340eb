export type JobOptionValue = string | number | boolean;

export type JobOptions = Record<string, JobOptionValue>;

export type ArtifactMetadata = Record<string, JobOptionValue>;

/**
 * A single document-processing request as handed to the worker pool.
 * Lives only for the duration of one request/response exchange.
 */
export interface DocumentJob {
  jobId: string;
  document: Uint8Array;
  fileName?: string;
  options: JobOptions;
}
