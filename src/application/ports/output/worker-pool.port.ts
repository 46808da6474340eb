import type { DocumentJob } from '../../../shared/interfaces/document-job.interface';
import type { JobOutcome } from '../../../shared/interfaces/processing-result.interface';
import type { PoolStats, WorkerStats } from '../../../worker-pool/interfaces/pool-stats.interface';

export interface SubmitJobOptions {
  /** Aborting cancels the job: dropped if queued, its worker replaced if running. */
  signal?: AbortSignal;
}

/**
 * Worker Pool Port (Driven Port)
 * Runs document jobs on worker threads, one job per worker at a time
 */
export interface WorkerPoolPort {
  /**
   * Run a job to one of its outcomes. Rejects with ServiceUnavailableError
   * when the backlog is full, the job waited too long for a worker, or the
   * pool is shutting down.
   */
  submitJob(job: DocumentJob, options?: SubmitJobOptions): Promise<JobOutcome>;

  getStats(): PoolStats;

  getWorkerStats(): WorkerStats[];

  /**
   * Gracefully shutdown the worker pool
   */
  shutdown(): Promise<void>;
}
