/**
 * Application Configuration
 *
 * Loads the environment, validates it with the Zod schema in
 * `validation.schema.ts` and exposes it as a typed `AppConfig`.
 *
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig, true>) {}
 *
 * const timeoutMs = this.configService.get('jobs.timeoutMs', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  server: {
    host: string;
    port: number;
  };
  jobs: {
    /** Deadline for one job, measured from the moment a worker picks it up. */
    timeoutMs: number;
    /** How long a job may wait in the backlog for a free worker. */
    queueTimeoutMs: number;
    maxDocumentBytes: number;
  };
  /**
   * Worker thread pool configuration.
   *
   * ### poolSize (WORKER_COUNT)
   * Number of worker threads. Each thread runs one job at a time, so this is
   * also the number of jobs that can be in flight. Defaults to 1. Raise it
   * only for a processor that can run side by side with itself.
   *
   * ### maxQueuedJobs (MAX_QUEUED_JOBS)
   * Jobs waiting for a free worker beyond this many are rejected with 503.
   * Zero disables the backlog entirely.
   *
   * ### processor (DOCUMENT_PROCESSOR)
   * Built-in processor name (`passthrough`) or a path to a CommonJS module that
   * exports a `DocumentProcessor`. Resolved inside each worker thread.
   *
   * ### maxMemoryMb (WORKER_MAX_MEMORY_MB)
   * Old-generation heap cap per worker. A worker that exceeds it is killed and
   * its job reported as WORKER_CRASHED.
   */
  workerPool: {
    poolSize: number;
    maxQueuedJobs: number;
    processor: string;
    maxMemoryMb?: number;
    shutdownGraceMs: number;
  };
}

export function buildAppConfig(env: EnvConfig): AppConfig {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    server: {
      host: env.HOST,
      port: env.PORT,
    },
    jobs: {
      timeoutMs: Math.round(env.REQUEST_TIMEOUT_SECONDS * 1000),
      queueTimeoutMs: Math.round(env.QUEUE_TIMEOUT_SECONDS * 1000),
      maxDocumentBytes: Math.floor(env.MAX_DOCUMENT_SIZE_MB * 1024 * 1024),
    },
    workerPool: {
      poolSize: env.WORKER_COUNT,
      maxQueuedJobs: env.MAX_QUEUED_JOBS,
      processor: env.DOCUMENT_PROCESSOR,
      maxMemoryMb: env.WORKER_MAX_MEMORY_MB,
      shutdownGraceMs: Math.round(env.SHUTDOWN_GRACE_SECONDS * 1000),
    },
  };
}

export default (): AppConfig => buildAppConfig(validateEnv(process.env));
