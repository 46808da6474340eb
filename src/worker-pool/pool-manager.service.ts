import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter } from 'events';
import type { AppConfig } from '../config/configuration';
import { PinoLoggerService } from '../shared/logging/pino-logger.service';
import { ServiceUnavailableError } from '../shared/errors/job.errors';
import type { DocumentJob } from '../shared/interfaces/document-job.interface';
import {
  JobOutcome,
  ProcessingErrorCode,
} from '../shared/interfaces/processing-result.interface';
import type {
  SubmitJobOptions,
  WorkerPoolPort,
} from '../application/ports/output/worker-pool.port';
import {
  JobCompletedPayload,
  JobFailedPayload,
  WorkerMessageType,
  WorkerToMainMessage,
} from './interfaces/worker-message.interface';
import type { PoolStats, WorkerStats } from './interfaces/pool-stats.interface';
import { WORKER_FACTORY, type PoolWorker, type WorkerFactory } from './worker-factory';

export const WORKER_STARTUP_TIMEOUT_MS = 5000;
export const WORKER_RESPAWN_DELAY_MS = 1000;
export const WORKER_EXIT_TIMEOUT_MS = 5000;

/**
 * A worker thread and its bookkeeping. A slot is replaced, never reused, when
 * its thread dies or is terminated; listeners of a replaced slot ignore
 * anything its old thread still emits.
 */
interface WorkerSlot {
  worker: PoolWorker;
  workerId: number;
  isOnline: boolean;
  currentJob?: RunningJob;
  jobsCompleted: number;
  jobsFailed: number;
  jobsTimedOut: number;
  startedAt: Date;
  lastActivityAt: Date;
}

/**
 * A submitted job with its Promise handlers. Lives in the backlog until a
 * worker is free.
 */
interface QueuedJob {
  job: DocumentJob;
  resolve: (outcome: JobOutcome) => void;
  reject: (error: Error) => void;
  queuedAt: number;
  queueTimer?: NodeJS.Timeout;
  signal?: AbortSignal;
  onAbort?: () => void;
}

interface RunningJob {
  queued: QueuedJob;
  startedAt: number;
  deadlineTimer: NodeJS.Timeout;
}

/**
 * Worker Pool Manager Service
 *
 * Runs document jobs on a fixed-size pool of Node.js worker threads.
 *
 * ## Concurrency
 *
 * Each worker runs exactly one job at a time, so at most `poolSize` jobs are in
 * flight. With the default pool size of one, jobs are strictly serialised.
 * Jobs arriving while every worker is busy wait in a FIFO backlog capped at
 * `maxQueuedJobs`; beyond that they are rejected straight away.
 *
 * ## Deadlines
 *
 * A supervising timer starts when a worker picks a job up. If it fires before
 * the worker answers, the job resolves as `timed_out`, the thread is
 * terminated (releasing whatever the processor held) and a fresh thread takes
 * its place. The same recycling happens when a running job's client aborts.
 *
 * ## Failures
 *
 * - Processor errors come back as JOB_FAILED messages; the worker stays.
 * - A thread that errors or exits mid-job fails that job with WORKER_CRASHED
 *   and is respawned.
 * - A thread that fails to come online is retried every WORKER_RESPAWN_DELAY_MS.
 *
 * ## Events
 *
 * `jobSettled` (outcome) after every job that reached a worker.
 */
@Injectable()
export class PoolManagerService
  extends EventEmitter
  implements WorkerPoolPort, OnModuleInit, OnModuleDestroy
{
  /** Worker slots indexed by workerId, including threads still starting. */
  private workers: Map<number, WorkerSlot> = new Map();

  /** FIFO backlog of jobs waiting for an idle worker. */
  private jobQueue: QueuedJob[] = [];

  private respawnTimers: Set<NodeJS.Timeout> = new Set();

  private isShuttingDown = false;

  private readonly poolSize: number;
  private readonly maxQueuedJobs: number;
  private readonly jobTimeoutMs: number;
  private readonly queueTimeoutMs: number;
  private readonly shutdownGraceMs: number;
  private readonly processor: string;
  private readonly maxMemoryMb?: number;
  private readonly logLevel: string;
  private readonly nodeEnv: string;

  private completedJobsCount = 0;
  private failedJobsCount = 0;
  private timedOutJobsCount = 0;
  private abortedJobsCount = 0;
  private workerRestarts = 0;

  /** Sum of processing times of completed and failed jobs, for the average. */
  private totalProcessingTimeMs = 0;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
    @Inject(WORKER_FACTORY) private readonly workerFactory: WorkerFactory,
  ) {
    super();

    const workerPoolConfig = this.configService.get('workerPool', { infer: true });
    const jobsConfig = this.configService.get('jobs', { infer: true });

    this.poolSize = workerPoolConfig.poolSize;
    this.maxQueuedJobs = workerPoolConfig.maxQueuedJobs;
    this.processor = workerPoolConfig.processor;
    this.maxMemoryMb = workerPoolConfig.maxMemoryMb;
    this.shutdownGraceMs = workerPoolConfig.shutdownGraceMs;
    this.jobTimeoutMs = jobsConfig.timeoutMs;
    this.queueTimeoutMs = jobsConfig.queueTimeoutMs;
    this.logLevel = this.configService.get('logLevel', { infer: true });
    this.nodeEnv = this.configService.get('nodeEnv', { infer: true });

    this.logger.setContext(PoolManagerService.name);
  }

  async onModuleInit(): Promise<void> {
    await this.initializePool();
  }

  async onModuleDestroy(): Promise<void> {
    await this.shutdown();
  }

  private async initializePool(): Promise<void> {
    this.logger.info(
      { poolSize: this.poolSize, processor: this.processor, jobTimeoutMs: this.jobTimeoutMs },
      'Initializing worker pool',
    );

    const startups: Promise<void>[] = [];
    for (let i = 0; i < this.poolSize; i++) {
      startups.push(this.startWorker(i));
    }
    await Promise.all(startups);

    this.logger.info(
      { poolSize: this.poolSize, runningWorkers: this.getRunningWorkerCount() },
      'Worker pool initialized',
    );
  }

  /**
   * Start a thread for `workerId`. Resolves once it is online; rejects if it
   * errors, exits or stays silent for WORKER_STARTUP_TIMEOUT_MS first.
   */
  private spawnWorker(workerId: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const worker = this.workerFactory(
        {
          workerId,
          processor: this.processor,
          logLevel: this.logLevel,
          nodeEnv: this.nodeEnv,
        },
        { maxMemoryMb: this.maxMemoryMb },
      );

      const slot: WorkerSlot = {
        worker,
        workerId,
        isOnline: false,
        jobsCompleted: 0,
        jobsFailed: 0,
        jobsTimedOut: 0,
        startedAt: new Date(),
        lastActivityAt: new Date(),
      };
      this.workers.set(workerId, slot);

      const failStartup = (reason: string): void => {
        clearTimeout(startupTimer);
        this.retireWorker(slot);
        reject(new Error(`Worker ${workerId} failed to start: ${reason}`));
      };

      const startupTimer = setTimeout(() => {
        if (this.isCurrent(slot) && !slot.isOnline) {
          failStartup(`not online after ${WORKER_STARTUP_TIMEOUT_MS}ms`);
        }
      }, WORKER_STARTUP_TIMEOUT_MS);

      worker.on('online', () => {
        clearTimeout(startupTimer);
        if (!this.isCurrent(slot)) return;

        slot.isOnline = true;
        slot.lastActivityAt = new Date();
        this.logger.debug({ workerId }, 'Worker online');
        resolve();

        this.processNextInQueue();
      });

      worker.on('message', (message: WorkerToMainMessage) => {
        if (this.isCurrent(slot)) {
          this.handleWorkerMessage(slot, message);
        }
      });

      worker.on('error', (error: Error) => {
        if (!this.isCurrent(slot)) return;

        this.logger.error({ workerId, error: error.message }, 'Worker error');
        if (!slot.isOnline) {
          failStartup(error.message);
          return;
        }
        this.handleWorkerFailure(slot, `Worker ${workerId} crashed: ${error.message}`);
      });

      worker.on('exit', (code: number) => {
        if (!this.isCurrent(slot)) return;

        if (this.isShuttingDown && !slot.currentJob) {
          this.workers.delete(workerId);
          return;
        }

        this.logger.warn({ workerId, code }, 'Worker exited unexpectedly');
        if (!slot.isOnline) {
          failStartup(`exited with code ${code}`);
          return;
        }
        this.handleWorkerFailure(slot, `Worker ${workerId} exited with code ${code}`);
      });
    });
  }

  private isCurrent(slot: WorkerSlot): boolean {
    return this.workers.get(slot.workerId) === slot;
  }

  /**
   * Detach a slot from the pool and terminate its thread. Events the thread
   * emits afterwards are ignored.
   */
  private retireWorker(slot: WorkerSlot): void {
    if (this.isCurrent(slot)) {
      this.workers.delete(slot.workerId);
    }

    slot.worker.terminate().catch((error: unknown) => {
      this.logger.warn(
        {
          workerId: slot.workerId,
          error: error instanceof Error ? error.message : String(error),
        },
        'Worker termination failed',
      );
    });
  }

  private respawnWorker(workerId: number): void {
    if (this.isShuttingDown) return;

    this.workerRestarts++;
    this.logger.info({ workerId }, 'Restarting worker');
    void this.startWorker(workerId);
  }

  /**
   * Spawn a thread for `workerId`, retrying every WORKER_RESPAWN_DELAY_MS
   * until one comes online or the pool shuts down. Never rejects.
   */
  private startWorker(workerId: number): Promise<void> {
    return this.spawnWorker(workerId).catch((error: Error) => {
      this.logger.error({ workerId, error: error.message }, 'Worker failed to start');
      if (this.isShuttingDown) return;

      const timer = setTimeout(() => {
        this.respawnTimers.delete(timer);
        void this.startWorker(workerId);
      }, WORKER_RESPAWN_DELAY_MS);
      this.respawnTimers.add(timer);
    });
  }

  private handleWorkerMessage(slot: WorkerSlot, message: WorkerToMainMessage): void {
    slot.lastActivityAt = new Date();

    const running = slot.currentJob;
    if (!running || running.queued.job.jobId !== message.payload.jobId) {
      this.logger.warn(
        { workerId: slot.workerId, jobId: message.payload.jobId, type: message.type },
        'Ignoring result for a job this worker is not running',
      );
      return;
    }

    switch (message.type) {
      case WorkerMessageType.JOB_COMPLETED:
        this.handleJobCompleted(slot, running, message.payload);
        break;

      case WorkerMessageType.JOB_FAILED:
        this.handleJobFailed(slot, running, message.payload);
        break;
    }
  }

  private handleJobCompleted(
    slot: WorkerSlot,
    running: RunningJob,
    payload: JobCompletedPayload,
  ): void {
    this.releaseWorker(slot);
    slot.jobsCompleted++;
    this.completedJobsCount++;
    this.totalProcessingTimeMs += payload.processingTimeMs;

    const { artifact } = payload;
    this.settle(running.queued, {
      status: 'completed',
      jobId: payload.jobId,
      workerId: slot.workerId,
      artifact: Buffer.from(artifact.buffer, artifact.byteOffset, artifact.byteLength),
      contentType: payload.contentType,
      metadata: payload.metadata,
      processingTimeMs: payload.processingTimeMs,
      queueTimeMs: running.startedAt - running.queued.queuedAt,
    });

    this.processNextInQueue();
  }

  private handleJobFailed(slot: WorkerSlot, running: RunningJob, payload: JobFailedPayload): void {
    this.releaseWorker(slot);
    slot.jobsFailed++;
    this.failedJobsCount++;
    this.totalProcessingTimeMs += payload.processingTimeMs;

    this.settle(running.queued, {
      status: 'failed',
      jobId: payload.jobId,
      workerId: slot.workerId,
      error: payload.error,
      processingTimeMs: payload.processingTimeMs,
      queueTimeMs: running.startedAt - running.queued.queuedAt,
    });

    this.processNextInQueue();
  }

  private handleWorkerFailure(slot: WorkerSlot, reason: string): void {
    const running = slot.currentJob;
    this.releaseWorker(slot);
    this.retireWorker(slot);

    if (running) {
      const processingTimeMs = Date.now() - running.startedAt;
      slot.jobsFailed++;
      this.failedJobsCount++;
      this.totalProcessingTimeMs += processingTimeMs;

      this.settle(running.queued, {
        status: 'failed',
        jobId: running.queued.job.jobId,
        workerId: slot.workerId,
        error: { code: ProcessingErrorCode.WORKER_CRASHED, message: reason, rejected: false },
        processingTimeMs,
        queueTimeMs: running.startedAt - running.queued.queuedAt,
      });
    }

    this.respawnWorker(slot.workerId);
  }

  /**
   * Deadline passed: give up on the job and replace the thread running it.
   * The thread may be stuck in native or synchronous code, so it is terminated
   * rather than asked to stop.
   */
  private handleJobTimeout(slot: WorkerSlot): void {
    const running = slot.currentJob;
    if (!running || !this.isCurrent(slot)) return;

    this.releaseWorker(slot);
    slot.jobsTimedOut++;
    this.timedOutJobsCount++;

    this.logger.warn(
      { workerId: slot.workerId, jobId: running.queued.job.jobId, timeoutMs: this.jobTimeoutMs },
      'Job exceeded deadline, terminating worker',
    );

    this.retireWorker(slot);
    this.settle(running.queued, {
      status: 'timed_out',
      jobId: running.queued.job.jobId,
      workerId: slot.workerId,
      timeoutMs: this.jobTimeoutMs,
      processingTimeMs: Date.now() - running.startedAt,
      queueTimeMs: running.startedAt - running.queued.queuedAt,
    });

    this.respawnWorker(slot.workerId);
  }

  /**
   * Submit a document job to the pool.
   *
   * Dispatches at once when a worker is idle and nobody is waiting, otherwise
   * appends to the backlog. Resolves with the job's outcome; processing
   * failures and timeouts are outcomes, not rejections.
   *
   * @throws ServiceUnavailableError when shutting down or the backlog is full,
   *   or (asynchronously) when the job waits longer than the queue timeout
   */
  async submitJob(job: DocumentJob, options: SubmitJobOptions = {}): Promise<JobOutcome> {
    if (this.isShuttingDown) {
      throw new ServiceUnavailableError(
        'SHUTTING_DOWN',
        'Worker pool is shutting down',
        job.jobId,
      );
    }

    const { signal } = options;
    if (signal?.aborted) {
      this.abortedJobsCount++;
      return {
        status: 'aborted',
        stage: 'queued',
        jobId: job.jobId,
        queueTimeMs: 0,
        processingTimeMs: 0,
      };
    }

    return new Promise((resolve, reject) => {
      const queued: QueuedJob = {
        job,
        resolve,
        reject,
        queuedAt: Date.now(),
        signal,
      };

      const idleWorker = this.jobQueue.length === 0 ? this.getIdleWorker() : null;
      if (idleWorker) {
        this.watchAbort(queued);
        this.dispatchToWorker(idleWorker, queued);
        return;
      }

      if (this.jobQueue.length >= this.maxQueuedJobs) {
        reject(
          new ServiceUnavailableError(
            'QUEUE_FULL',
            `All workers are busy and ${this.jobQueue.length} job(s) are already waiting`,
            job.jobId,
          ),
        );
        return;
      }

      queued.queueTimer = setTimeout(() => this.expireQueuedJob(queued), this.queueTimeoutMs);
      this.watchAbort(queued);
      this.jobQueue.push(queued);

      this.logger.debug({ jobId: job.jobId, queueLength: this.jobQueue.length }, 'Job queued');
    });
  }

  private watchAbort(queued: QueuedJob): void {
    if (!queued.signal) return;

    queued.onAbort = () => this.abortJob(queued);
    queued.signal.addEventListener('abort', queued.onAbort, { once: true });
  }

  private abortJob(queued: QueuedJob): void {
    const position = this.jobQueue.indexOf(queued);
    if (position !== -1) {
      this.jobQueue.splice(position, 1);
      this.abortedJobsCount++;
      this.logger.info({ jobId: queued.job.jobId }, 'Queued job aborted by client');
      this.settle(queued, {
        status: 'aborted',
        stage: 'queued',
        jobId: queued.job.jobId,
        queueTimeMs: Date.now() - queued.queuedAt,
        processingTimeMs: 0,
      });
      return;
    }

    const slot = Array.from(this.workers.values()).find(
      (candidate) => candidate.currentJob?.queued === queued,
    );
    const running = slot?.currentJob;
    if (!slot || !running) return;

    this.releaseWorker(slot);
    this.abortedJobsCount++;
    this.logger.info(
      { jobId: queued.job.jobId, workerId: slot.workerId },
      'Running job aborted by client, terminating worker',
    );

    this.retireWorker(slot);
    this.settle(queued, {
      status: 'aborted',
      stage: 'processing',
      jobId: queued.job.jobId,
      queueTimeMs: running.startedAt - queued.queuedAt,
      processingTimeMs: Date.now() - running.startedAt,
    });

    this.respawnWorker(slot.workerId);
  }

  private expireQueuedJob(queued: QueuedJob): void {
    const position = this.jobQueue.indexOf(queued);
    if (position === -1) return;

    this.jobQueue.splice(position, 1);
    this.logger.warn(
      { jobId: queued.job.jobId, queueTimeoutMs: this.queueTimeoutMs },
      'Job waited too long for a worker',
    );
    this.fail(
      queued,
      new ServiceUnavailableError(
        'QUEUE_TIMEOUT',
        `Job waited more than ${this.queueTimeoutMs / 1000}s for a free worker`,
        queued.job.jobId,
      ),
    );
  }

  private getIdleWorker(): WorkerSlot | null {
    for (const slot of this.workers.values()) {
      if (slot.isOnline && !slot.currentJob) {
        return slot;
      }
    }
    return null;
  }

  private dispatchToWorker(slot: WorkerSlot, queued: QueuedJob): void {
    if (queued.queueTimer) {
      clearTimeout(queued.queueTimer);
      queued.queueTimer = undefined;
    }

    const startedAt = Date.now();
    slot.currentJob = {
      queued,
      startedAt,
      deadlineTimer: setTimeout(() => this.handleJobTimeout(slot), this.jobTimeoutMs),
    };
    slot.lastActivityAt = new Date(startedAt);

    try {
      slot.worker.postMessage({
        type: WorkerMessageType.PROCESS_JOB,
        payload: queued.job,
        timestamp: startedAt,
      });
    } catch (error) {
      this.releaseWorker(slot);
      slot.jobsFailed++;
      this.failedJobsCount++;
      this.settle(queued, {
        status: 'failed',
        jobId: queued.job.jobId,
        workerId: slot.workerId,
        error: {
          code: ProcessingErrorCode.PROCESSING_FAILED,
          message: `Job could not be sent to worker: ${error instanceof Error ? error.message : String(error)}`,
          rejected: false,
        },
        processingTimeMs: 0,
        queueTimeMs: startedAt - queued.queuedAt,
      });
      return;
    }

    this.logger.debug({ jobId: queued.job.jobId, workerId: slot.workerId }, 'Job dispatched to worker');
  }

  /** Mark the slot idle and stop its deadline timer. */
  private releaseWorker(slot: WorkerSlot): void {
    if (slot.currentJob) {
      clearTimeout(slot.currentJob.deadlineTimer);
      slot.currentJob = undefined;
    }
  }

  private settle(queued: QueuedJob, outcome: JobOutcome): void {
    this.cleanup(queued);
    queued.resolve(outcome);
    this.emit('jobSettled', outcome);
  }

  private fail(queued: QueuedJob, error: Error): void {
    this.cleanup(queued);
    queued.reject(error);
  }

  private cleanup(queued: QueuedJob): void {
    if (queued.queueTimer) {
      clearTimeout(queued.queueTimer);
      queued.queueTimer = undefined;
    }
    if (queued.signal && queued.onAbort) {
      queued.signal.removeEventListener('abort', queued.onAbort);
      queued.onAbort = undefined;
    }
  }

  private processNextInQueue(): void {
    if (this.isShuttingDown) return;

    let idleWorker = this.getIdleWorker();
    while (idleWorker && this.jobQueue.length > 0) {
      const queued = this.jobQueue.shift();
      if (!queued) break;
      this.dispatchToWorker(idleWorker, queued);
      idleWorker = this.getIdleWorker();
    }
  }

  getRunningWorkerCount(): number {
    let count = 0;
    for (const slot of this.workers.values()) {
      if (slot.isOnline) count++;
    }
    return count;
  }

  getIdleWorkerCount(): number {
    let count = 0;
    for (const slot of this.workers.values()) {
      if (slot.isOnline && !slot.currentJob) count++;
    }
    return count;
  }

  getActiveWorkerCount(): number {
    let count = 0;
    for (const slot of this.workers.values()) {
      if (slot.currentJob) count++;
    }
    return count;
  }

  getStats(): PoolStats {
    const settledWithTiming = this.completedJobsCount + this.failedJobsCount;
    const runningWorkers = this.getRunningWorkerCount();

    return {
      poolSize: this.poolSize,
      runningWorkers,
      activeWorkers: this.getActiveWorkerCount(),
      idleWorkers: this.getIdleWorkerCount(),
      queuedJobs: this.jobQueue.length,
      maxQueuedJobs: this.maxQueuedJobs,
      completedJobs: this.completedJobsCount,
      failedJobs: this.failedJobsCount,
      timedOutJobs: this.timedOutJobsCount,
      abortedJobs: this.abortedJobsCount,
      workerRestarts: this.workerRestarts,
      averageProcessingTimeMs:
        settledWithTiming > 0 ? this.totalProcessingTimeMs / settledWithTiming : 0,
      isHealthy: !this.isShuttingDown && runningWorkers >= Math.ceil(this.poolSize / 2),
    };
  }

  getWorkerStats(): WorkerStats[] {
    return Array.from(this.workers.values()).map((slot) => ({
      workerId: slot.workerId,
      isActive: slot.currentJob !== undefined,
      currentJobId: slot.currentJob?.queued.job.jobId,
      jobsCompleted: slot.jobsCompleted,
      jobsFailed: slot.jobsFailed,
      jobsTimedOut: slot.jobsTimedOut,
      startedAt: slot.startedAt,
      lastActivityAt: slot.lastActivityAt,
    }));
  }

  private runningJobs(): RunningJob[] {
    const running: RunningJob[] = [];
    for (const slot of this.workers.values()) {
      if (slot.currentJob) running.push(slot.currentJob);
    }
    return running;
  }

  private waitForInFlightJobs(graceMs: number): Promise<void> {
    if (this.runningJobs().length === 0) return Promise.resolve();

    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.off('jobSettled', onSettled);
        resolve();
      };
      const onSettled = (): void => {
        if (this.runningJobs().length === 0) done();
      };
      const timer = setTimeout(done, graceMs);
      this.on('jobSettled', onSettled);
    });
  }

  /**
   * Stop accepting jobs, reject the backlog, give in-flight jobs up to
   * `shutdownGraceMs` to finish, then stop every worker.
   */
  async shutdown(): Promise<void> {
    if (this.isShuttingDown) return;

    this.isShuttingDown = true;
    this.logger.info(
      { queuedJobs: this.jobQueue.length, inFlightJobs: this.runningJobs().length },
      'Shutting down worker pool',
    );

    for (const timer of this.respawnTimers) {
      clearTimeout(timer);
    }
    this.respawnTimers.clear();

    const backlog = this.jobQueue;
    this.jobQueue = [];
    for (const queued of backlog) {
      this.fail(
        queued,
        new ServiceUnavailableError('SHUTTING_DOWN', 'Worker pool is shutting down', queued.job.jobId),
      );
    }

    await this.waitForInFlightJobs(this.shutdownGraceMs);

    for (const slot of this.workers.values()) {
      const running = slot.currentJob;
      if (!running) continue;

      this.releaseWorker(slot);
      this.fail(
        running.queued,
        new ServiceUnavailableError(
          'SHUTTING_DOWN',
          'Worker pool shut down before the job finished',
          running.queued.job.jobId,
        ),
      );
    }

    const exits = Array.from(this.workers.values()).map(
      (slot) =>
        new Promise<void>((resolve) => {
          const timeout = setTimeout(() => {
            this.retireWorker(slot);
            resolve();
          }, WORKER_EXIT_TIMEOUT_MS);

          slot.worker.once('exit', () => {
            clearTimeout(timeout);
            resolve();
          });

          slot.worker.postMessage({
            type: WorkerMessageType.SHUTDOWN,
            payload: null,
            timestamp: Date.now(),
          });
        }),
    );

    await Promise.all(exits);
    this.workers.clear();
    this.logger.info('Worker pool shut down');
  }
}
