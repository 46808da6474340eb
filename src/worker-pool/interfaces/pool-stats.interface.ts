export interface PoolStats {
  poolSize: number;
  runningWorkers: number;
  activeWorkers: number;
  idleWorkers: number;
  queuedJobs: number;
  maxQueuedJobs: number;
  completedJobs: number;
  failedJobs: number;
  timedOutJobs: number;
  abortedJobs: number;
  workerRestarts: number;
  averageProcessingTimeMs: number;
  isHealthy: boolean;
}

export interface WorkerStats {
  workerId: number;
  isActive: boolean;
  currentJobId?: string;
  jobsCompleted: number;
  jobsFailed: number;
  jobsTimedOut: number;
  startedAt: Date;
  lastActivityAt: Date;
}
