import { Inject, Injectable } from '@nestjs/common';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { WORKER_POOL_PORT } from '../../application/ports/tokens';
import type { WorkerPoolPort } from '../../application/ports/output/worker-pool.port';

@Injectable()
export class WorkerPoolHealthIndicator extends HealthIndicator {
  constructor(@Inject(WORKER_POOL_PORT) private readonly workerPool: WorkerPoolPort) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const stats = this.workerPool.getStats();

    const details = {
      poolSize: stats.poolSize,
      runningWorkers: stats.runningWorkers,
      activeWorkers: stats.activeWorkers,
      idleWorkers: stats.idleWorkers,
      queuedJobs: stats.queuedJobs,
      workerRestarts: stats.workerRestarts,
    };

    if (stats.isHealthy) {
      return this.getStatus(key, true, details);
    }

    throw new HealthCheckError(
      'Worker pool is unhealthy - insufficient workers running',
      this.getStatus(key, false, details),
    );
  }
}
