import { Controller, Get, Inject } from '@nestjs/common';
import { WORKER_POOL_PORT } from '../../application/ports/tokens';
import type { WorkerPoolPort } from '../../application/ports/output/worker-pool.port';
import type { PoolStats, WorkerStats } from '../../worker-pool/interfaces/pool-stats.interface';

export interface StatsResponse {
  pool: PoolStats;
  workers: WorkerStats[];
}

@Controller('stats')
export class StatsController {
  constructor(@Inject(WORKER_POOL_PORT) private readonly workerPool: WorkerPoolPort) {}

  @Get()
  getStats(): StatsResponse {
    return {
      pool: this.workerPool.getStats(),
      workers: this.workerPool.getWorkerStats(),
    };
  }
}
