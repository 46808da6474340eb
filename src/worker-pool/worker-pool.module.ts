import { Module } from '@nestjs/common';
import { WORKER_POOL_PORT } from '../application/ports/tokens';
import { PoolManagerService } from './pool-manager.service';
import { WORKER_FACTORY, threadWorkerFactory } from './worker-factory';

@Module({
  providers: [
    { provide: WORKER_FACTORY, useValue: threadWorkerFactory },
    PoolManagerService,
    { provide: WORKER_POOL_PORT, useExisting: PoolManagerService },
  ],
  exports: [PoolManagerService, WORKER_POOL_PORT],
})
export class WorkerPoolModule {}
