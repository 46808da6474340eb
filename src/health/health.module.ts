import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { WorkerPoolHealthIndicator } from './indicators/worker-pool.health';
import { WorkerPoolModule } from '../worker-pool/worker-pool.module';

@Module({
  imports: [TerminusModule, WorkerPoolModule],
  controllers: [HealthController],
  providers: [WorkerPoolHealthIndicator],
})
export class HealthModule {}
