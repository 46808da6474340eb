import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ApplicationModule } from '../application/application.module';
import { WorkerPoolModule } from '../worker-pool/worker-pool.module';
import { ProcessController } from './controllers/process.controller';
import { StatsController } from './controllers/stats.controller';
import { JobExceptionFilter } from './filters/job-exception.filter';

/**
 * Processing Module
 * HTTP driving adapter: turns requests into ProcessDocument commands
 */
@Module({
  imports: [ApplicationModule, WorkerPoolModule],
  controllers: [ProcessController, StatsController],
  providers: [{ provide: APP_FILTER, useClass: JobExceptionFilter }],
})
export class ProcessingModule {}
