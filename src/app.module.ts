import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { LoggingModule } from './shared/logging/logging.module';
import { WorkerPoolModule } from './worker-pool/worker-pool.module';
import { InfrastructureModule } from './infrastructure/infrastructure.module';
import { ApplicationModule } from './application/application.module';
import { ProcessingModule } from './processing/processing.module';
import { HealthModule } from './health/health.module';

/**
 * Application Module
 * HTTP service that runs document jobs on a worker thread pool
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      cache: true,
    }),
    LoggingModule,
    WorkerPoolModule,
    InfrastructureModule,
    ApplicationModule,
    ProcessingModule,
    HealthModule,
  ],
})
export class AppModule {}
