import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppModule } from './app.module';
import configuration, { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import {
  DOCUMENT_CONTENT_TYPES,
  buildServerOptions,
  registerRequestHooks,
} from './shared/http/http-server';

/**
 * Bootstrap the document processing HTTP service
 */
async function bootstrap() {
  // Validate the environment before anything starts; fails with every bad variable listed
  const { jobs } = configuration();

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter(buildServerOptions(jobs.maxDocumentBytes)),
    { bufferLogs: true },
  );

  // Get services
  const configService = app.get(ConfigService<AppConfig, true>);
  const logger = await app.resolve(PinoLoggerService);

  // Use custom logger
  app.useLogger(logger);
  logger.setContext('Bootstrap');

  // Raw document uploads; JSON bodies use the adapter's limit
  app.useBodyParser(DOCUMENT_CONTENT_TYPES, { bodyLimit: jobs.maxDocumentBytes });
  registerRequestHooks(app.getHttpAdapter().getInstance(), logger);

  // Register shutdown handlers
  let shuttingDown = false;
  const shutdownHandler = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, draining worker pool...');
    await app.close();
    logger.info('Worker pool drained, application shut down gracefully');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdownHandler(signal).catch((error: unknown) => {
      logger.error(
        { signal, error: error instanceof Error ? error.message : String(error) },
        'Graceful shutdown failed',
      );
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  const { host, port } = configService.get('server', { infer: true });
  await app.listen(port, host);

  // Log startup
  logger.info(
    {
      nodeEnv: configService.get('nodeEnv', { infer: true }),
      pid: process.pid,
      host,
      port,
      jobTimeoutMs: jobs.timeoutMs,
      workerPool: configService.get('workerPool', { infer: true }),
    },
    'Document Processing Service started',
  );
}

bootstrap().catch((error) => {
  console.error('Failed to start service:', error);
  process.exit(1);
});
