import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../config/configuration';
import { PINO_LOGGER, PinoLoggerService } from './pino-logger.service';
import { createPinoLogger } from './pino.factory';

@Global()
@Module({
  providers: [
    {
      provide: PINO_LOGGER,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) =>
        createPinoLogger({
          logLevel: configService.get('logLevel', { infer: true }),
          nodeEnv: configService.get('nodeEnv', { infer: true }),
        }),
    },
    PinoLoggerService,
  ],
  exports: [PinoLoggerService],
})
export class LoggingModule {}
