import pino, { type Logger } from 'pino';

export interface PinoOptions {
  logLevel: string;
  nodeEnv: string;
  /** Extra fields stamped on every line, e.g. the worker id. */
  bindings?: Record<string, unknown>;
}

export function createPinoLogger(options: PinoOptions): Logger {
  return pino({
    level: options.logLevel,
    ...(options.nodeEnv === 'development' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: 'document-processing-service',
      env: options.nodeEnv,
      ...options.bindings,
    },
  });
}
