import { ArgumentsHost, Catch, ExceptionFilter } from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { JobErrorCategory } from '../../shared/errors/job.errors';
import { describeError } from './error-response';

/**
 * Catches everything thrown while serving a request, including errors the
 * HTTP adapter raises before a route runs (body too large, bad JSON, unknown
 * route), and answers with the JSON error body.
 */
@Catch()
export class JobExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: PinoLoggerService) {
    this.logger.setContext(JobExceptionFilter.name);
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<FastifyRequest>();
    const reply = ctx.getResponse<FastifyReply>();

    const { statusCode, body } = describeError(exception, request.id);
    const logger = this.logger.withJobId(body.jobId);
    const logDetails = {
      statusCode,
      category: body.error.category,
      code: body.error.code,
      method: request.method,
      url: request.url,
    };

    if (statusCode >= 500 && body.error.category === JobErrorCategory.INTERNAL) {
      logger.error(
        {
          ...logDetails,
          error: exception instanceof Error ? exception.message : String(exception),
          stack: exception instanceof Error ? exception.stack : undefined,
        },
        'Request failed',
      );
    } else {
      logger.warn({ ...logDetails, message: body.error.message }, 'Request failed');
    }

    if (reply.sent || reply.raw.destroyed) {
      logger.debug(logDetails, 'Client gone, error response not sent');
      return;
    }

    void reply.status(statusCode).send(body);
  }
}
