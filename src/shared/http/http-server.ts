import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import type { PinoLoggerService } from '../logging/pino-logger.service';

export const REQUEST_ID_HEADER = 'x-request-id';

/** Body types parsed as raw document bytes. */
export const DOCUMENT_CONTENT_TYPES = ['application/pdf', 'application/octet-stream'];

/** Room for the JSON envelope around a base64 document. */
const JSON_ENVELOPE_BYTES = 64 * 1024;

/**
 * Largest JSON body that can carry a base64 document of `maxDocumentBytes`.
 */
export function jsonBodyLimit(maxDocumentBytes: number): number {
  return Math.ceil(maxDocumentBytes / 3) * 4 + JSON_ENVELOPE_BYTES;
}

/**
 * Fastify options for the document service. Request ids come from the
 * `x-request-id` header when the caller sends one and are generated otherwise;
 * they double as job ids.
 */
export function buildServerOptions(maxDocumentBytes: number): FastifyServerOptions {
  return {
    logger: false,
    requestIdHeader: REQUEST_ID_HEADER,
    genReqId: () => uuidv4(),
    bodyLimit: jsonBodyLimit(maxDocumentBytes),
  };
}

/**
 * Echo the request id on every response and write one log line per request.
 */
export function registerRequestHooks(fastify: FastifyInstance, logger: PinoLoggerService): void {
  fastify.addHook('onRequest', async (request, reply) => {
    reply.header(REQUEST_ID_HEADER, request.id);
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const details = {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTimeMs: Math.round(reply.elapsedTime),
    };

    if (reply.statusCode >= 500) {
      logger.withJobId(request.id).error(details, 'Request completed');
    } else {
      logger.withJobId(request.id).info(details, 'Request completed');
    }
  });
}
