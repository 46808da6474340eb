import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ProcessController } from '../../../src/processing/controllers/process.controller';
import { StatsController } from '../../../src/processing/controllers/stats.controller';
import { JobExceptionFilter } from '../../../src/processing/filters/job-exception.filter';
import { ProcessDocumentUseCase } from '../../../src/application/use-cases/process-document.use-case';
import {
  DOCUMENT_CONTENT_TYPES,
  buildServerOptions,
  registerRequestHooks,
} from '../../../src/shared/http/http-server';
import { ServiceUnavailableError } from '../../../src/shared/errors/job.errors';
import {
  InMemoryEventPublisherAdapter,
  InMemoryWorkerPoolAdapter,
} from '../../in-memory-adapters';
import { createTestConfigService, createTestLogger } from '../helpers/mock-factories';

// 0.0001 MiB is 104 bytes
const MAX_DOCUMENT_BYTES = 104;

/** What the /process route saw during the last request. */
interface ProcessRouteTracker {
  reply?: FastifyReply;
  closeListenersBefore?: number;
  closeListenersAfter?: number;
  /** Resolves with the controller's error, or undefined once it returned. */
  settled?: Promise<unknown>;
}

/**
 * Wires the controllers into Fastify the way the Nest adapter does: raw
 * document parser, request hooks, and every error rendered by the filter.
 */
function buildApp(workerPool: InMemoryWorkerPoolAdapter): {
  app: FastifyInstance;
  tracker: ProcessRouteTracker;
} {
  const tracker: ProcessRouteTracker = {};
  const logger = createTestLogger();
  const useCase = new ProcessDocumentUseCase(
    workerPool,
    new InMemoryEventPublisherAdapter(),
    createTestConfigService({ MAX_DOCUMENT_SIZE_MB: '0.0001' }),
    createTestLogger(),
  );
  const processController = new ProcessController(useCase, createTestLogger());
  const statsController = new StatsController(workerPool);
  const filter = new JobExceptionFilter(createTestLogger());

  const app = Fastify(buildServerOptions(MAX_DOCUMENT_BYTES));
  app.addContentTypeParser(
    DOCUMENT_CONTENT_TYPES,
    { parseAs: 'buffer', bodyLimit: MAX_DOCUMENT_BYTES },
    (_request, body, done) => done(null, body),
  );
  registerRequestHooks(app, logger);
  app.setErrorHandler((error, request, reply) => {
    filter.catch(error, new ExecutionContextHost([request, reply]));
  });

  app.post('/process', (request, reply) => {
    tracker.reply = reply;
    tracker.closeListenersBefore = reply.raw.listenerCount('close');
    const handled = processController.process(request.body, request.query, request, reply);
    tracker.settled = handled.then(
      () => {
        tracker.closeListenersAfter = reply.raw.listenerCount('close');
        return undefined;
      },
      (error: unknown) => error,
    );
    return handled;
  });
  app.get('/stats', () => statsController.getStats());

  return { app, tracker };
}

describe('ProcessController', () => {
  let workerPool: InMemoryWorkerPoolAdapter;
  let app: FastifyInstance;
  let tracker: ProcessRouteTracker;

  beforeEach(async () => {
    workerPool = new InMemoryWorkerPoolAdapter();
    ({ app, tracker } = buildApp(workerPool));
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /process', () => {
    it('should return the artifact of a binary upload', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process?dpi=300',
        headers: { 'content-type': 'application/pdf' },
        payload: Buffer.from('%PDF-1.7 upload'),
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('application/octet-stream');
      expect(response.headers['x-processing-time-ms']).toBe('5');
      expect(response.headers['x-queue-time-ms']).toBe('0');
      expect(response.rawPayload.toString('utf8')).toBe('%PDF-1.7 upload');
      expect(workerPool.getSubmittedJobs()[0]?.options).toEqual({ dpi: '300' });
    });

    it('should use the caller request id as the job id', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process',
        headers: { 'content-type': 'application/octet-stream', 'x-request-id': 'req-caller-1' },
        payload: Buffer.from('bytes'),
      });

      expect(response.headers['x-request-id']).toBe('req-caller-1');
      expect(workerPool.getSubmittedJobs()[0]?.jobId).toBe('req-caller-1');
    });

    it('should accept a base64 document in JSON', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process',
        payload: { document: Buffer.from('json upload').toString('base64'), fileName: 'a.txt' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.rawPayload.toString('utf8')).toBe('json upload');
      expect(workerPool.getSubmittedJobs()[0]?.fileName).toBe('a.txt');
    });

    it('should send artifact metadata as a percent-encoded JSON header', async () => {
      workerPool.setOutcome((job) => ({
        status: 'completed',
        jobId: job.jobId,
        workerId: 0,
        artifact: Buffer.from('page text'),
        contentType: 'text/plain',
        metadata: { pages: 3 },
        processingTimeMs: 12,
        queueTimeMs: 4,
      }));

      const response = await app.inject({
        method: 'POST',
        url: '/process',
        headers: { 'content-type': 'application/pdf' },
        payload: Buffer.from('%PDF'),
      });

      expect(response.headers['content-type']).toBe('text/plain');
      expect(response.headers['x-job-metadata']).toBe('%7B%22pages%22%3A3%7D');
      expect(response.headers['x-processing-time-ms']).toBe('12');
      expect(response.headers['x-queue-time-ms']).toBe('4');
    });

    it('should deliver metadata outside Latin-1', async () => {
      workerPool.setOutcome((job) => ({
        status: 'completed',
        jobId: job.jobId,
        workerId: 0,
        artifact: Buffer.from('invoice'),
        contentType: 'text/plain',
        metadata: { title: 'Rechnung – März' },
        processingTimeMs: 1,
        queueTimeMs: 0,
      }));

      const response = await app.inject({
        method: 'POST',
        url: '/process',
        headers: { 'content-type': 'application/pdf' },
        payload: Buffer.from('%PDF'),
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['x-job-metadata']).toBe(
        '%7B%22title%22%3A%22Rechnung%20%E2%80%93%20M%C3%A4rz%22%7D',
      );
      expect(decodeURIComponent(String(response.headers['x-job-metadata']))).toBe(
        '{"title":"Rechnung – März"}',
      );
    });

    it('should stop listening for a disconnect once the artifact is returned', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process',
        headers: { 'content-type': 'application/pdf' },
        payload: Buffer.from('%PDF'),
      });

      expect(response.statusCode).toBe(200);
      await expect(tracker.settled).resolves.toBeUndefined();
      expect(tracker.closeListenersAfter).toBe(tracker.closeListenersBefore);
    });

    it('should abort the job when the client disconnects', async () => {
      const submitted: { signal?: AbortSignal } = {};
      workerPool.setOutcome((job, options) => {
        submitted.signal = options.signal;
        tracker.reply?.raw.emit('close');
        return {
          status: 'aborted',
          jobId: job.jobId,
          stage: 'processing',
          processingTimeMs: 0,
          queueTimeMs: 0,
        };
      });

      const answered = app.inject({
        method: 'POST',
        url: '/process',
        headers: { 'content-type': 'application/pdf' },
        payload: Buffer.from('%PDF'),
      });
      // The simulated disconnect may end the injected request without a response
      await answered.catch(() => undefined);
      const error = await tracker.settled;

      expect(submitted.signal?.aborted).toBe(true);
      expect(error).toMatchObject({ code: 'CLIENT_ABORTED', statusCode: 499 });
    });

    it('should answer 504 when the job times out', async () => {
      workerPool.setOutcome((job) => ({
        status: 'timed_out',
        jobId: job.jobId,
        workerId: 0,
        timeoutMs: 300_000,
        processingTimeMs: 300_000,
        queueTimeMs: 0,
      }));

      const response = await app.inject({
        method: 'POST',
        url: '/process',
        headers: { 'content-type': 'application/pdf', 'x-request-id': 'req-slow' },
        payload: Buffer.from('%PDF'),
      });

      expect(response.statusCode).toBe(504);
      expect(response.json()).toEqual({
        error: {
          category: 'timeout',
          code: 'JOB_TIMEOUT',
          message: 'Job exceeded the 300s processing deadline',
        },
        jobId: 'req-slow',
      });
    });

    it('should answer 422 when the processor rejects the document', async () => {
      workerPool.setOutcome((job) => ({
        status: 'failed',
        jobId: job.jobId,
        workerId: 0,
        error: { code: 'DOCUMENT_REJECTED', message: 'Not a PDF', rejected: true },
        processingTimeMs: 1,
        queueTimeMs: 0,
      }));

      const response = await app.inject({
        method: 'POST',
        url: '/process',
        headers: { 'content-type': 'application/octet-stream' },
        payload: Buffer.from('text'),
      });

      expect(response.statusCode).toBe(422);
      expect(response.json().error).toEqual({
        category: 'processing',
        code: 'DOCUMENT_REJECTED',
        message: 'Not a PDF',
      });
    });

    it('should answer 503 when the pool is saturated', async () => {
      workerPool.setRejection(
        new ServiceUnavailableError('QUEUE_FULL', 'All workers are busy and 16 job(s) are already waiting'),
      );

      const response = await app.inject({
        method: 'POST',
        url: '/process',
        headers: { 'content-type': 'application/pdf' },
        payload: Buffer.from('%PDF'),
      });

      expect(response.statusCode).toBe(503);
      expect(response.json().error.code).toBe('QUEUE_FULL');
    });

    it('should answer 400 for an invalid JSON body', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process',
        payload: { document: 'not base64!' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toEqual({
        category: 'transport',
        code: 'INVALID_REQUEST',
        message: 'document: document must be base64-encoded',
      });
    });

    it('should answer 400 INVALID_REQUEST for malformed JSON', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process',
        headers: { 'content-type': 'application/json' },
        payload: '{bad',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toMatchObject({
        category: 'transport',
        code: 'INVALID_REQUEST',
      });
    });

    it('should answer 413 for a document over the limit', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process',
        headers: { 'content-type': 'application/octet-stream' },
        payload: Buffer.alloc(MAX_DOCUMENT_BYTES + 1, 1),
      });

      expect(response.statusCode).toBe(413);
      expect(response.json().error.code).toBe('DOCUMENT_TOO_LARGE');
      expect(workerPool.getSubmittedJobs()).toHaveLength(0);
    });

    it('should answer 415 for other content types', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/process',
        headers: { 'content-type': 'text/csv' },
        payload: 'a,b,c',
      });

      expect(response.statusCode).toBe(415);
      expect(response.json().error).toMatchObject({
        category: 'transport',
        code: 'UNSUPPORTED_MEDIA_TYPE',
      });
    });
  });

  describe('GET /stats', () => {
    it('should return pool and worker statistics', async () => {
      const response = await app.inject({ method: 'GET', url: '/stats' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        pool: workerPool.getStats(),
        workers: [],
      });
    });
  });
});
