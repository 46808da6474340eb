import { describe, it, expect } from 'vitest';
import {
  BadRequestException,
  ConflictException,
  InternalServerErrorException,
  NotFoundException,
  PayloadTooLargeException,
} from '@nestjs/common';
import { describeError } from '../../../src/processing/filters/error-response';
import {
  JobTimeoutError,
  ProcessingFailedError,
  ServiceUnavailableError,
  TransportError,
} from '../../../src/shared/errors/job.errors';

class TestServerError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code?: string,
  ) {
    super(message);
  }
}

describe('describeError', () => {
  const requestId = 'req-1';

  describe('job errors', () => {
    it('should map a timeout to 504', () => {
      expect(describeError(new JobTimeoutError('job-1', 300_000), requestId)).toEqual({
        statusCode: 504,
        body: {
          error: {
            category: 'timeout',
            code: 'JOB_TIMEOUT',
            message: 'Job exceeded the 300s processing deadline',
          },
          jobId: 'job-1',
        },
      });
    });

    it('should map a rejected document to 422 and a processor failure to 500', () => {
      const rejected = describeError(
        new ProcessingFailedError('job-2', 'DOCUMENT_REJECTED', 'Unreadable', true),
        requestId,
      );
      const failed = describeError(
        new ProcessingFailedError('job-3', 'PROCESSING_FAILED', 'Renderer failed', false),
        requestId,
      );

      expect(rejected.statusCode).toBe(422);
      expect(rejected.body.error).toEqual({
        category: 'processing',
        code: 'DOCUMENT_REJECTED',
        message: 'Unreadable',
      });
      expect(failed.statusCode).toBe(500);
      expect(failed.body.error.message).toBe('Renderer failed');
    });

    it('should fall back to the request id when the error has no job id', () => {
      const described = describeError(new TransportError('EMPTY_DOCUMENT', 'Request has no document'), requestId);

      expect(described.statusCode).toBe(400);
      expect(described.body.jobId).toBe('req-1');
    });

    it('should map pool rejections to 503', () => {
      const described = describeError(
        new ServiceUnavailableError('SHUTTING_DOWN', 'Worker pool is shutting down'),
        requestId,
      );

      expect(described.statusCode).toBe(503);
      expect(described.body.error.category).toBe('unavailable');
    });
  });

  describe('framework errors', () => {
    it('should map client HttpExceptions to transport errors', () => {
      expect(describeError(new NotFoundException('Cannot GET /missing'), requestId)).toEqual({
        statusCode: 404,
        body: {
          error: { category: 'transport', code: 'NOT_FOUND', message: 'Cannot GET /missing' },
          jobId: 'req-1',
        },
      });
      expect(describeError(new BadRequestException('bad'), requestId).body.error.code).toBe(
        'INVALID_REQUEST',
      );
    });

    it('should map other client statuses to listed transport codes', () => {
      expect(describeError(new PayloadTooLargeException(), requestId).body.error.code).toBe(
        'DOCUMENT_TOO_LARGE',
      );
      expect(describeError(new ConflictException(), requestId)).toMatchObject({
        statusCode: 409,
        body: { error: { category: 'transport', code: 'INVALID_REQUEST' } },
      });
      expect(describeError(new TestServerError('Route not found', 404), requestId).body.error.code).toBe(
        'NOT_FOUND',
      );
    });

    it('should hide server HttpExceptions', () => {
      expect(describeError(new InternalServerErrorException('db password wrong'), requestId).body.error).toEqual({
        category: 'internal',
        code: 'INTERNAL_ERROR',
        message: 'Internal server error',
      });
    });

    it('should map body parser errors by their code', () => {
      const tooLarge = describeError(
        new TestServerError('Request body is too large', 413, 'FST_ERR_CTP_BODY_TOO_LARGE'),
        requestId,
      );
      const mediaType = describeError(
        new TestServerError('Unsupported Media Type: text/csv', 415, 'FST_ERR_CTP_INVALID_MEDIA_TYPE'),
        requestId,
      );
      const badJson = describeError(new TestServerError('Unexpected token', 400), requestId);

      expect(tooLarge.statusCode).toBe(413);
      expect(tooLarge.body.error.code).toBe('DOCUMENT_TOO_LARGE');
      expect(mediaType.body.error.code).toBe('UNSUPPORTED_MEDIA_TYPE');
      expect(badJson.body.error).toEqual({
        category: 'transport',
        code: 'INVALID_REQUEST',
        message: 'Unexpected token',
      });
    });
  });

  it('should hide unexpected errors', () => {
    expect(describeError(new Error('secret detail'), requestId)).toEqual({
      statusCode: 500,
      body: {
        error: { category: 'internal', code: 'INTERNAL_ERROR', message: 'Internal server error' },
        jobId: 'req-1',
      },
    });
    expect(describeError('a string', requestId).statusCode).toBe(500);
  });
});
