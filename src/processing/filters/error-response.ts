import { HttpException, HttpStatus } from '@nestjs/common';
import {
  JobError,
  JobErrorCategory,
  type TransportErrorCode,
} from '../../shared/errors/job.errors';

export interface ErrorResponseBody {
  error: {
    category: JobErrorCategory;
    code: string;
    message: string;
  };
  jobId: string;
}

export interface ErrorResponse {
  statusCode: number;
  body: ErrorResponseBody;
}

/** Errors raised by the HTTP server itself, e.g. while reading the body. */
interface ServerError extends Error {
  statusCode: number;
  code?: string;
}

const SERVER_ERROR_CODES: Record<string, TransportErrorCode> = {
  FST_ERR_CTP_BODY_TOO_LARGE: 'DOCUMENT_TOO_LARGE',
  FST_ERR_CTP_INVALID_MEDIA_TYPE: 'UNSUPPORTED_MEDIA_TYPE',
  FST_ERR_CTP_EMPTY_JSON_BODY: 'EMPTY_DOCUMENT',
};

const STATUS_CODES: Partial<Record<number, TransportErrorCode>> = {
  [HttpStatus.NOT_FOUND]: 'NOT_FOUND',
  [HttpStatus.PAYLOAD_TOO_LARGE]: 'DOCUMENT_TOO_LARGE',
  [HttpStatus.UNSUPPORTED_MEDIA_TYPE]: 'UNSUPPORTED_MEDIA_TYPE',
};

function transportCode(statusCode: number, serverCode?: string): TransportErrorCode {
  return (
    (serverCode && SERVER_ERROR_CODES[serverCode]) || STATUS_CODES[statusCode] || 'INVALID_REQUEST'
  );
}

const INTERNAL_ERROR_MESSAGE = 'Internal server error';

function isServerError(error: unknown): error is ServerError {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  );
}

function response(
  statusCode: number,
  category: JobErrorCategory,
  code: string,
  message: string,
  jobId: string,
): ErrorResponse {
  return { statusCode, body: { error: { category, code, message }, jobId } };
}

function internal(jobId: string): ErrorResponse {
  return response(
    HttpStatus.INTERNAL_SERVER_ERROR,
    JobErrorCategory.INTERNAL,
    'INTERNAL_ERROR',
    INTERNAL_ERROR_MESSAGE,
    jobId,
  );
}

/**
 * Map anything thrown while serving a request to its status and JSON body.
 *
 * JobErrors carry their own category, code and status. Framework errors are
 * mapped by status: 4xx become `transport` with a transport code (unlisted
 * statuses fall back to INVALID_REQUEST), everything else `internal`, whose
 * message is never exposed.
 */
export function describeError(error: unknown, requestId: string): ErrorResponse {
  if (error instanceof JobError) {
    return response(
      error.statusCode,
      error.category,
      error.code,
      error.message,
      error.jobId ?? requestId,
    );
  }

  if (error instanceof HttpException) {
    const statusCode = error.getStatus();
    if (statusCode >= 500) return internal(requestId);

    return response(
      statusCode,
      JobErrorCategory.TRANSPORT,
      transportCode(statusCode),
      error.message,
      requestId,
    );
  }

  if (isServerError(error) && error.statusCode >= 400 && error.statusCode < 500) {
    return response(
      error.statusCode,
      JobErrorCategory.TRANSPORT,
      transportCode(error.statusCode, error.code),
      error.message,
      requestId,
    );
  }

  return internal(requestId);
}
