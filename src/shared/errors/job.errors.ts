/**
 * Error taxonomy for document jobs.
 *
 * Every error that can end a request is one of these categories. The HTTP
 * layer turns them into `{ error: { category, code, message }, jobId }`
 * responses; see `processing/filters/error-response.ts`.
 */
export enum JobErrorCategory {
  TIMEOUT = 'timeout',
  PROCESSING = 'processing',
  TRANSPORT = 'transport',
  UNAVAILABLE = 'unavailable',
  INTERNAL = 'internal',
}

export abstract class JobError extends Error {
  abstract readonly category: JobErrorCategory;
  abstract readonly statusCode: number;

  protected constructor(
    message: string,
    public readonly code: string,
    public readonly jobId?: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class JobTimeoutError extends JobError {
  readonly category = JobErrorCategory.TIMEOUT;
  readonly statusCode = 504;

  constructor(
    jobId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Job exceeded the ${timeoutMs / 1000}s processing deadline`, 'JOB_TIMEOUT', jobId);
  }
}

export class ProcessingFailedError extends JobError {
  readonly category = JobErrorCategory.PROCESSING;
  readonly statusCode: number;

  constructor(
    jobId: string,
    code: string,
    message: string,
    public readonly rejected: boolean,
  ) {
    super(message, code, jobId);
    this.statusCode = rejected ? 422 : 500;
  }
}

export type TransportErrorCode =
  | 'EMPTY_DOCUMENT'
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'DOCUMENT_TOO_LARGE'
  | 'UNSUPPORTED_MEDIA_TYPE'
  | 'CLIENT_ABORTED';

const TRANSPORT_STATUS: Record<TransportErrorCode, number> = {
  EMPTY_DOCUMENT: 400,
  INVALID_REQUEST: 400,
  NOT_FOUND: 404,
  DOCUMENT_TOO_LARGE: 413,
  UNSUPPORTED_MEDIA_TYPE: 415,
  // Non-standard; the client is gone so nobody sees it outside the logs.
  CLIENT_ABORTED: 499,
};

export class TransportError extends JobError {
  readonly category = JobErrorCategory.TRANSPORT;
  readonly statusCode: number;

  constructor(code: TransportErrorCode, message: string, jobId?: string) {
    super(message, code, jobId);
    this.statusCode = TRANSPORT_STATUS[code];
  }
}

export type UnavailableErrorCode = 'QUEUE_FULL' | 'QUEUE_TIMEOUT' | 'SHUTTING_DOWN';

export class ServiceUnavailableError extends JobError {
  readonly category = JobErrorCategory.UNAVAILABLE;
  readonly statusCode = 503;

  constructor(code: UnavailableErrorCode, message: string, jobId?: string) {
    super(message, code, jobId);
  }
}
