import { DomainEvent } from './base.event';

/**
 * Job Failed Event
 * Emitted when a job ends without an artifact for any reason other than its
 * deadline or a client abort
 */
export interface JobFailedEventPayload {
  jobId: string;
  /** Absent when the job never reached a worker. */
  workerId?: number;
  errorCode: string;
  errorMessage: string;
  rejected: boolean;
  processingTimeMs: number;
}

export class JobFailedEvent extends DomainEvent {
  constructor(public readonly payload: JobFailedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.failed';
  }

  get jobId(): string {
    return this.payload.jobId;
  }

  get errorCode(): string {
    return this.payload.errorCode;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
