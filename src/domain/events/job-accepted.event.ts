import { DomainEvent } from './base.event';
import type { JobOptions } from '../../shared/interfaces/document-job.interface';

/**
 * Job Accepted Event
 * Emitted when a request passes validation and is handed to the worker pool
 */
export interface JobAcceptedEventPayload {
  jobId: string;
  fileName?: string;
  sizeBytes: number;
  options: JobOptions;
}

export class JobAcceptedEvent extends DomainEvent {
  constructor(public readonly payload: JobAcceptedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.accepted';
  }

  get jobId(): string {
    return this.payload.jobId;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
