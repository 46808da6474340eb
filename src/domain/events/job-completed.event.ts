import { DomainEvent } from './base.event';

/**
 * Job Completed Event
 * Emitted when the processor returned an artifact
 */
export interface JobCompletedEventPayload {
  jobId: string;
  workerId: number;
  artifactSizeBytes: number;
  contentType: string;
  processingTimeMs: number;
  queueTimeMs: number;
}

export class JobCompletedEvent extends DomainEvent {
  constructor(public readonly payload: JobCompletedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.completed';
  }

  get jobId(): string {
    return this.payload.jobId;
  }

  get processingTimeMs(): number {
    return this.payload.processingTimeMs;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      payload: this.payload,
    };
  }
}
