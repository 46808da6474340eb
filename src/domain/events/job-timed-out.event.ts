import { DomainEvent } from './base.event';

/**
 * Job Timed Out Event
 * Emitted when a job overran its deadline and its worker was terminated
 */
export interface JobTimedOutEventPayload {
  jobId: string;
  workerId: number;
  timeoutMs: number;
}

export class JobTimedOutEvent extends DomainEvent {
  constructor(public readonly payload: JobTimedOutEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.timed-out';
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
