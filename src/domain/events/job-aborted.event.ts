import { DomainEvent } from './base.event';

export interface JobAbortedEventPayload {
  jobId: string;
  stage: 'queued' | 'processing';
}

export class JobAbortedEvent extends DomainEvent {
  constructor(public readonly payload: JobAbortedEventPayload) {
    super();
  }

  get eventName(): string {
    return 'job.aborted';
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
