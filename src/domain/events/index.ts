/**
 * Domain Events Barrel Export
 */
export { DomainEvent } from './base.event';
export { JobAcceptedEvent, type JobAcceptedEventPayload } from './job-accepted.event';
export { JobCompletedEvent, type JobCompletedEventPayload } from './job-completed.event';
export { JobFailedEvent, type JobFailedEventPayload } from './job-failed.event';
export { JobTimedOutEvent, type JobTimedOutEventPayload } from './job-timed-out.event';
export { JobAbortedEvent, type JobAbortedEventPayload } from './job-aborted.event';
