export type { WorkerPoolPort, SubmitJobOptions } from './worker-pool.port';
export type { EventPublisherPort } from './event-publisher.port';
