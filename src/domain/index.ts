/**
 * Domain Layer Barrel Export
 *
 * The domain layer has no framework dependencies.
 */

// Entities
export { DocumentJobEntity, type DocumentJobEntityData } from './entities/document-job.entity';

// Value Objects
export { JobStatusVO, JobStatus } from './value-objects/job-status.vo';

// Events
export * from './events';
