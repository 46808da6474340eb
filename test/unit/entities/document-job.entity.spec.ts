import { describe, it, expect } from 'vitest';
import { DocumentJobEntity } from '../../../src/domain/entities/document-job.entity';
import { JobStatus, JobStatusVO } from '../../../src/domain/value-objects/job-status.vo';

describe('DocumentJobEntity', () => {
  const acceptedAt = new Date('2024-05-01T10:00:00.000Z');

  const createJob = () =>
    DocumentJobEntity.create({
      jobId: 'job-entity',
      fileName: 'report.pdf',
      sizeBytes: 2048,
      options: { dpi: 150 },
      acceptedAt,
    });

  describe('create', () => {
    it('should start in ACCEPTED', () => {
      const job = createJob();

      expect(job.status.value).toBe(JobStatus.ACCEPTED);
      expect(job.isTerminal()).toBe(false);
      expect(job.durationMs).toBeUndefined();
    });

    it('should default options to an empty object', () => {
      const job = DocumentJobEntity.create({ jobId: 'job-defaults', sizeBytes: 1 });

      expect(job.options).toEqual({});
    });

    it('should require a job id', () => {
      expect(() => DocumentJobEntity.create({ jobId: ' ', sizeBytes: 1 })).toThrow(
        'Job ID is required',
      );
    });

    it('should require a positive size', () => {
      expect(() => DocumentJobEntity.create({ jobId: 'job-empty', sizeBytes: 0 })).toThrow(
        'Document size must be a positive integer',
      );
    });
  });

  describe('transitions', () => {
    it('should complete without changing the original', () => {
      const job = createJob();

      const completed = job.complete();

      expect(completed.status.isCompleted()).toBe(true);
      expect(completed.isTerminal()).toBe(true);
      expect(completed.finishedAt).toBeInstanceOf(Date);
      expect(job.status.isAccepted()).toBe(true);
      expect(job.finishedAt).toBeUndefined();
    });

    it('should record the error of a failed job', () => {
      const failed = createJob().fail('DOCUMENT_REJECTED', 'Document is encrypted');

      expect(failed.status.isFailed()).toBe(true);
      expect(failed.errorCode).toBe('DOCUMENT_REJECTED');
      expect(failed.errorMessage).toBe('Document is encrypted');
    });

    it('should record timeouts and aborts with their codes', () => {
      const timedOut = createJob().timeOut('Job exceeded the 300s processing deadline');
      const aborted = createJob().abort();

      expect(timedOut.status.value).toBe(JobStatus.TIMED_OUT);
      expect(timedOut.errorCode).toBe('JOB_TIMEOUT');
      expect(aborted.status.value).toBe(JobStatus.ABORTED);
      expect(aborted.errorCode).toBe('CLIENT_ABORTED');
    });

    it('should settle only once', () => {
      const completed = createJob().complete();

      expect(() => completed.fail('PROCESSING_FAILED', 'late failure')).toThrow(
        'Cannot transition job job-entity from COMPLETED to FAILED',
      );
    });
  });

  describe('toJSON', () => {
    it('should serialize the job', () => {
      const json = createJob().fail('PROCESSING_FAILED', 'boom').toJSON();

      expect(json).toMatchObject({
        jobId: 'job-entity',
        fileName: 'report.pdf',
        sizeBytes: 2048,
        options: { dpi: 150 },
        status: 'FAILED',
        acceptedAt: '2024-05-01T10:00:00.000Z',
        errorCode: 'PROCESSING_FAILED',
        errorMessage: 'boom',
      });
      expect(typeof json.finishedAt).toBe('string');
    });
  });
});

describe('JobStatusVO', () => {
  it('should parse case-insensitively', () => {
    expect(JobStatusVO.fromString('timed_out').equals(JobStatusVO.timedOut())).toBe(true);
  });

  it('should reject unknown statuses', () => {
    expect(() => JobStatusVO.fromString('PENDING')).toThrow('Invalid job status: PENDING');
  });

  it('should only leave ACCEPTED', () => {
    expect(JobStatusVO.accepted().canTransitionTo(JobStatusVO.aborted())).toBe(true);
    expect(JobStatusVO.failed().canTransitionTo(JobStatusVO.completed())).toBe(false);
    expect(JobStatusVO.completed().isTerminal()).toBe(true);
  });
});
