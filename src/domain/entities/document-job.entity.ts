import { produce } from 'immer';
import { JobStatusVO } from '../value-objects/job-status.vo';
import type { JobOptions } from '../../shared/interfaces/document-job.interface';

/**
 * Document Job Entity
 * One processing request, from acceptance to its single terminal state.
 *
 * Same shape as the other entities: data in a readonly interface, behaviour in
 * namespace functions, and `create` returning data with the methods attached.
 * The document bytes are not part of the entity; only their size is.
 */

export interface DocumentJobEntityData {
  readonly jobId: string;
  readonly fileName?: string;
  readonly sizeBytes: number;
  readonly options: Readonly<JobOptions>;
  readonly status: JobStatusVO;
  readonly acceptedAt: Date;
  readonly finishedAt?: Date;
  readonly errorCode?: string;
  readonly errorMessage?: string;
}

export interface DocumentJobEntity extends DocumentJobEntityData {
  readonly durationMs: number | undefined;

  isTerminal(): boolean;

  complete(): DocumentJobEntity;
  fail(errorCode: string, errorMessage: string): DocumentJobEntity;
  timeOut(errorMessage: string): DocumentJobEntity;
  abort(): DocumentJobEntity;

  toJSON(): ReturnType<typeof DocumentJobEntity.toJSON>;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace DocumentJobEntity {
  export interface CreateProps {
    jobId: string;
    fileName?: string;
    sizeBytes: number;
    options?: JobOptions;
    acceptedAt?: Date;
  }

  export function create(props: CreateProps): DocumentJobEntity {
    validate(props);

    return attachMethods({
      jobId: props.jobId,
      fileName: props.fileName,
      sizeBytes: props.sizeBytes,
      options: props.options ?? {},
      status: JobStatusVO.accepted(),
      acceptedAt: props.acceptedAt ?? new Date(),
    });
  }

  function attachMethods(data: DocumentJobEntityData): DocumentJobEntity {
    return {
      ...data,

      get durationMs() {
        return durationMs(data);
      },

      isTerminal: () => data.status.isTerminal(),

      complete: () => transition(data, JobStatusVO.completed()),
      fail: (errorCode: string, errorMessage: string) =>
        transition(data, JobStatusVO.failed(), errorCode, errorMessage),
      timeOut: (errorMessage: string) =>
        transition(data, JobStatusVO.timedOut(), 'JOB_TIMEOUT', errorMessage),
      abort: () =>
        transition(data, JobStatusVO.aborted(), 'CLIENT_ABORTED', 'Client closed the connection'),

      toJSON: () => toJSON(data),
    };
  }

  function validate(props: CreateProps): void {
    if (!props.jobId || props.jobId.trim().length === 0) {
      throw new Error('Job ID is required');
    }
    if (!Number.isInteger(props.sizeBytes) || props.sizeBytes <= 0) {
      throw new Error('Document size must be a positive integer');
    }
  }

  export function durationMs(job: DocumentJobEntityData): number | undefined {
    return job.finishedAt ? job.finishedAt.getTime() - job.acceptedAt.getTime() : undefined;
  }

  /**
   * Move to a terminal state. A job settles once; a second settlement is a
   * programming error.
   */
  function transition(
    job: DocumentJobEntityData,
    next: JobStatusVO,
    errorCode?: string,
    errorMessage?: string,
  ): DocumentJobEntity {
    if (!job.status.canTransitionTo(next)) {
      throw new Error(`Cannot transition job ${job.jobId} from ${job.status} to ${next}`);
    }

    const updated = produce(job, (draft) => {
      draft.status = next;
      draft.finishedAt = new Date();
      draft.errorCode = errorCode;
      draft.errorMessage = errorMessage;
    });

    return attachMethods(updated);
  }

  export function toJSON(job: DocumentJobEntityData) {
    return {
      jobId: job.jobId,
      fileName: job.fileName,
      sizeBytes: job.sizeBytes,
      options: job.options,
      status: job.status.value,
      acceptedAt: job.acceptedAt.toISOString(),
      finishedAt: job.finishedAt?.toISOString(),
      durationMs: durationMs(job),
      errorCode: job.errorCode,
      errorMessage: job.errorMessage,
    };
  }
}
