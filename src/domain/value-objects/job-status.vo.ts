/**
 * Job Status Value Object
 * Lifecycle of one document job: accepted on arrival, then exactly one
 * terminal state.
 */
export enum JobStatus {
  ACCEPTED = 'ACCEPTED',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  TIMED_OUT = 'TIMED_OUT',
  ABORTED = 'ABORTED',
}

function isJobStatus(value: string): value is JobStatus {
  return Object.values<string>(JobStatus).includes(value);
}

export class JobStatusVO {
  private constructor(private readonly _value: JobStatus) {}

  static fromString(value: string): JobStatusVO {
    const normalizedValue = value.toUpperCase();
    if (!isJobStatus(normalizedValue)) {
      throw new Error(`Invalid job status: ${value}`);
    }
    return new JobStatusVO(normalizedValue);
  }

  static accepted(): JobStatusVO {
    return new JobStatusVO(JobStatus.ACCEPTED);
  }

  static completed(): JobStatusVO {
    return new JobStatusVO(JobStatus.COMPLETED);
  }

  static failed(): JobStatusVO {
    return new JobStatusVO(JobStatus.FAILED);
  }

  static timedOut(): JobStatusVO {
    return new JobStatusVO(JobStatus.TIMED_OUT);
  }

  static aborted(): JobStatusVO {
    return new JobStatusVO(JobStatus.ABORTED);
  }

  get value(): JobStatus {
    return this._value;
  }

  isTerminal(): boolean {
    return this._value !== JobStatus.ACCEPTED;
  }

  isAccepted(): boolean {
    return this._value === JobStatus.ACCEPTED;
  }

  isCompleted(): boolean {
    return this._value === JobStatus.COMPLETED;
  }

  isFailed(): boolean {
    return this._value === JobStatus.FAILED;
  }

  canTransitionTo(newStatus: JobStatusVO): boolean {
    const transitions: Record<JobStatus, JobStatus[]> = {
      [JobStatus.ACCEPTED]: [
        JobStatus.COMPLETED,
        JobStatus.FAILED,
        JobStatus.TIMED_OUT,
        JobStatus.ABORTED,
      ],
      [JobStatus.COMPLETED]: [],
      [JobStatus.FAILED]: [],
      [JobStatus.TIMED_OUT]: [],
      [JobStatus.ABORTED]: [],
    };

    return transitions[this._value].includes(newStatus._value);
  }

  equals(other: JobStatusVO): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
