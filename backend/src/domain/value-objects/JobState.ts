/**
 * Value Object representing the lifecycle state of a feedback job
 * Implements the per-attempt state machine
 */
export type JobStateValue =
  | 'pending'
  | 'fetching'
  | 'running'
  | 'storing'
  | 'succeeded'
  | 'failed'
  | 'cancelled';

export const JOB_STATE_VALUES: readonly JobStateValue[] = [
  'pending',
  'fetching',
  'running',
  'storing',
  'succeeded',
  'failed',
  'cancelled',
];

const TRANSITIONS: Record<JobStateValue, readonly JobStateValue[]> = {
  // pending -> fetching starts a new attempt
  pending: ['fetching', 'cancelled'],
  // back to pending re-enqueues the job for its next attempt
  fetching: ['running', 'pending', 'failed', 'cancelled'],
  running: ['storing', 'pending', 'failed', 'cancelled'],
  storing: ['succeeded', 'pending', 'failed', 'cancelled'],
  succeeded: [],
  failed: [],
  cancelled: [],
};

export function isJobStateValue(value: string): value is JobStateValue {
  return JOB_STATE_VALUES.some((state) => state === value);
}

export class JobState {
  private readonly _value: JobStateValue;

  private constructor(value: JobStateValue) {
    this._value = value;
  }

  static pending(): JobState {
    return new JobState('pending');
  }

  static fetching(): JobState {
    return new JobState('fetching');
  }

  static running(): JobState {
    return new JobState('running');
  }

  static storing(): JobState {
    return new JobState('storing');
  }

  static succeeded(): JobState {
    return new JobState('succeeded');
  }

  static failed(): JobState {
    return new JobState('failed');
  }

  static cancelled(): JobState {
    return new JobState('cancelled');
  }

  static fromString(value: string): JobState {
    if (!isJobStateValue(value)) {
      throw new Error(`Invalid job state: ${value}`);
    }
    return new JobState(value);
  }

  get value(): JobStateValue {
    return this._value;
  }

  get isPending(): boolean {
    return this._value === 'pending';
  }

  /**
   * Fetching, running or storing: an attempt currently owns the job.
   */
  get isInFlight(): boolean {
    return this._value === 'fetching' || this._value === 'running' || this._value === 'storing';
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this._value].length === 0;
  }

  canTransitionTo(next: JobState): boolean {
    return TRANSITIONS[this._value].includes(next._value);
  }

  equals(other: JobState): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
