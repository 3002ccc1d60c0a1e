import { v4 as uuidv4 } from 'uuid';
import { FeedbackErrorKind } from '../errors';
import { JobState, JobStateValue } from '../value-objects/JobState';
import { RepositoryRef } from '../value-objects/RepositoryRef';

export interface JobError {
  kind: FeedbackErrorKind;
  message: string;
}

export interface FeedbackJobProps {
  id?: string;
  repository: RepositoryRef;
  analysisSet: string[];
  state?: JobState;
  attempt?: number;
  maxAttempts: number;
  createdAt?: Date;
  startedAt?: Date | null;
  finishedAt?: Date | null;
  updatedAt?: Date;
  nextRetryAt?: Date | null;
  lastError?: JobError | null;
}

/**
 * Read-only copy of a job handed out by `status()`.
 */
export interface JobSnapshot {
  id: string;
  repositoryUrl: string;
  revision: string;
  analysisSet: string[];
  state: JobStateValue;
  attempt: number;
  maxAttempts: number;
  createdAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  updatedAt: Date;
  nextRetryAt: Date | null;
  lastError: JobError | null;
}

/**
 * Entity representing one request to analyze a repository revision.
 * Every state change goes through `transitionTo`, so an illegal sequence throws.
 */
export class FeedbackJob {
  private readonly _id: string;
  private readonly _repository: RepositoryRef;
  private readonly _analysisSet: string[];
  private _state: JobState;
  private _attempt: number;
  private readonly _maxAttempts: number;
  private readonly _createdAt: Date;
  private _startedAt: Date | null;
  private _finishedAt: Date | null;
  private _updatedAt: Date;
  private _nextRetryAt: Date | null;
  private _lastError: JobError | null;

  private constructor(props: FeedbackJobProps) {
    this._id = props.id || uuidv4();
    this._repository = props.repository;
    this._analysisSet = [...props.analysisSet];
    this._state = props.state || JobState.pending();
    this._attempt = props.attempt ?? 0;
    this._maxAttempts = props.maxAttempts;
    this._createdAt = props.createdAt || new Date();
    this._startedAt = props.startedAt ?? null;
    this._finishedAt = props.finishedAt ?? null;
    this._updatedAt = props.updatedAt || this._createdAt;
    this._nextRetryAt = props.nextRetryAt ?? null;
    this._lastError = props.lastError ?? null;
  }

  static create(props: Pick<FeedbackJobProps, 'repository' | 'analysisSet' | 'maxAttempts'>): FeedbackJob {
    if (!Number.isInteger(props.maxAttempts) || props.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${props.maxAttempts}`);
    }
    return new FeedbackJob(props);
  }

  static reconstitute(props: FeedbackJobProps): FeedbackJob {
    return new FeedbackJob(props);
  }

  get id(): string {
    return this._id;
  }

  get repository(): RepositoryRef {
    return this._repository;
  }

  get analysisSet(): string[] {
    return [...this._analysisSet];
  }

  get state(): JobState {
    return this._state;
  }

  get attempt(): number {
    return this._attempt;
  }

  get maxAttempts(): number {
    return this._maxAttempts;
  }

  get createdAt(): Date {
    return this._createdAt;
  }

  get startedAt(): Date | null {
    return this._startedAt;
  }

  get finishedAt(): Date | null {
    return this._finishedAt;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get nextRetryAt(): Date | null {
    return this._nextRetryAt;
  }

  get lastError(): JobError | null {
    return this._lastError;
  }

  get hasAttemptsLeft(): boolean {
    return this._attempt < this._maxAttempts;
  }

  /**
   * Starts a new attempt.
   */
  beginFetching(): void {
    if (!this.hasAttemptsLeft) {
      throw new Error(`Job ${this._id} has used all ${this._maxAttempts} attempts`);
    }
    this.transitionTo(JobState.fetching());
    this._attempt += 1;
    this._startedAt = this._startedAt ?? this._updatedAt;
    this._nextRetryAt = null;
  }

  beginRunning(): void {
    this.transitionTo(JobState.running());
  }

  beginStoring(): void {
    this.transitionTo(JobState.storing());
  }

  succeed(): void {
    this.transitionTo(JobState.succeeded());
    this._finishedAt = this._updatedAt;
    this._lastError = null;
  }

  fail(error: JobError): void {
    this.transitionTo(JobState.failed());
    this._finishedAt = this._updatedAt;
    this._lastError = { ...error };
  }

  cancel(message = 'Cancelled by request'): void {
    this.transitionTo(JobState.cancelled());
    this._finishedAt = this._updatedAt;
    this._nextRetryAt = null;
    this._lastError = { kind: 'Cancelled', message };
  }

  /**
   * Returns the job to the queue for its next attempt.
   */
  scheduleRetry(error: JobError, at: Date): void {
    if (!this.hasAttemptsLeft) {
      throw new Error(`Job ${this._id} has no attempts left to retry`);
    }
    this.transitionTo(JobState.pending());
    this._lastError = { ...error };
    this._nextRetryAt = at;
  }

  /**
   * Settles a job whose attempt was cut off by a process stop: requeued
   * when the budget allows, failed as Interrupted otherwise.
   */
  recoverInterrupted(): 'requeued' | 'failed' {
    const error: JobError = {
      kind: 'Interrupted',
      message: `Attempt ${this._attempt} was interrupted while ${this._state.value}`,
    };
    if (this.hasAttemptsLeft) {
      this.scheduleRetry(error, new Date());
      return 'requeued';
    }
    this.fail(error);
    return 'failed';
  }

  toSnapshot(): JobSnapshot {
    return {
      id: this._id,
      repositoryUrl: this._repository.url,
      revision: this._repository.revision,
      analysisSet: [...this._analysisSet],
      state: this._state.value,
      attempt: this._attempt,
      maxAttempts: this._maxAttempts,
      createdAt: this._createdAt,
      startedAt: this._startedAt,
      finishedAt: this._finishedAt,
      updatedAt: this._updatedAt,
      nextRetryAt: this._nextRetryAt,
      lastError: this._lastError ? { ...this._lastError } : null,
    };
  }

  private transitionTo(next: JobState): void {
    if (!this._state.canTransitionTo(next)) {
      throw new Error(`Invalid state transition from ${this._state.value} to ${next.value}`);
    }
    this._state = next;
    this._updatedAt = new Date();
  }

  equals(other: FeedbackJob): boolean {
    return this._id === other._id;
  }
}
