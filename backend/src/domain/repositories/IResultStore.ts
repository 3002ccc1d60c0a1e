import { FeedbackJob, JobError } from '../entities/FeedbackJob';
import { AnalysisResult } from '../value-objects/AnalysisResult';
import { JobStateValue } from '../value-objects/JobState';

export interface StoreAck {
  jobId: string;
  attempt: number;
  checksum: string;
  /** True when this exact result was already stored by an earlier delivery. */
  duplicate: boolean;
}

export interface PersistedResult {
  jobId: string;
  attempt: number;
  result: AnalysisResult;
  createdAt: Date;
}

export interface JobEvent {
  id: number;
  jobId: string;
  attempt: number;
  state: JobStateValue;
  error: JobError | null;
  recordedAt: Date;
}

export interface ListJobsFilter {
  state?: JobStateValue;
  limit?: number;
}

/**
 * Repository interface (port) for durable job state and analysis results.
 * Every method throws PersistenceError on storage failure.
 */
export interface IResultStore {
  /** Upserts the job row and appends a job event in one transaction. */
  saveJob(job: FeedbackJob): Promise<void>;

  /**
   * Stores the result of a successful attempt and marks the job succeeded,
   * in one transaction. Re-delivering the same (jobId, attempt, result) is a no-op;
   * a different result for the same pair is a non-retryable conflict.
   */
  upsert(jobId: string, attempt: number, result: AnalysisResult): Promise<StoreAck>;

  get(jobId: string): Promise<PersistedResult | null>;
  findJob(jobId: string): Promise<FeedbackJob | null>;
  /** Jobs not in a terminal state, oldest first. */
  findUnfinished(): Promise<FeedbackJob[]>;
  listJobs(filter?: ListJobsFilter): Promise<FeedbackJob[]>;
  listEvents(jobId: string): Promise<JobEvent[]>;
  countByState(): Promise<Record<JobStateValue, number>>;
  /** Resolves when the store answers a trivial query. */
  ping(): Promise<void>;
}

export const RESULT_STORE = Symbol('IResultStore');
