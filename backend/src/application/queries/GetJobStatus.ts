import { JobSnapshot } from '../../domain/entities/FeedbackJob';
import { JobEvent, IResultStore, ListJobsFilter, PersistedResult } from '../../domain/repositories/IResultStore';
import { JobStateValue } from '../../domain/value-objects/JobState';
import { JobNotFoundError } from '../errors';
import { JobScheduler } from '../services/JobScheduler';

export interface JobListResult {
  jobs: JobSnapshot[];
  total: number;
}

/**
 * Query to get job status, results and history
 */
export class GetJobStatusQuery {
  constructor(
    private readonly scheduler: JobScheduler,
    private readonly store: IResultStore,
  ) {}

  async getById(jobId: string): Promise<JobSnapshot> {
    const snapshot = await this.scheduler.status(jobId);
    if (!snapshot) {
      throw new JobNotFoundError(jobId);
    }
    return snapshot;
  }

  async list(filter: ListJobsFilter = {}): Promise<JobListResult> {
    const jobs = await this.store.listJobs(filter);
    // In-flight jobs are fresher in memory than in the store.
    const snapshots = await Promise.all(
      jobs.map(async (job) => (await this.scheduler.status(job.id)) ?? job.toSnapshot()),
    );
    return { jobs: snapshots, total: snapshots.length };
  }

  /**
   * Null while the job has no stored result (still running, failed or cancelled).
   */
  async getResult(jobId: string): Promise<PersistedResult | null> {
    await this.getById(jobId);
    return this.store.get(jobId);
  }

  async listEvents(jobId: string): Promise<JobEvent[]> {
    await this.getById(jobId);
    return this.store.listEvents(jobId);
  }

  async countByState(): Promise<Record<JobStateValue, number>> {
    return this.store.countByState();
  }
}
