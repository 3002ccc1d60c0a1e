import { JobNotFoundError } from '../errors';
import { JobScheduler } from '../services/JobScheduler';

export interface CancelJobInput {
  jobId: string;
}

export interface CancelJobResult {
  cancelled: boolean;
}

/**
 * Command to cancel a queued or in-flight job.
 * Finished jobs, and jobs whose result is already being committed, are left alone.
 */
export class CancelJobCommand {
  constructor(private readonly scheduler: JobScheduler) {}

  async execute(input: CancelJobInput): Promise<CancelJobResult> {
    const cancelled = await this.scheduler.cancel(input.jobId);
    if (!cancelled && !(await this.scheduler.status(input.jobId))) {
      throw new JobNotFoundError(input.jobId);
    }
    return { cancelled };
  }
}
