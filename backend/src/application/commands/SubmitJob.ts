import { JobSnapshot } from '../../domain/entities/FeedbackJob';
import { RepositoryRef } from '../../domain/value-objects/RepositoryRef';
import { AnalysisCatalog } from '../../infrastructure/analysis/AnalysisCatalog';
import { InvalidJobRequestError } from '../errors';
import { JobScheduler } from '../services/JobScheduler';

export interface SubmitJobInput {
  repositoryUrl: string;
  revision: string;
  analysisSet?: string[];
}

/**
 * Command to validate a job request against the catalog and hand it to the scheduler.
 */
export class SubmitJobCommand {
  constructor(
    private readonly scheduler: JobScheduler,
    private readonly catalog: AnalysisCatalog,
  ) {}

  async execute(input: SubmitJobInput): Promise<JobSnapshot> {
    let repository: RepositoryRef;
    try {
      repository = RepositoryRef.create(input.repositoryUrl, input.revision);
    } catch (error) {
      throw new InvalidJobRequestError(error instanceof Error ? error.message : String(error));
    }

    const analysisSet = [...new Set(input.analysisSet ?? this.catalog.defaultSet)];
    if (analysisSet.length === 0) {
      throw new InvalidJobRequestError('analysisSet cannot be empty');
    }
    const unknown = this.catalog.unknownSteps(analysisSet);
    if (unknown.length > 0) {
      throw new InvalidJobRequestError(`Unknown analysis step(s): ${unknown.join(', ')}`);
    }

    const jobId = await this.scheduler.submit({ repository, analysisSet });
    const snapshot = await this.scheduler.status(jobId);
    if (!snapshot) {
      throw new Error(`Job ${jobId} disappeared after submission`);
    }
    return snapshot;
  }
}
