import { AnalysisResult } from '../value-objects/AnalysisResult';
import { Deadline } from '../value-objects/Deadline';
import { WorkingCopy } from './IRepositoryFetcher';

export interface RunRequest {
  workingCopy: WorkingCopy;
  analysisSet: string[];
  deadline: Deadline;
}

/**
 * Port for running analysis steps over a working copy.
 * Throws TimeoutError, CancelledError or AnalysisFailedError and never returns partial findings.
 */
export interface IAnalysisRunner {
  run(request: RunRequest): Promise<AnalysisResult>;
}

export const ANALYSIS_RUNNER = Symbol('IAnalysisRunner');
