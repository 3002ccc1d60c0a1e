// Job DTOs
export type JobState = 'pending' | 'fetching' | 'running' | 'storing' | 'succeeded' | 'failed' | 'cancelled';

export const JOB_STATES: readonly JobState[] = [
  'pending',
  'fetching',
  'running',
  'storing',
  'succeeded',
  'failed',
  'cancelled',
];

export type ErrorKind =
  | 'AuthError'
  | 'NetworkError'
  | 'RevisionNotFound'
  | 'Timeout'
  | 'AnalysisFailed'
  | 'PersistenceError'
  | 'Overloaded'
  | 'Cancelled'
  | 'Interrupted';

export interface JobErrorDto {
  kind: ErrorKind;
  message: string;
}

export interface JobDto {
  id: string;
  repositoryUrl: string;
  revision: string;
  analysisSet: string[];
  state: JobState;
  attempt: number;
  maxAttempts: number;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  updatedAt: string;
  nextRetryAt: string | null;
  lastError: JobErrorDto | null;
}

export interface JobListDto {
  jobs: JobDto[];
  total: number;
}

export interface CreateJobRequest {
  repositoryUrl: string;
  revision: string;
  analysisSet?: string[];
}

export interface CancelJobResponse {
  cancelled: boolean;
}

export interface JobEventDto {
  id: number;
  attempt: number;
  state: JobState;
  error: JobErrorDto | null;
  recordedAt: string;
}

export interface JobStatsDto {
  counts: Record<JobState, number>;
  total: number;
}

// Result DTOs
export type Severity = 'error' | 'warning' | 'info';

export interface FindingDto {
  ruleId: string;
  step: string;
  severity: Severity;
  message: string;
  location: {
    path: string;
    line: number;
    column?: number;
  };
}

export interface StepSummaryDto {
  step: string;
  kind: 'command' | 'pattern' | 'required-files';
  findingCount: number;
  exitCode: number | null;
}

export interface ResultDto {
  jobId: string;
  attempt: number;
  passed: boolean;
  checksum: string;
  counts: Record<Severity, number>;
  findings: FindingDto[];
  steps: StepSummaryDto[];
  createdAt: string;
}

// Health DTOs
export interface HealthDto {
  status: 'ok' | 'degraded';
  accepting: boolean;
  checks: {
    store: { status: 'up' } | { status: 'down'; error: string };
    scheduler: {
      running: boolean;
      active: number;
      queued: number;
      delayed: number;
      capacity: number;
      workers: number;
    };
  };
  checkedAt: string;
}

// Error response shape produced by the API
export interface ApiErrorDto {
  statusCode: number;
  message: string | string[];
  error?: string;
}
