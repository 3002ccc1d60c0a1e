export * from './errors';
export { SubmitJobCommand, SubmitJobInput } from './commands/SubmitJob';
export { CancelJobCommand, CancelJobInput, CancelJobResult } from './commands/CancelJob';
export { GetJobStatusQuery, JobListResult } from './queries/GetJobStatus';
export { JobScheduler, JobRequest, JobSchedulerOptions, SchedulerStats, JobListener } from './services/JobScheduler';
export { HealthMonitor, HealthReport, StoreHealth } from './services/HealthMonitor';
