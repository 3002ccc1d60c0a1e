export { JobsController } from './jobs.controller';
export { HealthController } from './health.controller';
