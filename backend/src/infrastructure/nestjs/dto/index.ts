export * from './job.dto';
