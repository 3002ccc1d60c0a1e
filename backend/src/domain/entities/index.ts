export { FeedbackJob, FeedbackJobProps, JobError, JobSnapshot } from './FeedbackJob';
