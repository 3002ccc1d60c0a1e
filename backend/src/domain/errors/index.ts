export * from './FeedbackError';
