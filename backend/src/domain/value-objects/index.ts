export * from './JobState';
export * from './RepositoryRef';
export * from './RetryPolicy';
export * from './Deadline';
export * from './Finding';
export * from './AnalysisResult';
export * from './AnalysisStep';
