// External service ports (interfaces)
export * from './ICommandRunner';
export * from './IRepositoryFetcher';
export * from './IAnalysisRunner';
export * from './IWorkspaceManager';
