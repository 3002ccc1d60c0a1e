// Configuration
export * from './config';

// Persistence
export * from './persistence/sqlite';

// Git
export * from './git';

// Analysis
export * from './analysis';
export * from './parsers';

// Command Runner
export * from './runner';

// Workspaces
export * from './workspace';

// NestJS
export * from './nestjs';
