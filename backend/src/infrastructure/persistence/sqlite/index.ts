export { createDatabase, createTestDatabase, runMigrations, resolveDatabasePath, MIGRATIONS, Migration } from './database';
export { SqliteResultStore } from './ResultStore';
