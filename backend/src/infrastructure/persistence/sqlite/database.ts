import Database from 'better-sqlite3';
import { createHash } from 'crypto';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

export interface Migration {
  version: number;
  name: string;
  sql: string;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'create_jobs',
    sql: `
      CREATE TABLE jobs (
        id TEXT PRIMARY KEY,
        repository_url TEXT NOT NULL,
        revision TEXT NOT NULL,
        analysis_set TEXT NOT NULL,
        state TEXT NOT NULL DEFAULT 'pending',
        attempt INTEGER NOT NULL DEFAULT 0,
        max_attempts INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        started_at TEXT,
        finished_at TEXT,
        updated_at TEXT NOT NULL,
        next_retry_at TEXT,
        last_error_kind TEXT,
        last_error_message TEXT
      );

      CREATE TABLE job_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        job_id TEXT NOT NULL,
        attempt INTEGER NOT NULL,
        state TEXT NOT NULL,
        error_kind TEXT,
        error_message TEXT,
        recorded_at TEXT NOT NULL,
        FOREIGN KEY (job_id) REFERENCES jobs(id) ON DELETE CASCADE
      );

      CREATE INDEX idx_jobs_state ON jobs(state);
      CREATE INDEX idx_jobs_created_at ON jobs(created_at);
      CREATE INDEX idx_job_events_job ON job_events(job_id);
    `,
  },
  {
    version: 2,
    name: 'create_analysis_results',
    sql: `
      CREATE TABLE analysis_results (
        job_id TEXT NOT NULL,
        attempt INTEGER NOT NULL,
        passed INTEGER NOT NULL,
        finding_count INTEGER NOT NULL,
        result_json TEXT NOT NULL,
        checksum TEXT NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY (job_id, attempt),
        FOREIGN KEY (job_id) REFERENCES jobs(id) ON DELETE CASCADE
      );
    `,
  },
];

interface AppliedMigrationRow {
  version: number;
  name: string;
  checksum: string;
}

export function migrationChecksum(migration: Migration): string {
  return createHash('sha256').update(migration.sql).digest('hex');
}

/**
 * Applies pending migrations in version order, each in its own transaction.
 * Throws if an applied migration's SQL no longer matches its recorded checksum.
 */
export function runMigrations(database: Database.Database, migrations: readonly Migration[] = MIGRATIONS): number[] {
  database.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      checksum TEXT NOT NULL,
      applied_at TEXT NOT NULL
    )
  `);

  const applied = new Map<number, AppliedMigrationRow>();
  const rows = database.prepare('SELECT version, name, checksum FROM schema_migrations').all() as AppliedMigrationRow[];
  for (const row of rows) {
    applied.set(row.version, row);
  }

  const newlyApplied: number[] = [];
  const ordered = [...migrations].sort((a, b) => a.version - b.version);
  for (const migration of ordered) {
    const checksum = migrationChecksum(migration);
    const existing = applied.get(migration.version);
    if (existing) {
      if (existing.checksum !== checksum) {
        throw new Error(
          `Migration ${migration.version} (${migration.name}) was modified after it was applied`,
        );
      }
      continue;
    }

    const apply = database.transaction(() => {
      database.exec(migration.sql);
      database
        .prepare('INSERT INTO schema_migrations (version, name, checksum, applied_at) VALUES (?, ?, ?, ?)')
        .run(migration.version, migration.name, checksum, new Date().toISOString());
    });
    apply();
    newlyApplied.push(migration.version);
  }
  return newlyApplied;
}

/**
 * Turns DATABASE_URL into a better-sqlite3 filename.
 * Accepts `sqlite:` / `sqlite://` / `file:` prefixes, bare paths and `:memory:`.
 */
export function resolveDatabasePath(url: string): string {
  const value = url.trim().replace(/\?.*$/, '');
  if (value === '') {
    throw new Error('DATABASE_URL cannot be empty');
  }

  let path = value;
  if (/^sqlite:\/\//i.test(path)) {
    path = path.slice('sqlite://'.length);
  } else if (/^sqlite:/i.test(path)) {
    path = path.slice('sqlite:'.length);
  } else if (/^file:\/\//i.test(path)) {
    path = path.slice('file://'.length);
  } else if (/^file:/i.test(path)) {
    path = path.slice('file:'.length);
  } else if (/^[a-z][a-z0-9+.-]*:\/\//i.test(path)) {
    throw new Error(`Unsupported DATABASE_URL scheme: ${value.split(':')[0]}`);
  }

  if (path === '' || path === ':memory:') {
    return ':memory:';
  }
  return path;
}

/**
 * Create a new database connection for a DATABASE_URL and bring its schema up to date
 */
export function createDatabase(url: string): Database.Database {
  const path = resolveDatabasePath(url);
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
  const database = new Database(path);
  database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');
  database.pragma('busy_timeout = 5000');
  runMigrations(database);
  return database;
}

// For testing purposes
export function createTestDatabase(): Database.Database {
  return createDatabase(':memory:');
}
