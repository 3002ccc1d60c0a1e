import Database from 'better-sqlite3';
import { FeedbackJob, JobError } from '../../../domain/entities/FeedbackJob';
import { PersistenceError, describeError, isFeedbackErrorKind } from '../../../domain/errors';
import {
  IResultStore,
  JobEvent,
  ListJobsFilter,
  PersistedResult,
  StoreAck,
} from '../../../domain/repositories/IResultStore';
import { AnalysisResult } from '../../../domain/value-objects/AnalysisResult';
import { JOB_STATE_VALUES, JobState, JobStateValue } from '../../../domain/value-objects/JobState';
import { RepositoryRef } from '../../../domain/value-objects/RepositoryRef';

interface JobRow {
  id: string;
  repository_url: string;
  revision: string;
  analysis_set: string;
  state: string;
  attempt: number;
  max_attempts: number;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
  updated_at: string;
  next_retry_at: string | null;
  last_error_kind: string | null;
  last_error_message: string | null;
}

interface ResultRow {
  job_id: string;
  attempt: number;
  result_json: string;
  checksum: string;
  created_at: string;
}

interface EventRow {
  id: number;
  job_id: string;
  attempt: number;
  state: string;
  error_kind: string | null;
  error_message: string | null;
  recorded_at: string;
}

const TERMINAL_STATES = "('succeeded', 'failed', 'cancelled')";
const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 500;

/**
 * SQLite-backed store for job rows, job events and analysis results
 */
export class SqliteResultStore implements IResultStore {
  constructor(private readonly db: Database.Database) {}

  async saveJob(job: FeedbackJob): Promise<void> {
    this.guard('save job', () => {
      const upsertJob = this.db.prepare(`
        INSERT INTO jobs (
          id, repository_url, revision, analysis_set, state, attempt, max_attempts,
          created_at, started_at, finished_at, updated_at, next_retry_at, last_error_kind, last_error_message
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          state = excluded.state,
          attempt = excluded.attempt,
          started_at = excluded.started_at,
          finished_at = excluded.finished_at,
          updated_at = excluded.updated_at,
          next_retry_at = excluded.next_retry_at,
          last_error_kind = excluded.last_error_kind,
          last_error_message = excluded.last_error_message
        WHERE jobs.state NOT IN ${TERMINAL_STATES}
      `);
      const write = this.db.transaction(() => {
        const info = upsertJob.run(
          job.id,
          job.repository.url,
          job.repository.revision,
          JSON.stringify(job.analysisSet),
          job.state.value,
          job.attempt,
          job.maxAttempts,
          job.createdAt.toISOString(),
          toIso(job.startedAt),
          toIso(job.finishedAt),
          job.updatedAt.toISOString(),
          toIso(job.nextRetryAt),
          job.lastError?.kind ?? null,
          job.lastError?.message ?? null,
        );
        if (info.changes === 0) {
          throw new PersistenceError(`Job ${job.id} is already finished`, { retryable: false });
        }
        // A pending row belongs to the attempt it is waiting for.
        const eventAttempt = job.state.isPending ? job.attempt + 1 : job.attempt;
        this.appendEvent(job.id, eventAttempt, job.state.value, job.lastError, job.updatedAt);
      });
      write();
    });
  }

  async upsert(jobId: string, attempt: number, result: AnalysisResult): Promise<StoreAck> {
    return this.guard('store result', () => {
      const write = this.db.transaction((): StoreAck => {
        const existing = this.db
          .prepare('SELECT checksum FROM analysis_results WHERE job_id = ? AND attempt = ?')
          .get(jobId, attempt) as { checksum: string } | undefined;
        if (existing) {
          if (existing.checksum !== result.checksum) {
            throw new PersistenceError(
              `Conflicting result for job ${jobId} attempt ${attempt}: stored ${existing.checksum}, got ${result.checksum}`,
              { retryable: false },
            );
          }
          return { jobId, attempt, checksum: result.checksum, duplicate: true };
        }

        const row = this.db.prepare('SELECT state, attempt FROM jobs WHERE id = ?').get(jobId) as
          | { state: string; attempt: number }
          | undefined;
        if (!row) {
          throw new PersistenceError(`Job not found: ${jobId}`, { retryable: false });
        }
        if (row.state !== 'storing' || row.attempt !== attempt) {
          throw new PersistenceError(
            `Job ${jobId} is ${row.state} on attempt ${row.attempt}; cannot store a result for attempt ${attempt}`,
            { retryable: false },
          );
        }

        const now = new Date();
        this.db
          .prepare(`
            INSERT INTO analysis_results (job_id, attempt, passed, finding_count, result_json, checksum, created_at)
            VALUES (?, ?, ?, ?, ?, ?, ?)
          `)
          .run(jobId, attempt, result.passed ? 1 : 0, result.findings.length, result.canonicalJson, result.checksum, now.toISOString());
        this.db
          .prepare(`
            UPDATE jobs
            SET state = 'succeeded', finished_at = ?, updated_at = ?, last_error_kind = NULL, last_error_message = NULL
            WHERE id = ?
          `)
          .run(now.toISOString(), now.toISOString(), jobId);
        this.appendEvent(jobId, attempt, 'succeeded', null, now);

        return { jobId, attempt, checksum: result.checksum, duplicate: false };
      });
      return write();
    });
  }

  async get(jobId: string): Promise<PersistedResult | null> {
    return this.guard('read result', () => {
      const row = this.db
        .prepare('SELECT * FROM analysis_results WHERE job_id = ? ORDER BY attempt DESC LIMIT 1')
        .get(jobId) as ResultRow | undefined;
      if (!row) {
        return null;
      }
      return {
        jobId: row.job_id,
        attempt: row.attempt,
        result: AnalysisResult.fromCanonicalJson(row.result_json),
        createdAt: new Date(row.created_at),
      };
    });
  }

  async findJob(jobId: string): Promise<FeedbackJob | null> {
    return this.guard('read job', () => {
      const row = this.db.prepare('SELECT * FROM jobs WHERE id = ?').get(jobId) as JobRow | undefined;
      return row ? this.mapToEntity(row) : null;
    });
  }

  async findUnfinished(): Promise<FeedbackJob[]> {
    return this.guard('read unfinished jobs', () => {
      const rows = this.db
        .prepare(`SELECT * FROM jobs WHERE state NOT IN ${TERMINAL_STATES} ORDER BY created_at ASC`)
        .all() as JobRow[];
      return rows.map((row) => this.mapToEntity(row));
    });
  }

  async listJobs(filter: ListJobsFilter = {}): Promise<FeedbackJob[]> {
    const limit = Math.min(Math.max(1, filter.limit ?? DEFAULT_LIST_LIMIT), MAX_LIST_LIMIT);
    return this.guard('list jobs', () => {
      const rows = filter.state
        ? (this.db
            .prepare('SELECT * FROM jobs WHERE state = ? ORDER BY created_at DESC LIMIT ?')
            .all(filter.state, limit) as JobRow[])
        : (this.db.prepare('SELECT * FROM jobs ORDER BY created_at DESC LIMIT ?').all(limit) as JobRow[]);
      return rows.map((row) => this.mapToEntity(row));
    });
  }

  async listEvents(jobId: string): Promise<JobEvent[]> {
    return this.guard('list job events', () => {
      const rows = this.db
        .prepare('SELECT * FROM job_events WHERE job_id = ? ORDER BY id ASC')
        .all(jobId) as EventRow[];
      return rows.map((row) => ({
        id: row.id,
        jobId: row.job_id,
        attempt: row.attempt,
        state: JobState.fromString(row.state).value,
        error: toJobError(row.error_kind, row.error_message),
        recordedAt: new Date(row.recorded_at),
      }));
    });
  }

  async countByState(): Promise<Record<JobStateValue, number>> {
    return this.guard('count jobs', () => {
      const counts: Record<JobStateValue, number> = {
        pending: 0,
        fetching: 0,
        running: 0,
        storing: 0,
        succeeded: 0,
        failed: 0,
        cancelled: 0,
      };
      const rows = this.db.prepare('SELECT state, COUNT(*) AS count FROM jobs GROUP BY state').all() as Array<{
        state: string;
        count: number;
      }>;
      for (const row of rows) {
        const state = JOB_STATE_VALUES.find((value) => value === row.state);
        if (state) {
          counts[state] = row.count;
        }
      }
      return counts;
    });
  }

  async ping(): Promise<void> {
    this.guard('ping', () => this.db.prepare('SELECT 1').get());
  }

  private appendEvent(jobId: string, attempt: number, state: JobStateValue, error: JobError | null, at: Date): void {
    this.db
      .prepare(`
        INSERT INTO job_events (job_id, attempt, state, error_kind, error_message, recorded_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `)
      .run(jobId, attempt, state, error?.kind ?? null, error?.message ?? null, at.toISOString());
  }

  /**
   * Runs a storage operation, wrapping driver failures in PersistenceError.
   * Constraint violations are not retryable; everything else (busy, locked, I/O) is.
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      const code = sqliteCode(error);
      throw new PersistenceError(`Failed to ${operation}: ${describeError(error)}`, {
        retryable: !code.startsWith('SQLITE_CONSTRAINT'),
        cause: error,
      });
    }
  }

  private mapToEntity(row: JobRow): FeedbackJob {
    return FeedbackJob.reconstitute({
      id: row.id,
      repository: RepositoryRef.create(row.repository_url, row.revision),
      analysisSet: parseAnalysisSet(row.analysis_set),
      state: JobState.fromString(row.state),
      attempt: row.attempt,
      maxAttempts: row.max_attempts,
      createdAt: new Date(row.created_at),
      startedAt: fromIso(row.started_at),
      finishedAt: fromIso(row.finished_at),
      updatedAt: new Date(row.updated_at),
      nextRetryAt: fromIso(row.next_retry_at),
      lastError: toJobError(row.last_error_kind, row.last_error_message),
    });
  }
}

function toIso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

function fromIso(value: string | null): Date | null {
  return value ? new Date(value) : null;
}

function toJobError(kind: string | null, message: string | null): JobError | null {
  if (!kind || !isFeedbackErrorKind(kind)) {
    return null;
  }
  return { kind, message: message ?? '' };
}

function parseAnalysisSet(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter((item): item is string => typeof item === 'string');
}

function sqliteCode(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return '';
}
