import { Logger } from '@nestjs/common';
import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { IAnalysisRunner } from '../../domain/ports/IAnalysisRunner';
import { IRepositoryFetcher } from '../../domain/ports/IRepositoryFetcher';
import { RetryPolicy } from '../../domain/value-objects/RetryPolicy';
import { createTestDatabase } from '../../infrastructure/persistence/sqlite/database';
import { SqliteResultStore } from '../../infrastructure/persistence/sqlite/ResultStore';
import { WorkspaceManager } from '../../infrastructure/workspace/WorkspaceManager';
import { HealthMonitor } from './HealthMonitor';
import { JobScheduler } from './JobScheduler';

describe('HealthMonitor', () => {
  let db: Database.Database;
  let root: string;
  let scheduler: JobScheduler;
  let monitor: HealthMonitor;

  const fetcher: IRepositoryFetcher = {
    fetch: () => Promise.reject(new Error('not used')),
  };
  const runner: IAnalysisRunner = {
    run: () => Promise.reject(new Error('not used')),
  };
  const policy = RetryPolicy.create({
    maxAttempts: 1,
    baseDelayMs: 0,
    maxDelayMs: 0,
    multiplier: 1,
    jitterRatio: 0,
    retryableKinds: [],
  });

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(() => {
    db = createTestDatabase();
    root = mkdtempSync(join(tmpdir(), 'feedbacker-health-'));
    const store = new SqliteResultStore(db);
    scheduler = new JobScheduler(store, fetcher, runner, new WorkspaceManager(root), {
      workerCount: 2,
      queueCapacity: 3,
      fetchTimeoutMs: 1000,
      analysisTimeoutMs: 1000,
      fetchRetry: policy,
      storeRetry: policy,
    });
    monitor = new HealthMonitor(scheduler, store);
  });

  afterEach(async () => {
    await scheduler.stop();
    if (db.open) {
      db.close();
    }
    rmSync(root, { recursive: true, force: true });
  });

  it('should be ok and accepting when the scheduler runs and the store answers', async () => {
    await scheduler.start();

    const report = await monitor.check();

    expect(report.status).toBe('ok');
    expect(report.accepting).toBe(true);
    expect(report.checks).toEqual({
      store: { status: 'up' },
      scheduler: { running: true, active: 0, queued: 0, delayed: 0, capacity: 5, workers: 2 },
    });
  });

  it('should be degraded while the scheduler is stopped', async () => {
    const report = await monitor.check();

    expect(report.status).toBe('degraded');
    expect(report.accepting).toBe(false);
  });

  it('should be degraded when the store is unreachable', async () => {
    await scheduler.start();
    db.close();

    const report = await monitor.check();

    expect(report.status).toBe('degraded');
    expect(report.accepting).toBe(false);
    expect(report.checks.store.status).toBe('down');
  });
});
