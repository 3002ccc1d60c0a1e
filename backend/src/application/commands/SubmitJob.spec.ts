import { Logger } from '@nestjs/common';
import Database from 'better-sqlite3';
import { mkdirSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { OverloadedError } from '../../domain/errors';
import { IAnalysisRunner } from '../../domain/ports/IAnalysisRunner';
import { IRepositoryFetcher } from '../../domain/ports/IRepositoryFetcher';
import { Deadline } from '../../domain/value-objects/Deadline';
import { RetryPolicy } from '../../domain/value-objects/RetryPolicy';
import { AnalysisCatalog } from '../../infrastructure/analysis/AnalysisCatalog';
import { createTestDatabase } from '../../infrastructure/persistence/sqlite/database';
import { SqliteResultStore } from '../../infrastructure/persistence/sqlite/ResultStore';
import { WorkspaceManager } from '../../infrastructure/workspace/WorkspaceManager';
import { InvalidJobRequestError, JobNotFoundError } from '../errors';
import { JobScheduler } from '../services/JobScheduler';
import { CancelJobCommand } from './CancelJob';
import { SubmitJobCommand } from './SubmitJob';

const catalog = AnalysisCatalog.fromDefinition({
  defaultSet: ['readme'],
  steps: [
    { name: 'todos', kind: 'pattern', pattern: 'TODO', message: 'Unresolved TODO' },
    { name: 'readme', kind: 'required-files', paths: ['README.md'] },
  ],
});

describe('job commands', () => {
  let db: Database.Database;
  let root: string;
  let scheduler: JobScheduler;

  const fetcher: IRepositoryFetcher = {
    fetch: async (request) => {
      mkdirSync(request.dest);
      return { path: request.dest, repositoryUrl: request.repository.url, revision: request.repository.revision, commitSha: 'c0ffee' };
    },
  };
  const runner: IAnalysisRunner = {
    run: ({ deadline }) =>
      new Promise((_resolve, reject) => {
        deadline.signal.addEventListener('abort', () => reject(Deadline.reasonOf(deadline.signal)), { once: true });
      }),
  };
  const policy = RetryPolicy.create({
    maxAttempts: 3,
    baseDelayMs: 1,
    maxDelayMs: 1,
    multiplier: 1,
    jitterRatio: 0,
    retryableKinds: ['NetworkError'],
  });

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    db = createTestDatabase();
    root = mkdtempSync(join(tmpdir(), 'feedbacker-commands-'));
    scheduler = new JobScheduler(new SqliteResultStore(db), fetcher, runner, new WorkspaceManager(root), {
      workerCount: 1,
      queueCapacity: 4,
      fetchTimeoutMs: 5_000,
      analysisTimeoutMs: 5_000,
      fetchRetry: policy,
      storeRetry: policy,
    });
    await scheduler.start();
  });

  afterEach(async () => {
    await scheduler.stop();
    db.close();
    rmSync(root, { recursive: true, force: true });
  });

  describe('SubmitJobCommand', () => {
    const submit = (): SubmitJobCommand => new SubmitJobCommand(scheduler, catalog);

    it('should fall back to the default analysis set', async () => {
      const job = await submit().execute({ repositoryUrl: 'git@git.example.com:team/app.git', revision: 'main' });

      expect(job.analysisSet).toEqual(['readme']);
      expect(job.maxAttempts).toBe(3);
      expect(job.repositoryUrl).toBe('git@git.example.com:team/app.git');
    });

    it('should drop repeated step names and keep their first order', async () => {
      const job = await submit().execute({
        repositoryUrl: 'ssh://git@git.example.com/team/app.git',
        revision: 'v2',
        analysisSet: ['todos', 'readme', 'todos'],
      });

      expect(job.analysisSet).toEqual(['todos', 'readme']);
    });

    it('should reject unsupported repository URLs', async () => {
      await expect(
        submit().execute({ repositoryUrl: 'ftp://git.example.com/team/app.git', revision: 'main' }),
      ).rejects.toThrow(InvalidJobRequestError);
    });

    it('should reject an empty analysis set', async () => {
      await expect(
        submit().execute({ repositoryUrl: 'git@git.example.com:team/app.git', revision: 'main', analysisSet: [] }),
      ).rejects.toThrow('analysisSet cannot be empty');
    });

    it('should name every unknown step', async () => {
      await expect(
        submit().execute({
          repositoryUrl: 'git@git.example.com:team/app.git',
          revision: 'main',
          analysisSet: ['lint', 'todos', 'audit'],
        }),
      ).rejects.toThrow('Unknown analysis step(s): lint, audit');
    });

    it('should surface Overloaded from a stopped scheduler', async () => {
      await scheduler.stop();

      await expect(
        submit().execute({ repositoryUrl: 'git@git.example.com:team/app.git', revision: 'main' }),
      ).rejects.toThrow(OverloadedError);
    });
  });

  describe('CancelJobCommand', () => {
    it('should cancel a job that is still in flight', async () => {
      const job = await new SubmitJobCommand(scheduler, catalog).execute({
        repositoryUrl: 'git@git.example.com:team/app.git',
        revision: 'main',
      });

      await expect(new CancelJobCommand(scheduler).execute({ jobId: job.id })).resolves.toEqual({ cancelled: true });
      expect((await scheduler.awaitTerminal(job.id))?.state).toBe('cancelled');
    });

    it('should throw JobNotFoundError for an unknown job', async () => {
      await expect(
        new CancelJobCommand(scheduler).execute({ jobId: '00000000-0000-4000-8000-000000000000' }),
      ).rejects.toThrow(JobNotFoundError);
    });
  });
});
