import { Logger } from '@nestjs/common';
import { setTimeout as sleep } from 'timers/promises';
import {
  AnalysisFailedError,
  CancelledError,
  FeedbackError,
  InterruptedError,
  NetworkError,
  OverloadedError,
  PersistenceError,
  describeError,
  toFeedbackError,
} from '../../domain/errors';
import { FeedbackJob, JobSnapshot } from '../../domain/entities/FeedbackJob';
import { IAnalysisRunner } from '../../domain/ports/IAnalysisRunner';
import { IRepositoryFetcher, WorkingCopy } from '../../domain/ports/IRepositoryFetcher';
import { IWorkspaceManager } from '../../domain/ports/IWorkspaceManager';
import { IResultStore } from '../../domain/repositories/IResultStore';
import { AnalysisResult } from '../../domain/value-objects/AnalysisResult';
import { Deadline } from '../../domain/value-objects/Deadline';
import { RepositoryRef } from '../../domain/value-objects/RepositoryRef';
import { RetryPolicy } from '../../domain/value-objects/RetryPolicy';

export interface JobRequest {
  repository: RepositoryRef;
  analysisSet: string[];
}

export interface JobSchedulerOptions {
  workerCount: number;
  queueCapacity: number;
  fetchTimeoutMs: number;
  analysisTimeoutMs: number;
  fetchRetry: RetryPolicy;
  storeRetry: RetryPolicy;
  /** Source of jitter; defaults to Math.random. */
  random?: () => number;
}

export interface SchedulerStats {
  running: boolean;
  /** Attempts currently owned by a worker. */
  active: number;
  queued: number;
  /** Jobs waiting on a retry timer. */
  delayed: number;
  /** Non-terminal jobs held in memory. */
  held: number;
  capacity: number;
  workers: number;
}

export type JobListener = (snapshot: JobSnapshot) => void;

interface JobRecord {
  job: FeedbackJob;
  abort: AbortController;
  cancelRequested: boolean;
  /** Set once the result upsert has been issued; cancel is refused from then on. */
  committing: boolean;
  retryTimer: ReturnType<typeof setTimeout> | null;
  waiters: ((snapshot: JobSnapshot) => void)[];
}

type Phase = 'fetch' | 'run';

const OVERLOADED_RETRY_AFTER_MS = 1000;

/**
 * Owns every non-terminal job: admission, the FIFO queue, the worker pool and
 * the fetch -> run -> store sequence of each attempt.
 *
 * All bookkeeping (records, queue, counters) is touched only from synchronous
 * code, so a state check and the mutation that follows it never straddle an await.
 */
export class JobScheduler {
  private readonly logger = new Logger(JobScheduler.name);
  private readonly records = new Map<string, JobRecord>();
  private readonly queue: string[] = [];
  private readonly listeners = new Set<JobListener>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly random: () => number;
  private active = 0;
  private reserved = 0;
  private running = false;

  constructor(
    private readonly store: IResultStore,
    private readonly fetcher: IRepositoryFetcher,
    private readonly runner: IAnalysisRunner,
    private readonly workspaces: IWorkspaceManager,
    private readonly options: JobSchedulerOptions,
  ) {
    if (!Number.isInteger(options.workerCount) || options.workerCount < 1) {
      throw new Error(`workerCount must be a positive integer, got ${options.workerCount}`);
    }
    if (!Number.isInteger(options.queueCapacity) || options.queueCapacity < 0) {
      throw new Error(`queueCapacity must be a non-negative integer, got ${options.queueCapacity}`);
    }
    this.random = options.random ?? Math.random;
  }

  get capacity(): number {
    return this.options.queueCapacity + this.options.workerCount;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Sweeps leftover workspaces, then reloads unfinished jobs from the store.
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    await this.workspaces.prepare();
    const unfinished = await this.store.findUnfinished();
    this.running = true;

    let requeued = 0;
    for (const job of unfinished) {
      if (this.records.has(job.id)) {
        continue;
      }
      if (job.state.isInFlight) {
        const outcome = job.recoverInterrupted();
        if (outcome === 'failed') {
          this.logger.warn(`Job ${job.id} was interrupted on its last attempt; marking it failed`);
          await this.persistOutcome(job);
          continue;
        }
        await this.persist(job);
      }
      const record = this.createRecord(job);
      this.records.set(job.id, record);
      this.schedule(record);
      requeued += 1;
    }

    this.logger.log(
      `Scheduler started with ${this.options.workerCount} worker(s), capacity ${this.capacity}; resumed ${requeued} job(s)`,
    );
    this.drain();
  }

  /**
   * Stops admission and interrupts in-flight attempts without recording a terminal state,
   * so the next start() resumes them.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.queue.length = 0;
    for (const record of this.records.values()) {
      if (record.retryTimer) {
        clearTimeout(record.retryTimer);
        record.retryTimer = null;
      }
      if (record.job.state.isInFlight) {
        record.abort.abort(new InterruptedError('Scheduler stopped'));
      }
    }
    await Promise.allSettled([...this.inFlight]);
    for (const record of this.records.values()) {
      const snapshot = record.job.toSnapshot();
      record.waiters.splice(0).forEach((resolve) => resolve(snapshot));
    }
    this.records.clear();
    this.logger.log('Scheduler stopped');
  }

  /**
   * Admits a job. Never blocks: a full or stopped scheduler answers Overloaded.
   */
  async submit(request: JobRequest): Promise<string> {
    if (!this.running) {
      throw new OverloadedError('Scheduler is not accepting jobs', OVERLOADED_RETRY_AFTER_MS);
    }
    if (this.records.size + this.reserved >= this.capacity) {
      throw new OverloadedError(
        `Scheduler is at capacity (${this.capacity} jobs in progress)`,
        OVERLOADED_RETRY_AFTER_MS,
      );
    }

    const job = FeedbackJob.create({
      repository: request.repository,
      analysisSet: request.analysisSet,
      maxAttempts: this.options.fetchRetry.maxAttempts,
    });

    this.reserved += 1;
    try {
      await this.persist(job);
    } finally {
      this.reserved -= 1;
    }

    const record = this.createRecord(job);
    this.records.set(job.id, record);
    this.logger.log(`Accepted job ${job.id} for ${job.repository}`);
    this.schedule(record);
    return job.id;
  }

  /**
   * Live state for jobs in progress, the stored projection for everything else.
   */
  async status(jobId: string): Promise<JobSnapshot | null> {
    const record = this.records.get(jobId);
    if (record) {
      return record.job.toSnapshot();
    }
    const job = await this.store.findJob(jobId);
    return job ? job.toSnapshot() : null;
  }

  /**
   * Returns false for unknown and finished jobs, and for jobs whose result commit has begun.
   */
  async cancel(jobId: string): Promise<boolean> {
    const record = this.records.get(jobId);
    if (!record) {
      return false;
    }
    const { job } = record;
    if (job.state.isTerminal || record.committing) {
      return false;
    }
    if (record.cancelRequested) {
      return true;
    }
    record.cancelRequested = true;

    if (job.state.isPending) {
      // Not owned by a worker: queued or waiting on a retry timer.
      this.unschedule(record);
      job.cancel();
      this.logger.log(`Cancelled queued job ${jobId}`);
      await this.complete(record);
      return true;
    }

    record.abort.abort(new CancelledError('Cancelled by request'));
    this.logger.log(`Cancellation requested for job ${jobId} while ${job.state.value}`);
    return true;
  }

  subscribe(listener: JobListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves once the job reaches a terminal state. Resolves at once with the
   * stored state for jobs this scheduler is not holding.
   */
  awaitTerminal(jobId: string): Promise<JobSnapshot | null> {
    const record = this.records.get(jobId);
    if (!record) {
      return this.status(jobId);
    }
    return new Promise((resolve) => {
      record.waiters.push(resolve);
    });
  }

  stats(): SchedulerStats {
    let delayed = 0;
    for (const record of this.records.values()) {
      if (record.retryTimer) {
        delayed += 1;
      }
    }
    return {
      running: this.running,
      active: this.active,
      queued: this.queue.length,
      delayed,
      held: this.records.size,
      capacity: this.capacity,
      workers: this.options.workerCount,
    };
  }

  private createRecord(job: FeedbackJob): JobRecord {
    return { job, abort: new AbortController(), cancelRequested: false, committing: false, retryTimer: null, waiters: [] };
  }

  private schedule(record: JobRecord): void {
    if (!this.running) {
      return;
    }
    const due = record.job.nextRetryAt;
    const delay = due ? due.getTime() - Date.now() : 0;
    if (delay <= 0) {
      this.enqueue(record);
      return;
    }
    record.retryTimer = setTimeout(() => {
      record.retryTimer = null;
      this.enqueue(record);
    }, delay);
  }

  private unschedule(record: JobRecord): void {
    if (record.retryTimer) {
      clearTimeout(record.retryTimer);
      record.retryTimer = null;
    }
    const index = this.queue.indexOf(record.job.id);
    if (index >= 0) {
      this.queue.splice(index, 1);
    }
  }

  private enqueue(record: JobRecord): void {
    this.queue.push(record.job.id);
    this.drain();
  }

  private drain(): void {
    while (this.running && this.active < this.options.workerCount && this.queue.length > 0) {
      const jobId = this.queue.shift();
      const record = jobId === undefined ? undefined : this.records.get(jobId);
      if (!record || !record.job.state.isPending) {
        continue;
      }

      this.active += 1;
      const task: Promise<void> = this.runAttempt(record)
        .catch((error) => {
          this.logger.error(`Unexpected failure in job ${record.job.id}: ${describeError(error)}`);
        })
        .finally(() => {
          this.active -= 1;
          this.inFlight.delete(task);
          this.drain();
        });
      this.inFlight.add(task);
    }
  }

  /**
   * One attempt: fetch, run, then store. Must take ownership of the job
   * (pending -> fetching) before its first await.
   */
  private async runAttempt(record: JobRecord): Promise<void> {
    const { job } = record;
    job.beginFetching();
    this.logger.log(`Job ${job.id} attempt ${job.attempt}/${job.maxAttempts}: fetching ${job.repository}`);

    let result: AnalysisResult | null = null;
    let failure: FeedbackError | null = null;
    let phase: Phase = 'fetch';

    try {
      await this.persist(job);
      this.throwIfAborted(record);

      const dest = this.workspaces.allocate(job.id, job.attempt);
      const workingCopy = await this.fetch(record, dest);
      this.throwIfAborted(record);

      phase = 'run';
      job.beginRunning();
      await this.persist(job);
      this.throwIfAborted(record);

      result = await this.analyze(record, workingCopy);
    } catch (error) {
      // fetch, analyze and persist already normalise their own errors
      failure = toFeedbackError(error, (message, cause) => new AnalysisFailedError(message, cause));
    } finally {
      await this.releaseWorkspace(job.id);
    }

    // A cancel or stop that lands while the workspace is released still wins over storing.
    if (!failure && record.abort.signal.aborted) {
      failure = Deadline.reasonOf(record.abort.signal);
    }
    if (failure || !result) {
      await this.settleFailure(record, failure ?? new AnalysisFailedError('Analysis produced no result'), phase);
      return;
    }

    const analysis = result;
    job.beginStoring();
    try {
      await this.persist(job);
      const ack = await this.withStoreRetry(
        `store result of job ${job.id}`,
        async () => {
          record.committing = true;
          try {
            return await this.store.upsert(job.id, job.attempt, analysis);
          } catch (error) {
            record.committing = false;
            throw error;
          }
        },
        record.abort.signal,
      );
      job.succeed();
      this.logger.log(
        `Job ${job.id} succeeded on attempt ${job.attempt} (${analysis.findings.length} finding(s), checksum ${ack.checksum.slice(0, 12)})`,
      );
      this.finish(record);
    } catch (error) {
      await this.settleFailure(
        record,
        toFeedbackError(error, (message, cause) => new PersistenceError(message, { cause })),
        'run',
      );
    }
  }

  private async fetch(record: JobRecord, dest: string): Promise<WorkingCopy> {
    const { job } = record;
    const deadline = Deadline.after(this.options.fetchTimeoutMs, `Fetch of ${job.repository}`, record.abort.signal);
    try {
      return await this.fetcher.fetch({ repository: job.repository, dest, deadline });
    } catch (error) {
      throw toFeedbackError(error, (message, cause) => new NetworkError(message, cause));
    } finally {
      deadline.dispose();
    }
  }

  private async analyze(record: JobRecord, workingCopy: WorkingCopy): Promise<AnalysisResult> {
    const { job } = record;
    const deadline = Deadline.after(this.options.analysisTimeoutMs, `Analysis of job ${job.id}`, record.abort.signal);
    try {
      return await this.runner.run({ workingCopy, analysisSet: job.analysisSet, deadline });
    } catch (error) {
      throw toFeedbackError(error, (message, cause) => new AnalysisFailedError(message, cause));
    } finally {
      deadline.dispose();
    }
  }

  private async settleFailure(record: JobRecord, error: FeedbackError, phase: Phase): Promise<void> {
    const { job } = record;

    if (error.kind === 'Interrupted' && !this.running) {
      // Left in its in-flight state; recovery settles it on the next start.
      this.logger.warn(`Job ${job.id} attempt ${job.attempt} interrupted by shutdown`);
      return;
    }
    if (record.cancelRequested) {
      job.cancel();
      this.logger.log(`Job ${job.id} cancelled during attempt ${job.attempt}`);
      await this.complete(record);
      return;
    }

    const jobError = { kind: error.kind, message: error.message };
    if (phase === 'fetch' && job.state.value === 'fetching' && this.options.fetchRetry.shouldRetry(error, job.attempt)) {
      const delay = this.options.fetchRetry.delayForAttempt(job.attempt, this.random);
      job.scheduleRetry(jobError, new Date(Date.now() + delay));
      this.logger.warn(
        `Job ${job.id} attempt ${job.attempt}/${job.maxAttempts} failed (${error.kind}: ${error.message}); retrying in ${delay}ms`,
      );
      try {
        await this.persist(job);
      } catch (persistError) {
        this.logger.error(`Could not record retry of job ${job.id}: ${describeError(persistError)}`);
      }
      this.schedule(record);
      return;
    }

    job.fail(jobError);
    this.logger.error(`Job ${job.id} failed on attempt ${job.attempt} (${error.kind}): ${error.message}`);
    await this.complete(record);
  }

  /**
   * Persists a terminal state, then releases the job from memory.
   */
  private async complete(record: JobRecord): Promise<void> {
    await this.persistOutcome(record.job);
    this.finish(record);
  }

  private finish(record: JobRecord): void {
    this.records.delete(record.job.id);
    const snapshot = record.job.toSnapshot();
    for (const resolve of record.waiters.splice(0)) {
      resolve(snapshot);
    }
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        this.logger.error(`Job listener threw for ${snapshot.id}: ${describeError(error)}`);
      }
    }
  }

  private async persistOutcome(job: FeedbackJob): Promise<void> {
    try {
      await this.persist(job);
    } catch (error) {
      this.logger.error(`Could not record ${job.state.value} state of job ${job.id}: ${describeError(error)}`);
    }
  }

  private persist(job: FeedbackJob): Promise<void> {
    return this.withStoreRetry(`save job ${job.id}`, () => this.store.saveJob(job));
  }

  /**
   * Retries a store call in place according to the store policy.
   * With a signal, an abort stops the retries before the next try.
   */
  private async withStoreRetry<T>(label: string, operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const policy = this.options.storeRetry;
    for (let attempt = 1; ; attempt += 1) {
      if (signal?.aborted) {
        throw Deadline.reasonOf(signal);
      }
      try {
        return await operation();
      } catch (error) {
        const failure = toFeedbackError(error, (message, cause) => new PersistenceError(message, { cause }));
        if (!policy.shouldRetry(failure, attempt)) {
          throw failure;
        }
        const delay = policy.delayForAttempt(attempt, this.random);
        this.logger.warn(
          `Failed to ${label} (try ${attempt}/${policy.maxAttempts}): ${failure.message}; retrying in ${delay}ms`,
        );
        await sleep(delay, undefined, { signal }).catch((sleepError: unknown) => {
          throw signal?.aborted ? Deadline.reasonOf(signal) : sleepError;
        });
      }
    }
  }

  private async releaseWorkspace(jobId: string): Promise<void> {
    try {
      await this.workspaces.release(jobId);
    } catch (error) {
      this.logger.error(`Could not remove workspace of job ${jobId}: ${describeError(error)}`);
    }
  }

  private throwIfAborted(record: JobRecord): void {
    if (record.abort.signal.aborted) {
      throw Deadline.reasonOf(record.abort.signal);
    }
  }
}
