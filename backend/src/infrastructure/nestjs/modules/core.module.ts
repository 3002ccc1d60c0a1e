import { Module, Global, Inject, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import Database from 'better-sqlite3';
import { createDatabase, SqliteResultStore } from '../../persistence/sqlite';
import { CommandRunner } from '../../runner';
import { GitRepositoryFetcher } from '../../git';
import { AnalysisCatalog, LocalAnalysisRunner } from '../../analysis';
import { WorkspaceManager } from '../../workspace';
import { feedbackerConfig } from '../../config';
import { JobScheduler, HealthMonitor } from '../../../application';
import {
  ANALYSIS_RUNNER,
  COMMAND_RUNNER,
  REPOSITORY_FETCHER,
  RESULT_STORE,
  WORKSPACE_MANAGER,
  IAnalysisRunner,
  ICommandRunner,
  IRepositoryFetcher,
  IResultStore,
  IWorkspaceManager,
  RetryPolicy,
} from '../../../domain';
import { JobsController, HealthController } from '../controllers';

export const DATABASE_TOKEN = Symbol('DATABASE');

type FeedbackerConfig = ConfigType<typeof feedbackerConfig>;

@Global()
@Module({
  controllers: [JobsController, HealthController],
  providers: [
    // Database
    {
      provide: DATABASE_TOKEN,
      useFactory: (config: FeedbackerConfig) => createDatabase(config.databaseUrl),
      inject: [feedbackerConfig.KEY],
    },

    // Repositories
    {
      provide: RESULT_STORE,
      useFactory: (db: Database.Database) => new SqliteResultStore(db),
      inject: [DATABASE_TOKEN],
    },

    // Infrastructure services
    {
      provide: AnalysisCatalog,
      useFactory: (config: FeedbackerConfig) => AnalysisCatalog.fromFile(config.analysis.catalogPath),
      inject: [feedbackerConfig.KEY],
    },
    {
      provide: COMMAND_RUNNER,
      useFactory: () => new CommandRunner(),
    },
    {
      provide: REPOSITORY_FETCHER,
      useFactory: (config: FeedbackerConfig) => new GitRepositoryFetcher(config.ssh),
      inject: [feedbackerConfig.KEY],
    },
    {
      provide: ANALYSIS_RUNNER,
      useFactory: (config: FeedbackerConfig, catalog: AnalysisCatalog, commandRunner: ICommandRunner) =>
        new LocalAnalysisRunner(catalog, commandRunner, {
          killGraceMs: config.analysis.killGraceMs,
          maxOutputBytes: config.analysis.maxOutputBytes,
        }),
      inject: [feedbackerConfig.KEY, AnalysisCatalog, COMMAND_RUNNER],
    },
    {
      provide: WORKSPACE_MANAGER,
      useFactory: (config: FeedbackerConfig) => new WorkspaceManager(config.workspaceRoot),
      inject: [feedbackerConfig.KEY],
    },

    // Orchestration
    {
      provide: JobScheduler,
      useFactory: (
        config: FeedbackerConfig,
        store: IResultStore,
        fetcher: IRepositoryFetcher,
        runner: IAnalysisRunner,
        workspaces: IWorkspaceManager,
      ) => new JobScheduler(store, fetcher, runner, workspaces, {
        workerCount: config.scheduler.workerCount,
        queueCapacity: config.scheduler.queueCapacity,
        fetchTimeoutMs: config.scheduler.fetchTimeoutMs,
        analysisTimeoutMs: config.scheduler.analysisTimeoutMs,
        fetchRetry: RetryPolicy.create(config.scheduler.fetchRetry),
        storeRetry: RetryPolicy.create(config.scheduler.storeRetry),
      }),
      inject: [feedbackerConfig.KEY, RESULT_STORE, REPOSITORY_FETCHER, ANALYSIS_RUNNER, WORKSPACE_MANAGER],
    },
    {
      provide: HealthMonitor,
      useFactory: (scheduler: JobScheduler, store: IResultStore) => new HealthMonitor(scheduler, store),
      inject: [JobScheduler, RESULT_STORE],
    },
  ],
  exports: [
    DATABASE_TOKEN,
    RESULT_STORE,
    AnalysisCatalog,
    COMMAND_RUNNER,
    REPOSITORY_FETCHER,
    ANALYSIS_RUNNER,
    WORKSPACE_MANAGER,
    JobScheduler,
    HealthMonitor,
  ],
})
export class CoreModule implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CoreModule.name);

  constructor(
    private readonly scheduler: JobScheduler,
    @Inject(feedbackerConfig.KEY)
    private readonly config: FeedbackerConfig,
    @Inject(DATABASE_TOKEN)
    private readonly db: Database.Database,
  ) {}

  async onModuleInit() {
    if (this.config.scheduler.enabled) {
      this.logger.log('Starting job scheduler...');
      await this.scheduler.start();
    } else {
      this.logger.warn('Job scheduler disabled (SCHEDULER_ENABLED=false); submissions will be refused');
    }
  }

  async onModuleDestroy() {
    await this.scheduler.stop();
    this.db.close();
  }
}
