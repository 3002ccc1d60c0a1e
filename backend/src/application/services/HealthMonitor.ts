import { describeError } from '../../domain/errors';
import { IResultStore } from '../../domain/repositories/IResultStore';
import { JobScheduler, SchedulerStats } from './JobScheduler';

export type StoreHealth = { status: 'up' } | { status: 'down'; error: string };

export interface HealthReport {
  status: 'ok' | 'degraded';
  /** Whether a submit right now could be admitted. */
  accepting: boolean;
  checks: {
    store: StoreHealth;
    scheduler: Omit<SchedulerStats, 'held'>;
  };
  checkedAt: Date;
}

/**
 * Liveness and readiness of the scheduler and the result store
 */
export class HealthMonitor {
  constructor(
    private readonly scheduler: JobScheduler,
    private readonly store: IResultStore,
  ) {}

  async check(): Promise<HealthReport> {
    const { held, ...scheduler } = this.scheduler.stats();
    const store = await this.checkStore();
    const storeUp = store.status === 'up';

    return {
      status: storeUp && scheduler.running ? 'ok' : 'degraded',
      accepting: storeUp && scheduler.running && held < scheduler.capacity,
      checks: { store, scheduler },
      checkedAt: new Date(),
    };
  }

  private async checkStore(): Promise<StoreHealth> {
    try {
      await this.store.ping();
      return { status: 'up' };
    } catch (error) {
      return { status: 'down', error: describeError(error) };
    }
  }
}
