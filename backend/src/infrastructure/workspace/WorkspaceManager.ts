import { Logger } from '@nestjs/common';
import { existsSync } from 'fs';
import { mkdir, readdir, rm } from 'fs/promises';
import { join } from 'path';
import { IWorkspaceManager } from '../../domain/ports/IWorkspaceManager';

/**
 * Hands out one directory per job attempt under a single root: `<root>/<jobId>-<attempt>`.
 * The fetcher creates the directory itself; this class only reserves the path and removes it.
 */
export class WorkspaceManager implements IWorkspaceManager {
  private readonly logger = new Logger(WorkspaceManager.name);
  private readonly allocations = new Map<string, string>();

  constructor(private readonly root: string) {}

  async prepare(): Promise<void> {
    await mkdir(this.root, { recursive: true });
    const entries = await readdir(this.root);
    const stale = entries.filter((entry) => ![...this.allocations.values()].includes(join(this.root, entry)));
    for (const entry of stale) {
      await rm(join(this.root, entry), { recursive: true, force: true });
    }
    if (stale.length > 0) {
      this.logger.warn(`Removed ${stale.length} stale workspace(s) from ${this.root}`);
    }
  }

  allocate(jobId: string, attempt: number): string {
    const held = this.allocations.get(jobId);
    if (held) {
      throw new Error(`Job ${jobId} already holds workspace ${held}`);
    }
    const dir = join(this.root, `${jobId}-${attempt}`);
    if (existsSync(dir)) {
      throw new Error(`Workspace ${dir} already exists`);
    }
    this.allocations.set(jobId, dir);
    return dir;
  }

  async release(jobId: string): Promise<void> {
    const dir = this.allocations.get(jobId);
    if (!dir) {
      return;
    }
    await rm(dir, { recursive: true, force: true });
    this.allocations.delete(jobId);
    this.logger.debug(`Released workspace ${dir}`);
  }

  held(): string[] {
    return [...this.allocations.keys()];
  }
}
