/**
 * Port owning the per-attempt working directories
 */
export interface IWorkspaceManager {
  /** Creates the root and removes anything a previous process left behind. */
  prepare(): Promise<void>;

  /**
   * Reserves a fresh, not-yet-existing directory for the attempt.
   * Throws when the job already holds one.
   */
  allocate(jobId: string, attempt: number): string;

  /** Removes the job's directory, if any. */
  release(jobId: string): Promise<void>;

  /** Job ids currently holding a directory. */
  held(): string[];
}

export const WORKSPACE_MANAGER = Symbol('IWorkspaceManager');
