/**
 * Port for running external commands
 * Infrastructure provides the adapter implementation
 */

export interface CommandResult {
  stdout: string;
  stderr: string;
  /** Null when the process was ended by a signal. */
  exitCode: number | null;
  /** The signal that ended the process, if any. */
  signal: NodeJS.Signals | null;
  /** True when either stream hit `maxOutputBytes` and was cut. */
  truncated: boolean;
}

export interface CommandOptions {
  cwd: string;
  /** Aborting kills the process: SIGTERM, then SIGKILL after `killGraceMs`. */
  signal?: AbortSignal;
  env?: Record<string, string>;
  maxOutputBytes?: number;
  killGraceMs?: number;
}

export interface ICommandRunner {
  /**
   * Spawns `command` without a shell and resolves once it exits.
   * Rejects with the signal's reason when aborted.
   */
  execute(command: string, args: string[], options: CommandOptions): Promise<CommandResult>;
}

export const COMMAND_RUNNER = Symbol('ICommandRunner');
