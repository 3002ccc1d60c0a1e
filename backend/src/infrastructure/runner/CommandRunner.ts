import { spawn } from 'child_process';
import { CommandOptions, CommandResult, ICommandRunner } from '../../domain/ports/ICommandRunner';
import { Deadline } from '../../domain/value-objects/Deadline';

export { CommandOptions, CommandResult };

const DEFAULT_MAX_OUTPUT_BYTES = 10 * 1024 * 1024;
const DEFAULT_KILL_GRACE_MS = 5000;

class OutputBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  append(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.truncated = this.truncated || kept.length < chunk.length;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf-8');
  }
}

/**
 * Runs analysis tools as child processes in a working copy.
 * No shell is involved: `command` and `args` go straight to spawn.
 * Implements ICommandRunner port from domain
 */
export class CommandRunner implements ICommandRunner {
  execute(command: string, args: string[], options: CommandOptions): Promise<CommandResult> {
    const { cwd, signal, env = {}, maxOutputBytes = DEFAULT_MAX_OUTPUT_BYTES, killGraceMs = DEFAULT_KILL_GRACE_MS } = options;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(Deadline.reasonOf(signal));
        return;
      }

      // Own process group, so a kill also reaches whatever the tool spawned.
      const useProcessGroup = process.platform !== 'win32';
      const proc = spawn(command, args, {
        cwd,
        env: {
          ...process.env,
          // Disable interactive mode for CI environments
          CI: 'true',
          // Force color output off to avoid parsing issues
          FORCE_COLOR: '0',
          ...env,
        },
        shell: false,
        detached: useProcessGroup,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdout = new OutputBuffer(maxOutputBytes);
      const stderr = new OutputBuffer(maxOutputBytes);
      let killTimer: ReturnType<typeof setTimeout> | undefined;
      let settled = false;

      const kill = (killSignal: NodeJS.Signals): void => {
        if (proc.pid === undefined || proc.exitCode !== null || proc.signalCode !== null) {
          return;
        }
        if (useProcessGroup) {
          try {
            process.kill(-proc.pid, killSignal);
          } catch {
            // group already gone
            proc.kill(killSignal);
          }
          return;
        }
        proc.kill(killSignal);
      };

      const onAbort = (): void => {
        kill('SIGTERM');
        killTimer = setTimeout(() => kill('SIGKILL'), killGraceMs);
      };

      const settle = (finish: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (killTimer) {
          clearTimeout(killTimer);
        }
        signal?.removeEventListener('abort', onAbort);
        finish();
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      proc.stdout.on('data', (data: Buffer) => stdout.append(data));
      proc.stderr.on('data', (data: Buffer) => stderr.append(data));

      proc.on('error', (err) => {
        settle(() => reject(err));
      });

      proc.on('close', (code, exitSignal) => {
        settle(() => {
          if (signal?.aborted) {
            reject(Deadline.reasonOf(signal));
            return;
          }
          resolve({
            stdout: stdout.text(),
            stderr: stderr.text(),
            exitCode: code,
            signal: exitSignal,
            truncated: stdout.truncated || stderr.truncated,
          });
        });
      });
    });
  }
}
