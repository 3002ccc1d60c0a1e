import { Logger } from '@nestjs/common';
import { mkdir, rm } from 'fs/promises';
import { dirname } from 'path';
import { simpleGit, SimpleGit, SimpleGitOptions } from 'simple-git';
import {
  AuthError,
  FeedbackError,
  NetworkError,
  RevisionNotFoundError,
  describeError,
} from '../../domain/errors';
import { FetchRequest, IRepositoryFetcher, WorkingCopy } from '../../domain/ports/IRepositoryFetcher';
import { Deadline } from '../../domain/value-objects/Deadline';
import { RepositoryRef } from '../../domain/value-objects/RepositoryRef';
import { SshConfig } from '../config/configuration';

export interface GitCommandOptions {
  cwd?: string;
  env: Record<string, string>;
  signal: AbortSignal;
  timeoutMs: number;
}

/**
 * The handful of git operations a fetch needs. Swapped for a fake in tests.
 */
export interface GitClient {
  clone(url: string, dest: string, args: string[], options: GitCommandOptions): Promise<void>;
  revparse(ref: string, options: GitCommandOptions): Promise<string>;
  fetch(remote: string, ref: string, options: GitCommandOptions): Promise<void>;
  checkout(args: string[], options: GitCommandOptions): Promise<void>;
}

export class SimpleGitClient implements GitClient {
  private createGit(options: GitCommandOptions): SimpleGit {
    const gitOptions: Partial<SimpleGitOptions> = {
      binary: 'git',
      maxConcurrentProcesses: 1,
      abort: options.signal,
      timeout: { block: options.timeoutMs },
    };
    if (options.cwd) {
      gitOptions.baseDir = options.cwd;
    }
    return simpleGit(gitOptions).env({ ...process.env, ...options.env });
  }

  async clone(url: string, dest: string, args: string[], options: GitCommandOptions): Promise<void> {
    await this.createGit(options).clone(url, dest, args);
  }

  async revparse(ref: string, options: GitCommandOptions): Promise<string> {
    const sha = await this.createGit(options).revparse(['--verify', '--quiet', ref]);
    return sha.trim();
  }

  async fetch(remote: string, ref: string, options: GitCommandOptions): Promise<void> {
    await this.createGit(options).fetch(remote, ref);
  }

  async checkout(args: string[], options: GitCommandOptions): Promise<void> {
    await this.createGit(options).checkout(args);
  }
}

const AUTH_FAILURE =
  /permission denied|publickey|authentication failed|could not read username|invalid username or password|host key verification failed|no matching host key/i;
const NOT_FOUND =
  /repository .*not found|not found: repository|does not appear to be a git repository|couldn't find remote ref|unknown revision|not a valid object name|needed a single revision|invalid reference|did not match any/i;

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Environment for every git invocation: non-interactive, and ssh pinned to the configured key.
 */
export function buildGitEnvironment(ssh: SshConfig): Record<string, string> {
  const command = [
    'ssh',
    '-o',
    'BatchMode=yes',
    '-o',
    `ConnectTimeout=${ssh.connectTimeoutSeconds}`,
    '-o',
    `StrictHostKeyChecking=${ssh.strictHostKeyChecking}`,
  ];
  if (ssh.knownHostsPath) {
    command.push('-o', `UserKnownHostsFile=${shellQuote(ssh.knownHostsPath)}`);
  }
  if (ssh.keyPath) {
    command.push('-i', shellQuote(ssh.keyPath), '-o', 'IdentitiesOnly=yes');
  }
  return {
    GIT_SSH_COMMAND: command.join(' '),
    GIT_TERMINAL_PROMPT: '0',
  };
}

/**
 * Maps a git failure onto the fetch error kinds. Anything unrecognised counts as a network problem.
 */
export function classifyGitError(error: unknown, repository: RepositoryRef): FeedbackError {
  if (error instanceof FeedbackError) {
    return error;
  }
  const message = describeError(error).trim();
  if (AUTH_FAILURE.test(message)) {
    return new AuthError(`Authentication failed for ${repository.url}: ${message}`, error);
  }
  if (NOT_FOUND.test(message)) {
    return new RevisionNotFoundError(`Revision ${repository.revision} not found in ${repository.url}: ${message}`, error);
  }
  return new NetworkError(`Failed to fetch ${repository.url}: ${message}`, error);
}

/**
 * Materializes a repository revision with git, detached at the resolved commit.
 * Implements IRepositoryFetcher port from domain
 */
export class GitRepositoryFetcher implements IRepositoryFetcher {
  private readonly logger = new Logger(GitRepositoryFetcher.name);
  private readonly env: Record<string, string>;

  constructor(
    ssh: SshConfig,
    private readonly client: GitClient = new SimpleGitClient(),
  ) {
    this.env = buildGitEnvironment(ssh);
  }

  async fetch(request: FetchRequest): Promise<WorkingCopy> {
    const { repository, dest, deadline } = request;
    try {
      deadline.throwIfExpired();
      await mkdir(dirname(dest), { recursive: true });
      await this.client.clone(repository.url, dest, ['--no-checkout', '--quiet'], this.options(deadline));

      const commitSha = await this.resolveCommit(repository.revision, dest, deadline);
      await this.client.checkout(['--quiet', '--detach', commitSha], this.options(deadline, dest));
      deadline.throwIfExpired();

      this.logger.log(`Fetched ${repository.url} at ${repository.revision} (${commitSha})`);
      return { path: dest, repositoryUrl: repository.url, revision: repository.revision, commitSha };
    } catch (error) {
      await this.removePartialClone(dest);
      throw this.toFetchError(error, repository, deadline);
    }
  }

  private async removePartialClone(dest: string): Promise<void> {
    try {
      await rm(dest, { recursive: true, force: true });
    } catch (rmError) {
      this.logger.warn(`Could not remove ${dest} after a failed fetch: ${describeError(rmError)}`);
    }
  }

  /**
   * Tries the revision as a local ref, then as a remote branch, then fetches it by name.
   */
  private async resolveCommit(revision: string, dest: string, deadline: Deadline): Promise<string> {
    for (const candidate of [revision, `origin/${revision}`]) {
      deadline.throwIfExpired();
      const sha = await this.client.revparse(`${candidate}^{commit}`, this.options(deadline, dest)).catch(() => '');
      if (sha) {
        return sha;
      }
    }

    deadline.throwIfExpired();
    this.logger.debug(`Revision ${revision} not in clone of ${dest}; fetching it explicitly`);
    await this.client.fetch('origin', revision, this.options(deadline, dest));
    const sha = await this.client.revparse('FETCH_HEAD^{commit}', this.options(deadline, dest));
    if (!sha) {
      throw new RevisionNotFoundError(`Revision ${revision} did not resolve to a commit`);
    }
    return sha;
  }

  private options(deadline: Deadline, cwd?: string): GitCommandOptions {
    return {
      cwd,
      env: this.env,
      signal: deadline.signal,
      timeoutMs: Math.max(1, deadline.remainingMs),
    };
  }

  private toFetchError(error: unknown, repository: RepositoryRef, deadline: Deadline): FeedbackError {
    const reason = deadline.reason;
    if (reason?.kind === 'Timeout') {
      return new NetworkError(`Fetching ${repository} timed out: ${reason.message}`, reason);
    }
    if (reason) {
      return reason;
    }
    return classifyGitError(error, repository);
  }
}
