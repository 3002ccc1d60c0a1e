import chalk from 'chalk';
import type { Ora } from 'ora';
import type { JobDto, JobState, Severity } from '@feedbacker/shared';
import { ApiError } from './api.js';

export const STATES: readonly JobState[] = ['pending', 'fetching', 'running', 'storing', 'succeeded', 'failed', 'cancelled'];

const TERMINAL_STATES: readonly JobState[] = ['succeeded', 'failed', 'cancelled'];

export function isJobState(value: string): value is JobState {
  return STATES.some((state) => state === value);
}

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function getStateColor(state: JobState): (text: string) => string {
  switch (state) {
    case 'succeeded':
      return chalk.green;
    case 'fetching':
    case 'running':
    case 'storing':
      return chalk.blue;
    case 'pending':
      return chalk.yellow;
    case 'failed':
      return chalk.red;
    case 'cancelled':
      return chalk.gray;
    default:
      return chalk.white;
  }
}

export function getSeverityColor(severity: Severity): (text: string) => string {
  switch (severity) {
    case 'error':
      return chalk.red;
    case 'warning':
      return chalk.yellow;
    default:
      return chalk.cyan;
  }
}

export function formatDate(value: string | null): string {
  return value ? new Date(value).toLocaleString() : chalk.gray('-');
}

export function printJob(job: JobDto): void {
  console.log(chalk.bold('Job Details'));
  console.log(chalk.gray('─'.repeat(50)));
  console.log(`  ID:         ${job.id}`);
  console.log(`  Repository: ${job.repositoryUrl}`);
  console.log(`  Revision:   ${job.revision}`);
  console.log(`  Analysis:   ${job.analysisSet.join(', ')}`);
  console.log(`  State:      ${getStateColor(job.state)(job.state)}`);
  console.log(`  Attempt:    ${job.attempt}/${job.maxAttempts}`);
  console.log(`  Created:    ${formatDate(job.createdAt)}`);
  console.log(`  Started:    ${formatDate(job.startedAt)}`);
  console.log(`  Finished:   ${formatDate(job.finishedAt)}`);

  if (job.nextRetryAt) {
    console.log(`  Next retry: ${formatDate(job.nextRetryAt)}`);
  }

  if (job.lastError) {
    console.log();
    console.log(chalk.red.bold(`Last error (${job.lastError.kind}):`));
    console.log(`  ${job.lastError.message}`);
  }
}

/**
 * Stops the spinner with `label` and prints the error. Callers exit afterwards.
 */
export function reportFailure(spinner: Ora, label: string, error: unknown): void {
  spinner.fail(label);
  console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error'));
  if (error instanceof ApiError && error.retryAfter !== null) {
    console.error(chalk.gray(`The service is busy; retry in ${error.retryAfter}s`));
  }
}
