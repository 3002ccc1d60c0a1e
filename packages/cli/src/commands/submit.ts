import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { JobDto } from '@feedbacker/shared';
import { getJob, getResult, submitJob } from '../api.js';
import { getStateColor, isTerminal, printJob, reportFailure } from '../format.js';

export const submitCommand = new Command('submit')
  .description('Submit a repository revision for analysis')
  .argument('<repository-url>', 'SSH URL of the repository (git@host:owner/repo.git or ssh://...)')
  .argument('<revision>', 'Branch, tag or commit to analyze')
  .option('-s, --steps <names>', 'Comma-separated analysis steps (default: the server\'s default set)')
  .option('-w, --wait', 'Wait for the job to finish', false)
  .option('--interval <ms>', 'Polling interval while waiting', '2000')
  .action(async (repositoryUrl: string, revision: string, options: {
    steps?: string;
    wait: boolean;
    interval: string;
  }) => {
    const analysisSet = options.steps
      ?.split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0);

    const spinner = ora(`Submitting ${repositoryUrl}@${revision}...`).start();

    try {
      const job = await submitJob({ repositoryUrl, revision, analysisSet });
      spinner.succeed(`Job submitted: ${job.id}`);

      console.log();
      printJob(job);

      if (options.wait) {
        console.log();
        await waitForJob(job.id, spinner, Math.max(250, parseInt(options.interval, 10) || 2000));
      } else {
        console.log();
        console.log(chalk.gray(`Use 'feedbacker status ${job.id}' to check progress`));
      }
    } catch (error) {
      reportFailure(spinner, 'Failed to submit job', error);
      process.exit(1);
    }
  });

async function waitForJob(jobId: string, spinner: Ora, intervalMs: number): Promise<void> {
  spinner.start('Waiting for job completion...');

  let job: JobDto = await getJob(jobId);
  while (!isTerminal(job.state)) {
    spinner.text = `${getStateColor(job.state)(job.state)} (attempt ${job.attempt}/${job.maxAttempts})`;
    // Wait before polling again
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
    job = await getJob(jobId);
  }

  if (job.state === 'succeeded') {
    const result = await getResult(jobId);
    spinner.succeed(`Job succeeded with ${result.findings.length} finding${result.findings.length === 1 ? '' : 's'}`);
    console.log(
      `  ${chalk.red(`${result.counts.error} errors`)}, ${chalk.yellow(`${result.counts.warning} warnings`)}, ${chalk.cyan(`${result.counts.info} info`)}`,
    );
    console.log(chalk.gray(`Use 'feedbacker result ${jobId}' for the findings`));
    return;
  }

  if (job.state === 'failed') {
    spinner.fail('Job failed');
    console.error(chalk.red(`${job.lastError?.kind ?? 'Error'}: ${job.lastError?.message ?? 'unknown'}`));
    process.exit(1);
  }

  spinner.warn('Job was cancelled');
}
