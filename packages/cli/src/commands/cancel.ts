import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { cancelJob } from '../api.js';
import { reportFailure } from '../format.js';

export const cancelCommand = new Command('cancel')
  .description('Cancel a pending or running job')
  .argument('<job-id>', 'Job ID to cancel')
  .action(async (jobId: string) => {
    const spinner = ora(`Cancelling ${jobId}...`).start();

    try {
      const { cancelled } = await cancelJob(jobId);
      if (cancelled) {
        spinner.succeed('Cancellation requested');
      } else {
        spinner.warn('Job is already finishing or finished');
        console.log(chalk.gray(`Use 'feedbacker status ${jobId}' to see its final state`));
      }
    } catch (error) {
      reportFailure(spinner, 'Failed to cancel job', error);
      process.exit(1);
    }
  });
