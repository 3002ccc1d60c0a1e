import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import { getEvents, getJob, getStats, listJobs } from '../api.js';
import { STATES, formatDate, getStateColor, isJobState, printJob, reportFailure } from '../format.js';

export const statusCommand = new Command('status')
  .description('Check job status')
  .argument('[job-id]', 'Specific job ID to check')
  .option('--state <state>', `Filter jobs by state (${STATES.join(', ')})`)
  .option('--limit <n>', 'Maximum number of jobs to list', '50')
  .option('-e, --events', 'Show the state transitions of a job', false)
  .action(async (jobId: string | undefined, options: { state?: string; limit: string; events: boolean }) => {
    const state = options.state;
    if (state !== undefined && !isJobState(state)) {
      console.error(chalk.red(`State must be one of: ${STATES.join(', ')}`));
      process.exit(1);
    }

    const spinner = ora('Fetching job status...').start();

    try {
      if (jobId) {
        const job = await getJob(jobId);
        spinner.succeed('Job found');

        console.log();
        printJob(job);

        if (options.events) {
          const events = await getEvents(jobId);
          const table = new Table({
            head: [chalk.cyan('Recorded'), chalk.cyan('Attempt'), chalk.cyan('State'), chalk.cyan('Error')],
            colWidths: [24, 9, 12, 60],
            wordWrap: true,
          });
          for (const event of events) {
            table.push([
              formatDate(event.recordedAt),
              String(event.attempt),
              getStateColor(event.state)(event.state),
              event.error ? `${event.error.kind}: ${event.error.message}` : '',
            ]);
          }
          console.log();
          console.log(table.toString());
        }
      } else {
        const [{ jobs, total }, stats] = await Promise.all([
          listJobs({ state, limit: parseInt(options.limit, 10) || 50 }),
          getStats(),
        ]);
        spinner.succeed(`Found ${total} jobs`);

        console.log(
          chalk.gray(
            STATES.filter((name) => stats.counts[name] > 0)
              .map((name) => `${name}: ${stats.counts[name]}`)
              .join('  ') || 'no jobs recorded',
          ),
        );

        if (jobs.length === 0) {
          console.log(chalk.yellow('No jobs found. Use `feedbacker submit` to start one.'));
          return;
        }

        const table = new Table({
          head: [
            chalk.cyan('ID'),
            chalk.cyan('Repository'),
            chalk.cyan('Revision'),
            chalk.cyan('State'),
            chalk.cyan('Attempt'),
          ],
          colWidths: [40, 36, 16, 12, 9],
        });

        for (const job of jobs) {
          table.push([
            job.id,
            job.repositoryUrl.length > 34 ? '...' + job.repositoryUrl.slice(-31) : job.repositoryUrl,
            job.revision,
            getStateColor(job.state)(job.state),
            `${job.attempt}/${job.maxAttempts}`,
          ]);
        }

        console.log(table.toString());
        console.log();
        console.log(chalk.gray('Use `feedbacker status <job-id>` for detailed info'));
      }
    } catch (error) {
      reportFailure(spinner, 'Failed to fetch job status', error);
      process.exit(1);
    }
  });
