import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { getHealth } from '../api.js';
import { reportFailure } from '../format.js';

export const healthCommand = new Command('health')
  .description('Check whether the service is up and accepting jobs')
  .action(async () => {
    const spinner = ora('Checking service health...').start();

    try {
      const health = await getHealth();
      const { store, scheduler } = health.checks;

      if (health.status === 'ok') {
        spinner.succeed(chalk.green('Service is healthy'));
      } else {
        spinner.warn(chalk.yellow('Service is degraded'));
      }

      console.log(`  Accepting:  ${health.accepting ? chalk.green('yes') : chalk.red('no')}`);
      console.log(`  Store:      ${store.status === 'up' ? chalk.green('up') : chalk.red(`down (${store.error})`)}`);
      console.log(`  Scheduler:  ${scheduler.running ? chalk.green('running') : chalk.red('stopped')}`);
      console.log(`  Workers:    ${scheduler.active}/${scheduler.workers} busy`);
      console.log(`  Queue:      ${scheduler.queued} queued, ${scheduler.delayed} awaiting retry (capacity ${scheduler.capacity})`);

      if (health.status !== 'ok') {
        process.exit(1);
      }
    } catch (error) {
      reportFailure(spinner, 'Service unreachable', error);
      process.exit(1);
    }
  });
