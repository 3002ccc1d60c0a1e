import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import { getResult } from '../api.js';
import { getSeverityColor, reportFailure } from '../format.js';

export const resultCommand = new Command('result')
  .description('Show the findings of a finished job')
  .argument('<job-id>', 'Job ID')
  .option('--json', 'Print the raw result as JSON', false)
  .option('--fail-on-error', 'Exit with code 2 when the result did not pass', false)
  .action(async (jobId: string, options: { json: boolean; failOnError: boolean }) => {
    const spinner = ora('Fetching result...').start();

    try {
      const result = await getResult(jobId);
      spinner.stop();

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        console.log(
          `${result.passed ? chalk.green.bold('PASSED') : chalk.red.bold('FAILED')} ` +
            chalk.gray(`(attempt ${result.attempt}, checksum ${result.checksum.slice(0, 12)})`),
        );
        console.log(
          `  ${chalk.red(`${result.counts.error} errors`)}, ${chalk.yellow(`${result.counts.warning} warnings`)}, ${chalk.cyan(`${result.counts.info} info`)}`,
        );

        if (result.findings.length > 0) {
          const table = new Table({
            head: [chalk.cyan('Severity'), chalk.cyan('Rule'), chalk.cyan('Location'), chalk.cyan('Message')],
            colWidths: [10, 24, 36, 60],
            wordWrap: true,
          });
          for (const finding of result.findings) {
            const { path, line, column } = finding.location;
            table.push([
              getSeverityColor(finding.severity)(finding.severity),
              finding.ruleId,
              column === undefined ? `${path}:${line}` : `${path}:${line}:${column}`,
              finding.message,
            ]);
          }
          console.log(table.toString());
        }

        const steps = new Table({
          head: [chalk.cyan('Step'), chalk.cyan('Kind'), chalk.cyan('Findings'), chalk.cyan('Exit')],
        });
        for (const step of result.steps) {
          steps.push([step.step, step.kind, String(step.findingCount), step.exitCode === null ? '-' : String(step.exitCode)]);
        }
        console.log(steps.toString());
      }

      if (options.failOnError && !result.passed) {
        process.exit(2);
      }
    } catch (error) {
      reportFailure(spinner, 'Failed to fetch result', error);
      process.exit(1);
    }
  });
