#!/usr/bin/env node
import { Command, Option } from 'commander';
import { setApiUrl } from './api.js';
import { cancelCommand } from './commands/cancel.js';
import { healthCommand } from './commands/health.js';
import { resultCommand } from './commands/result.js';
import { statusCommand } from './commands/status.js';
import { submitCommand } from './commands/submit.js';

const program = new Command();

program
  .name('feedbacker')
  .description('CLI for Feedbacker - submit repositories for analysis and read their findings')
  .version('0.1.0')
  .addOption(
    new Option('--api-url <url>', 'API base URL').default('http://localhost:3000/api').env('FEEDBACKER_API_URL'),
  )
  .hook('preAction', (command) => {
    setApiUrl(command.opts<{ apiUrl: string }>().apiUrl);
  });

program.addCommand(submitCommand);
program.addCommand(statusCommand);
program.addCommand(cancelCommand);
program.addCommand(resultCommand);
program.addCommand(healthCommand);

program.parse();
