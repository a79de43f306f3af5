#!/usr/bin/env node
/**
 * intune-assign CLI
 * Bulk application-to-group assignment for Microsoft Intune
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { appsCommands } from './commands/apps';
import { groupsCommands } from './commands/groups';
import { assignCommands } from './commands/assign';
import { historyCommands } from './commands/history';
import { configCommands } from './commands/config';
import { closeContext } from './context';
import { enableConsoleLogging } from '../utils/logger';
import { toErrorMessage } from '../utils/errors';

const program = new Command();

program
  .name('intune-assign')
  .description('Assign Intune applications to groups in bulk')
  .version('1.0.0')
  .option('-v, --verbose', 'Show detailed log output');

program.hook('preAction', (thisCommand) => {
  enableConsoleLogging(Boolean(thisCommand.opts<{ verbose?: boolean }>().verbose));
});

// Register command groups
program.addCommand(appsCommands);
program.addCommand(groupsCommands);
program.addCommand(assignCommands);
program.addCommand(historyCommands);
program.addCommand(configCommands);

// Global error handling
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`Error: ${err.message}`));
  process.exit(1);
});

// Show help if no command specified
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).then(closeContext, (error: unknown) => {
    console.error(chalk.red(`Error: ${toErrorMessage(error)}`));
    closeContext();
    process.exit(1);
  });
}
