/**
 * Application catalog CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { table } from 'table';
import { APP_TYPES, AppType } from '../../types';
import { APP_TYPE_LABELS } from '../../utils/constants';
import { createGraphClient, exitWithError, requireConfig } from '../context';

export const appsCommands = new Command('apps')
  .description('Browse Intune applications');

appsCommands
  .command('list')
  .description('List Intune applications')
  .option('-t, --type <appType>', `Only this app type (${APP_TYPES.join(', ')})`)
  .option('-a, --assignments', 'Include current assignment counts')
  .action(async (options: { type?: string; assignments?: boolean }) => {
    let appType: AppType | undefined;
    if (options.type) {
      appType = APP_TYPES.find((type) => type === options.type);
      if (!appType) {
        console.error(chalk.red(`Unknown app type: ${options.type}`));
        process.exit(1);
      }
    }

    const spinner = ora('Loading applications...').start();

    try {
      const graph = createGraphClient(requireConfig());
      const applications = await graph.listApplications({
        ...(appType ? { appType } : {}),
        includeAssignments: Boolean(options.assignments),
      });
      spinner.stop();

      if (applications.length === 0) {
        console.log(chalk.yellow('No applications found.'));
        return;
      }

      const header = ['ID', 'Name', 'Type', 'Platforms'];
      const data = [
        options.assignments ? [...header, 'Assignments'] : header,
        ...applications.map((application) => {
          const row = [
            application.id,
            application.displayName,
            APP_TYPE_LABELS[application.appType],
            application.supportedPlatforms.join(', '),
          ];
          return options.assignments ? [...row, String(application.assignments?.length ?? 0)] : row;
        }),
      ];

      console.log(table(data));
      console.log(chalk.dim(`${applications.length} application(s)`));
    } catch (error) {
      spinner.fail('Failed to load applications');
      exitWithError('List applications', error);
    }
  });
