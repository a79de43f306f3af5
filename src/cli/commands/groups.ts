/**
 * Group CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { table } from 'table';
import { BUILT_IN_TARGETS } from '../../utils/constants';
import { createGraphClient, exitWithError, requireConfig } from '../context';

export const groupsCommands = new Command('groups')
  .description('Browse assignment targets');

groupsCommands
  .command('list')
  .description('List Entra ID groups and the built-in targets')
  .option('-s, --search <text>', 'Only groups whose name starts with this text')
  .action(async (options: { search?: string }) => {
    const spinner = ora('Loading groups...').start();

    try {
      const graph = createGraphClient(requireConfig());
      const groups = await graph.listGroups(options.search ? { search: options.search } : {});
      spinner.stop();

      const builtIns = options.search
        ? []
        : Object.entries(BUILT_IN_TARGETS).map(([id, target]) => [id, target.displayName, 'Built-in', '']);

      const data = [
        ['ID', 'Name', 'Kind', 'Membership'],
        ...builtIns,
        ...groups.map((group) => [
          group.id,
          group.displayName,
          group.securityEnabled ? 'Security' : group.mailEnabled ? 'Mail' : 'Other',
          group.isDynamic ? 'Dynamic' : 'Assigned',
        ]),
      ];

      if (data.length === 1) {
        console.log(chalk.yellow('No groups found.'));
        return;
      }

      console.log(table(data));
      console.log(chalk.dim(`${groups.length} group(s)`));
    } catch (error) {
      spinner.fail('Failed to load groups');
      exitWithError('List groups', error);
    }
  });
