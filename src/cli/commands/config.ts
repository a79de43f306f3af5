/**
 * Configuration CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { authManager } from '../../core/auth';
import { ConfigFile } from '../../core/config';
import { exitWithError, getConfigManager } from '../context';

export const configCommands = new Command('config')
  .description('Manage tenant and engine configuration');

configCommands
  .command('show')
  .description('Show the effective configuration')
  .action(() => {
    try {
      const manager = getConfigManager();
      const config = manager.getConfig();
      const problems = manager.validateAzureConfig(config.azure);

      console.log(chalk.bold('\nConfiguration'));
      console.log('─'.repeat(40));
      console.log(`  File: ${manager.getConfigPath()}`);
      console.log(`  Tenant ID: ${config.azure.tenantId || chalk.dim('(not set)')}`);
      console.log(`  Client ID: ${config.azure.clientId || chalk.dim('(not set)')}`);
      console.log(`  Client secret: ${config.azure.clientSecret ? '********' : chalk.dim('(not set)')}`);
      console.log(`  Concurrency: ${config.concurrency}`);
      console.log(`  Conflict policy: ${config.conflictPolicy}`);
      console.log(`  Request timeout: ${config.requestTimeoutMs}ms`);
      console.log(
        `  Rate limits: ${config.rateLimits.maxWriteRequests} writes / ${config.rateLimits.maxTotalRequests} requests per ${config.rateLimits.windowMs}ms`
      );

      if (problems.length > 0) {
        console.log(chalk.yellow('\nCredentials incomplete:'));
        problems.forEach((problem) => console.log(chalk.yellow(`  - ${problem}`)));
      }
    } catch (error) {
      exitWithError('Failed to read configuration', error);
    }
  });

configCommands
  .command('init')
  .description('Write the tenant and client IDs to the config file')
  .requiredOption('-t, --tenant-id <id>', 'Entra ID tenant ID (GUID)')
  .requiredOption('-c, --client-id <id>', 'App registration client ID (GUID)')
  .option('--concurrency <n>', 'Applications processed in parallel (1-8)')
  .option('--conflict-policy <policy>', 'overwrite or skip')
  .option('--test', 'Test authentication after saving (needs INTUNE_CLIENT_SECRET)')
  .action(
    async (options: {
      tenantId: string;
      clientId: string;
      concurrency?: string;
      conflictPolicy?: string;
      test?: boolean;
    }) => {
      try {
        const manager = getConfigManager();
        const problems = manager
          .validateAzureConfig({ tenantId: options.tenantId, clientId: options.clientId, clientSecret: 'unchecked' })
          .filter((problem) => !problem.startsWith('Client secret'));

        if (problems.length > 0) {
          console.error(chalk.red('Validation errors:'));
          problems.forEach((problem) => console.error(chalk.red(`  - ${problem}`)));
          process.exit(1);
        }

        const updates: ConfigFile = { tenantId: options.tenantId, clientId: options.clientId };
        if (options.concurrency) {
          updates.concurrency = Number(options.concurrency);
        }
        if (options.conflictPolicy === 'overwrite' || options.conflictPolicy === 'skip') {
          updates.conflictPolicy = options.conflictPolicy;
        } else if (options.conflictPolicy) {
          console.error(chalk.red(`Unknown conflict policy: ${options.conflictPolicy}`));
          process.exit(1);
        }

        manager.save(updates);
        console.log(chalk.green(`✓ Saved configuration to ${manager.getConfigPath()}`));

        if (options.test) {
          const spinner = ora('Testing authentication...').start();
          const azure = manager.requireAzureConfig();
          if (await authManager.testAuth(azure)) {
            spinner.succeed('Authentication successful');
          } else {
            spinner.fail('Authentication failed - check credentials');
          }
        }
      } catch (error) {
        exitWithError('Failed to save configuration', error);
      }
    }
  );
