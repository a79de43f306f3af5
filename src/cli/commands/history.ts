/**
 * Assignment history CLI commands
 */

import fs from 'fs';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { table } from 'table';
import { Assignment, AssignmentStatus } from '../../types';
import { exportAssignments } from '../../core/export';
import { partitionResults } from '../../core/selection';
import {
  createAssignmentService,
  exitWithError,
  getConfigManager,
  getHistoryStore,
  requireConfig,
} from '../context';
import { assignmentTable, formatState, printSummary } from '../format';

const STATUSES: AssignmentStatus[] = ['pending', 'inProgress', 'success', 'failed', 'cancelled'];

export const historyCommands = new Command('history')
  .description('View, retry and export past assignments');

// Overview
historyCommands
  .command('show')
  .description('Show assignment statistics and recent operations')
  .option('-l, --limit <n>', 'Number of operations to show', '10')
  .action((options: { limit: string }) => {
    const store = getHistoryStore();
    const stats = store.getStats();

    console.log(chalk.bold('\nAssignment History'));
    console.log('─'.repeat(40));
    console.log(`  Total assignments: ${stats.total}`);
    console.log(`  ${chalk.green('Succeeded')}: ${stats.succeeded}`);
    console.log(`  ${chalk.red('Failed')}: ${stats.failed}`);
    console.log(`  ${chalk.yellow('Cancelled')}: ${stats.cancelled}`);
    console.log(`  ${chalk.dim('Pending')}: ${stats.pending}`);

    const operations = store.getRecentOperations(parseInt(options.limit, 10) || 10);
    if (operations.length === 0) {
      return;
    }

    console.log(chalk.bold('\nRecent Operations:'));
    console.log(
      table([
        ['Started', 'State', 'Sent', 'Succeeded', 'Failed', 'Cancelled', 'Skipped'],
        ...operations.map((operation) => [
          new Date(operation.startedAt).toLocaleString(),
          formatState(operation.state),
          operation.total.toString(),
          operation.succeeded.toString(),
          (operation.failed - operation.rejected).toString() +
            (operation.rejected > 0 ? chalk.dim(` +${operation.rejected} rejected`) : ''),
          operation.cancelled.toString(),
          operation.skipped.length.toString(),
        ]),
      ])
    );
  });

// Failures
historyCommands
  .command('failed')
  .description('List failed and cancelled assignments')
  .option('-s, --status <status>', 'Only this status')
  .option('-l, --limit <n>', 'Limit results', '50')
  .action((options: { status?: string; limit: string }) => {
    const store = getHistoryStore();
    const limit = parseInt(options.limit, 10) || 50;

    let assignments: Assignment[];
    if (options.status) {
      const status = STATUSES.find((candidate) => candidate === options.status);
      if (!status) {
        console.error(chalk.red(`Unknown status: ${options.status}`));
        process.exit(1);
      }
      assignments = store.getAssignments({ status, limit });
    } else {
      assignments = store.getRetryableAssignments().slice(0, limit);
    }

    if (assignments.length === 0) {
      console.log(chalk.green('No failed assignments.'));
      return;
    }

    console.log(assignmentTable(assignments));
  });

// Retry
historyCommands
  .command('retry')
  .description('Retry failed assignments')
  .option('--all', 'Also retry validation rejections and cancelled assignments')
  .action(async (options: { all?: boolean }) => {
    const store = getHistoryStore();
    const retryable = store.getRetryableAssignments();

    if (retryable.length === 0) {
      console.log(chalk.green('Nothing to retry.'));
      return;
    }

    const spinner = ora(`Retrying ${retryable.length} assignment(s)...`).start();

    try {
      const service = createAssignmentService(requireConfig());
      service.restoreFailedAssignments(retryable);

      const onInterrupt = () => service.cancelActiveAssignments();
      process.on('SIGINT', onInterrupt);

      try {
        const results = await service.retryFailedAssignments(!options.all);
        const summary = service.getLastRunSummary();
        store.saveAssignments(results);
        if (summary) {
          store.saveOperation(summary);
        }

        const { completedAssignments, failedAssignments, cancelledAssignments } = partitionResults(results);
        if (failedAssignments.length + cancelledAssignments.length > 0) {
          spinner.warn(`Retried ${results.length}: ${completedAssignments.length} succeeded`);
          console.log(assignmentTable([...failedAssignments, ...cancelledAssignments]));
          process.exitCode = 1;
        } else {
          spinner.succeed(`Retried ${results.length}: all succeeded`);
        }

        if (summary) {
          printSummary(summary);
        }
      } finally {
        process.off('SIGINT', onInterrupt);
      }
    } catch (error) {
      spinner.fail('Retry failed');
      exitWithError('Retry failed', error);
    }
  });

// Export
historyCommands
  .command('export <file>')
  .description('Write assignment history to a JSON file')
  .option('-s, --status <status>', 'Only this status')
  .action((file: string, options: { status?: string }) => {
    try {
      const store = getHistoryStore();
      const status = STATUSES.find((candidate) => candidate === options.status);
      const assignments = store.getAssignments(status ? { status } : {});
      const tenantId = getConfigManager().getConfig().azure.tenantId;

      const document = exportAssignments(assignments, tenantId ? { tenantId } : {});
      fs.writeFileSync(file, JSON.stringify(document, null, 2));

      console.log(chalk.green(`✓ Exported ${document.summary.totalAssignments} assignment(s) to ${file}`));
    } catch (error) {
      exitWithError('Export failed', error);
    }
  });

// Clear
historyCommands
  .command('clear')
  .description('Delete assignment history')
  .option('--failed-only', 'Only delete failed and cancelled assignments')
  .option('-f, --force', 'Confirm deletion')
  .action((options: { failedOnly?: boolean; force?: boolean }) => {
    if (!options.force) {
      console.error(chalk.yellow('This deletes assignment history. Re-run with --force to confirm.'));
      process.exit(1);
    }

    const removed = getHistoryStore().clear({ failedOnly: Boolean(options.failedOnly) });
    console.log(chalk.green(`✓ Removed ${removed} assignment record(s)`));
  });
