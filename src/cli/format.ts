/**
 * Terminal formatting helpers
 */

import chalk from 'chalk';
import { table } from 'table';
import { Assignment, AssignmentStatus, OperationState, OperationSummary } from '../types';
import { INTENT_LABELS, TARGET_LABELS } from '../utils/constants';

export function formatStatus(status: AssignmentStatus): string {
  switch (status) {
    case 'success':
      return chalk.green('✓ success');
    case 'failed':
      return chalk.red('✗ failed');
    case 'cancelled':
      return chalk.yellow('~ cancelled');
    default:
      return chalk.dim(status);
  }
}

export function formatState(state: OperationState): string {
  switch (state) {
    case 'completed':
      return chalk.green(state);
    case 'partiallyFailed':
    case 'fatallyFailed':
      return chalk.red(state);
    case 'cancelled':
      return chalk.yellow(state);
    default:
      return state;
  }
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

export function assignmentTable(assignments: readonly Assignment[]): string {
  return table([
    ['Application', 'Target', 'Intent', 'Status', 'Retries', 'Error'],
    ...assignments.map((assignment) => [
      truncate(assignment.applicationName, 40),
      assignment.targetType === 'group'
        ? truncate(assignment.groupName, 40)
        : `${truncate(assignment.groupName, 30)} (${TARGET_LABELS[assignment.targetType]})`,
      INTENT_LABELS[assignment.intent],
      formatStatus(assignment.status),
      assignment.retryCount.toString(),
      truncate(assignment.errorMessage ?? '', 60),
    ]),
  ]);
}

export function printSummary(summary: OperationSummary): void {
  console.log(chalk.bold('\nAssignment Summary:'));
  console.log('─'.repeat(40));
  console.log(`  State: ${formatState(summary.state)}`);
  console.log(`  Sent: ${summary.total}`);
  console.log(`  ${chalk.green('Succeeded')}: ${summary.succeeded}`);
  console.log(`  ${chalk.red('Failed')}: ${summary.failed}`);
  if (summary.rejected > 0) {
    console.log(`  ${chalk.red('Rejected by validation')}: ${summary.rejected}`);
  }
  if (summary.cancelled > 0) {
    console.log(`  ${chalk.yellow('Cancelled')}: ${summary.cancelled}`);
  }
  if (summary.skipped.length > 0) {
    console.log(`  ${chalk.dim('Skipped')}: ${summary.skipped.length}`);
    for (const pair of summary.skipped) {
      console.log(
        chalk.dim(
          `    - ${pair.applicationName} -> ${pair.groupName}: ${pair.reason} (existing ${INTENT_LABELS[pair.existingIntent]})`
        )
      );
    }
  }
}
