/**
 * Bulk assignment CLI commands
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { table } from 'table';
import {
  ASSIGNMENT_INTENTS,
  AppConfig,
  AssignmentIntent,
  BulkAssignmentOperation,
  ConflictPolicy,
} from '../../types';
import { BUILT_IN_TARGETS, INTENT_LABELS, TARGET_LABELS } from '../../utils/constants';
import { PlanningError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { BulkAssignmentSelection, partitionResults } from '../../core/selection';
import { reviewOperation } from '../../core/planner';
import { GraphClient } from '../../core/graph';
import {
  createAssignmentService,
  createGraphClient,
  exitWithError,
  getHistoryStore,
  requireConfig,
} from '../context';
import { assignmentTable, printSummary } from '../format';

interface AssignOptions {
  app: string[];
  group?: string[];
  exclude?: string[];
  intent: AssignmentIntent;
  skipConflicts?: boolean;
  concurrency?: number;
}

function parseIntent(value: string): AssignmentIntent {
  const intent = ASSIGNMENT_INTENTS.find((candidate) => candidate === value);
  if (!intent) {
    throw new InvalidArgumentError(`Expected one of: ${ASSIGNMENT_INTENTS.join(', ')}`);
  }
  return intent;
}

function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 8) {
    throw new InvalidArgumentError('Expected an integer between 1 and 8');
  }
  return parsed;
}

function withAssignOptions(command: Command): Command {
  return command
    .requiredOption('-a, --app <ids...>', 'Application IDs')
    .option('-g, --group <ids...>', `Group IDs to include (built-in: ${Object.keys(BUILT_IN_TARGETS).join(', ')})`)
    .option('-x, --exclude <ids...>', 'Group IDs to exclude')
    .option('-i, --intent <intent>', `Assignment intent (${ASSIGNMENT_INTENTS.join(', ')})`, parseIntent, 'required')
    .option('--skip-conflicts', 'Leave targets that already have a different intent untouched')
    .option('-c, --concurrency <n>', 'Applications processed in parallel (1-8)', parseConcurrency);
}

/**
 * Resolve the command-line selection into a frozen operation, with each
 * application's current assignments attached
 */
async function buildOperation(graph: GraphClient, options: AssignOptions): Promise<BulkAssignmentOperation> {
  const included = options.group ?? [];
  const excluded = options.exclude ?? [];
  if (included.length + excluded.length === 0) {
    throw new PlanningError('Specify at least one --group or --exclude');
  }

  const applications = await graph.listApplications({ includeAssignments: true });
  const applicationsById = new Map(applications.map((application) => [application.id, application]));

  const customGroupIds = [...included, ...excluded].filter((id) => !(id in BUILT_IN_TARGETS));
  const groups = customGroupIds.length > 0 ? await graph.listGroups() : [];
  const groupNames = new Map<string, string>([
    ...Object.entries(BUILT_IN_TARGETS).map(([id, target]): [string, string] => [id, target.displayName]),
    ...groups.map((group): [string, string] => [group.id, group.displayName]),
  ]);

  const selection = new BulkAssignmentSelection();
  selection.intent = options.intent;

  for (const id of options.app) {
    const application = applicationsById.get(id);
    if (!application) {
      throw new PlanningError(`Application not found: ${id}`);
    }
    selection.selectApplication(application);
  }

  for (const id of [...included, ...excluded]) {
    const displayName = groupNames.get(id);
    if (!displayName) {
      throw new PlanningError(`Group not found: ${id}`);
    }
    selection.selectGroup({ id, displayName });
    if (excluded.includes(id)) {
      selection.updateGroupSettings(id, { mode: 'exclude' });
    }
  }

  const summary = selection.getSummary();
  logger.debug(
    `Selection: ${summary.applications} application(s) x ${summary.groups} group(s); shared platforms: ${summary.sharedPlatforms.join(', ') || 'none'}`
  );

  return selection.buildOperation();
}

function conflictPolicyOf(options: AssignOptions, config: AppConfig): ConflictPolicy {
  return options.skipConflicts ? 'skip' : config.conflictPolicy;
}

export const assignCommands = new Command('assign')
  .description('Assign applications to groups in bulk');

// Dry run
withAssignOptions(
  assignCommands
    .command('plan')
    .description('Validate the selection and review conflicts without writing anything')
).action(async (options: AssignOptions) => {
  const spinner = ora('Reading applications and groups...').start();

  try {
    const config = requireConfig();
    const operation = await buildOperation(createGraphClient(config), options);
    spinner.stop();

    const review = reviewOperation(operation, {
      batchId: operation.id,
      conflictPolicy: conflictPolicyOf(options, config),
      now: () => new Date(),
    });

    const outcomeLabel = {
      new: chalk.green('assign'),
      overwrite: chalk.yellow('overwrite'),
      duplicate: chalk.dim('already assigned'),
      repeat: chalk.dim('repeated'),
      skip: chalk.dim('skip (conflict)'),
      rejected: chalk.red('rejected'),
    };

    console.log(chalk.bold(`\nPlan for ${operation.applications.length} application(s) x ${operation.groups.length} target(s):`));
    console.log(
      table([
        ['Application', 'Target', 'Intent', 'Outcome', 'Detail'],
        ...review.pairs.map((pair) => [
          pair.applicationName,
          pair.targetType === 'group' ? pair.groupName : `${pair.groupName} (${TARGET_LABELS[pair.targetType]})`,
          INTENT_LABELS[pair.intent],
          outcomeLabel[pair.outcome],
          pair.detail ?? '',
        ]),
      ])
    );

    if (review.conflicts.length > 0) {
      console.log(chalk.bold('Intent conflicts:'));
      for (const conflict of review.conflicts) {
        const colour = conflict.severity === 'critical' ? chalk.red : chalk.yellow;
        console.log(colour(`  [${conflict.severity}] ${conflict.applicationName} -> ${conflict.targetName}`));
        console.log(chalk.dim(`    ${conflict.resolution}`));
      }
    }
  } catch (error) {
    spinner.stop();
    exitWithError('Plan failed', error);
  }
});

// Execute
withAssignOptions(
  assignCommands
    .command('run')
    .description('Create the assignments')
).action(async (options: AssignOptions) => {
  const spinner = ora('Reading applications and groups...').start();

  try {
    const config = requireConfig();
    const operation = await buildOperation(createGraphClient(config), options);
    const service = createAssignmentService(config, {
      conflictPolicy: conflictPolicyOf(options, config),
      ...(options.concurrency ? { concurrency: options.concurrency } : {}),
    });

    const unsubscribe = service.subscribe((snapshot) => {
      const progress = snapshot.progress;
      if (snapshot.state === 'planning') {
        spinner.text = 'Planning assignments...';
      } else if (progress && snapshot.isProcessing) {
        const done = progress.completed + progress.failed + progress.cancelled;
        const pct = progress.total > 0 ? Math.round((done / progress.total) * 100) : 100;
        spinner.text = `${progress.currentOperation} [${pct}%] ${progress.currentApplication ?? ''}`;
      }
    });

    let interrupted = false;
    const onInterrupt = () => {
      if (interrupted) {
        process.exit(130);
      }
      interrupted = true;
      spinner.text = 'Cancelling (press Ctrl-C again to abort immediately)...';
      service.cancelActiveAssignments();
    };
    process.on('SIGINT', onInterrupt);

    try {
      const results = await service.performBulkAssignment(operation);
      const summary = service.getLastRunSummary();
      const { completedAssignments, failedAssignments, cancelledAssignments } = partitionResults(results);

      const store = getHistoryStore();
      store.saveAssignments(results);
      if (summary) {
        store.saveOperation(summary);
      }

      if (failedAssignments.length > 0 || cancelledAssignments.length > 0) {
        spinner.warn(`Assigned ${completedAssignments.length} of ${results.length}`);
        console.log(assignmentTable([...failedAssignments, ...cancelledAssignments]));
        console.log(chalk.dim('Run "intune-assign history retry" to retry the failures.'));
        process.exitCode = 1;
      } else {
        spinner.succeed(`Assigned ${completedAssignments.length} assignment(s)`);
      }

      if (summary) {
        printSummary(summary);
      }
    } finally {
      process.off('SIGINT', onInterrupt);
      unsubscribe();
    }
  } catch (error) {
    spinner.fail('Bulk assignment failed');
    exitWithError('Bulk assignment failed', error);
  }
});
