/**
 * Assignment Service
 * Plans and executes bulk application assignments against the remote API
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Assignment,
  AssignmentApi,
  AssignmentProgress,
  AssignmentServiceSnapshot,
  AssignmentStatistics,
  AssignmentWriteRequest,
  BulkAssignmentOperation,
  ConflictPolicy,
  ExistingAssignment,
  OperationState,
  OperationSummary,
  SnapshotListener,
} from '../types';
import { logger } from '../utils/logger';
import { runPool, sleep } from '../utils/async';
import { DEFAULT_ASSIGNMENT_OPTIONS } from '../utils/constants';
import {
  AssignmentEngineError,
  BusyError,
  CancelledError,
  NoFailedAssignmentsError,
  PermanentRemoteError,
  isTransientError,
  errorCategoryOf,
  toErrorMessage,
} from '../utils/errors';
import { RateLimiter, RequestKind } from './rate-limiter';
import { deepFreeze } from './operation';
import { validateIntent } from './intent-validator';
import {
  ApplicationCandidates,
  ApplicationPlan,
  PlanContext,
  RepeatedCandidate,
  expandOperation,
  markFailed,
  planApplication,
} from './planner';

export interface AssignmentServiceOptions {
  api: AssignmentApi;
  rateLimiter?: RateLimiter;
  concurrency?: number;
  conflictPolicy?: ConflictPolicy;
  requestTimeoutMs?: number;
  maxAttempts?: number;
  timeoutAttempts?: number;
  historyLimit?: number;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

// Failures the remote side produced; a selective retry only re-sends these
const REMOTE_ERROR_CATEGORIES = new Set([
  'rate-limit',
  'transient',
  'auth',
  'permission',
  'not-found',
  'bad-request',
  'unknown',
]);

interface RunOutcome {
  results: Assignment[];
  summary: OperationSummary;
}

export class AssignmentService {
  private readonly api: AssignmentApi;
  private readonly rateLimiter: RateLimiter;
  private readonly concurrency: number;
  private readonly conflictPolicy: ConflictPolicy;
  private readonly requestTimeoutMs: number;
  private readonly maxAttempts: number;
  private readonly timeoutAttempts: number;
  private readonly historyLimit: number;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  private state: OperationState = 'idle';
  private progress: AssignmentProgress | null = null;
  private lastError: string | null = null;
  private snapshot: Readonly<AssignmentServiceSnapshot>;
  private readonly listeners = new Set<SnapshotListener>();

  private cancelRequested = false;
  private startedAtMs = 0;

  private failedAssignments: Assignment[] = [];
  private cancelledAssignments: Assignment[] = [];
  private history: Assignment[] = [];
  private lastSummary: OperationSummary | null = null;

  constructor(options: AssignmentServiceOptions) {
    this.api = options.api;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_ASSIGNMENT_OPTIONS.concurrency);
    this.conflictPolicy = options.conflictPolicy ?? DEFAULT_ASSIGNMENT_OPTIONS.conflictPolicy;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_ASSIGNMENT_OPTIONS.requestTimeoutMs;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_ASSIGNMENT_OPTIONS.maxAttempts);
    this.timeoutAttempts = Math.max(1, options.timeoutAttempts ?? DEFAULT_ASSIGNMENT_OPTIONS.timeoutAttempts);
    this.historyLimit = options.historyLimit ?? DEFAULT_ASSIGNMENT_OPTIONS.historyLimit;
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleep;
    this.snapshot = this.buildSnapshot();
  }

  // ==========================================================================
  // Observation
  // ==========================================================================

  getSnapshot(): Readonly<AssignmentServiceSnapshot> {
    return this.snapshot;
  }

  /**
   * Register a listener for state changes. Returns the unsubscribe function.
   */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get isProcessing(): boolean {
    return this.state === 'planning' || this.state === 'executing';
  }

  private buildSnapshot(): Readonly<AssignmentServiceSnapshot> {
    const progress = this.progress
      ? { ...this.progress, elapsedMs: this.now().getTime() - this.startedAtMs }
      : null;
    return deepFreeze({
      state: this.state,
      isProcessing: this.isProcessing,
      progress,
      lastError: this.lastError,
    });
  }

  private publish(): void {
    this.snapshot = this.buildSnapshot();
    for (const listener of this.listeners) {
      try {
        listener(this.snapshot);
      } catch (error) {
        logger.error(`Assignment progress listener failed: ${toErrorMessage(error)}`);
      }
    }
  }

  private transition(state: OperationState): void {
    logger.debug(`Assignment service: ${this.state} -> ${state}`);
    this.state = state;
    this.publish();
  }

  private updateProgress(changes: Partial<AssignmentProgress>): void {
    if (!this.progress) {
      return;
    }
    this.progress = { ...this.progress, ...changes };
    this.publish();
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /**
   * Assign every application in the operation to every group in it.
   * Resolves with one record per planned or rejected pair.
   */
  async performBulkAssignment(operation: BulkAssignmentOperation): Promise<Assignment[]> {
    this.assertNotBusy();

    logger.info(
      `Starting bulk assignment ${operation.id}: ${operation.applications.length} application(s) x ${operation.groups.length} group(s) as ${operation.intent}`
    );

    const { results } = await this.run(operation.id, (context) => expandOperation(operation, context));

    this.failedAssignments = results.filter((assignment) => assignment.status === 'failed');
    this.cancelledAssignments = results.filter((assignment) => assignment.status === 'cancelled');

    return results;
  }

  /**
   * Re-plan and re-send previously failed assignments. A selective retry only
   * covers failures the remote side produced; otherwise validation rejections
   * and the last run's cancelled assignments are included too.
   */
  async retryFailedAssignments(selective: boolean = true): Promise<Assignment[]> {
    this.assertNotBusy();

    const toRetry = selective
      ? this.failedAssignments.filter((assignment) =>
          REMOTE_ERROR_CATEGORIES.has(assignment.errorCategory ?? 'unknown')
        )
      : [...this.failedAssignments, ...this.cancelledAssignments];

    if (toRetry.length === 0) {
      throw new NoFailedAssignmentsError();
    }

    logger.info(`Retrying ${toRetry.length} assignment(s) (${selective ? 'selective' : 'all'})`);

    const retryId = uuidv4();
    const { results } = await this.run(retryId, () => groupForRetry(toRetry), true);

    const succeeded = new Set(
      results.filter((assignment) => assignment.status === 'success').map((assignment) => assignment.id)
    );
    const failedAgain = new Map(
      results
        .filter((assignment) => assignment.status === 'failed')
        .map((assignment) => [assignment.id, assignment])
    );
    const cancelledAgain = new Map(
      results
        .filter((assignment) => assignment.status === 'cancelled')
        .map((assignment) => [assignment.id, assignment])
    );

    const previousFailedIds = new Set(this.failedAssignments.map((assignment) => assignment.id));

    this.failedAssignments = [
      ...this.failedAssignments
        .filter((assignment) => !succeeded.has(assignment.id))
        .map((assignment) => failedAgain.get(assignment.id) ?? assignment),
      ...[...failedAgain.values()].filter((assignment) => !previousFailedIds.has(assignment.id)),
    ];
    this.cancelledAssignments = this.cancelledAssignments
      .filter((assignment) => !succeeded.has(assignment.id) && !failedAgain.has(assignment.id))
      .map((assignment) => cancelledAgain.get(assignment.id) ?? assignment);

    return results;
  }

  /**
   * Stop issuing writes for the in-flight operation. Writes already sent are
   * allowed to finish; no-op when idle.
   */
  cancelActiveAssignments(): void {
    if (!this.isProcessing) {
      logger.debug('Cancel requested while idle; nothing to do');
      return;
    }
    if (!this.cancelRequested) {
      logger.info('Cancellation requested; remaining writes will not be sent');
      this.cancelRequested = true;
      this.updateProgress({ currentOperation: 'Cancelling' });
    }
  }

  /**
   * Load a failed/cancelled set from an earlier session so it can be retried
   */
  restoreFailedAssignments(assignments: readonly Assignment[]): void {
    this.assertNotBusy();
    const copies = structuredClone([...assignments]);
    this.failedAssignments = copies.filter((assignment) => assignment.status === 'failed');
    this.cancelledAssignments = copies.filter((assignment) => assignment.status === 'cancelled');
    logger.info(
      `Restored ${this.failedAssignments.length} failed and ${this.cancelledAssignments.length} cancelled assignment(s)`
    );
  }

  getFailedAssignments(): Assignment[] {
    return structuredClone(this.failedAssignments);
  }

  getCancelledAssignments(): Assignment[] {
    return structuredClone(this.cancelledAssignments);
  }

  getLastRunSummary(): OperationSummary | null {
    return this.lastSummary ? structuredClone(this.lastSummary) : null;
  }

  getAssignmentHistory(): Assignment[] {
    return structuredClone(this.history);
  }

  getStatistics(): AssignmentStatistics {
    const count = (status: Assignment['status']) =>
      this.history.filter((assignment) => assignment.status === status).length;
    return {
      total: this.history.length,
      succeeded: count('success'),
      failed: count('failed'),
      cancelled: count('cancelled'),
      pending: count('pending') + count('inProgress'),
    };
  }

  clearAssignmentHistory(): void {
    this.assertNotBusy();
    this.history = [];
    this.failedAssignments = [];
    this.cancelledAssignments = [];
    this.lastSummary = null;
    logger.info('Assignment history cleared');
  }

  private assertNotBusy(): void {
    if (this.isProcessing) {
      throw new BusyError();
    }
  }

  // ==========================================================================
  // Planning and execution
  // ==========================================================================

  private async run(
    operationId: string,
    expand: (context: PlanContext) => ApplicationCandidates[],
    duplicatesSucceed: boolean = false
  ): Promise<RunOutcome> {
    const startedAt = this.now();
    this.startedAtMs = startedAt.getTime();
    this.cancelRequested = false;
    this.lastError = null;
    this.progress = null;
    this.state = 'idle';
    this.transition('planning');

    const context: PlanContext = {
      batchId: operationId,
      conflictPolicy: this.conflictPolicy,
      now: this.now,
    };

    try {
      const sources = expand(context);
      const plans = await this.planAll(sources, context);

      const writes = plans.flatMap((plan) => (plan.write ? [plan.write] : []));
      const rejected = plans.flatMap((plan) => plan.rejected);
      const fetchFailures = plans.flatMap((plan) => plan.fetchFailures);
      const skipped = plans.flatMap((plan) => plan.skipped);
      // On retry an assignment that is already in place counts as done
      const alreadyPresent = duplicatesSucceed
        ? plans.flatMap((plan) =>
            plan.duplicates.map((assignment): Assignment => ({
              ...assignment,
              status: 'success',
              completedDate: this.now().toISOString(),
            }))
          )
        : [];
      const total = writes.reduce((sum, write) => sum + write.additions.length, 0);

      logger.info(
        `Planned ${total} assignment(s) in ${writes.length} write(s); ${rejected.length} rejected, ${skipped.length} skipped, ${fetchFailures.length} failed during planning`
      );

      this.progress = {
        operationId,
        total,
        completed: 0,
        failed: 0,
        cancelled: 0,
        pending: total,
        currentOperation: 'Executing assignments',
        startedAt: startedAt.toISOString(),
        elapsedMs: 0,
      };
      this.transition('executing');

      const executed = await this.executeWrites(writes);
      const settled = [...rejected, ...fetchFailures, ...alreadyPresent, ...executed];
      const results = [...settled, ...settleRepeats(plans.flatMap((plan) => plan.repeats), settled)];

      const failed = results.filter((assignment) => assignment.status === 'failed').length;
      const cancelled = results.filter((assignment) => assignment.status === 'cancelled').length;
      const succeeded = results.filter((assignment) => assignment.status === 'success').length;

      const finalState: OperationState =
        this.cancelRequested && cancelled > 0 ? 'cancelled' : failed > 0 ? 'partiallyFailed' : 'completed';

      const summary: OperationSummary = {
        operationId,
        state: finalState,
        startedAt: startedAt.toISOString(),
        completedAt: this.now().toISOString(),
        total,
        succeeded,
        failed,
        cancelled,
        rejected: rejected.length,
        skipped,
      };

      this.recordHistory(results);
      this.lastSummary = summary;
      this.progress = { ...this.progress, currentOperation: describeState(finalState) };

      logger.info(
        `Bulk assignment ${operationId} ${finalState}: ${succeeded} succeeded, ${failed} failed, ${cancelled} cancelled, ${skipped.length} skipped`
      );
      this.transition(finalState);

      return { results, summary };
    } catch (error) {
      this.lastError = toErrorMessage(error);
      logger.error(`Bulk assignment ${operationId} failed: ${this.lastError}`);
      this.transition('fatallyFailed');
      throw error;
    }
  }

  private async planAll(
    sources: ApplicationCandidates[],
    context: PlanContext
  ): Promise<(ApplicationPlan & { fetchFailures: Assignment[] })[]> {
    const plans = new Map<string, ApplicationPlan & { fetchFailures: Assignment[] }>();
    const needsFetch = sources.some((source) => source.existing === undefined);

    if (!needsFetch) {
      logger.debug('Using cached assignments for every application');
    }

    await runPool(sources, this.concurrency, async (source) => {
      logger.debug(`Planning assignments for ${source.application.displayName}`);

      // Nothing to write when every candidate fails validation
      const admissible = source.candidates.some(
        (candidate) => validateIntent(candidate.intent, source.application.appType, candidate.targetType).valid
      );

      let existing: readonly ExistingAssignment[];
      try {
        existing = source.existing ?? (admissible ? await this.fetchExisting(source) : []);
      } catch (error) {
        // Validation still applies; the rest fail with the fetch error
        const plan = planApplication(source.application, source.candidates, [], context);
        const message = `Could not read current assignments: ${toErrorMessage(error)}`;
        logger.error(`${source.application.displayName}: ${message}`);
        const completedDate = this.now().toISOString();
        plans.set(source.application.id, {
          ...plan,
          skipped: [],
          duplicates: [],
          overwrites: [],
          write: null,
          fetchFailures: (plan.write?.additions ?? []).map((assignment) =>
            markFailed(assignment, message, errorCategoryOf(error), completedDate)
          ),
        });
        return;
      }

      const plan = planApplication(source.application, source.candidates, existing, context);
      plans.set(source.application.id, { ...plan, fetchFailures: [] });
    });

    // Keep operation order regardless of which worker finished first
    return sources.flatMap((source) => {
      const plan = plans.get(source.application.id);
      return plan ? [plan] : [];
    });
  }

  private async fetchExisting(source: ApplicationCandidates): Promise<ExistingAssignment[]> {
    return this.withRetries(`read assignments of ${source.application.displayName}`, 'read', () =>
      this.api.fetchCurrentAssignments(source.application.id, { timeoutMs: this.requestTimeoutMs })
    );
  }

  private async executeWrites(writes: AssignmentWriteRequest[]): Promise<Assignment[]> {
    const outcomes = new Map<string, Assignment[]>();
    const workers = Math.min(this.concurrency, this.rateLimiter.calculateOptimalBatchSize());
    logger.debug(`Executing ${writes.length} write(s) with ${workers} worker(s)`);

    await runPool(writes, workers, async (write) => {
      outcomes.set(write.applicationId, await this.executeWrite(write));
    });

    return writes.flatMap((write) => outcomes.get(write.applicationId) ?? []);
  }

  private async executeWrite(write: AssignmentWriteRequest): Promise<Assignment[]> {
    const count = write.additions.length;
    let attempts = 0;

    try {
      await this.withRetries(
        `assign ${write.applicationName}`,
        'write',
        () => {
          attempts += 1;
          this.updateProgress({
            currentApplication: write.applicationName,
            currentGroup: write.additions.map((assignment) => assignment.groupName).join(', '),
          });
          const request: AssignmentWriteRequest = {
            ...write,
            additions: write.additions.map((assignment): Assignment => ({ ...assignment, status: 'inProgress' })),
          };
          return this.api.assign(request, { timeoutMs: this.requestTimeoutMs });
        }
      );
    } catch (error) {
      if (error instanceof CancelledError) {
        this.updateProgress({
          cancelled: this.counter('cancelled') + count,
          pending: this.counter('pending') - count,
        });
        logger.info(`Cancelled ${count} assignment(s) for ${write.applicationName}`);
        return write.additions.map((assignment): Assignment => ({
          ...assignment,
          status: 'cancelled',
          errorMessage: error.message,
          errorCategory: error.errorCategory,
          retryCount: assignment.retryCount + Math.max(0, attempts - 1),
        }));
      }

      const message = toErrorMessage(error);
      logger.error(`Assignment write for ${write.applicationName} failed: ${message}`);
      this.updateProgress({
        failed: this.counter('failed') + count,
        pending: this.counter('pending') - count,
      });
      const completedDate = this.now().toISOString();
      return write.additions.map((assignment): Assignment => ({
        ...markFailed(assignment, message, errorCategoryOf(error), completedDate),
        retryCount: assignment.retryCount + Math.max(0, attempts - 1),
      }));
    }

    this.updateProgress({
      completed: this.counter('completed') + count,
      pending: this.counter('pending') - count,
    });
    logger.info(`Assigned ${write.applicationName} to ${count} target(s)`);

    const completedDate = this.now().toISOString();
    return write.additions.map((assignment): Assignment => ({
      ...assignment,
      status: 'success',
      completedDate,
      retryCount: assignment.retryCount + attempts - 1,
    }));
  }

  /**
   * Run a remote call under the limiter with bounded retries for transient
   * failures. Cancellation is checked before every write attempt.
   */
  private async withRetries<T>(
    label: string,
    kind: RequestKind,
    call: () => Promise<T>
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      if (kind === 'write' && this.cancelRequested) {
        throw new CancelledError();
      }

      await this.rateLimiter.acquire(kind, kind === 'write' ? () => this.cancelRequested : undefined);

      try {
        const result = await call();
        this.rateLimiter.recordSuccess();
        return result;
      } catch (error) {
        const remoteError = normalizeRemoteError(error);
        if (!isTransientError(remoteError)) {
          throw remoteError;
        }

        const allowed = remoteError.reason === 'timeout' ? this.timeoutAttempts : this.maxAttempts;
        if (attempt >= allowed) {
          logger.error(`${label}: giving up after ${attempt} attempt(s): ${remoteError.message}`);
          throw remoteError;
        }

        if (remoteError.reason === 'rate-limit') {
          // The limiter pauses every caller; the next acquire() waits it out
          this.rateLimiter.recordRateLimit(remoteError.retryAfterMs);
        } else {
          const delay = this.rateLimiter.calculateRetryDelay(attempt, remoteError.retryAfterMs);
          logger.warn(`${label}: ${remoteError.message}; retrying in ${delay}ms (attempt ${attempt + 1}/${allowed})`);
          await this.sleep(delay);
        }
      }
    }
  }

  private counter(field: 'completed' | 'failed' | 'cancelled' | 'pending'): number {
    return this.progress ? this.progress[field] : 0;
  }

  private recordHistory(results: Assignment[]): void {
    const ids = new Set(results.map((assignment) => assignment.id));
    // A retried assignment replaces its earlier record
    this.history = [...this.history.filter((assignment) => !ids.has(assignment.id)), ...results];
    if (this.history.length > this.historyLimit) {
      this.history = this.history.slice(this.history.length - this.historyLimit);
    }
  }
}

/**
 * Anything the transport throws that is not part of the taxonomy is a
 * permanent failure of that write
 */
function normalizeRemoteError(error: unknown): AssignmentEngineError {
  if (error instanceof AssignmentEngineError) {
    return error;
  }
  return new PermanentRemoteError(toErrorMessage(error), 'unknown');
}

/**
 * A repeated candidate takes the outcome of the candidate that was written in
 * its place. Repeats of a pair that never settled are dropped with it.
 */
function settleRepeats(repeats: readonly RepeatedCandidate[], settled: readonly Assignment[]): Assignment[] {
  const byId = new Map(settled.map((assignment) => [assignment.id, assignment]));

  return repeats.flatMap(({ assignment, keptId }) => {
    const kept = byId.get(keptId);
    if (!kept) {
      return [];
    }
    return [
      {
        ...assignment,
        status: kept.status,
        ...(kept.completedDate ? { completedDate: kept.completedDate } : {}),
        ...(kept.errorMessage ? { errorMessage: kept.errorMessage } : {}),
        ...(kept.errorCategory ? { errorCategory: kept.errorCategory } : {}),
      },
    ];
  });
}

function groupForRetry(assignments: readonly Assignment[]): ApplicationCandidates[] {
  const byApplication = new Map<string, ApplicationCandidates>();

  for (const assignment of assignments) {
    const candidate: Assignment = {
      id: assignment.id,
      batchId: assignment.batchId,
      applicationId: assignment.applicationId,
      applicationName: assignment.applicationName,
      appType: assignment.appType,
      groupId: assignment.groupId,
      groupName: assignment.groupName,
      targetType: assignment.targetType,
      intent: assignment.intent,
      ...(assignment.settings ? { settings: { ...assignment.settings } } : {}),
      ...(assignment.filter ? { filter: { ...assignment.filter } } : {}),
      createdDate: assignment.createdDate,
      status: 'pending',
      retryCount: assignment.retryCount + 1,
    };

    const entry = byApplication.get(assignment.applicationId);
    if (entry) {
      entry.candidates.push(candidate);
    } else {
      byApplication.set(assignment.applicationId, {
        application: {
          id: assignment.applicationId,
          displayName: assignment.applicationName,
          appType: assignment.appType,
        },
        candidates: [candidate],
      });
    }
  }

  return [...byApplication.values()];
}

function describeState(state: OperationState): string {
  switch (state) {
    case 'completed':
      return 'Completed';
    case 'partiallyFailed':
      return 'Completed with failures';
    case 'cancelled':
      return 'Cancelled';
    case 'fatallyFailed':
      return 'Failed';
    default:
      return state;
  }
}
