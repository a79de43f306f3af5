/**
 * Assignment Planner
 * Expands an operation into per-application write plans
 */

import { v4 as uuidv4 } from 'uuid';
import {
  AppType,
  Assignment,
  AssignmentIntent,
  AssignmentSettings,
  AssignmentWriteRequest,
  BulkAssignmentOperation,
  ConflictPolicy,
  ExistingAssignment,
  OperationApplication,
  SkippedPair,
} from '../types';
import { logger } from '../utils/logger';
import { ConflictError } from '../utils/errors';
import {
  AssignmentConflict,
  AssignmentReviewEntry,
  IntentChangeAssessment,
  assessIntentChange,
  classifyAssignment,
  detectConflicts,
  targetKey,
} from './conflict-detector';
import { validateIntent } from './intent-validator';

export interface PlanContext {
  batchId: string;
  conflictPolicy: ConflictPolicy;
  now: () => Date;
}

export interface PlannedApplication {
  id: string;
  displayName: string;
  appType: AppType;
}

export interface PlannedOverwrite {
  assignment: Assignment;
  existing: ExistingAssignment;
  assessment: IntentChangeAssessment;
}

// A candidate naming a target another candidate of the same application already claimed
export interface RepeatedCandidate {
  assignment: Assignment;
  keptId: string;
}

export interface ApplicationPlan {
  application: PlannedApplication;
  rejected: Assignment[];
  skipped: SkippedPair[];
  // candidates whose exact assignment is already present remotely
  duplicates: Assignment[];
  // same target and intent as a kept candidate; they share its outcome
  repeats: RepeatedCandidate[];
  overwrites: PlannedOverwrite[];
  // null when every candidate was rejected or skipped
  write: AssignmentWriteRequest | null;
}

export interface ApplicationCandidates {
  application: PlannedApplication;
  existing?: readonly ExistingAssignment[];
  candidates: Assignment[];
}

function settingsFor(
  operation: BulkAssignmentOperation,
  application: OperationApplication,
  groupId: string
): AssignmentSettings | undefined {
  const override = operation.groupSettings.find((setting) => setting.groupId === groupId);
  if (override?.settings && override.appType === application.appType) {
    return { ...operation.settings, ...override.settings };
  }
  return operation.settings ? { ...operation.settings } : undefined;
}

/**
 * Cross product of applications and groups as pending assignment records,
 * grouped per application in operation order
 */
export function expandOperation(
  operation: BulkAssignmentOperation,
  context: PlanContext
): ApplicationCandidates[] {
  const createdDate = context.now().toISOString();

  return operation.applications.map((application) => {
    const candidates = operation.groups.map((group): Assignment => {
      const override = operation.groupSettings.find((setting) => setting.groupId === group.id);
      const intent = override?.intent ?? operation.intent;
      const settings = intent === 'uninstall' ? undefined : settingsFor(operation, application, group.id);

      return {
        id: uuidv4(),
        batchId: context.batchId,
        applicationId: application.id,
        applicationName: application.displayName,
        appType: application.appType,
        groupId: group.id,
        groupName: group.displayName,
        targetType: group.targetType,
        intent,
        ...(settings ? { settings } : {}),
        ...(override?.filter ? { filter: { ...override.filter } } : {}),
        createdDate,
        status: 'pending',
        retryCount: 0,
      };
    });

    return {
      application: {
        id: application.id,
        displayName: application.displayName,
        appType: application.appType,
      },
      ...(application.existingAssignments ? { existing: application.existingAssignments } : {}),
      candidates,
    };
  });
}

export function markFailed(
  assignment: Assignment,
  errorMessage: string,
  errorCategory: string,
  completedDate: string
): Assignment {
  return { ...assignment, status: 'failed', errorMessage, errorCategory, completedDate };
}

/**
 * Validate candidates for one application and classify them against its
 * existing assignments. Rejected candidates never reach the write, and each
 * target appears in it at most once.
 */
export function planApplication(
  application: PlannedApplication,
  candidates: readonly Assignment[],
  existing: readonly ExistingAssignment[],
  context: PlanContext
): ApplicationPlan {
  const completedDate = context.now().toISOString();
  const rejected: Assignment[] = [];
  const skipped: SkippedPair[] = [];
  const duplicates: Assignment[] = [];
  const overwrites: PlannedOverwrite[] = [];
  const repeats: RepeatedCandidate[] = [];
  const additions: Assignment[] = [];
  const replacedIds = new Set<string>();
  const claimed = new Map<string, Assignment>();

  for (const candidate of candidates) {
    const validation = validateIntent(candidate.intent, application.appType, candidate.targetType);
    if (!validation.valid) {
      logger.warn(
        `Rejected ${candidate.intent} for ${application.displayName} -> ${candidate.groupName}: ${validation.reason}`
      );
      rejected.push(markFailed(candidate, validation.reason, 'validation', completedDate));
      continue;
    }

    const key = targetKey(candidate);
    const kept = claimed.get(key);
    if (kept) {
      if (kept.intent === candidate.intent) {
        logger.debug(`Merging repeated ${candidate.intent} assignment of ${application.displayName} to ${candidate.groupName}`);
        repeats.push({ assignment: candidate, keptId: kept.id });
      } else {
        logger.warn(
          `Skipping ${candidate.intent} for ${application.displayName} -> ${candidate.groupName}: the same operation assigns it as ${kept.intent}`
        );
        skipped.push(toSkippedPair(candidate, 'conflict', kept.intent));
      }
      continue;
    }
    claimed.set(key, candidate);

    const classification = classifyAssignment(existing, candidate);

    if (classification.kind === 'duplicate') {
      logger.info(
        `Skipping duplicate ${candidate.intent} assignment of ${application.displayName} to ${candidate.groupName}`
      );
      skipped.push(toSkippedPair(candidate, 'duplicate', classification.existing.intent));
      duplicates.push(candidate);
      continue;
    }

    if (classification.kind === 'conflicting') {
      const conflict = new ConflictError(
        `${application.displayName} -> ${candidate.groupName}: already assigned as ${classification.existing.intent}`,
        classification.existing
      );
      if (context.conflictPolicy === 'skip') {
        logger.info(`Skipping ${conflict.message}`);
        skipped.push(toSkippedPair(candidate, 'conflict', conflict.existing.intent));
        continue;
      }

      const assessment = assessIntentChange(classification.existing.intent, candidate.intent);
      const message = `${application.displayName} -> ${candidate.groupName}: ${assessment.message}`;
      if (assessment.severity === 'info') {
        logger.info(message);
      } else {
        logger.warn(message);
      }

      overwrites.push({ assignment: candidate, existing: classification.existing, assessment });
      replacedIds.add(classification.existing.id);
    }

    additions.push({ ...candidate, status: 'pending' });
  }

  const write: AssignmentWriteRequest | null =
    additions.length === 0
      ? null
      : {
          applicationId: application.id,
          applicationName: application.displayName,
          retained: existing.filter((assignment) => !replacedIds.has(assignment.id)),
          replaced: existing.filter((assignment) => replacedIds.has(assignment.id)),
          additions,
        };

  return { application, rejected, skipped, duplicates, repeats, overwrites, write };
}

function toSkippedPair(
  candidate: Assignment,
  reason: SkippedPair['reason'],
  existingIntent: AssignmentIntent
): SkippedPair {
  return {
    applicationId: candidate.applicationId,
    applicationName: candidate.applicationName,
    groupId: candidate.groupId,
    groupName: candidate.groupName,
    intent: candidate.intent,
    reason,
    existingIntent,
  };
}

// ============================================================================
// Dry-run review
// ============================================================================

export type PairOutcome = 'new' | 'duplicate' | 'repeat' | 'overwrite' | 'skip' | 'rejected';

export interface PairReview {
  applicationId: string;
  applicationName: string;
  groupId: string;
  groupName: string;
  targetType: Assignment['targetType'];
  intent: Assignment['intent'];
  outcome: PairOutcome;
  detail?: string;
}

export interface OperationReview {
  pairs: PairReview[];
  conflicts: AssignmentConflict[];
  // applications whose current assignments were not known up front
  unknownExisting: string[];
}

/**
 * What performBulkAssignment would do with the operation, using only the
 * existing assignments the operation already carries. Nothing is written.
 */
export function reviewOperation(operation: BulkAssignmentOperation, context: PlanContext): OperationReview {
  const pairs: PairReview[] = [];
  const reviewEntries: AssignmentReviewEntry[] = [];
  const unknownExisting: string[] = [];
  const groupNames = new Map(operation.groups.map((group) => [group.id, group.displayName]));

  for (const source of expandOperation(operation, context)) {
    const existing = source.existing ?? [];
    if (!source.existing) {
      unknownExisting.push(source.application.displayName);
    }

    const plan = planApplication(source.application, source.candidates, existing, context);
    const rejected = new Map(plan.rejected.map((assignment) => [assignment.id, assignment]));
    const duplicates = new Set(plan.duplicates.map((assignment) => assignment.id));
    const repeats = new Set(plan.repeats.map((repeat) => repeat.assignment.id));
    const overwrites = new Map(plan.overwrites.map((overwrite) => [overwrite.assignment.id, overwrite]));
    const written = new Set((plan.write?.additions ?? []).map((assignment) => assignment.id));

    for (const candidate of source.candidates) {
      const rejection = rejected.get(candidate.id);
      const overwrite = overwrites.get(candidate.id);
      const outcome: PairOutcome = rejection
        ? 'rejected'
        : duplicates.has(candidate.id)
          ? 'duplicate'
          : repeats.has(candidate.id)
            ? 'repeat'
            : overwrite
              ? 'overwrite'
              : written.has(candidate.id)
                ? 'new'
                : 'skip';
      const detail = rejection?.errorMessage ?? overwrite?.assessment.message;

      pairs.push({
        applicationId: candidate.applicationId,
        applicationName: candidate.applicationName,
        groupId: candidate.groupId,
        groupName: candidate.groupName,
        targetType: candidate.targetType,
        intent: candidate.intent,
        outcome,
        ...(detail ? { detail } : {}),
      });

      if (!rejection) {
        reviewEntries.push({
          applicationId: candidate.applicationId,
          applicationName: candidate.applicationName,
          targetType: candidate.targetType,
          groupId: candidate.groupId,
          targetName: candidate.groupName,
          intent: candidate.intent,
          isExisting: false,
        });
      }
    }

    for (const assignment of existing) {
      reviewEntries.push({
        applicationId: source.application.id,
        applicationName: source.application.displayName,
        targetType: assignment.targetType,
        ...(assignment.groupId ? { groupId: assignment.groupId } : {}),
        targetName: (assignment.groupId && groupNames.get(assignment.groupId)) || assignment.groupId || assignment.targetType,
        intent: assignment.intent,
        isExisting: true,
      });
    }
  }

  return { pairs, conflicts: detectConflicts(reviewEntries), unknownExisting };
}
