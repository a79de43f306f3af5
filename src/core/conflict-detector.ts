/**
 * Assignment Conflict Detector
 * Classifies candidate assignments against what an application already has
 */

import { AssignmentIntent, AssignmentTargetType, ExistingAssignment } from '../types';
import { INTENT_LABELS } from '../utils/constants';

export interface AssignmentTargetRef {
  targetType: AssignmentTargetType;
  groupId?: string;
}

export interface AssignmentCandidate extends AssignmentTargetRef {
  intent: AssignmentIntent;
}

export type ConflictClassification =
  | { kind: 'new' }
  | { kind: 'duplicate'; existing: ExistingAssignment }
  | { kind: 'conflicting'; existing: ExistingAssignment };

export type ConflictSeverity = 'critical' | 'warning' | 'info';

export interface IntentChangeAssessment {
  severity: ConflictSeverity;
  message: string;
}

/**
 * Identity of an assignment target. Built-in targets have no group id and
 * are identified by their target type.
 */
export function targetKey(target: AssignmentTargetRef): string {
  if (target.targetType === 'group' || target.targetType === 'exclusionGroup') {
    return target.groupId ?? target.targetType;
  }
  return target.targetType;
}

export function classifyAssignment(
  existing: readonly ExistingAssignment[],
  candidate: AssignmentCandidate
): ConflictClassification {
  const key = targetKey(candidate);
  const sameTarget = existing.filter((assignment) => targetKey(assignment) === key);

  if (sameTarget.length === 0) {
    return { kind: 'new' };
  }

  const duplicate = sameTarget.find(
    (assignment) =>
      assignment.intent === candidate.intent && assignment.targetType === candidate.targetType
  );
  if (duplicate) {
    return { kind: 'duplicate', existing: duplicate };
  }

  return { kind: 'conflicting', existing: sameTarget[0] };
}

/**
 * Grade replacing an existing intent with a requested one on the same target
 */
export function assessIntentChange(
  existing: AssignmentIntent,
  requested: AssignmentIntent
): IntentChangeAssessment {
  const from = INTENT_LABELS[existing];
  const to = INTENT_LABELS[requested];
  const pair = new Set([existing, requested]);

  if (pair.has('required') && pair.has('uninstall')) {
    return {
      severity: 'critical',
      message: `Replacing '${from}' with '${to}' reverses the deployment on every targeted device`,
    };
  }
  if (pair.has('required') && pair.has('availableWithoutEnrollment')) {
    return {
      severity: 'critical',
      message: `'${from}' and '${to}' target different enrollment states; replacing one with the other changes who receives the app`,
    };
  }
  if (pair.has('required') && pair.has('available')) {
    return {
      severity: 'warning',
      message:
        requested === 'available'
          ? `Downgrading '${from}' to '${to}' stops forced installation`
          : `'${to}' makes the existing '${from}' assignment redundant`,
    };
  }
  return {
    severity: 'info',
    message: `Existing '${from}' assignment will be replaced with '${to}'`,
  };
}

// ============================================================================
// Review of combined existing and pending assignments
// ============================================================================

export type ConflictType = 'conflictingIntents' | 'redundantAssignment' | 'logicalConflict';

export interface AssignmentReviewEntry extends AssignmentTargetRef {
  applicationId: string;
  applicationName: string;
  targetName: string;
  intent: AssignmentIntent;
  isExisting: boolean;
}

export interface AssignmentConflict {
  targetKey: string;
  targetName: string;
  applicationId: string;
  applicationName: string;
  conflictType: ConflictType;
  severity: ConflictSeverity;
  entries: AssignmentReviewEntry[];
  resolution: string;
}

const INTENT_RULES: {
  intents: [AssignmentIntent, AssignmentIntent];
  conflictType: ConflictType;
  severity: ConflictSeverity;
  resolution: (appName: string) => string;
}[] = [
  {
    intents: ['required', 'uninstall'],
    conflictType: 'conflictingIntents',
    severity: 'critical',
    resolution: (appName) =>
      `Cannot have both 'Required' and 'Uninstall' intents for '${appName}' on the same target. Choose one intent.`,
  },
  {
    intents: ['required', 'available'],
    conflictType: 'redundantAssignment',
    severity: 'warning',
    resolution: (appName) =>
      `'Required' makes 'Available' redundant for '${appName}'. Consider using only 'Required' for this target.`,
  },
  {
    intents: ['availableWithoutEnrollment', 'required'],
    conflictType: 'logicalConflict',
    severity: 'critical',
    resolution: (appName) =>
      `Cannot use 'Available without enrollment' with 'Required' for '${appName}' on the same target. Enrolled devices should use standard intents.`,
  },
];

/**
 * Find intent combinations that clash per application and target
 */
export function detectConflicts(entries: readonly AssignmentReviewEntry[]): AssignmentConflict[] {
  const byTargetAndApp = new Map<string, AssignmentReviewEntry[]>();

  for (const entry of entries) {
    const key = `${targetKey(entry)}|${entry.applicationId}`;
    const bucket = byTargetAndApp.get(key);
    if (bucket) {
      bucket.push(entry);
    } else {
      byTargetAndApp.set(key, [entry]);
    }
  }

  const conflicts: AssignmentConflict[] = [];

  for (const bucket of byTargetAndApp.values()) {
    if (bucket.length < 2) {
      continue;
    }
    const first = bucket[0];
    const intents = new Set(bucket.map((entry) => entry.intent));

    for (const rule of INTENT_RULES) {
      const [a, b] = rule.intents;
      if (!intents.has(a) || !intents.has(b)) {
        continue;
      }
      conflicts.push({
        targetKey: targetKey(first),
        targetName: first.targetName,
        applicationId: first.applicationId,
        applicationName: first.applicationName,
        conflictType: rule.conflictType,
        severity: rule.severity,
        entries: bucket.filter((entry) => entry.intent === a || entry.intent === b),
        resolution: rule.resolution(first.applicationName),
      });
    }
  }

  return conflicts;
}
