/**
 * Bulk Assignment Operation
 * Frozen snapshot of a selection, safe to hold across async work
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Application,
  AssignmentIntent,
  AssignmentSettings,
  AssignmentTargetType,
  BulkAssignmentOperation,
  DeviceGroup,
  GroupAssignmentSettings,
  OperationApplication,
  OperationGroup,
} from '../types';
import { PlanningError } from '../utils/errors';
import { APP_TYPE_PLATFORMS, BUILT_IN_TARGETS } from '../utils/constants';
import { targetKey } from './conflict-detector';

export interface BulkAssignmentInput {
  applications: readonly Application[];
  groups: readonly Pick<DeviceGroup, 'id' | 'displayName'>[];
  intent: AssignmentIntent;
  settings?: AssignmentSettings;
  groupSettings?: readonly GroupAssignmentSettings[];
  id?: string;
  createdAt?: Date;
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function resolveTargetType(
  groupId: string,
  mode: GroupAssignmentSettings['mode'] = 'include'
): AssignmentTargetType {
  const builtIn = BUILT_IN_TARGETS[groupId];
  if (builtIn) {
    return builtIn.targetType;
  }
  return mode === 'exclude' ? 'exclusionGroup' : 'group';
}

export function isBuiltInTarget(groupId: string): boolean {
  return groupId in BUILT_IN_TARGETS;
}

function uniqueBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  const result: T[] = [];
  for (const item of items) {
    const k = key(item);
    if (!seen.has(k)) {
      seen.add(k);
      result.push(item);
    }
  }
  return result;
}

/**
 * Build an immutable operation from a (possibly live) selection. Inputs are
 * deep-copied; later changes to them do not reach the operation.
 */
export function createBulkAssignmentOperation(input: BulkAssignmentInput): BulkAssignmentOperation {
  const source = structuredClone({
    applications: input.applications,
    groups: input.groups,
    settings: input.settings,
    groupSettings: input.groupSettings ?? [],
  });

  const applications: OperationApplication[] = uniqueBy(source.applications, (app) => app.id).map(
    (app) => ({
      id: app.id,
      displayName: app.displayName,
      appType: app.appType,
      supportedPlatforms:
        app.supportedPlatforms.length > 0 ? app.supportedPlatforms : [...APP_TYPE_PLATFORMS[app.appType]],
      ...(app.assignments ? { existingAssignments: app.assignments } : {}),
    })
  );

  const settingsByGroup = new Map<string, GroupAssignmentSettings>();
  for (const setting of source.groupSettings) {
    if (!settingsByGroup.has(setting.groupId)) {
      settingsByGroup.set(setting.groupId, setting);
    }
  }

  const groups: OperationGroup[] = uniqueBy(
    uniqueBy(source.groups, (group) => group.id).map((group) => ({
      id: group.id,
      displayName: group.displayName,
      targetType: resolveTargetType(group.id, settingsByGroup.get(group.id)?.mode),
    })),
    (group) => targetKey({ targetType: group.targetType, groupId: group.id })
  );

  if (applications.length === 0) {
    throw new PlanningError('Select at least one application');
  }
  if (groups.length === 0) {
    throw new PlanningError('Select at least one group');
  }

  const selectedGroupIds = new Set(groups.map((group) => group.id));
  const groupSettings = [...settingsByGroup.values()].filter((setting) =>
    selectedGroupIds.has(setting.groupId)
  );

  const operation: BulkAssignmentOperation = {
    id: input.id ?? uuidv4(),
    applications,
    groups,
    intent: input.intent,
    ...(source.settings ? { settings: source.settings } : {}),
    groupSettings,
    createdAt: (input.createdAt ?? new Date()).toISOString(),
  };

  return deepFreeze(operation);
}
