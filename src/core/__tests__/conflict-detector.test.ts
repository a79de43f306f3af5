import { describe, it, expect } from 'vitest';
import {
  AssignmentReviewEntry,
  assessIntentChange,
  classifyAssignment,
  detectConflicts,
  targetKey,
} from '../conflict-detector';
import { ExistingAssignment } from '../../types';

const existing: ExistingAssignment[] = [
  { id: 'e1', intent: 'required', targetType: 'group', groupId: 'g1' },
  { id: 'e2', intent: 'available', targetType: 'allUsers' },
];

function entry(overrides: Partial<AssignmentReviewEntry>): AssignmentReviewEntry {
  return {
    applicationId: 'a1',
    applicationName: 'Company Portal',
    targetType: 'group',
    groupId: 'g1',
    targetName: 'Sales',
    intent: 'required',
    isExisting: false,
    ...overrides,
  };
}

describe('conflict detector', () => {
  describe('targetKey', () => {
    it('uses the group id for groups and the target type for built-in targets', () => {
      expect(targetKey({ targetType: 'group', groupId: 'g1' })).toBe('g1');
      expect(targetKey({ targetType: 'exclusionGroup', groupId: 'g1' })).toBe('g1');
      expect(targetKey({ targetType: 'allDevices', groupId: 'intune-all-devices' })).toBe('allDevices');
    });
  });

  describe('classifyAssignment', () => {
    it('reports a new target', () => {
      expect(classifyAssignment(existing, { targetType: 'group', groupId: 'g2', intent: 'required' })).toEqual({
        kind: 'new',
      });
    });

    it('reports a duplicate for the same group and intent', () => {
      expect(classifyAssignment(existing, { targetType: 'group', groupId: 'g1', intent: 'required' })).toEqual({
        kind: 'duplicate',
        existing: existing[0],
      });
    });

    it('reports a conflict for the same group with another intent', () => {
      expect(classifyAssignment(existing, { targetType: 'group', groupId: 'g1', intent: 'uninstall' })).toEqual({
        kind: 'conflicting',
        existing: existing[0],
      });
    });

    it('matches built-in targets by target type', () => {
      expect(
        classifyAssignment(existing, { targetType: 'allUsers', groupId: 'intune-all-users', intent: 'available' })
      ).toEqual({ kind: 'duplicate', existing: existing[1] });
      expect(classifyAssignment(existing, { targetType: 'allDevices', intent: 'available' })).toEqual({ kind: 'new' });
    });

    it('treats excluding an included group as a conflict', () => {
      expect(
        classifyAssignment(existing, { targetType: 'exclusionGroup', groupId: 'g1', intent: 'required' }).kind
      ).toBe('conflicting');
    });

    it('reports everything as new when nothing exists', () => {
      expect(classifyAssignment([], { targetType: 'allDevices', intent: 'required' })).toEqual({ kind: 'new' });
    });
  });

  describe('assessIntentChange', () => {
    it('grades reversals as critical', () => {
      expect(assessIntentChange('required', 'uninstall')).toEqual({
        severity: 'critical',
        message: "Replacing 'Required' with 'Uninstall' reverses the deployment on every targeted device",
      });
      expect(assessIntentChange('availableWithoutEnrollment', 'required').severity).toBe('critical');
    });

    it('grades a downgrade to available as a warning', () => {
      expect(assessIntentChange('required', 'available')).toEqual({
        severity: 'warning',
        message: "Downgrading 'Required' to 'Available' stops forced installation",
      });
    });

    it('grades other replacements as informational', () => {
      expect(assessIntentChange('available', 'uninstall')).toEqual({
        severity: 'info',
        message: "Existing 'Available' assignment will be replaced with 'Uninstall'",
      });
    });
  });

  describe('detectConflicts', () => {
    it('flags required and uninstall on the same target', () => {
      const required = entry({ intent: 'required', isExisting: true });
      const uninstall = entry({ intent: 'uninstall' });

      expect(detectConflicts([required, uninstall])).toEqual([
        {
          targetKey: 'g1',
          targetName: 'Sales',
          applicationId: 'a1',
          applicationName: 'Company Portal',
          conflictType: 'conflictingIntents',
          severity: 'critical',
          entries: [required, uninstall],
          resolution:
            "Cannot have both 'Required' and 'Uninstall' intents for 'Company Portal' on the same target. Choose one intent.",
        },
      ]);
    });

    it('flags redundant and logically conflicting combinations', () => {
      const conflicts = detectConflicts([
        entry({ intent: 'required' }),
        entry({ intent: 'available', isExisting: true }),
        entry({ targetType: 'allUsers', groupId: undefined, targetName: 'All Users', intent: 'required' }),
        entry({ targetType: 'allUsers', groupId: undefined, targetName: 'All Users', intent: 'availableWithoutEnrollment' }),
      ]);

      expect(conflicts.map((conflict) => [conflict.targetKey, conflict.conflictType, conflict.severity])).toEqual([
        ['g1', 'redundantAssignment', 'warning'],
        ['allUsers', 'logicalConflict', 'critical'],
      ]);
    });

    it('ignores different applications and single entries', () => {
      expect(
        detectConflicts([
          entry({ intent: 'required' }),
          entry({ applicationId: 'a2', intent: 'uninstall' }),
          entry({ groupId: 'g2', intent: 'available' }),
        ])
      ).toEqual([]);
    });
  });
});
