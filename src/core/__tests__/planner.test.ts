import { describe, it, expect } from 'vitest';
import { PlanContext, expandOperation, planApplication, reviewOperation } from '../planner';
import { createBulkAssignmentOperation } from '../operation';
import { GroupAssignmentSettings } from '../../types';
import { makeApp, makeGroup } from './fakes';

const context: PlanContext = {
  batchId: 'batch-1',
  conflictPolicy: 'overwrite',
  now: () => new Date('2026-02-01T08:00:00.000Z'),
};

const vppOverride: GroupAssignmentSettings = {
  groupId: 'g2',
  groupName: 'Group g2',
  appType: 'iosVppApp',
  intent: 'available',
  mode: 'include',
  filter: { filterId: 'filter-1', filterMode: 'include' },
  settings: { useDeviceLicensing: true },
};

describe('expandOperation', () => {
  const operation = createBulkAssignmentOperation({
    applications: [makeApp('vpp', 'iosVppApp'), makeApp('lob', 'iosLobApp')],
    groups: [makeGroup('g1'), makeGroup('g2')],
    intent: 'required',
    settings: { uninstallOnDeviceRemoval: false },
    groupSettings: [vppOverride],
  });

  it('creates one pending record per application and group', () => {
    const expanded = expandOperation(operation, context);

    expect(expanded.map((source) => source.application.id)).toEqual(['vpp', 'lob']);
    const [first] = expanded[0].candidates;
    expect(first).toMatchObject({
      batchId: 'batch-1',
      applicationId: 'vpp',
      groupId: 'g1',
      targetType: 'group',
      intent: 'required',
      settings: { uninstallOnDeviceRemoval: false },
      createdDate: '2026-02-01T08:00:00.000Z',
      status: 'pending',
      retryCount: 0,
    });
  });

  it('applies a group override, with its settings only for the matching app type', () => {
    const [vpp, lob] = expandOperation(operation, context);

    expect(vpp.candidates[1]).toMatchObject({
      intent: 'available',
      settings: { uninstallOnDeviceRemoval: false, useDeviceLicensing: true },
      filter: { filterId: 'filter-1', filterMode: 'include' },
    });
    expect(lob.candidates[1].intent).toBe('available');
    expect(lob.candidates[1].settings).toEqual({ uninstallOnDeviceRemoval: false });
  });

  it('sends no settings with uninstall', () => {
    const uninstall = createBulkAssignmentOperation({
      applications: [makeApp('lob', 'iosLobApp')],
      groups: [makeGroup('g1')],
      intent: 'uninstall',
      settings: { uninstallOnDeviceRemoval: true },
    });

    const [source] = expandOperation(uninstall, context);

    expect(source.candidates[0].settings).toBeUndefined();
  });
});

describe('planApplication', () => {
  it('sorts candidates into rejected, skipped, overwritten and new', () => {
    const operation = createBulkAssignmentOperation({
      applications: [makeApp('web', 'webApp')],
      groups: [makeGroup('g1'), makeGroup('g2'), makeGroup('g3'), makeGroup('intune-all-devices')],
      intent: 'available',
    });
    const [source] = expandOperation(operation, context);

    const plan = planApplication(
      source.application,
      source.candidates,
      [
        { id: 'e1', intent: 'available', targetType: 'group', groupId: 'g1' },
        { id: 'e2', intent: 'required', targetType: 'group', groupId: 'g2' },
        { id: 'e3', intent: 'required', targetType: 'allUsers' },
      ],
      context
    );

    expect(plan.rejected.map((assignment) => [assignment.groupId, assignment.errorCategory])).toEqual([
      ['intune-all-devices', 'validation'],
    ]);
    expect(plan.skipped.map((pair) => [pair.groupId, pair.reason])).toEqual([['g1', 'duplicate']]);
    expect(plan.overwrites.map((overwrite) => [overwrite.existing.id, overwrite.assessment.severity])).toEqual([
      ['e2', 'warning'],
    ]);
    expect(plan.write?.additions.map((assignment) => assignment.groupId)).toEqual(['g2', 'g3']);
    expect(plan.write?.retained.map((assignment) => assignment.id)).toEqual(['e1', 'e3']);
    expect(plan.write?.replaced.map((assignment) => assignment.id)).toEqual(['e2']);
  });

  it('produces no write when nothing is left to send', () => {
    const operation = createBulkAssignmentOperation({
      applications: [makeApp('lob')],
      groups: [makeGroup('g1')],
      intent: 'required',
    });
    const [source] = expandOperation(operation, context);

    const plan = planApplication(
      source.application,
      source.candidates,
      [{ id: 'e1', intent: 'available', targetType: 'group', groupId: 'g1' }],
      { ...context, conflictPolicy: 'skip' }
    );

    expect(plan.write).toBeNull();
    expect(plan.skipped.map((pair) => pair.reason)).toEqual(['conflict']);
  });

  it('writes each target once when the same pair is requested twice', () => {
    const operation = createBulkAssignmentOperation({
      applications: [makeApp('lob')],
      groups: [makeGroup('g1')],
      intent: 'required',
    });
    const [source] = expandOperation(operation, context);
    const [original] = source.candidates;
    const candidates = [
      original,
      { ...original, id: 'copy' },
      { ...original, id: 'other-intent', intent: 'available' as const },
    ];

    const plan = planApplication(source.application, candidates, [], context);

    expect(plan.write?.additions.map((assignment) => assignment.id)).toEqual([original.id]);
    expect(plan.repeats).toEqual([{ assignment: candidates[1], keptId: original.id }]);
    expect(plan.skipped).toEqual([
      {
        applicationId: 'lob',
        applicationName: 'App lob',
        groupId: 'g1',
        groupName: 'Group g1',
        intent: 'available',
        reason: 'conflict',
        existingIntent: 'required',
      },
    ]);
  });
});

describe('reviewOperation', () => {
  it('describes each pair and the intent conflicts', () => {
    const operation = createBulkAssignmentOperation({
      applications: [
        makeApp('lob', 'iosLobApp', {
          displayName: 'Field App',
          assignments: [{ id: 'e1', intent: 'required', targetType: 'group', groupId: 'g1' }],
        }),
        makeApp('web', 'webApp', { displayName: 'Portal' }),
      ],
      groups: [makeGroup('g1'), makeGroup('g2')],
      intent: 'uninstall',
    });

    const review = reviewOperation(operation, context);

    expect(review.pairs.map((pair) => [pair.applicationName, pair.groupId, pair.outcome])).toEqual([
      ['Field App', 'g1', 'overwrite'],
      ['Field App', 'g2', 'new'],
      ['Portal', 'g1', 'rejected'],
      ['Portal', 'g2', 'rejected'],
    ]);
    expect(review.pairs[0].detail).toBe(
      "Replacing 'Required' with 'Uninstall' reverses the deployment on every targeted device"
    );
    expect(review.conflicts.map((conflict) => [conflict.applicationName, conflict.targetName, conflict.conflictType])).toEqual([
      ['Field App', 'Group g1', 'conflictingIntents'],
    ]);
    expect(review.unknownExisting).toEqual(['Portal']);
  });
});
