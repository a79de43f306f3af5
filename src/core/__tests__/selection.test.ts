import { describe, it, expect } from 'vitest';
import { BulkAssignmentSelection, partitionResults } from '../selection';
import { Assignment } from '../../types';
import { makeApp, makeGroup } from './fakes';

function result(id: string, status: Assignment['status']): Assignment {
  return {
    id,
    batchId: 'batch-1',
    applicationId: 'a1',
    applicationName: 'App a1',
    appType: 'iosLobApp',
    groupId: id,
    groupName: `Group ${id}`,
    targetType: 'group',
    intent: 'required',
    createdDate: '2026-01-01T00:00:00.000Z',
    status,
    retryCount: 0,
  };
}

describe('BulkAssignmentSelection', () => {
  it('creates group settings from the first selected application', () => {
    const selection = new BulkAssignmentSelection();
    selection.intent = 'available';
    selection.selectApplication(makeApp('a1', 'win32LobApp'));

    const settings = selection.selectGroup(makeGroup('g1'));

    expect(settings).toEqual({
      groupId: 'g1',
      groupName: 'Group g1',
      appType: 'win32LobApp',
      intent: 'available',
      mode: 'include',
    });
  });

  it('keeps existing group settings when a group is selected again', () => {
    const selection = new BulkAssignmentSelection();
    selection.selectApplication(makeApp('a1'));
    selection.selectGroup(makeGroup('g1'));
    selection.updateGroupSettings('g1', { mode: 'exclude' });

    expect(selection.selectGroup(makeGroup('g1'))?.mode).toBe('exclude');
  });

  it('has no group settings without an application', () => {
    const selection = new BulkAssignmentSelection();

    expect(selection.selectGroup(makeGroup('g1'))).toBeUndefined();
    expect(() => selection.updateGroupSettings('g1', { mode: 'exclude' })).toThrow('Group g1 is not selected');
  });

  it('summarises the selection', () => {
    const selection = new BulkAssignmentSelection();
    selection.selectApplication(makeApp('a1', 'webApp'));
    selection.selectApplication(makeApp('a2', 'iosLobApp'));
    selection.selectGroup(makeGroup('g1'));
    selection.selectGroup(makeGroup('g2'));
    selection.selectGroup(makeGroup('g3'));

    expect(selection.getSummary()).toEqual({
      applications: 2,
      groups: 3,
      totalAssignments: 6,
      sharedPlatforms: ['iOS'],
    });
    expect(selection.isReady()).toBe(true);
  });

  it('forgets settings for deselected groups', () => {
    const selection = new BulkAssignmentSelection();
    selection.selectApplication(makeApp('a1'));
    selection.selectGroup(makeGroup('g1'));

    selection.deselectGroup('g1');
    selection.deselectApplication('a1');

    expect(selection.getGroupSettings('g1')).toBeUndefined();
    expect(selection.isReady()).toBe(false);
  });

  it('builds an operation that later edits do not change', () => {
    const selection = new BulkAssignmentSelection();
    selection.intent = 'uninstall';
    selection.selectApplication(makeApp('a1'));
    selection.selectGroup(makeGroup('g1'));
    selection.selectGroup(makeGroup('g2'));
    selection.updateGroupSettings('g2', { mode: 'exclude' });

    const operation = selection.buildOperation();
    selection.reset();

    expect(operation.intent).toBe('uninstall');
    expect(operation.groups.map((group) => group.targetType)).toEqual(['group', 'exclusionGroup']);
    expect(selection.getSummary().applications).toBe(0);
    expect(selection.intent).toBe('required');
  });
});

describe('partitionResults', () => {
  it('splits results by status', () => {
    const partitioned = partitionResults([
      result('g1', 'success'),
      result('g2', 'failed'),
      result('g3', 'cancelled'),
      result('g4', 'success'),
    ]);

    expect(partitioned.completedAssignments.map((assignment) => assignment.id)).toEqual(['g1', 'g4']);
    expect(partitioned.failedAssignments.map((assignment) => assignment.id)).toEqual(['g2']);
    expect(partitioned.cancelledAssignments.map((assignment) => assignment.id)).toEqual(['g3']);
  });
});
