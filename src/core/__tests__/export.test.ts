import { describe, it, expect } from 'vitest';
import { EXPORT_VERSION, exportAssignments, parseAssignmentExport } from '../export';
import { ValidationError } from '../../utils/errors';
import { Assignment } from '../../types';

const assignments: Assignment[] = [
  {
    id: 'as-1',
    batchId: 'batch-1',
    applicationId: 'a1',
    applicationName: 'Field App',
    appType: 'iosLobApp',
    groupId: 'g1',
    groupName: 'Sales',
    targetType: 'group',
    intent: 'required',
    settings: { uninstallOnDeviceRemoval: true },
    createdDate: '2026-01-01T00:00:00.000Z',
    completedDate: '2026-01-01T00:00:02.000Z',
    status: 'success',
    retryCount: 0,
  },
  {
    id: 'as-2',
    batchId: 'batch-1',
    applicationId: 'a1',
    applicationName: 'Field App',
    appType: 'iosLobApp',
    groupId: 'g2',
    groupName: 'Support',
    targetType: 'group',
    intent: 'available',
    createdDate: '2026-01-01T00:00:00.000Z',
    status: 'failed',
    errorMessage: 'Forbidden',
    errorCategory: 'permission',
    retryCount: 1,
  },
  {
    id: 'as-3',
    batchId: 'batch-1',
    applicationId: 'a2',
    applicationName: 'Portal',
    appType: 'webApp',
    groupId: 'g1',
    groupName: 'Sales',
    targetType: 'group',
    intent: 'required',
    createdDate: '2026-01-01T00:00:00.000Z',
    status: 'cancelled',
    retryCount: 0,
  },
];

describe('assignment export', () => {
  it('summarises the exported assignments', () => {
    const exported = exportAssignments(assignments, {
      tenantId: 'tenant-1',
      now: new Date('2026-01-02T00:00:00.000Z'),
    });

    expect(exported.version).toBe(EXPORT_VERSION);
    expect(exported.exportDate).toBe('2026-01-02T00:00:00.000Z');
    expect(exported.tenantId).toBe('tenant-1');
    expect(exported.summary).toEqual({
      totalAssignments: 3,
      successful: 1,
      failed: 1,
      uniqueApplications: 2,
      uniqueGroups: 2,
      intentBreakdown: { required: 2, available: 1 },
    });
  });

  it('reads back what it writes', () => {
    const exported = exportAssignments(assignments, { now: new Date('2026-01-02T00:00:00.000Z') });

    const parsed = parseAssignmentExport(JSON.stringify(exported));

    expect(parsed).toEqual(exported);
    expect(parsed.tenantId).toBeUndefined();
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseAssignmentExport('{not json')).toThrow(ValidationError);
    expect(() => parseAssignmentExport('{not json')).toThrow(/^Export is not valid JSON: /);
  });

  it('names the invalid fields', () => {
    const exported = exportAssignments(assignments, { now: new Date('2026-01-02T00:00:00.000Z') });
    const broken = {
      ...exported,
      assignments: [{ ...exported.assignments[0], intent: 'install' }],
    };

    expect(() => parseAssignmentExport(broken)).toThrow(/^Invalid assignment export: assignments\.0\.intent: /);
  });

  it('rejects other versions', () => {
    const exported = exportAssignments([], { now: new Date('2026-01-02T00:00:00.000Z') });

    expect(() => parseAssignmentExport({ ...exported, version: '2.0' })).toThrow('Unsupported export version 2.0');
  });
});
