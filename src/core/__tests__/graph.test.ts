import { describe, it, expect } from 'vitest';
import { GraphError } from '@microsoft/microsoft-graph-client';
import {
  buildAssignRequestBody,
  buildAssignmentPayload,
  buildSettingsPayload,
  decodeAppType,
  decodeAssignment,
  toRemoteError,
} from '../graph';
import { PermanentRemoteError, TransientRemoteError, ValidationError } from '../../utils/errors';
import { Assignment } from '../../types';

function graphError(statusCode: number, message: string, retryAfter?: string): GraphError {
  const error = new GraphError(statusCode, message);
  if (retryAfter !== undefined) {
    error.headers = new Headers({ 'Retry-After': retryAfter });
  }
  return error;
}

function candidate(overrides: Partial<Assignment> = {}): Assignment {
  return {
    id: 'as-1',
    batchId: 'batch-1',
    applicationId: 'a1',
    applicationName: 'Field App',
    appType: 'iosLobApp',
    groupId: 'g1',
    groupName: 'Sales',
    targetType: 'group',
    intent: 'required',
    createdDate: '2026-01-01T00:00:00.000Z',
    status: 'pending',
    retryCount: 0,
    ...overrides,
  };
}

describe('toRemoteError', () => {
  it('treats 429 as a rate limit with its Retry-After', () => {
    const error = toRemoteError(graphError(429, 'Too many requests', '7'), 'Assign Field App');

    expect(error).toBeInstanceOf(TransientRemoteError);
    expect(error).toMatchObject({
      message: 'Assign Field App: Too many requests',
      reason: 'rate-limit',
      retryAfterMs: 7000,
      statusCode: 429,
      errorCategory: 'rate-limit',
    });
  });

  it('treats 503 as a rate limit only when it carries Retry-After', () => {
    expect(toRemoteError(graphError(503, 'Busy', '2'), 'x')).toMatchObject({
      reason: 'rate-limit',
      retryAfterMs: 2000,
    });
    expect(toRemoteError(graphError(503, 'Busy'), 'x')).toMatchObject({ reason: 'server', errorCategory: 'transient' });
  });

  it('maps client errors to permanent kinds', () => {
    const cases: [number, string][] = [
      [401, 'auth'],
      [403, 'permission'],
      [404, 'not-found'],
      [400, 'bad-request'],
      [409, 'bad-request'],
      [418, 'unknown'],
    ];

    for (const [statusCode, kind] of cases) {
      const error = toRemoteError(graphError(statusCode, 'Nope'), 'x');
      expect(error).toBeInstanceOf(PermanentRemoteError);
      expect(error.errorCategory).toBe(kind);
    }
  });

  it('treats aborted and unreachable requests as transient', () => {
    const aborted = graphError(-1, 'The user aborted a request.');
    aborted.code = 'AbortError';

    expect(toRemoteError(aborted, 'Read assignments of a1')).toMatchObject({
      message: 'Read assignments of a1: request aborted',
      reason: 'timeout',
    });
    expect(toRemoteError(graphError(-1, 'socket hang up'), 'x')).toMatchObject({ reason: 'network' });
    expect(toRemoteError(new TypeError('fetch failed'), 'x')).toMatchObject({
      message: 'x: fetch failed',
      reason: 'network',
    });
  });

  it('passes engine errors through and wraps anything else', () => {
    const validation = new ValidationError('bad intent');

    expect(toRemoteError(validation, 'x')).toBe(validation);
    expect(toRemoteError('boom', 'x')).toMatchObject({ message: 'x: boom', kind: 'unknown' });
  });
});

describe('payload mapping', () => {
  it('decodes app types from their OData type', () => {
    expect(decodeAppType('#microsoft.graph.win32LobApp')).toBe('win32LobApp');
    expect(decodeAppType('#microsoft.graph.officeSuiteApp')).toBe('unknown');
  });

  it('decodes an assignment and keeps its original payload', () => {
    const target = {
      '@odata.type': '#microsoft.graph.groupAssignmentTarget',
      groupId: 'g1',
      deviceAndAppManagementAssignmentFilterId: 'filter-1',
      deviceAndAppManagementAssignmentFilterType: 'include',
    };

    expect(decodeAssignment({ id: 'e1', intent: 'required', target, settings: null })).toEqual({
      id: 'e1',
      intent: 'required',
      targetType: 'group',
      groupId: 'g1',
      filter: { filterId: 'filter-1', filterMode: 'include' },
      payload: {
        '@odata.type': '#microsoft.graph.mobileAppAssignment',
        intent: 'required',
        target,
        settings: null,
      },
    });
  });

  it('refuses assignments it cannot represent', () => {
    expect(
      decodeAssignment({
        id: 'e1',
        intent: 'required',
        target: { '@odata.type': '#microsoft.graph.configurationManagerCollectionAssignmentTarget' },
      })
    ).toBeNull();
    expect(
      decodeAssignment({ id: 'e2', intent: 'install', target: { '@odata.type': '#microsoft.graph.allDevicesAssignmentTarget' } })
    ).toBeNull();
  });

  it('builds typed settings per app type', () => {
    expect(buildSettingsPayload('iosVppApp', { useDeviceLicensing: true, isRemovable: false })).toEqual({
      '@odata.type': '#microsoft.graph.iosVppAppAssignmentSettings',
      useDeviceLicensing: true,
      isRemovable: false,
    });
    expect(buildSettingsPayload('win32LobApp', { notificationsEnabled: false, restartGracePeriodInMinutes: 30 })).toEqual({
      '@odata.type': '#microsoft.graph.win32LobAppAssignmentSettings',
      notifications: 'hideAll',
      restartSettings: { gracePeriodInMinutes: 30 },
    });
    expect(buildSettingsPayload('macOSDmgApp', { uninstallOnDeviceRemoval: true })).toEqual({
      '@odata.type': '#microsoft.graph.macOsDmgAppAssignmentSettings',
      uninstallOnDeviceRemoval: true,
    });
    expect(buildSettingsPayload('webApp', { notificationsEnabled: true })).toBeNull();
    expect(buildSettingsPayload('iosLobApp', undefined)).toBeNull();
  });

  it('sends group ids only for group targets and no settings with uninstall', () => {
    expect(buildAssignmentPayload(candidate({ targetType: 'allDevices', groupId: 'intune-all-devices' }))).toEqual({
      '@odata.type': '#microsoft.graph.mobileAppAssignment',
      intent: 'required',
      target: { '@odata.type': '#microsoft.graph.allDevicesAssignmentTarget' },
      settings: null,
    });
    expect(
      buildAssignmentPayload(candidate({ intent: 'uninstall', settings: { uninstallOnDeviceRemoval: true } })).settings
    ).toBeNull();
  });

  it('writes retained assignments back ahead of the additions', () => {
    const retainedPayload = { '@odata.type': '#microsoft.graph.mobileAppAssignment', intent: 'available', opaque: 1 };

    const body = buildAssignRequestBody({
      applicationId: 'a1',
      applicationName: 'Field App',
      retained: [
        { id: 'e1', intent: 'available', targetType: 'allUsers', payload: retainedPayload },
        { id: 'e2', intent: 'required', targetType: 'exclusionGroup', groupId: 'g9' },
      ],
      replaced: [],
      additions: [candidate({ settings: { uninstallOnDeviceRemoval: true } })],
    });

    expect(body.mobileAppAssignments).toEqual([
      retainedPayload,
      {
        '@odata.type': '#microsoft.graph.mobileAppAssignment',
        intent: 'required',
        target: { '@odata.type': '#microsoft.graph.exclusionGroupAssignmentTarget', groupId: 'g9' },
        settings: null,
      },
      {
        '@odata.type': '#microsoft.graph.mobileAppAssignment',
        intent: 'required',
        target: { '@odata.type': '#microsoft.graph.groupAssignmentTarget', groupId: 'g1' },
        settings: {
          '@odata.type': '#microsoft.graph.iosLobAppAssignmentSettings',
          uninstallOnDeviceRemoval: true,
        },
      },
    ]);
  });
});
