/**
 * Microsoft Graph API Client
 * Intune app assignment operations via Graph API
 */

import { Client, GraphError } from '@microsoft/microsoft-graph-client';
import 'isomorphic-fetch';
import { z } from 'zod';
import {
  APP_TYPES,
  ASSIGNMENT_INTENTS,
  ASSIGNMENT_TARGET_TYPES,
  AccessTokenProvider,
  AppConfig,
  AppType,
  Application,
  Assignment,
  AssignmentApi,
  AssignmentFilter,
  AssignmentSettings,
  AssignmentTargetType,
  AssignmentWriteRequest,
  DeviceGroup,
  ExistingAssignment,
  RequestOptions,
} from '../types';
import { APP_TYPE_PLATFORMS, GRAPH_API, TARGET_ODATA_TYPES } from '../utils/constants';
import {
  AssignmentEngineError,
  PermanentRemoteError,
  TransientRemoteError,
  toErrorMessage,
} from '../utils/errors';
import { withTimeout } from '../utils/async';
import { authManager } from './auth';
import { logger } from '../utils/logger';

const ODATA_PREFIX = '#microsoft.graph.';

// =============================================================================
// Response schemas
// =============================================================================

const assignmentTargetSchema = z
  .object({
    '@odata.type': z.string(),
    groupId: z.string().nullish(),
    deviceAndAppManagementAssignmentFilterId: z.string().nullish(),
    deviceAndAppManagementAssignmentFilterType: z.string().nullish(),
  })
  .passthrough();

const mobileAppAssignmentSchema = z.object({
  id: z.string(),
  intent: z.string(),
  target: assignmentTargetSchema,
  settings: z.record(z.string(), z.unknown()).nullish(),
});

const mobileAppSchema = z.object({
  '@odata.type': z.string(),
  id: z.string(),
  displayName: z.string(),
  publisher: z.string().nullish(),
  assignments: z.array(mobileAppAssignmentSchema).optional(),
});

const groupSchema = z.object({
  id: z.string(),
  displayName: z.string(),
  description: z.string().nullish(),
  securityEnabled: z.boolean().nullish(),
  mailEnabled: z.boolean().nullish(),
  groupTypes: z.array(z.string()).nullish(),
  membershipRule: z.string().nullish(),
});

function pageOf<T>(item: z.ZodType<T>) {
  return z.object({
    value: z.array(item),
    '@odata.nextLink': z.string().optional(),
  });
}

type MobileAppAssignmentResource = z.infer<typeof mobileAppAssignmentSchema>;

// =============================================================================
// Error mapping
// =============================================================================

function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

/**
 * Map whatever the SDK or fetch threw into the engine's error taxonomy
 */
export function toRemoteError(error: unknown, label: string): AssignmentEngineError {
  if (error instanceof AssignmentEngineError) {
    return error;
  }

  if (error instanceof GraphError) {
    const statusCode = error.statusCode;
    const code = error.code ?? undefined;
    const message = `${label}: ${error.message || code || `HTTP ${statusCode}`}`;
    const retryAfterMs = parseRetryAfter(error.headers?.get('Retry-After'));

    if (code === 'AbortError') {
      return new TransientRemoteError(`${label}: request aborted`, 'timeout');
    }
    if (statusCode === 429 || (statusCode === 503 && retryAfterMs !== undefined)) {
      return new TransientRemoteError(message, 'rate-limit', { retryAfterMs, statusCode });
    }
    if (statusCode >= 500) {
      return new TransientRemoteError(message, 'server', { retryAfterMs, statusCode });
    }
    if (statusCode === 401) {
      return new PermanentRemoteError(message, 'auth', { statusCode, code });
    }
    if (statusCode === 403) {
      return new PermanentRemoteError(message, 'permission', { statusCode, code });
    }
    if (statusCode === 404) {
      return new PermanentRemoteError(message, 'not-found', { statusCode, code });
    }
    if (statusCode === 400 || statusCode === 409 || statusCode === 422) {
      return new PermanentRemoteError(message, 'bad-request', { statusCode, code });
    }
    if (statusCode === -1) {
      return new TransientRemoteError(message, 'network');
    }
    return new PermanentRemoteError(message, 'unknown', { statusCode, code });
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return new TransientRemoteError(`${label}: request aborted`, 'timeout');
  }
  if (error instanceof TypeError) {
    // fetch reports connection failures as TypeError
    return new TransientRemoteError(`${label}: ${error.message}`, 'network');
  }

  return new PermanentRemoteError(`${label}: ${toErrorMessage(error)}`, 'unknown');
}

// =============================================================================
// Payload mapping
// =============================================================================

export function decodeAppType(odataType: string): AppType {
  const name = odataType.startsWith(ODATA_PREFIX) ? odataType.slice(ODATA_PREFIX.length) : odataType;
  return APP_TYPES.find((type) => type === name) ?? 'unknown';
}

function decodeTargetType(odataType: string): AssignmentTargetType | undefined {
  return ASSIGNMENT_TARGET_TYPES.find((type) => TARGET_ODATA_TYPES[type] === odataType);
}

export function decodeAssignment(resource: MobileAppAssignmentResource): ExistingAssignment | null {
  const targetType = decodeTargetType(resource.target['@odata.type']);
  const intent = ASSIGNMENT_INTENTS.find((value) => value === resource.intent);
  if (!targetType || !intent) {
    return null;
  }

  const filterId = resource.target.deviceAndAppManagementAssignmentFilterId;
  const filterType = resource.target.deviceAndAppManagementAssignmentFilterType;
  const filter: AssignmentFilter | undefined =
    filterId && (filterType === 'include' || filterType === 'exclude')
      ? { filterId, filterMode: filterType }
      : undefined;

  return {
    id: resource.id,
    intent,
    targetType,
    ...(resource.target.groupId ? { groupId: resource.target.groupId } : {}),
    ...(filter ? { filter } : {}),
    ...(resource.settings ? { settings: resource.settings } : {}),
    payload: toRetainedPayload(resource),
  };
}

/**
 * Decode a full assignment set, or null when any member cannot be represented
 */
function decodeAll(resources: readonly MobileAppAssignmentResource[]): ExistingAssignment[] | null {
  const decoded: ExistingAssignment[] = [];
  for (const resource of resources) {
    const assignment = decodeAssignment(resource);
    if (!assignment) {
      return null;
    }
    decoded.push(assignment);
  }
  return decoded;
}

function toRetainedPayload(resource: MobileAppAssignmentResource): Record<string, unknown> {
  return {
    '@odata.type': `${ODATA_PREFIX}mobileAppAssignment`,
    intent: resource.intent,
    target: resource.target,
    settings: resource.settings ?? null,
  };
}

function compact(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Typed settings block for the app type; null where Graph takes none
 */
export function buildSettingsPayload(
  appType: AppType,
  settings: AssignmentSettings | undefined
): Record<string, unknown> | null {
  if (!settings) {
    return null;
  }

  switch (appType) {
    case 'iosVppApp':
      return compact({
        '@odata.type': `${ODATA_PREFIX}iosVppAppAssignmentSettings`,
        useDeviceLicensing: settings.useDeviceLicensing,
        vpnConfigurationId: settings.vpnConfigurationId,
        uninstallOnDeviceRemoval: settings.uninstallOnDeviceRemoval,
        isRemovable: settings.isRemovable,
      });
    case 'macOSVppApp':
      return compact({
        '@odata.type': `${ODATA_PREFIX}macOsVppAppAssignmentSettings`,
        useDeviceLicensing: settings.useDeviceLicensing,
        uninstallOnDeviceRemoval: settings.uninstallOnDeviceRemoval,
      });
    case 'iosLobApp':
    case 'iosStoreApp':
      return compact({
        '@odata.type': `${ODATA_PREFIX}${appType}AssignmentSettings`,
        vpnConfigurationId: settings.vpnConfigurationId,
        uninstallOnDeviceRemoval: settings.uninstallOnDeviceRemoval,
        isRemovable: settings.isRemovable,
      });
    case 'macOSLobApp':
    case 'macOSDmgApp':
      return compact({
        '@odata.type': `${ODATA_PREFIX}${appType === 'macOSLobApp' ? 'macOsLobApp' : 'macOsDmgApp'}AssignmentSettings`,
        uninstallOnDeviceRemoval: settings.uninstallOnDeviceRemoval,
      });
    case 'win32LobApp':
      return compact({
        '@odata.type': `${ODATA_PREFIX}win32LobAppAssignmentSettings`,
        notifications:
          settings.notificationsEnabled === undefined
            ? undefined
            : settings.notificationsEnabled
              ? 'showAll'
              : 'hideAll',
        restartSettings:
          settings.restartGracePeriodInMinutes === undefined
            ? undefined
            : { gracePeriodInMinutes: settings.restartGracePeriodInMinutes },
      });
    case 'winGetApp':
      return compact({
        '@odata.type': `${ODATA_PREFIX}winGetAppAssignmentSettings`,
        notifications:
          settings.notificationsEnabled === undefined
            ? undefined
            : settings.notificationsEnabled
              ? 'showAll'
              : 'hideAll',
      });
    default:
      return null;
  }
}

export function buildAssignmentPayload(assignment: Assignment): Record<string, unknown> {
  const target = compact({
    '@odata.type': TARGET_ODATA_TYPES[assignment.targetType],
    groupId:
      assignment.targetType === 'group' || assignment.targetType === 'exclusionGroup'
        ? assignment.groupId
        : undefined,
    deviceAndAppManagementAssignmentFilterId: assignment.filter?.filterId,
    deviceAndAppManagementAssignmentFilterType: assignment.filter?.filterMode,
  });

  return {
    '@odata.type': `${ODATA_PREFIX}mobileAppAssignment`,
    intent: assignment.intent,
    target,
    settings: assignment.intent === 'uninstall' ? null : buildSettingsPayload(assignment.appType, assignment.settings),
  };
}

function retainedPayload(existing: ExistingAssignment): Record<string, unknown> {
  if (existing.payload) {
    return existing.payload;
  }
  return {
    '@odata.type': `${ODATA_PREFIX}mobileAppAssignment`,
    intent: existing.intent,
    target: compact({
      '@odata.type': TARGET_ODATA_TYPES[existing.targetType],
      groupId: existing.groupId,
      deviceAndAppManagementAssignmentFilterId: existing.filter?.filterId,
      deviceAndAppManagementAssignmentFilterType: existing.filter?.filterMode,
    }),
    settings: existing.settings ?? null,
  };
}

/**
 * Body of the assign action: the complete assignment set the app should end up with
 */
export function buildAssignRequestBody(write: AssignmentWriteRequest): { mobileAppAssignments: Record<string, unknown>[] } {
  return {
    mobileAppAssignments: [
      ...write.retained.map(retainedPayload),
      ...write.additions.map(buildAssignmentPayload),
    ],
  };
}

// =============================================================================
// Client
// =============================================================================

export class GraphClient implements AssignmentApi {
  private client: Client;
  private timeoutMs: number;

  constructor(tokenProvider: AccessTokenProvider, timeoutMs: number = GRAPH_API.REQUEST_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
    this.client = Client.init({
      authProvider: (done) => {
        tokenProvider.getAccessToken().then(
          (token) => done(null, token),
          (error: unknown) => done(error, null)
        );
      },
    });
  }

  /**
   * Create a Graph client for the configured tenant
   */
  static forConfig(config: AppConfig): GraphClient {
    return new GraphClient(authManager.providerFor(config.azure), config.requestTimeoutMs);
  }

  private async call(
    label: string,
    options: RequestOptions | undefined,
    run: (signal: AbortSignal) => Promise<unknown>
  ): Promise<unknown> {
    const timeoutMs = options?.timeoutMs ?? this.timeoutMs;
    try {
      return await withTimeout(timeoutMs, label, run);
    } catch (error) {
      throw toRemoteError(error, label);
    }
  }

  private async getAll<T>(
    label: string,
    firstPage: (signal: AbortSignal) => Promise<unknown>,
    item: z.ZodType<T>,
    options?: RequestOptions
  ): Promise<T[]> {
    const schema = pageOf(item);
    const items: T[] = [];

    let page = schema.parse(await this.call(label, options, firstPage));
    items.push(...page.value);

    for (let next = page['@odata.nextLink']; next; next = page['@odata.nextLink']) {
      const url = next;
      page = schema.parse(
        await this.call(label, options, (signal) => this.client.api(url).option('signal', signal).get())
      );
      items.push(...page.value);
    }

    return items;
  }

  /**
   * Current assignments of an application
   */
  async fetchCurrentAssignments(applicationId: string, options?: RequestOptions): Promise<ExistingAssignment[]> {
    const resources = await this.getAll(
      `Read assignments of ${applicationId}`,
      (signal) =>
        this.client
          .api(`/deviceAppManagement/mobileApps/${applicationId}/assignments`)
          .option('signal', signal)
          .get(),
      mobileAppAssignmentSchema,
      options
    );

    const known = decodeAll(resources);
    if (!known) {
      // Writing back without them would delete them
      throw new PermanentRemoteError(
        `Application ${applicationId} has assignments with targets or intents this tool cannot preserve`,
        'unknown'
      );
    }

    logger.debug(`Fetched ${known.length} assignment(s) for ${applicationId}`);
    return known;
  }

  /**
   * Replace the application's assignment set with retained + new assignments
   */
  async assign(write: AssignmentWriteRequest, options?: RequestOptions): Promise<void> {
    const body = buildAssignRequestBody(write);
    logger.debug(
      `Assigning ${write.applicationName}: ${write.additions.length} new, ${write.retained.length} retained, ${write.replaced.length} replaced`
    );

    await this.call(`Assign ${write.applicationName}`, options, (signal) =>
      this.client
        .api(`/deviceAppManagement/mobileApps/${write.applicationId}/assign`)
        .option('signal', signal)
        .post(body)
    );
  }

  /**
   * List Intune applications, optionally with their assignments expanded
   */
  async listApplications(
    options: RequestOptions & { appType?: AppType; includeAssignments?: boolean } = {}
  ): Promise<Application[]> {
    const resources = await this.getAll(
      'List applications',
      (signal) => {
        let request = this.client
          .api('/deviceAppManagement/mobileApps')
          .select(['id', 'displayName', 'publisher'])
          .top(GRAPH_API.PAGE_SIZE);
        if (options.includeAssignments) {
          request = request.expand('assignments');
        }
        return request.option('signal', signal).get();
      },
      mobileAppSchema,
      options
    );

    const applications = resources.map((resource): Application => {
      const appType = decodeAppType(resource['@odata.type']);
      const assignments = resource.assignments ? decodeAll(resource.assignments) : null;

      return {
        id: resource.id,
        displayName: resource.displayName,
        appType,
        ...(resource.publisher ? { publisher: resource.publisher } : {}),
        supportedPlatforms: [...APP_TYPE_PLATFORMS[appType]],
        ...(assignments ? { assignments } : {}),
      };
    });

    const filtered = options.appType
      ? applications.filter((application) => application.appType === options.appType)
      : applications;

    logger.debug(`Listed ${filtered.length} application(s)`);
    return filtered;
  }

  /**
   * List Entra ID groups, optionally by display name prefix
   */
  async listGroups(options: RequestOptions & { search?: string } = {}): Promise<DeviceGroup[]> {
    const resources = await this.getAll(
      'List groups',
      (signal) => {
        let request = this.client
          .api('/groups')
          .select(['id', 'displayName', 'description', 'securityEnabled', 'mailEnabled', 'groupTypes', 'membershipRule'])
          .top(GRAPH_API.PAGE_SIZE);
        if (options.search) {
          request = request.filter(`startswith(displayName,'${options.search.replace(/'/g, "''")}')`);
        }
        return request.option('signal', signal).get();
      },
      groupSchema,
      options
    );

    return resources.map((resource): DeviceGroup => ({
      id: resource.id,
      displayName: resource.displayName,
      ...(resource.description ? { description: resource.description } : {}),
      securityEnabled: resource.securityEnabled ?? false,
      mailEnabled: resource.mailEnabled ?? false,
      isDynamic: (resource.groupTypes ?? []).includes('DynamicMembership'),
      ...(resource.membershipRule ? { membershipRule: resource.membershipRule } : {}),
    }));
  }
}
