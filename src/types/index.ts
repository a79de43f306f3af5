/**
 * Intune Bulk Assignment Core Types
 */

// ============================================================================
// Applications
// ============================================================================

export const APP_TYPES = [
  'macOSApp',
  'iosStoreApp',
  'macOSLobApp',
  'iosLobApp',
  'iosVppApp',
  'macOSVppApp',
  'managedIOSStoreApp',
  'managedMacOSStoreApp',
  'macOSOfficeSuiteApp',
  'macOSPkgApp',
  'macOSDmgApp',
  'webApp',
  'windowsWebApp',
  'win32LobApp',
  'winGetApp',
  'androidStoreApp',
  'androidManagedStoreApp',
  'unknown',
] as const;

export type AppType = (typeof APP_TYPES)[number];

export type DevicePlatform = 'iOS' | 'macOS' | 'windows' | 'android' | 'web';

export interface Application {
  id: string;
  displayName: string;
  appType: AppType;
  publisher?: string;
  supportedPlatforms: DevicePlatform[];
  // undefined until fetched; an empty array means "known to have none"
  assignments?: ExistingAssignment[];
}

// ============================================================================
// Groups and targets
// ============================================================================

export const ASSIGNMENT_TARGET_TYPES = [
  'allUsers',
  'allLicensedUsers',
  'allDevices',
  'group',
  'exclusionGroup',
] as const;

export type AssignmentTargetType = (typeof ASSIGNMENT_TARGET_TYPES)[number];

export interface DeviceGroup {
  id: string;
  displayName: string;
  description?: string;
  securityEnabled: boolean;
  mailEnabled: boolean;
  isDynamic: boolean;
  membershipRule?: string;
}

// ============================================================================
// Assignments
// ============================================================================

export const ASSIGNMENT_INTENTS = [
  'available',
  'required',
  'uninstall',
  'availableWithoutEnrollment',
] as const;

export type AssignmentIntent = (typeof ASSIGNMENT_INTENTS)[number];

export type AssignmentStatus = 'pending' | 'inProgress' | 'success' | 'failed' | 'cancelled';

export type AssignmentFilterMode = 'include' | 'exclude';

export interface AssignmentFilter {
  filterId: string;
  filterMode: AssignmentFilterMode;
}

export interface AssignmentSettings {
  notificationsEnabled?: boolean;
  vpnConfigurationId?: string;
  uninstallOnDeviceRemoval?: boolean;
  useDeviceLicensing?: boolean;
  isRemovable?: boolean;
  restartGracePeriodInMinutes?: number;
}

/**
 * One application-to-target binding produced by the engine.
 * Dates are ISO-8601 strings so the record serializes without loss.
 */
export interface Assignment {
  id: string;
  batchId: string;
  applicationId: string;
  applicationName: string;
  appType: AppType;
  groupId: string;
  groupName: string;
  targetType: AssignmentTargetType;
  intent: AssignmentIntent;
  settings?: AssignmentSettings;
  filter?: AssignmentFilter;
  createdDate: string;
  completedDate?: string;
  status: AssignmentStatus;
  errorMessage?: string;
  errorCategory?: string;
  retryCount: number;
}

/**
 * An assignment that already exists on the remote side for an application.
 */
export interface ExistingAssignment {
  id: string;
  intent: AssignmentIntent;
  targetType: AssignmentTargetType;
  groupId?: string;
  filter?: AssignmentFilter;
  settings?: Record<string, unknown>;
  // Remote representation, written back verbatim when the assignment is retained
  payload?: Record<string, unknown>;
}

export interface GroupAssignmentSettings {
  groupId: string;
  groupName: string;
  appType: AppType;
  intent: AssignmentIntent;
  mode: AssignmentFilterMode;
  filter?: AssignmentFilter;
  settings?: AssignmentSettings;
}

// ============================================================================
// Bulk operations
// ============================================================================

export interface OperationApplication {
  readonly id: string;
  readonly displayName: string;
  readonly appType: AppType;
  readonly supportedPlatforms: readonly DevicePlatform[];
  readonly existingAssignments?: readonly ExistingAssignment[];
}

export interface OperationGroup {
  readonly id: string;
  readonly displayName: string;
  readonly targetType: AssignmentTargetType;
}

export interface BulkAssignmentOperation {
  readonly id: string;
  readonly applications: readonly OperationApplication[];
  readonly groups: readonly OperationGroup[];
  readonly intent: AssignmentIntent;
  readonly settings?: Readonly<AssignmentSettings>;
  readonly groupSettings: readonly Readonly<GroupAssignmentSettings>[];
  readonly createdAt: string;
}

export type ConflictPolicy = 'overwrite' | 'skip';

export interface SkippedPair {
  applicationId: string;
  applicationName: string;
  groupId: string;
  groupName: string;
  intent: AssignmentIntent;
  reason: 'duplicate' | 'conflict';
  existingIntent: AssignmentIntent;
}

// ============================================================================
// Progress and orchestrator state
// ============================================================================

export const OPERATION_STATES = [
  'idle',
  'planning',
  'executing',
  'completed',
  'partiallyFailed',
  'cancelled',
  'fatallyFailed',
] as const;

export type OperationState = (typeof OPERATION_STATES)[number];

export interface AssignmentProgress {
  operationId: string;
  total: number;
  completed: number;
  failed: number;
  cancelled: number;
  pending: number;
  currentOperation: string;
  currentApplication?: string;
  currentGroup?: string;
  startedAt: string;
  elapsedMs: number;
}

export interface AssignmentServiceSnapshot {
  state: OperationState;
  isProcessing: boolean;
  progress: Readonly<AssignmentProgress> | null;
  lastError: string | null;
}

export type SnapshotListener = (snapshot: Readonly<AssignmentServiceSnapshot>) => void;

export interface OperationSummary {
  operationId: string;
  state: OperationState;
  startedAt: string;
  completedAt: string;
  total: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  rejected: number;
  skipped: SkippedPair[];
}

export interface AssignmentStatistics {
  total: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  pending: number;
}

// ============================================================================
// Remote collaborators
// ============================================================================

export interface RequestOptions {
  timeoutMs?: number;
}

/**
 * One write against the remote API: the full assignment set for a single
 * application, since the assign action replaces whatever was there before.
 */
export interface AssignmentWriteRequest {
  applicationId: string;
  applicationName: string;
  retained: ExistingAssignment[];
  replaced: ExistingAssignment[];
  additions: Assignment[];
}

export interface AssignmentApi {
  fetchCurrentAssignments(applicationId: string, options?: RequestOptions): Promise<ExistingAssignment[]>;
  assign(write: AssignmentWriteRequest, options?: RequestOptions): Promise<void>;
}

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

// ============================================================================
// Configuration
// ============================================================================

export interface AzureConfig {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface RateLimitConfig {
  maxWriteRequests: number;
  maxTotalRequests: number;
  windowMs: number;
}

export interface AppConfig {
  azure: AzureConfig;
  concurrency: number;
  conflictPolicy: ConflictPolicy;
  requestTimeoutMs: number;
  rateLimits: RateLimitConfig;
}

// ============================================================================
// Authentication
// ============================================================================

export interface AuthToken {
  accessToken: string;
  expiresAt: Date;
}

export interface TokenCache {
  [tenantId: string]: AuthToken;
}
