/**
 * Application Constants
 */

import { AppType, AssignmentIntent, AssignmentTargetType, DevicePlatform } from '../types';

// Graph API
export const GRAPH_API = {
  BASE_URL: 'https://graph.microsoft.com/v1.0',
  SCOPES: ['https://graph.microsoft.com/.default'],

  // Retry policy
  MAX_RETRIES: 3,
  RETRY_DELAY_MS: 1000,
  MAX_RETRY_DELAY_MS: 32000,
  DEFAULT_RETRY_AFTER_MS: 10000,
  REQUEST_TIMEOUT_MS: 30000,
  PAGE_SIZE: 999,
};

// Intune service limits per app per tenant
export const RATE_LIMITS = {
  MAX_WRITE_REQUESTS: 100, // POST/PUT/PATCH/DELETE per window
  MAX_TOTAL_REQUESTS: 1000,
  WINDOW_MS: 20000,
  MAX_BATCH_SIZE: 20, // Graph $batch limit
  PREVENTIVE_THRESHOLD: 0.8,
  MAX_PREVENTIVE_DELAY_MS: 10000,
  RATE_LIMIT_MEMORY_MS: 60000,
};

export const DEFAULT_ASSIGNMENT_OPTIONS = {
  concurrency: 3,
  maxAttempts: GRAPH_API.MAX_RETRIES,
  timeoutAttempts: 2,
  requestTimeoutMs: GRAPH_API.REQUEST_TIMEOUT_MS,
  conflictPolicy: 'overwrite' as const,
  historyLimit: 1000,
};

// Pseudo-groups standing in for the built-in targets
export const BUILT_IN_TARGETS: Record<string, { displayName: string; targetType: AssignmentTargetType }> = {
  'intune-all-devices': { displayName: 'All Devices', targetType: 'allDevices' },
  'intune-all-users': { displayName: 'All Users', targetType: 'allUsers' },
  'intune-all-licensed-users': { displayName: 'All Licensed Users', targetType: 'allLicensedUsers' },
};

export const TARGET_ODATA_TYPES: Record<AssignmentTargetType, string> = {
  allUsers: '#microsoft.graph.allUsersAssignmentTarget',
  allLicensedUsers: '#microsoft.graph.allLicensedUsersAssignmentTarget',
  allDevices: '#microsoft.graph.allDevicesAssignmentTarget',
  group: '#microsoft.graph.groupAssignmentTarget',
  exclusionGroup: '#microsoft.graph.exclusionGroupAssignmentTarget',
};

export const APP_TYPE_PLATFORMS: Record<AppType, DevicePlatform[]> = {
  macOSApp: ['macOS'],
  iosStoreApp: ['iOS'],
  macOSLobApp: ['macOS'],
  iosLobApp: ['iOS'],
  iosVppApp: ['iOS'],
  macOSVppApp: ['macOS'],
  managedIOSStoreApp: ['iOS'],
  managedMacOSStoreApp: ['macOS'],
  macOSOfficeSuiteApp: ['macOS'],
  macOSPkgApp: ['macOS'],
  macOSDmgApp: ['macOS'],
  webApp: ['web', 'iOS', 'macOS', 'windows', 'android'],
  windowsWebApp: ['windows'],
  win32LobApp: ['windows'],
  winGetApp: ['windows'],
  androidStoreApp: ['android'],
  androidManagedStoreApp: ['android'],
  unknown: [],
};

export const APP_TYPE_LABELS: Record<AppType, string> = {
  macOSApp: 'macOS',
  iosStoreApp: 'iOS Store',
  macOSLobApp: 'macOS Line-of-Business',
  iosLobApp: 'iOS Line-of-Business',
  iosVppApp: 'iOS VPP',
  macOSVppApp: 'macOS VPP',
  managedIOSStoreApp: 'Managed iOS Store',
  managedMacOSStoreApp: 'Managed macOS Store',
  macOSOfficeSuiteApp: 'macOS Office Suite',
  macOSPkgApp: 'macOS PKG',
  macOSDmgApp: 'macOS DMG',
  webApp: 'Web App',
  windowsWebApp: 'Windows Web App',
  win32LobApp: 'Win32',
  winGetApp: 'WinGet',
  androidStoreApp: 'Android Store',
  androidManagedStoreApp: 'Managed Google Play',
  unknown: 'Unknown',
};

export const INTENT_LABELS: Record<AssignmentIntent, string> = {
  available: 'Available',
  required: 'Required',
  uninstall: 'Uninstall',
  availableWithoutEnrollment: 'Available without enrollment',
};

export const TARGET_LABELS: Record<AssignmentTargetType, string> = {
  allUsers: 'All Users',
  allLicensedUsers: 'All Licensed Users',
  allDevices: 'All Devices',
  group: 'Group',
  exclusionGroup: 'Exclusion Group',
};

// Application paths
export const PATHS = {
  CONFIG_DIR: process.env.INTUNE_ASSIGN_CONFIG_DIR || '.intune-assign',
  DATA_DIR: process.env.INTUNE_ASSIGN_DATA_DIR || '.intune-assign/data',
  LOG_DIR: process.env.INTUNE_ASSIGN_LOG_DIR || 'logs',
  DB_FILE: 'history.db',
  CONFIG_FILE: 'config.json',
};
