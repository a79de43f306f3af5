/**
 * Assignment export format
 * Versioned JSON document for saving and reloading assignment batches
 */

import { z } from 'zod';
import {
  APP_TYPES,
  ASSIGNMENT_INTENTS,
  ASSIGNMENT_TARGET_TYPES,
  Assignment,
} from '../types';
import { ValidationError, toErrorMessage } from '../utils/errors';

export const EXPORT_VERSION = '1.0';

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

const assignmentSettingsSchema = z.object({
  notificationsEnabled: z.boolean().optional(),
  vpnConfigurationId: z.string().optional(),
  uninstallOnDeviceRemoval: z.boolean().optional(),
  useDeviceLicensing: z.boolean().optional(),
  isRemovable: z.boolean().optional(),
  restartGracePeriodInMinutes: z.number().int().nonnegative().optional(),
});

export const assignmentSchema: z.ZodType<Assignment> = z.object({
  id: z.string().min(1),
  batchId: z.string().min(1),
  applicationId: z.string().min(1),
  applicationName: z.string(),
  appType: z.enum(APP_TYPES),
  groupId: z.string().min(1),
  groupName: z.string(),
  targetType: z.enum(ASSIGNMENT_TARGET_TYPES),
  intent: z.enum(ASSIGNMENT_INTENTS),
  settings: assignmentSettingsSchema.optional(),
  filter: z
    .object({
      filterId: z.string().min(1),
      filterMode: z.enum(['include', 'exclude']),
    })
    .optional(),
  createdDate: z.string().datetime(),
  completedDate: z.string().datetime().optional(),
  status: z.enum(['pending', 'inProgress', 'success', 'failed', 'cancelled']),
  errorMessage: z.string().optional(),
  errorCategory: z.string().optional(),
  retryCount: z.number().int().nonnegative(),
});

export const assignmentExportSchema = z.object({
  version: z.string(),
  exportDate: z.string().datetime(),
  tenantId: z.string().optional(),
  assignments: z.array(assignmentSchema),
  summary: z.object({
    totalAssignments: z.number().int().nonnegative(),
    successful: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
    uniqueApplications: z.number().int().nonnegative(),
    uniqueGroups: z.number().int().nonnegative(),
    intentBreakdown: z.record(z.string(), z.number().int().nonnegative()),
  }),
});

export type AssignmentExport = z.infer<typeof assignmentExportSchema>;

// =============================================================================
// ENCODE / DECODE
// =============================================================================

export function exportAssignments(
  assignments: readonly Assignment[],
  options: { tenantId?: string; now?: Date } = {}
): AssignmentExport {
  const intentBreakdown: Record<string, number> = {};
  for (const assignment of assignments) {
    intentBreakdown[assignment.intent] = (intentBreakdown[assignment.intent] ?? 0) + 1;
  }

  return {
    version: EXPORT_VERSION,
    exportDate: (options.now ?? new Date()).toISOString(),
    ...(options.tenantId ? { tenantId: options.tenantId } : {}),
    assignments: structuredClone([...assignments]),
    summary: {
      totalAssignments: assignments.length,
      successful: assignments.filter((assignment) => assignment.status === 'success').length,
      failed: assignments.filter((assignment) => assignment.status === 'failed').length,
      uniqueApplications: new Set(assignments.map((assignment) => assignment.applicationId)).size,
      uniqueGroups: new Set(assignments.map((assignment) => assignment.groupId)).size,
      intentBreakdown,
    },
  };
}

/**
 * Parse an export document from its JSON text or an already-decoded value
 */
export function parseAssignmentExport(input: unknown): AssignmentExport {
  let value: unknown = input;
  if (typeof input === 'string') {
    try {
      value = JSON.parse(input);
    } catch (error) {
      throw new ValidationError(`Export is not valid JSON: ${toErrorMessage(error)}`);
    }
  }

  const parsed = assignmentExportSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ValidationError(`Invalid assignment export: ${issues.join('; ')}`);
  }

  if (parsed.data.version !== EXPORT_VERSION) {
    throw new ValidationError(`Unsupported export version ${parsed.data.version}`);
  }

  return parsed.data;
}
