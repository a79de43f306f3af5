/**
 * Assignment engine error taxonomy
 */

import { ExistingAssignment } from '../types';

export type TransientReason = 'rate-limit' | 'timeout' | 'server' | 'network';

export type PermanentKind = 'auth' | 'permission' | 'not-found' | 'bad-request' | 'unknown';

export class AssignmentEngineError extends Error {
  readonly errorCategory: string;

  constructor(message: string, errorCategory: string) {
    super(message);
    this.name = new.target.name;
    this.errorCategory = errorCategory;
  }
}

/** Intent not legal for the app type / target combination. Never reaches the network. */
export class ValidationError extends AssignmentEngineError {
  constructor(message: string) {
    super(message, 'validation');
  }
}

/** Informational only: the target already carries an assignment for the application. */
export class ConflictError extends AssignmentEngineError {
  readonly existing: ExistingAssignment;

  constructor(message: string, existing: ExistingAssignment) {
    super(message, 'conflict');
    this.existing = existing;
  }
}

export class TransientRemoteError extends AssignmentEngineError {
  readonly reason: TransientReason;
  readonly retryAfterMs?: number;
  readonly statusCode?: number;

  constructor(
    message: string,
    reason: TransientReason,
    options: { retryAfterMs?: number; statusCode?: number } = {}
  ) {
    super(message, reason === 'rate-limit' ? 'rate-limit' : 'transient');
    this.reason = reason;
    this.retryAfterMs = options.retryAfterMs;
    this.statusCode = options.statusCode;
  }
}

export class PermanentRemoteError extends AssignmentEngineError {
  readonly kind: PermanentKind;
  readonly statusCode?: number;
  readonly code?: string;

  constructor(
    message: string,
    kind: PermanentKind,
    options: { statusCode?: number; code?: string } = {}
  ) {
    super(message, kind);
    this.kind = kind;
    this.statusCode = options.statusCode;
    this.code = options.code;
  }
}

export class CancelledError extends AssignmentEngineError {
  constructor(message: string = 'Assignment cancelled before it was sent') {
    super(message, 'cancelled');
  }
}

export class BusyError extends AssignmentEngineError {
  constructor(message: string = 'A bulk assignment is already in progress') {
    super(message, 'busy');
  }
}

export class PlanningError extends AssignmentEngineError {
  constructor(message: string) {
    super(message, 'planning');
  }
}

export class NoFailedAssignmentsError extends AssignmentEngineError {
  constructor() {
    super('No failed assignments to retry', 'planning');
  }
}

export class ConfigurationError extends AssignmentEngineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'configuration');
    this.issues = issues;
  }
}

export function isTransientError(error: unknown): error is TransientRemoteError {
  return error instanceof TransientRemoteError;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

export function errorCategoryOf(error: unknown): string {
  return error instanceof AssignmentEngineError ? error.errorCategory : 'unknown';
}
