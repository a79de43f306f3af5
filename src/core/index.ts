/**
 * Core module exports
 */

export { RateLimiter } from './rate-limiter';
export type { RateLimiterOptions, RateLimitStatus, RequestKind } from './rate-limiter';
export {
  assessIntentChange,
  classifyAssignment,
  detectConflicts,
  targetKey,
} from './conflict-detector';
export type {
  AssignmentConflict,
  AssignmentReviewEntry,
  ConflictClassification,
  ConflictSeverity,
  ConflictType,
  IntentChangeAssessment,
} from './conflict-detector';
export { isIntentValid, suggestedIntents, validIntents, validateIntent } from './intent-validator';
export type { IntentValidation } from './intent-validator';
export { createBulkAssignmentOperation, isBuiltInTarget, resolveTargetType } from './operation';
export type { BulkAssignmentInput } from './operation';
export { reviewOperation } from './planner';
export type { OperationReview, PairOutcome, PairReview } from './planner';
export { AssignmentService } from './assignment-service';
export type { AssignmentServiceOptions } from './assignment-service';
export { BulkAssignmentSelection, partitionResults } from './selection';
export type { PartitionedResults, SelectionSummary } from './selection';
export { EXPORT_VERSION, exportAssignments, parseAssignmentExport } from './export';
export type { AssignmentExport } from './export';
export { AssignmentHistoryStore } from './history';
export { ConfigManager } from './config';
export type { ConfigFile } from './config';
export { AuthManager, authManager } from './auth';
export { GraphClient } from './graph';
