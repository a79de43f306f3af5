/**
 * Assignment History Store
 * SQLite database for assignment outcomes and operation summaries
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { z } from 'zod';
import {
  ASSIGNMENT_INTENTS,
  Assignment,
  AssignmentStatistics,
  AssignmentStatus,
  OPERATION_STATES,
  OperationSummary,
} from '../types';
import { PATHS } from '../utils/constants';
import { logger } from '../utils/logger';
import { assignmentSchema } from './export';

interface AssignmentRow {
  id: string;
  batch_id: string;
  application_id: string;
  application_name: string;
  app_type: string;
  group_id: string;
  group_name: string;
  target_type: string;
  intent: string;
  settings: string | null;
  filter: string | null;
  created_date: string;
  completed_date: string | null;
  status: string;
  error_message: string | null;
  error_category: string | null;
  retry_count: number;
}

interface OperationRow {
  id: string;
  state: string;
  started_at: string;
  completed_at: string;
  total: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  rejected: number;
  skipped: string;
}

interface StatsRow {
  total: number;
  succeeded: number | null;
  failed: number | null;
  cancelled: number | null;
  pending: number | null;
}

const operationSummarySchema: z.ZodType<OperationSummary> = z.object({
  operationId: z.string(),
  state: z.enum(OPERATION_STATES),
  startedAt: z.string(),
  completedAt: z.string(),
  total: z.number().int(),
  succeeded: z.number().int(),
  failed: z.number().int(),
  cancelled: z.number().int(),
  rejected: z.number().int(),
  skipped: z.array(
    z.object({
      applicationId: z.string(),
      applicationName: z.string(),
      groupId: z.string(),
      groupName: z.string(),
      intent: z.enum(ASSIGNMENT_INTENTS),
      reason: z.enum(['duplicate', 'conflict']),
      existingIntent: z.enum(ASSIGNMENT_INTENTS),
    })
  ),
});

export const IN_MEMORY = ':memory:';

export class AssignmentHistoryStore {
  private db: Database.Database;

  /**
   * @param dataDir directory holding the database file, or ':memory:'
   */
  constructor(dataDir?: string) {
    if (dataDir === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const dir = dataDir || path.join(process.cwd(), PATHS.DATA_DIR);

      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      const dbPath = path.join(dir, PATHS.DB_FILE);
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
    }

    this.initialize();
    logger.debug(`Initialized assignment history: ${dataDir ?? 'default location'}`);
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS assignments (
        id TEXT PRIMARY KEY,
        batch_id TEXT NOT NULL,
        application_id TEXT NOT NULL,
        application_name TEXT NOT NULL,
        app_type TEXT NOT NULL,
        group_id TEXT NOT NULL,
        group_name TEXT NOT NULL,
        target_type TEXT NOT NULL,
        intent TEXT NOT NULL,
        settings TEXT,
        filter TEXT,
        created_date TEXT NOT NULL,
        completed_date TEXT,
        status TEXT NOT NULL,
        error_message TEXT,
        error_category TEXT,
        retry_count INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS operations (
        id TEXT PRIMARY KEY,
        state TEXT NOT NULL,
        started_at TEXT NOT NULL,
        completed_at TEXT NOT NULL,
        total INTEGER NOT NULL DEFAULT 0,
        succeeded INTEGER NOT NULL DEFAULT 0,
        failed INTEGER NOT NULL DEFAULT 0,
        cancelled INTEGER NOT NULL DEFAULT 0,
        rejected INTEGER NOT NULL DEFAULT 0,
        skipped TEXT NOT NULL DEFAULT '[]'
      );

      CREATE INDEX IF NOT EXISTS idx_assignments_status ON assignments(status);
      CREATE INDEX IF NOT EXISTS idx_assignments_batch ON assignments(batch_id);
      CREATE INDEX IF NOT EXISTS idx_operations_started ON operations(started_at);
    `);
  }

  // ============================================================================
  // Assignments
  // ============================================================================

  /**
   * Insert or update assignment records; a retried assignment keeps its id
   */
  saveAssignments(assignments: readonly Assignment[]): void {
    const upsert = this.db.prepare(
      `INSERT INTO assignments (
        id, batch_id, application_id, application_name, app_type, group_id, group_name,
        target_type, intent, settings, filter, created_date, completed_date, status,
        error_message, error_category, retry_count
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        completed_date = excluded.completed_date,
        status = excluded.status,
        error_message = excluded.error_message,
        error_category = excluded.error_category,
        retry_count = excluded.retry_count`
    );

    const saveAll = this.db.transaction((items: readonly Assignment[]) => {
      for (const a of items) {
        upsert.run(
          a.id,
          a.batchId,
          a.applicationId,
          a.applicationName,
          a.appType,
          a.groupId,
          a.groupName,
          a.targetType,
          a.intent,
          a.settings ? JSON.stringify(a.settings) : null,
          a.filter ? JSON.stringify(a.filter) : null,
          a.createdDate,
          a.completedDate ?? null,
          a.status,
          a.errorMessage ?? null,
          a.errorCategory ?? null,
          a.retryCount
        );
      }
    });

    saveAll(assignments);
    logger.debug(`Saved ${assignments.length} assignment record(s)`);
  }

  getAssignments(options: { status?: AssignmentStatus; limit?: number } = {}): Assignment[] {
    const limit = options.limit ?? -1;
    const rows = options.status
      ? this.db
          .prepare<[string, number], AssignmentRow>(
            `SELECT * FROM assignments WHERE status = ? ORDER BY created_date DESC, rowid DESC LIMIT ?`
          )
          .all(options.status, limit)
      : this.db
          .prepare<[number], AssignmentRow>(
            `SELECT * FROM assignments ORDER BY created_date DESC, rowid DESC LIMIT ?`
          )
          .all(limit);

    return rows.map((row) => this.mapAssignment(row));
  }

  /**
   * Failed and cancelled records, ready to hand back to the service for retry
   */
  getRetryableAssignments(): Assignment[] {
    const rows = this.db
      .prepare<[], AssignmentRow>(
        `SELECT * FROM assignments WHERE status IN ('failed', 'cancelled') ORDER BY created_date, rowid`
      )
      .all();
    return rows.map((row) => this.mapAssignment(row));
  }

  getStats(): AssignmentStatistics {
    const stats = this.db
      .prepare<[], StatsRow>(
        `SELECT
          COUNT(*) as total,
          SUM(CASE WHEN status = 'success' THEN 1 ELSE 0 END) as succeeded,
          SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) as failed,
          SUM(CASE WHEN status = 'cancelled' THEN 1 ELSE 0 END) as cancelled,
          SUM(CASE WHEN status IN ('pending', 'inProgress') THEN 1 ELSE 0 END) as pending
         FROM assignments`
      )
      .get();

    return {
      total: stats?.total ?? 0,
      succeeded: stats?.succeeded ?? 0,
      failed: stats?.failed ?? 0,
      cancelled: stats?.cancelled ?? 0,
      pending: stats?.pending ?? 0,
    };
  }

  /**
   * Delete history. With failedOnly, only failed and cancelled records go.
   * Returns the number of assignment records removed.
   */
  clear(options: { failedOnly?: boolean } = {}): number {
    if (options.failedOnly) {
      return this.db.prepare(`DELETE FROM assignments WHERE status IN ('failed', 'cancelled')`).run()
        .changes;
    }
    const removed = this.db.prepare(`DELETE FROM assignments`).run().changes;
    this.db.prepare(`DELETE FROM operations`).run();
    return removed;
  }

  // ============================================================================
  // Operations
  // ============================================================================

  saveOperation(summary: OperationSummary): void {
    this.db
      .prepare(
        `INSERT INTO operations (id, state, started_at, completed_at, total, succeeded, failed, cancelled, rejected, skipped)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           state = excluded.state,
           completed_at = excluded.completed_at,
           total = excluded.total,
           succeeded = excluded.succeeded,
           failed = excluded.failed,
           cancelled = excluded.cancelled,
           rejected = excluded.rejected,
           skipped = excluded.skipped`
      )
      .run(
        summary.operationId,
        summary.state,
        summary.startedAt,
        summary.completedAt,
        summary.total,
        summary.succeeded,
        summary.failed,
        summary.cancelled,
        summary.rejected,
        JSON.stringify(summary.skipped)
      );
  }

  getRecentOperations(limit: number = 10): OperationSummary[] {
    const rows = this.db
      .prepare<[number], OperationRow>(`SELECT * FROM operations ORDER BY started_at DESC LIMIT ?`)
      .all(limit);

    return rows.map((row) => this.mapOperation(row));
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private mapAssignment(row: AssignmentRow): Assignment {
    return assignmentSchema.parse({
      id: row.id,
      batchId: row.batch_id,
      applicationId: row.application_id,
      applicationName: row.application_name,
      appType: row.app_type,
      groupId: row.group_id,
      groupName: row.group_name,
      targetType: row.target_type,
      intent: row.intent,
      settings: row.settings ? parseJson(row.settings) : undefined,
      filter: row.filter ? parseJson(row.filter) : undefined,
      createdDate: row.created_date,
      completedDate: row.completed_date ?? undefined,
      status: row.status,
      errorMessage: row.error_message ?? undefined,
      errorCategory: row.error_category ?? undefined,
      retryCount: row.retry_count,
    });
  }

  private mapOperation(row: OperationRow): OperationSummary {
    return operationSummarySchema.parse({
      operationId: row.id,
      state: row.state,
      startedAt: row.started_at,
      completedAt: row.completed_at,
      total: row.total,
      succeeded: row.succeeded,
      failed: row.failed,
      cancelled: row.cancelled,
      rejected: row.rejected,
      skipped: parseJson(row.skipped),
    });
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
  }
}

function parseJson(text: string): unknown {
  return JSON.parse(text);
}
