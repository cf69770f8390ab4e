/**
 * @fileoverview Report archive
 *
 * SQLite-backed store of finalized run reports. A report is immutable once
 * written: saving the same run id twice keeps the first copy.
 *
 * PRECONDITION: initialize() has been awaited before any other call
 * INVARIANT: every report read back has passed RunReportSchema
 *
 * @packageDocumentation
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { StorageError } from '../core/errors.js';
import { formatIssues } from '../config/loader.js';
import { RunReportSchema, type RunReport } from '../report/schema.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { safeJsonParse } from '../utils/safe_json.js';

const TAG = 'ReportStore';
const DEFAULT_LIST_LIMIT = 20;

// ============================================================================
// TYPES
// ============================================================================

export interface ReportSummary {
  readonly runId: string;
  readonly status: RunReport['status'];
  readonly truncated: boolean;
  readonly overallScore: number;
  readonly findings: number;
  readonly unresolvedConflicts: number;
  readonly completedAt: string;
}

export interface ListReportsOptions {
  limit?: number;
  status?: RunReport['status'];
}

export interface ReportStore {
  initialize(): Promise<void>;
  close(): Promise<void>;
  /** @returns false when a report with the same run id was already stored */
  save(report: RunReport): Promise<boolean>;
  get(runId: string): Promise<RunReport | null>;
  /** Newest first. */
  list(options?: ListReportsOptions): Promise<ReportSummary[]>;
}

const SummaryRowSchema = z.object({
  run_id: z.string(),
  status: z.enum(['complete', 'failed']),
  truncated: z.number().int(),
  overall_score: z.number(),
  findings: z.number().int(),
  unresolved_conflicts: z.number().int(),
  completed_at: z.string(),
});

const ReportRowSchema = z.object({ report: z.string() });

// ============================================================================
// SQLITE IMPLEMENTATION
// ============================================================================

export class SqliteReportStore implements ReportStore {
  private db: Database.Database | null = null;

  constructor(private readonly dbPath: string) {}

  async initialize(): Promise<void> {
    if (this.db) return;

    try {
      const BetterSqlite3 = (await import('better-sqlite3')).default;
      this.db = new BetterSqlite3(this.dbPath);
    } catch (error) {
      throw new StorageError('open', false, `${this.dbPath}: ${getErrorMessage(error)}`);
    }

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS run_reports (
        run_id TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        truncated INTEGER NOT NULL,
        overall_score REAL NOT NULL,
        findings INTEGER NOT NULL,
        unresolved_conflicts INTEGER NOT NULL,
        completed_at TEXT NOT NULL,
        report TEXT NOT NULL,

        CONSTRAINT valid_status CHECK (status IN ('complete', 'failed'))
      );

      CREATE INDEX IF NOT EXISTS idx_reports_completed ON run_reports(completed_at);
      CREATE INDEX IF NOT EXISTS idx_reports_status ON run_reports(status);
    `);
    logDebug(`${TAG}: opened`, { path: this.dbPath });
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  async save(report: RunReport): Promise<boolean> {
    const db = this.requireDb();
    const parsed = RunReportSchema.safeParse(report);
    if (!parsed.success) {
      throw new StorageError('write', false, `report ${report.runId} is invalid: ${formatIssues(parsed.error).join('; ')}`);
    }

    try {
      const result = db
        .prepare(
          `
        INSERT OR IGNORE INTO run_reports
          (run_id, status, truncated, overall_score, findings, unresolved_conflicts, completed_at, report)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `
        )
        .run(
          report.runId,
          report.status,
          report.truncated ? 1 : 0,
          report.overall.score,
          report.counts.findings,
          report.counts.unresolvedConflicts,
          report.completedAt,
          JSON.stringify(report)
        );
      return result.changes > 0;
    } catch (error) {
      throw new StorageError('write', isBusy(error), getErrorMessage(error));
    }
  }

  async get(runId: string): Promise<RunReport | null> {
    const db = this.requireDb();
    const row: unknown = db.prepare('SELECT report FROM run_reports WHERE run_id = ?').get(runId);
    if (row === undefined) return null;

    const { report } = ReportRowSchema.parse(row);
    const json = safeJsonParse(report);
    if (!json.ok) {
      throw new StorageError('read', false, `report ${runId} is not valid JSON: ${json.error.message}`);
    }
    const parsed = RunReportSchema.safeParse(json.value);
    if (!parsed.success) {
      throw new StorageError('read', false, `report ${runId} failed validation: ${formatIssues(parsed.error).join('; ')}`);
    }
    return parsed.data;
  }

  async list(options: ListReportsOptions = {}): Promise<ReportSummary[]> {
    const db = this.requireDb();
    const limit = options.limit ?? DEFAULT_LIST_LIMIT;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new StorageError('query', false, `limit must be a positive integer, got ${limit}`);
    }

    let sql = `
      SELECT run_id, status, truncated, overall_score, findings, unresolved_conflicts, completed_at
      FROM run_reports
    `;
    const params: (string | number)[] = [];
    if (options.status) {
      sql += ' WHERE status = ?';
      params.push(options.status);
    }
    sql += ' ORDER BY completed_at DESC, rowid DESC LIMIT ?';
    params.push(limit);

    const rows: unknown[] = db.prepare(sql).all(...params);
    return rows.map((raw) => {
      const row = SummaryRowSchema.parse(raw);
      return {
        runId: row.run_id,
        status: row.status,
        truncated: row.truncated === 1,
        overallScore: row.overall_score,
        findings: row.findings,
        unresolvedConflicts: row.unresolved_conflicts,
        completedAt: row.completed_at,
      };
    });
  }

  private requireDb(): Database.Database {
    if (!this.db) throw new StorageError('open', false, 'report store is not initialized');
    return this.db;
  }
}

function isBusy(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'SQLITE_BUSY';
}

/**
 * Create and open a store. `:memory:` gives a private, throwaway archive.
 */
export async function createReportStore(dbPath: string): Promise<SqliteReportStore> {
  const store = new SqliteReportStore(dbPath);
  await store.initialize();
  return store;
}
