// packages/core/src/memory/scan-history-store.ts — Finalized scan reports in SQLite

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { HealthRating, SmartScanReport } from '../types/scan.js';
import { DatabaseError } from '../utils/errors.js';
import { healthRatingSchema, recommendationListSchema, scanResultSchema } from './report-schema.js';

export interface ScanHistoryEntry {
  id: string;
  scannedAt: string;
  healthScore: number;
  rating: HealthRating;
  totalReclaimable: number;
  recommendationCount: number;
  durationMs: number;
}

const summaryRowSchema = z.object({
  id: z.string(),
  scanned_at: z.string(),
  health_score: z.number(),
  rating: healthRatingSchema,
  total_reclaimable: z.number(),
  recommendation_count: z.number(),
  duration_ms: z.number(),
});

const fullRowSchema = summaryRowSchema.extend({
  result_json: z.string(),
  recommendations_json: z.string(),
});

const SUMMARY_COLUMNS =
  'id, scanned_at, health_score, rating, total_reclaimable, recommendation_count, duration_ms';

function toEntry(row: z.infer<typeof summaryRowSchema>): ScanHistoryEntry {
  return {
    id: row.id,
    scannedAt: row.scanned_at,
    healthScore: row.health_score,
    rating: row.rating,
    totalReclaimable: row.total_reclaimable,
    recommendationCount: row.recommendation_count,
    durationMs: row.duration_ms,
  };
}

export class ScanHistoryStore {
  constructor(private db: Database.Database) {}

  /** Insert or replace the report under its scan id. */
  save(report: SmartScanReport): void {
    const { result } = report;
    this.db
      .prepare(
        `INSERT OR REPLACE INTO scan_history
          (id, scanned_at, health_score, rating, total_reclaimable, recommendation_count, duration_ms, result_json, recommendations_json)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        result.id,
        result.timestamp,
        result.healthScore,
        result.rating,
        result.totalReclaimableSpace,
        report.recommendations.length,
        Math.round(report.durationMs),
        JSON.stringify(result),
        JSON.stringify(report.recommendations),
      );
  }

  get(id: string): SmartScanReport | null {
    const row = this.db
      .prepare(`SELECT ${SUMMARY_COLUMNS}, result_json, recommendations_json FROM scan_history WHERE id = ?`)
      .get(id);
    return row === undefined ? null : this.toReport(row);
  }

  latest(): SmartScanReport | null {
    const row = this.db
      .prepare(
        `SELECT ${SUMMARY_COLUMNS}, result_json, recommendations_json FROM scan_history ORDER BY scanned_at DESC, rowid DESC LIMIT 1`,
      )
      .get();
    return row === undefined ? null : this.toReport(row);
  }

  /** Newest first. */
  list(limit = 20): ScanHistoryEntry[] {
    const rows = this.db
      .prepare(`SELECT ${SUMMARY_COLUMNS} FROM scan_history ORDER BY scanned_at DESC, rowid DESC LIMIT ?`)
      .all(limit);
    return z.array(summaryRowSchema).parse(rows).map(toEntry);
  }

  count(): number {
    const row = z.object({ n: z.number() }).parse(this.db.prepare('SELECT COUNT(*) AS n FROM scan_history').get());
    return row.n;
  }

  /** Keep the newest `maxEntries` scans; returns how many were deleted. */
  prune(maxEntries: number): number {
    const result = this.db
      .prepare(
        `DELETE FROM scan_history WHERE id NOT IN (
           SELECT id FROM scan_history ORDER BY scanned_at DESC, rowid DESC LIMIT ?
         )`,
      )
      .run(Math.max(0, maxEntries));
    return result.changes;
  }

  private toReport(raw: unknown): SmartScanReport {
    const parsed = fullRowSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DatabaseError(`Malformed scan_history row: ${parsed.error.message}`, 'read');
    }
    const row = parsed.data;
    try {
      return {
        result: scanResultSchema.parse(JSON.parse(row.result_json)),
        recommendations: recommendationListSchema.parse(JSON.parse(row.recommendations_json)),
        durationMs: row.duration_ms,
      };
    } catch (err) {
      throw new DatabaseError(
        `Stored scan ${row.id} could not be decoded: ${err instanceof Error ? err.message : String(err)}`,
        'read',
      );
    }
  }
}
