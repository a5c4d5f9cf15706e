// packages/core/src/memory/database.ts

import Database from 'better-sqlite3';
import { z } from 'zod';
import { DatabaseError } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,

  // Finalized scans
  `CREATE TABLE IF NOT EXISTS scan_history (
    id                   TEXT PRIMARY KEY,
    scanned_at           TEXT NOT NULL,
    health_score         INTEGER NOT NULL,
    rating               TEXT NOT NULL,
    total_reclaimable    INTEGER NOT NULL DEFAULT 0,
    recommendation_count INTEGER NOT NULL DEFAULT 0,
    duration_ms          INTEGER NOT NULL DEFAULT 0,
    result_json          TEXT NOT NULL,
    recommendations_json TEXT NOT NULL,
    created_at           DATETIME DEFAULT CURRENT_TIMESTAMP
  )`,
  'CREATE INDEX IF NOT EXISTS idx_scan_history_scanned ON scan_history(scanned_at DESC)',
];

/**
 * Open a SQLite database and run migrations.
 * Pass ':memory:' for in-memory databases (testing).
 */
export function openDatabase(dbPath: string): Database.Database {
  try {
    const db = new Database(dbPath);
    configurePragmas(db);
    runMigrations(db);
    return db;
  } catch (err) {
    throw new DatabaseError(
      `Failed to open database at "${dbPath}": ${err instanceof Error ? err.message : String(err)}`,
      'open',
    );
  }
}

function configurePragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
}

/**
 * Run all schema migrations. Idempotent (uses IF NOT EXISTS).
 */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }
    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(
      SCHEMA_VERSION,
    );
    db.prepare(
      "INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))",
    ).run();
  })();
}

const metaRowSchema = z.object({ value: z.string() });

/** Get the current schema version. */
export function getSchemaVersion(db: Database.Database): string | null {
  const row = metaRowSchema.safeParse(db.prepare("SELECT value FROM schema_meta WHERE key = 'version'").get());
  return row.success ? row.data.value : null;
}
