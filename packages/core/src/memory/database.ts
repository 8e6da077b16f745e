// packages/core/src/memory/database.ts

import Database from 'better-sqlite3';
import { DB_BUSY_TIMEOUT_MS } from '../utils/constants.js';
import { DatabaseError, errorMessage } from '../utils/errors.js';

const SCHEMA_VERSION = '1';

const MIGRATIONS = [
  // Analysis runs
  `CREATE TABLE IF NOT EXISTS analysis_runs (
    run_id         TEXT PRIMARY KEY,
    config_root    TEXT NOT NULL,
    analyzed_at    TEXT NOT NULL,
    saved_at       INTEGER NOT NULL,
    total          INTEGER NOT NULL,
    actively_used  INTEGER NOT NULL,
    dashboard_only INTEGER NOT NULL,
    truly_orphaned INTEGER NOT NULL,
    result_json    TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_analysis_runs_root ON analysis_runs(config_root, saved_at DESC)',

  // Pre-delete snapshots and outcomes
  `CREATE TABLE IF NOT EXISTS deletion_records (
    id            INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id        TEXT NOT NULL,
    entity_id     TEXT NOT NULL,
    dry_run       INTEGER NOT NULL DEFAULT 1,
    snapshot_json TEXT NOT NULL,
    requested_at  TEXT NOT NULL,
    status        TEXT NOT NULL DEFAULT 'pending',
    message       TEXT,
    updated_at    INTEGER NOT NULL
  )`,
  'CREATE UNIQUE INDEX IF NOT EXISTS idx_deletion_run_entity ON deletion_records(run_id, entity_id)',

  // Schema meta
  `CREATE TABLE IF NOT EXISTS schema_meta (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )`,
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
    throw new DatabaseError(`Failed to open database at "${dbPath}": ${errorMessage(err)}`, 'open');
  }
}

function configurePragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
}

/**
 * Run all schema migrations. Idempotent (uses IF NOT EXISTS).
 */
export function runMigrations(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of MIGRATIONS) {
      db.exec(sql);
    }
    db.prepare("INSERT OR REPLACE INTO schema_meta(key, value) VALUES ('version', ?)").run(SCHEMA_VERSION);
    db.prepare("INSERT OR IGNORE INTO schema_meta(key, value) VALUES ('created_at', datetime('now'))").run();
  })();
}

/** Get the current schema version. */
export function getSchemaVersion(db: Database.Database): string | null {
  const row = db
    .prepare<[], { value: string }>("SELECT value FROM schema_meta WHERE key = 'version'")
    .get();
  return row?.value ?? null;
}
