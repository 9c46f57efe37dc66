import type { SqliteDatabase } from '../connection.js';
import type { Migration } from './types.js';

export const scanJobsMigration: Migration = {
  id: '003_scan_jobs',
  name: 'add scan job history and cron schedules',
  up(db: SqliteDatabase) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS scan_jobs (
        id TEXT PRIMARY KEY,
        library_id TEXT,
        status TEXT NOT NULL DEFAULT 'pending'
          CHECK (status IN ('pending', 'running', 'completed', 'failed', 'cancelled')),
        progress_percentage INTEGER NOT NULL DEFAULT 0,
        status_message TEXT NOT NULL DEFAULT '',
        duplicates_found INTEGER NOT NULL DEFAULT 0,
        items_processed INTEGER NOT NULL DEFAULT 0,
        started_at TEXT NOT NULL,
        finished_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_scan_jobs_started_at ON scan_jobs(started_at);

      CREATE TABLE IF NOT EXISTS scan_schedules (
        id TEXT PRIMARY KEY,
        job_type TEXT NOT NULL CHECK (job_type IN ('duplicate_scan', 'audit_retention')),
        cron_expression TEXT NOT NULL,
        enabled INTEGER NOT NULL DEFAULT 1,
        last_run_at TEXT,
        next_run_at TEXT,
        created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TRIGGER IF NOT EXISTS update_scan_schedules_updated_at
      AFTER UPDATE ON scan_schedules
      FOR EACH ROW
      BEGIN
        UPDATE scan_schedules SET updated_at = CURRENT_TIMESTAMP WHERE id = NEW.id;
      END;
    `);
  },
};
