import type { SqliteDatabase } from '../connection.js';
import { duplicateGroupsMigration } from './001_duplicate_groups.js';
import { deletionAuditMigration } from './002_deletion_audit.js';
import { scanJobsMigration } from './003_scan_jobs.js';
import type { Migration } from './types.js';

const migrations: Migration[] = [duplicateGroupsMigration, deletionAuditMigration, scanJobsMigration];

export const runMigrations = (db: SqliteDatabase): string[] => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const applied = new Set<string>(
    db
      .prepare<[], { id: string }>('SELECT id FROM schema_migrations')
      .all()
      .map((row) => row.id),
  );
  const insertStmt = db.prepare("INSERT INTO schema_migrations (id, applied_at) VALUES (?, datetime('now'))");
  const ran: string[] = [];

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }

    db.transaction(() => {
      migration.up(db);
      insertStmt.run(migration.id);
    })();
    ran.push(migration.id);
  }

  return ran;
};

export const getMigrations = (): readonly Migration[] => migrations;
