import type { SqliteDatabase } from '../connection.js';
import type { Migration } from './types.js';

export const deletionAuditMigration: Migration = {
  id: '002_deletion_audit',
  name: 'create append-only deletion audit log',
  up(db: SqliteDatabase) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS deletion_audit_records (
        record_id TEXT PRIMARY KEY,
        group_id TEXT NOT NULL,
        item_id TEXT NOT NULL,
        file_path TEXT NOT NULL,
        quality_score INTEGER NOT NULL DEFAULT 0,
        deletion_reason TEXT NOT NULL DEFAULT '',
        user_initiated INTEGER NOT NULL DEFAULT 0,
        user_id TEXT,
        timestamp TEXT NOT NULL,
        month TEXT NOT NULL,
        success INTEGER NOT NULL DEFAULT 0,
        error_message TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_deletion_audit_month ON deletion_audit_records(month);
      CREATE INDEX IF NOT EXISTS idx_deletion_audit_timestamp ON deletion_audit_records(timestamp);
    `);
  },
};
