import type { SqliteDatabase } from '../connection.js';
import type { Migration } from './types.js';

export const duplicateGroupsMigration: Migration = {
  id: '001_duplicate_groups',
  name: 'create duplicate group documents and library preferences',
  up(db: SqliteDatabase) {
    db.exec(`
      -- One JSON document per library, replaced wholesale on every scan
      CREATE TABLE IF NOT EXISTS duplicate_group_documents (
        library_id TEXT PRIMARY KEY,
        document TEXT NOT NULL,
        group_count INTEGER NOT NULL DEFAULT 0,
        updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS library_preferences (
        library_id TEXT PRIMARY KEY,
        payload TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );
    `);
  },
};
