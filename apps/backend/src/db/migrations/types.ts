import type { SqliteDatabase } from '../connection.js';

export interface Migration {
  /** Sortable key recorded in schema_migrations, e.g. `001_duplicate_groups`. */
  id: string;
  name: string;
  up: (db: SqliteDatabase) => void;
}
