import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

export type SqliteDatabase = Database.Database;
export type DrizzleDatabase = BetterSQLite3Database<typeof schema>;

export type CreateConnectionOptions = Database.Options;

const IN_MEMORY = ':memory:';

export const createSqliteConnection = (
  filePath: string,
  options: CreateConnectionOptions = {},
): SqliteDatabase => {
  if (filePath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  }

  const database = new Database(filePath, options);

  database.pragma('foreign_keys = ON');
  // Scans write one document per library while the API keeps reading.
  if (filePath !== IN_MEMORY) {
    database.pragma('journal_mode = WAL');
  }
  database.pragma('busy_timeout = 5000');
  database.pragma('synchronous = NORMAL');

  return database;
};

export const createDrizzle = (filePath: string, options: CreateConnectionOptions = {}) => {
  const sqlite = createSqliteConnection(filePath, options);
  const db = drizzle(sqlite, { schema });
  return { sqlite, db };
};

export const closeConnection = (database: SqliteDatabase) => {
  if (database.open) {
    database.close();
  }
};
