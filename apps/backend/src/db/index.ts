import { createDrizzle, closeConnection, type SqliteDatabase, type DrizzleDatabase } from './connection.js';
import { runMigrations } from './migrations/index.js';

export interface InitializeDatabaseOptions {
  filePath: string;
}

export interface DatabaseHandle {
  sqlite: SqliteDatabase;
  db: DrizzleDatabase;
  close: () => void;
}

export const initializeDrizzleDatabase = ({ filePath }: InitializeDatabaseOptions): DatabaseHandle => {
  const { sqlite, db } = createDrizzle(filePath);
  runMigrations(sqlite);
  return { sqlite, db, close: () => closeConnection(sqlite) };
};

export type { SqliteDatabase, DrizzleDatabase };
