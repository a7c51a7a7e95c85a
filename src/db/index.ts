import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema.js';

export * from './schema.js';

export interface DatabaseConfig {
  dbPath: string;
}

export interface DatabaseInstance {
  db: BetterSQLite3Database<typeof schema>;
  sqlite: Database.Database;
  close: () => void;
}

const CREATE_TABLES = `
  CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY NOT NULL,
    name TEXT NOT NULL,
    program TEXT NOT NULL,
    cron_expression TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS tasks_name_idx ON tasks(name);
`;

/**
 * Open (or create) the SQLite database with Drizzle ORM
 */
export function initDatabase(config: DatabaseConfig): DatabaseInstance {
  const { dbPath } = config;

  // Ensure directory exists
  const dbDir = dirname(dbPath);
  if (dbDir && !existsSync(dbDir)) {
    mkdirSync(dbDir, { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Enable WAL mode for better concurrent access
  sqlite.pragma('journal_mode = WAL');
  sqlite.exec(CREATE_TABLES);

  const db = drizzle(sqlite, { schema });

  return {
    db,
    sqlite,
    close: () => sqlite.close(),
  };
}

/**
 * Create an in-memory database (useful for testing)
 */
export function createInMemoryDatabase(): DatabaseInstance {
  const sqlite = new Database(':memory:');
  sqlite.exec(CREATE_TABLES);

  const db = drizzle(sqlite, { schema });

  return {
    db,
    sqlite,
    close: () => sqlite.close(),
  };
}
