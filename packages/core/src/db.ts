import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';

export type TaskdeckDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

/** The raw SQL to create the schema from scratch (for new databases and tests) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL CHECK (length(title) BETWEEN 1 AND 200),
    description TEXT,
    status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'in_progress', 'completed')),
    priority TEXT NOT NULL DEFAULT 'medium' CHECK (priority IN ('low', 'medium', 'high')),
    due_date TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    CHECK (updated_at >= created_at)
);

CREATE INDEX IF NOT EXISTS idx_tasks_title ON tasks(title);
CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
CREATE INDEX IF NOT EXISTS idx_tasks_priority ON tasks(priority);
CREATE INDEX IF NOT EXISTS idx_tasks_due_date ON tasks(due_date);
CREATE INDEX IF NOT EXISTS idx_tasks_created_at ON tasks(created_at);
`;

const SQLITE_URL_PREFIX = /^sqlite:\/\//;

/**
 * Turn a DATABASE_URL into a better-sqlite3 path.
 * `sqlite:///./tasks.db` -> `./tasks.db`, `sqlite:////var/db/t.db` -> `/var/db/t.db`,
 * `sqlite://:memory:` -> `:memory:`. Bare paths pass through.
 */
export function resolveDbPath(databaseUrl: string): string {
  if (!SQLITE_URL_PREFIX.test(databaseUrl)) return databaseUrl;
  const rest = databaseUrl.replace(SQLITE_URL_PREFIX, '');
  return rest.startsWith('/') ? rest.slice(1) : rest;
}

/**
 * Create a Drizzle database connection with proper pragmas and the schema applied.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path: string): TaskdeckDb {
  // Ensure directory exists for file-based databases
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);

  // Set pragmas — must happen on every connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  // Idempotent — all statements use IF NOT EXISTS
  sqlite.exec(CREATE_SCHEMA_SQL);

  return drizzle(sqlite, { schema });
}

/** Create an in-memory database with schema applied. For tests. */
export function createTestDb(): TaskdeckDb {
  return createDb(':memory:');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for transactions and statements Drizzle doesn't cover.
 */
export function getRawDb(db: TaskdeckDb): Database.Database {
  return db.$client;
}

export function closeDb(db: TaskdeckDb): void {
  const raw = getRawDb(db);
  if (raw.open) raw.close();
}
