/**
 * Lazily opened task service shared by every command, so the global
 * `--db` option is read before the database is touched.
 */

import {
  createDb, closeDb, resolveDbPath, SqliteTaskRepository, TaskService,
  type AppConfig, type Logger, type TaskdeckDb,
} from '@taskdeck/core';

export type OpenDb = (path: string) => TaskdeckDb;

export interface CliContext {
  readonly config: AppConfig;
  readonly logger: Logger;
  /** Opens the database on first call */
  db(): TaskdeckDb;
  service(): TaskService;
  close(): void;
}

export function createCliContext(
  config: AppConfig,
  logger: Logger,
  dbPath: () => string | undefined,
  openDb: OpenDb = createDb,
): CliContext {
  let db: TaskdeckDb | null = null;
  let service: TaskService | null = null;

  const getDb = (): TaskdeckDb => {
    db ??= openDb(resolveDbPath(dbPath() ?? config.databaseUrl));
    return db;
  };

  return {
    config,
    logger,
    db: getDb,
    service: () => {
      service ??= new TaskService(new SqliteTaskRepository(getDb()), {
        defaultPageSize: config.defaultPageSize,
        maxPageSize: config.maxPageSize,
        logger: logger.child({ component: 'task-service' }),
      });
      return service;
    },
    close: () => {
      if (db) closeDb(db);
      db = null;
      service = null;
    },
  };
}
