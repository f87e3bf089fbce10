/**
 * Dependency container
 *
 * Builds the object graph once per process from an AppConfig.
 */

import {
  createDb, closeDb, resolveDbPath,
  SqliteTaskRepository, TaskService,
  type AppConfig, type Logger, type TaskdeckDb, type TaskRepository,
} from '@taskdeck/core';

export interface Container {
  config: AppConfig;
  logger: Logger;
  db: TaskdeckDb;
  taskRepository: TaskRepository;
  taskService: TaskService;
  close(): void;
}

export function createContainer(config: AppConfig, logger: Logger, db?: TaskdeckDb): Container {
  const database = db ?? createDb(resolveDbPath(config.databaseUrl));
  const taskRepository = new SqliteTaskRepository(database);
  const taskService = new TaskService(taskRepository, {
    defaultPageSize: config.defaultPageSize,
    maxPageSize: config.maxPageSize,
    logger: logger.child({ component: 'task-service' }),
  });

  return {
    config,
    logger,
    db: database,
    taskRepository,
    taskService,
    close: () => closeDb(database),
  };
}
