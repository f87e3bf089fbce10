// Types
export {
  TaskStatus, TaskStatusName, TASK_STATUSES, isTaskStatus,
  Priority, PriorityName, PRIORITIES, isPriority,
  TITLE_MAX_LENGTH,
  ok, notFound, invalid, isSuccess, isFailure,
} from './types/index.js';
export type {
  TaskId, Task, NewTask, TaskChanges, TaskPage, TaskStatistics,
  ServiceResult, Failure,
} from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getRawDb, closeDb, resolveDbPath, CREATE_SCHEMA_SQL } from './db.js';
export type { TaskdeckDb } from './db.js';

// Repository
export * from './repository/index.js';

// Service
export * from './service/index.js';

// Parsers
export { parseDate, parseIsoDate, isCalendarDate, formatDate } from './parsers/index.js';

// Ambient
export {
  TaskdeckError, ValidationError, NotFoundError, PersistenceError, ConfigError, unwrap,
} from './errors.js';
export type { ErrorCode, ValidationIssue } from './errors.js';
export { loadConfig } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
export { createLogger, createSilentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
