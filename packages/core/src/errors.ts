/**
 * Error types shared by the server and the CLI.
 *
 * Service operations report not-found and validation outcomes as
 * {@link ServiceResult} variants; these classes are what the transport
 * boundaries raise or map when they need an exception instead.
 */

import type { TaskId } from './types/task.js';
import type { ServiceResult } from './types/results.js';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'PERSISTENCE_ERROR'
  | 'CONFIG_ERROR';

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

export class TaskdeckError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends TaskdeckError {
  constructor(message: string, readonly issues: ValidationIssue[] = []) {
    super('VALIDATION_ERROR', message);
  }
}

export class NotFoundError extends TaskdeckError {
  constructor(readonly taskId: TaskId) {
    super('NOT_FOUND', `Task with id ${taskId} not found`);
  }
}

/** The store was unreachable or rejected an operation */
export class PersistenceError extends TaskdeckError {
  constructor(message = 'Database operation failed', cause?: unknown) {
    super('PERSISTENCE_ERROR', message, { cause });
  }
}

export class ConfigError extends TaskdeckError {
  constructor(message: string, readonly issues: ValidationIssue[] = []) {
    super('CONFIG_ERROR', message);
  }
}

/** Return the data of a successful result, or throw the matching error */
export function unwrap<T>(result: ServiceResult<T>): T {
  switch (result.type) {
    case 'success': return result.data;
    case 'not-found': throw new NotFoundError(result.taskId);
    case 'validation-error':
      throw new ValidationError(
        result.message,
        result.field ? [{ path: result.field, message: result.message, code: 'invalid' }] : [],
      );
  }
}
