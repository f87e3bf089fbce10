import type { TaskId } from './task.js';

/** Outcome of a task service operation */
export type ServiceResult<T> =
  | { readonly type: 'success'; readonly data: T }
  | { readonly type: 'not-found'; readonly taskId: TaskId; readonly message: string }
  | { readonly type: 'validation-error'; readonly message: string; readonly field?: string };

export type Failure = Exclude<ServiceResult<never>, { type: 'success' }>;

export function ok<T>(data: T): ServiceResult<T> {
  return { type: 'success', data };
}

export function notFound(taskId: TaskId): Failure {
  return { type: 'not-found', taskId, message: `Task with id ${taskId} not found` };
}

export function invalid(message: string, field?: string): Failure {
  return field === undefined
    ? { type: 'validation-error', message }
    : { type: 'validation-error', message, field };
}

export function isSuccess<T>(r: ServiceResult<T>): r is { readonly type: 'success'; readonly data: T } {
  return r.type === 'success';
}

export function isFailure<T>(r: ServiceResult<T>): r is Failure {
  return r.type !== 'success';
}
