/**
 * CLI helpers: argument parsing, error handling.
 */

import type { TaskStatus as TaskStatusType, Priority as PriorityType, TaskId } from '@taskdeck/core';
import { TaskStatus, Priority, TaskdeckError } from '@taskdeck/core';
import * as out from './output.js';

/**
 * Parse a status string into a TaskStatus value.
 */
export function parseStatus(status: string): TaskStatusType | null {
  switch (status.toLowerCase()) {
    case 'pending': case 'todo': return TaskStatus.Pending;
    case 'in-progress': case 'in_progress': case 'inprogress': case 'wip': return TaskStatus.InProgress;
    case 'done': case 'complete': case 'completed': return TaskStatus.Completed;
    default: return null;
  }
}

/**
 * Parse a priority string into a Priority value.
 */
export function parsePriority(level: string): PriorityType | null {
  switch (level.toLowerCase()) {
    case 'high': case '1': case 'p1': return Priority.High;
    case 'medium': case '2': case 'p2': return Priority.Medium;
    case 'low': case '3': case 'p3': return Priority.Low;
    default: return null;
  }
}

/** Positive integer ids only; anything else is null */
export function parseTaskId(value: string): TaskId | null {
  if (!/^\d+$/.test(value)) return null;
  const id = Number(value);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export function parseCount(value: string): number {
  const count = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(count)) {
    throw new TaskdeckError('VALIDATION_ERROR', `Expected a non-negative integer, got '${value}'`);
  }
  return count;
}

/**
 * Run a command action, printing any error and setting a failing exit code.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.fail(err instanceof Error ? err.message : String(err));
  }
}
