/**
 * TaskRepository - port for task persistence.
 *
 * A dumb record store: it assigns ids and runs filtered reads, while every
 * business rule (defaults, merge, timestamps, not-found) lives in the service.
 * Implementations raise PersistenceError when the store fails.
 */

import type { Task, TaskId } from '../types/task.js';
import type { TaskStatus } from '../types/task-status.js';
import type { Priority } from '../types/priority.js';

export interface TaskFilter {
  status?: TaskStatus;
  priority?: Priority;
  /** Case-insensitive substring of title or description */
  text?: string;
}

export interface TaskQuery extends TaskFilter {
  skip: number;
  limit: number;
}

export interface TaskSlice {
  tasks: Task[];
  total: number;
}

export type GroupField = 'status' | 'priority';

export interface TaskRepository {
  getById(id: TaskId): Task | null;

  /** Newest first; `total` ignores skip/limit */
  listFiltered(query: TaskQuery): TaskSlice;

  insert(task: Omit<Task, 'id'>): Task;

  /** Write every mutable field of `task`; null if the row is gone */
  update(task: Task): Task | null;

  /** False if there was nothing to delete */
  delete(id: TaskId): boolean;

  count(filter?: TaskFilter): number;

  /** Row counts keyed by the column's value; absent values are omitted */
  countBy(field: GroupField): Map<string, number>;

  /** Throws if the store can't answer a trivial query */
  ping(): void;
}
