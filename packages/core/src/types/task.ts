import type { TaskStatus } from './task-status.js';
import type { Priority } from './priority.js';

/** Storage-assigned, never reused after deletion */
export type TaskId = number;

export const TITLE_MAX_LENGTH = 200;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly status: TaskStatus;
  readonly priority: Priority;
  readonly dueDate: string | null; // yyyy-MM-dd
  readonly createdAt: string; // ISO string
  readonly updatedAt: string; // ISO string
}

/** Fields a caller supplies on create; the rest take their defaults */
export interface NewTask {
  readonly title: string;
  readonly description?: string | null;
  readonly status?: TaskStatus;
  readonly priority?: Priority;
  readonly dueDate?: string | null;
}

/**
 * Field assignments for an update. A key left undefined is untouched;
 * an explicit null clears description or dueDate.
 */
export interface TaskChanges {
  readonly title?: string;
  readonly description?: string | null;
  readonly status?: TaskStatus;
  readonly priority?: Priority;
  readonly dueDate?: string | null;
}

export interface TaskPage {
  readonly tasks: Task[];
  /** Matches before skip/limit were applied */
  readonly total: number;
  readonly skip: number;
  readonly limit: number;
}

export interface TaskStatistics {
  readonly totalTasks: number;
  readonly byStatus: Record<TaskStatus, number>;
  readonly byPriority: Record<Priority, number>;
}
