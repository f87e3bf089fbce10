import type { Task, NewTask, TaskChanges } from '../types/task.js';
import { TITLE_MAX_LENGTH } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import { Priority } from '../types/priority.js';

/** Length in characters (code points), the way SQLite's length() counts */
export function titleLength(title: string): number {
  return [...title].length;
}

/** Error message for a bad title, or null if it's acceptable */
export function checkTitle(title: string): string | null {
  const length = titleLength(title);
  if (length === 0) return 'Title must not be empty';
  if (length > TITLE_MAX_LENGTH) return `Title must be at most ${TITLE_MAX_LENGTH} characters`;
  return null;
}

/**
 * Timestamp for a mutation that must sort strictly after `previous`.
 * When the clock hasn't moved past it, step one millisecond forward.
 */
export function nextTimestamp(previous: string, now: Date): string {
  const prev = Date.parse(previous);
  const next = Math.max(now.getTime(), prev + 1);
  return new Date(next).toISOString();
}

/** Build the record to insert, with defaults applied and both timestamps equal */
export function buildTask(input: NewTask, now: Date): Omit<Task, 'id'> {
  const timestamp = now.toISOString();
  return {
    title: input.title,
    description: input.description ?? null,
    status: input.status ?? TaskStatus.Pending,
    priority: input.priority ?? Priority.Medium,
    dueDate: input.dueDate ?? null,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/** Return a copy of the task with only the supplied fields replaced */
export function applyChanges(task: Task, changes: TaskChanges, updatedAt: string): Task {
  return {
    ...task,
    title: changes.title !== undefined ? changes.title : task.title,
    description: changes.description !== undefined ? changes.description : task.description,
    status: changes.status !== undefined ? changes.status : task.status,
    priority: changes.priority !== undefined ? changes.priority : task.priority,
    dueDate: changes.dueDate !== undefined ? changes.dueDate : task.dueDate,
    updatedAt,
  };
}
