/**
 * Task API DTOs
 *
 * Wire shapes are snake_case; the core works in camelCase.
 */

import { z } from 'zod';
import {
  TASK_STATUSES, PRIORITIES, TITLE_MAX_LENGTH, isCalendarDate, titleLength,
  type Task, type TaskPage, type TaskStatistics, type NewTask, type TaskChanges,
  type TaskStatus, type Priority,
} from '@taskdeck/core';

// Counted in characters, not UTF-16 units
const title = z.string().superRefine((value, ctx) => {
  const length = titleLength(value);
  if (length < 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.too_small,
      minimum: 1,
      type: 'string',
      inclusive: true,
      message: 'Title must not be empty',
    });
  } else if (length > TITLE_MAX_LENGTH) {
    ctx.addIssue({
      code: z.ZodIssueCode.too_big,
      maximum: TITLE_MAX_LENGTH,
      type: 'string',
      inclusive: true,
      message: `Title must be at most ${TITLE_MAX_LENGTH} characters`,
    });
  }
});
const dueDate = z.string().refine(isCalendarDate, { message: 'Expected a date in YYYY-MM-DD format' });
const status = z.enum(TASK_STATUSES);
const priority = z.enum(PRIORITIES);

export const createTaskSchema = z.object({
  title,
  description: z.string().nullish(),
  status: status.nullish(),
  priority: priority.nullish(),
  due_date: dueDate.nullish(),
});

/** PUT and PATCH share this: every field optional, absent fields untouched */
export const updateTaskSchema = z.object({
  title: title.optional(),
  description: z.string().nullable().optional(),
  status: status.optional(),
  priority: priority.optional(),
  due_date: dueDate.nullable().optional(),
});

export const statusUpdateSchema = z.object({ status });
export const priorityUpdateSchema = z.object({ priority });

/** Any safe integer; ids that name no task are a 404, not a validation error */
export const taskIdSchema = z.coerce.number().int().safe();

function pageFields(defaultPageSize: number, maxPageSize: number) {
  return {
    skip: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
    limit: z.coerce.number().int().min(1).max(maxPageSize).default(defaultPageSize),
  };
}

export function listQuerySchema(defaultPageSize: number, maxPageSize: number) {
  return z.object({
    ...pageFields(defaultPageSize, maxPageSize),
    status: status.optional(),
    priority: priority.optional(),
  });
}

export function searchQuerySchema(defaultPageSize: number, maxPageSize: number) {
  return z.object({
    q: z.string().min(1),
    ...pageFields(defaultPageSize, maxPageSize),
  });
}

export type CreateTaskRequest = z.infer<typeof createTaskSchema>;
export type UpdateTaskRequest = z.infer<typeof updateTaskSchema>;

export function toNewTask(dto: CreateTaskRequest): NewTask {
  return {
    title: dto.title,
    description: dto.description ?? null,
    status: dto.status ?? undefined,
    priority: dto.priority ?? undefined,
    dueDate: dto.due_date ?? null,
  };
}

/** Only keys present in the request end up in the changes */
export function toTaskChanges(dto: UpdateTaskRequest): TaskChanges {
  return {
    title: dto.title,
    description: dto.description,
    status: dto.status,
    priority: dto.priority,
    dueDate: dto.due_date,
  };
}

export interface TaskResponse {
  id: number;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: Priority;
  due_date: string | null;
  created_at: string;
  updated_at: string;
}

export interface TaskListResponse {
  tasks: TaskResponse[];
  total: number;
  skip: number;
  limit: number;
}

export interface StatisticsResponse {
  total_tasks: number;
  by_status: { pending: number; in_progress: number; completed: number };
  by_priority: { high: number; medium: number; low: number };
}

export function toTaskResponse(task: Task): TaskResponse {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    priority: task.priority,
    due_date: task.dueDate,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}

export function toTaskListResponse(page: TaskPage): TaskListResponse {
  return {
    tasks: page.tasks.map(toTaskResponse),
    total: page.total,
    skip: page.skip,
    limit: page.limit,
  };
}

export function toStatisticsResponse(stats: TaskStatistics): StatisticsResponse {
  return {
    total_tasks: stats.totalTasks,
    by_status: {
      pending: stats.byStatus.pending,
      in_progress: stats.byStatus.in_progress,
      completed: stats.byStatus.completed,
    },
    by_priority: {
      high: stats.byPriority.high,
      medium: stats.byPriority.medium,
      low: stats.byPriority.low,
    },
  };
}
