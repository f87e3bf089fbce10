import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { TASK_STATUSES, TaskStatus } from '../types/task-status.js';
import { PRIORITIES, Priority } from '../types/priority.js';

export const tasks = sqliteTable('tasks', {
  /** AUTOINCREMENT so ids of deleted rows are never handed out again */
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  description: text('description'),
  status: text('status', { enum: TASK_STATUSES }).notNull().default(TaskStatus.Pending),
  priority: text('priority', { enum: PRIORITIES }).notNull().default(Priority.Medium),
  /** yyyy-MM-dd */
  dueDate: text('due_date'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
}, (table) => [
  index('idx_tasks_title').on(table.title),
  index('idx_tasks_status').on(table.status),
  index('idx_tasks_priority').on(table.priority),
  index('idx_tasks_due_date').on(table.dueDate),
  index('idx_tasks_created_at').on(table.createdAt),
]);

export type TaskRow = typeof tasks.$inferSelect;
export type TaskInsert = typeof tasks.$inferInsert;
