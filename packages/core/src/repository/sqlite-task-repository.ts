/**
 * Drizzle/better-sqlite3 implementation of TaskRepository.
 */

import { eq, and, desc, count, sql, type SQL } from 'drizzle-orm';
import type { TaskdeckDb } from '../db.js';
import { getRawDb } from '../db.js';
import { tasks, type TaskRow } from '../schema/tasks.js';
import type { Task, TaskId } from '../types/task.js';
import { PersistenceError } from '../errors.js';
import type {
  TaskRepository, TaskFilter, TaskQuery, TaskSlice, GroupField,
} from './task-repository.js';

/** Map a Drizzle row to a Task object */
function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    status: row.status,
    priority: row.priority,
    dueDate: row.dueDate,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/** Escape LIKE wildcards so the query matches literally */
export function escapeLike(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

function whereClause(filter: TaskFilter): SQL | undefined {
  const conditions: SQL[] = [];

  if (filter.status != null) {
    conditions.push(eq(tasks.status, filter.status));
  }
  if (filter.priority != null) {
    conditions.push(eq(tasks.priority, filter.priority));
  }
  // NULL descriptions never satisfy LIKE, so they never match
  if (filter.text != null) {
    const pattern = '%' + escapeLike(filter.text) + '%';
    conditions.push(
      sql`(${tasks.title} LIKE ${pattern} ESCAPE '\\' OR ${tasks.description} LIKE ${pattern} ESCAPE '\\')`,
    );
  }

  return conditions.length > 0 ? and(...conditions) : undefined;
}

export class SqliteTaskRepository implements TaskRepository {
  constructor(private readonly db: TaskdeckDb) {}

  getById(id: TaskId): Task | null {
    return this.guard('load task', () => {
      const row = this.db.select().from(tasks).where(eq(tasks.id, id)).get();
      return row ? toTask(row) : null;
    });
  }

  listFiltered(query: TaskQuery): TaskSlice {
    const where = whereClause(query);
    const raw = getRawDb(this.db);

    return this.guard('list tasks', () => {
      // Count and page from the same snapshot
      const read = raw.transaction((): TaskSlice => {
        const total = this.db.select({ n: count() }).from(tasks).where(where).get()?.n ?? 0;
        const rows = this.db.select().from(tasks)
          .where(where)
          .orderBy(desc(tasks.createdAt), desc(tasks.id))
          .limit(query.limit)
          .offset(query.skip)
          .all();
        return { tasks: rows.map(toTask), total };
      });
      return read();
    });
  }

  insert(task: Omit<Task, 'id'>): Task {
    return this.guard('insert task', () => {
      const row = this.db.insert(tasks).values({
        title: task.title,
        description: task.description,
        status: task.status,
        priority: task.priority,
        dueDate: task.dueDate,
        createdAt: task.createdAt,
        updatedAt: task.updatedAt,
      }).returning().get();
      return toTask(row);
    });
  }

  update(task: Task): Task | null {
    return this.guard('update task', () => {
      const row = this.db.update(tasks).set({
        title: task.title,
        description: task.description,
        status: task.status,
        priority: task.priority,
        dueDate: task.dueDate,
        updatedAt: task.updatedAt,
      }).where(eq(tasks.id, task.id)).returning().get();
      return row ? toTask(row) : null;
    });
  }

  delete(id: TaskId): boolean {
    return this.guard('delete task', () =>
      this.db.delete(tasks).where(eq(tasks.id, id)).run().changes > 0,
    );
  }

  count(filter: TaskFilter = {}): number {
    return this.guard('count tasks', () =>
      this.db.select({ n: count() }).from(tasks).where(whereClause(filter)).get()?.n ?? 0,
    );
  }

  countBy(field: GroupField): Map<string, number> {
    return this.guard('count tasks', () => {
      const rows: Array<{ value: string; n: number }> = field === 'status'
        ? this.db.select({ value: tasks.status, n: count() }).from(tasks).groupBy(tasks.status).all()
        : this.db.select({ value: tasks.priority, n: count() }).from(tasks).groupBy(tasks.priority).all();
      return new Map(rows.map(r => [r.value, r.n]));
    });
  }

  ping(): void {
    this.guard('ping database', () => {
      this.db.get(sql`SELECT 1`);
    });
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err: unknown) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`Failed to ${operation}`, err);
    }
  }
}
