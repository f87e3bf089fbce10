import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, type TaskdeckDb } from '../../src/db.js';
import { SqliteTaskRepository } from '../../src/repository/sqlite-task-repository.js';
import { TaskService } from '../../src/service/task-service.js';
import { TaskStatus } from '../../src/types/task-status.js';
import { Priority } from '../../src/types/priority.js';
import type { Task, NewTask } from '../../src/types/task.js';
import { unwrap } from '../../src/errors.js';
import { steppingClock, frozenClock } from '../helpers.js';

let db: TaskdeckDb;
let service: TaskService;

function makeService(clock: () => Date = steppingClock()): TaskService {
  return new TaskService(new SqliteTaskRepository(db), {
    defaultPageSize: 100,
    maxPageSize: 1000,
    clock,
  });
}

function create(title: string, extra: Omit<NewTask, 'title'> = {}): Task {
  return unwrap(service.create({ title, ...extra }));
}

beforeEach(() => {
  db = createTestDb();
  service = makeService();
});

describe('create', () => {
  it('returns the persisted task with generated fields', () => {
    const result = service.create({
      title: 'Test Task',
      description: 'Test Description',
      status: TaskStatus.Pending,
      priority: Priority.High,
    });

    expect(result.type).toBe('success');
    const task = unwrap(result);
    expect(task.id).toBe(1);
    expect(task.title).toBe('Test Task');
    expect(task.description).toBe('Test Description');
    expect(task.status).toBe('pending');
    expect(task.priority).toBe('high');
    expect(task.dueDate).toBeNull();
    expect(task.createdAt).toBe('2026-01-01T09:00:00.000Z');
    expect(task.updatedAt).toBe(task.createdAt);
  });

  it('applies defaults for omitted fields', () => {
    const task = create('Just a title');
    expect(task.status).toBe(TaskStatus.Pending);
    expect(task.priority).toBe(Priority.Medium);
    expect(task.description).toBeNull();
  });

  it('stores a due date', () => {
    const task = create('Pay rent', { dueDate: '2026-02-01' });
    expect(task.dueDate).toBe('2026-02-01');
  });

  it('rejects an empty title', () => {
    const result = service.create({ title: '' });
    expect(result).toEqual({ type: 'validation-error', message: 'Title must not be empty', field: 'title' });
  });

  it('rejects a title over 200 characters', () => {
    const result = service.create({ title: 'x'.repeat(201) });
    expect(result.type).toBe('validation-error');
  });

  it('counts characters rather than UTF-16 units in the title', () => {
    const task = create('😀'.repeat(200));
    expect([...task.title]).toHaveLength(200);
    expect(service.create({ title: '😀'.repeat(201) })).toEqual({
      type: 'validation-error',
      message: 'Title must be at most 200 characters',
      field: 'title',
    });
  });

  it('accepts a title of exactly 200 characters', () => {
    expect(service.create({ title: 'x'.repeat(200) }).type).toBe('success');
  });
});

describe('get', () => {
  it('returns the task', () => {
    const created = create('Find me');
    expect(service.get(created.id)).toEqual({ type: 'success', data: created });
  });

  it('returns not-found with the id', () => {
    expect(service.get(9999)).toEqual({
      type: 'not-found',
      taskId: 9999,
      message: 'Task with id 9999 not found',
    });
  });

  it('returns not-found after deletion', () => {
    const task = create('Short lived');
    service.delete(task.id);
    expect(service.get(task.id).type).toBe('not-found');
  });
});

describe('list', () => {
  it('returns newest first with total', () => {
    create('first');
    create('second');
    create('third');

    const page = unwrap(service.list());
    expect(page.tasks.map(t => t.title)).toEqual(['third', 'second', 'first']);
    expect(page.total).toBe(3);
    expect(page.skip).toBe(0);
    expect(page.limit).toBe(100);
  });

  it('paginates into disjoint, ordered slices with a stable total', () => {
    for (let i = 1; i <= 5; i++) create(`Task ${i}`);

    const first = unwrap(service.list({ skip: 0, limit: 2 }));
    const second = unwrap(service.list({ skip: 2, limit: 2 }));

    expect(first.tasks.map(t => t.title)).toEqual(['Task 5', 'Task 4']);
    expect(second.tasks.map(t => t.title)).toEqual(['Task 3', 'Task 2']);
    expect(first.total).toBe(5);
    expect(second.total).toBe(5);
  });

  it('breaks created_at ties by insertion order', () => {
    service = makeService(frozenClock());
    create('a');
    create('b');
    create('c');

    const page = unwrap(service.list());
    expect(page.tasks.map(t => t.title)).toEqual(['c', 'b', 'a']);
  });

  it('filters by status, counting matches before pagination', () => {
    create('p1');
    create('done', { status: TaskStatus.Completed });
    create('p2');
    create('p3');

    const page = unwrap(service.list({ status: TaskStatus.Pending, limit: 1 }));
    expect(page.tasks.map(t => t.title)).toEqual(['p3']);
    expect(page.total).toBe(3);
  });

  it('ANDs status and priority filters', () => {
    create('a', { priority: Priority.High });
    create('b', { priority: Priority.High, status: TaskStatus.InProgress });
    create('c', { priority: Priority.Low, status: TaskStatus.InProgress });

    const page = unwrap(service.list({ status: TaskStatus.InProgress, priority: Priority.High }));
    expect(page.tasks.map(t => t.title)).toEqual(['b']);
    expect(page.total).toBe(1);
  });

  it('returns an empty page past the end', () => {
    create('only');
    const page = unwrap(service.list({ skip: 10 }));
    expect(page.tasks).toEqual([]);
    expect(page.total).toBe(1);
  });

  it('rejects a negative skip', () => {
    expect(service.list({ skip: -1 })).toEqual({
      type: 'validation-error',
      message: 'skip must be a non-negative integer',
      field: 'skip',
    });
  });

  it('rejects a skip beyond the safe integer range', () => {
    expect(service.list({ skip: 1e20 })).toEqual({
      type: 'validation-error',
      message: 'skip must be a non-negative integer',
      field: 'skip',
    });
  });

  it('rejects a limit outside [1, max]', () => {
    expect(service.list({ limit: 0 }).type).toBe('validation-error');
    expect(service.list({ limit: 1001 }).type).toBe('validation-error');
    expect(service.list({ limit: 1000 }).type).toBe('success');
  });
});

describe('search', () => {
  it('matches title substrings case-insensitively', () => {
    create('Important Meeting');
    create('Buy groceries');

    const page = unwrap(service.search({ query: 'meeting' }));
    expect(page.tasks.map(t => t.title)).toEqual(['Important Meeting']);
    expect(page.total).toBe(1);
  });

  it('matches descriptions too', () => {
    create('Errands', { description: 'pick up the DRY cleaning' });
    create('Other', { description: null });

    const page = unwrap(service.search({ query: 'dry clean' }));
    expect(page.tasks.map(t => t.title)).toEqual(['Errands']);
  });

  it('treats LIKE wildcards literally', () => {
    create('Discount 50% off');
    create('Order 500 items');
    create('snake_case name');
    create('snakeXcase name');

    expect(unwrap(service.search({ query: '50%' })).tasks.map(t => t.title)).toEqual(['Discount 50% off']);
    expect(unwrap(service.search({ query: 'snake_case' })).tasks.map(t => t.title)).toEqual(['snake_case name']);
  });

  it('paginates with the total of all matches', () => {
    create('report one');
    create('report two');
    create('report three');
    create('unrelated');

    const page = unwrap(service.search({ query: 'report', skip: 1, limit: 1 }));
    expect(page.tasks.map(t => t.title)).toEqual(['report two']);
    expect(page.total).toBe(3);
  });

  it('rejects an empty query', () => {
    expect(service.search({ query: '' })).toEqual({
      type: 'validation-error',
      message: 'Search query must not be empty',
      field: 'q',
    });
  });
});

describe('update', () => {
  it('changes only the supplied fields and bumps updatedAt', () => {
    const task = create('Original', {
      description: 'keep me',
      priority: Priority.High,
      dueDate: '2026-03-01',
    });

    const updated = unwrap(service.update(task.id, { status: TaskStatus.Completed }));

    expect(updated.status).toBe(TaskStatus.Completed);
    expect(updated.title).toBe('Original');
    expect(updated.description).toBe('keep me');
    expect(updated.priority).toBe(Priority.High);
    expect(updated.dueDate).toBe('2026-03-01');
    expect(updated.createdAt).toBe(task.createdAt);
    expect(updated.updatedAt > task.updatedAt).toBe(true);
  });

  it('applies an explicit null description', () => {
    const task = create('With notes', { description: 'notes' });
    const updated = unwrap(service.update(task.id, { description: null }));
    expect(updated.description).toBeNull();
  });

  it('leaves a field alone when it is undefined', () => {
    const task = create('With notes', { description: 'notes' });
    const updated = unwrap(service.update(task.id, { title: 'Renamed', description: undefined }));
    expect(updated.title).toBe('Renamed');
    expect(updated.description).toBe('notes');
  });

  it('persists the change', () => {
    const task = create('Before');
    service.update(task.id, { title: 'After' });
    expect(unwrap(service.get(task.id)).title).toBe('After');
  });

  it('strictly increases updatedAt even when the clock stands still', () => {
    service = makeService(frozenClock('2026-01-01T09:00:00.000Z'));
    const task = create('Frozen');

    const once = unwrap(service.update(task.id, { title: 'Once' }));
    const twice = unwrap(service.update(task.id, { title: 'Twice' }));

    expect(once.updatedAt).toBe('2026-01-01T09:00:00.001Z');
    expect(twice.updatedAt).toBe('2026-01-01T09:00:00.002Z');
  });

  it('allows any status transition', () => {
    const task = create('Flip-flop', { status: TaskStatus.Completed });
    expect(unwrap(service.update(task.id, { status: TaskStatus.Pending })).status).toBe(TaskStatus.Pending);
  });

  it('returns not-found for a missing task', () => {
    expect(service.update(9999, { title: 'x' }).type).toBe('not-found');
  });

  it('rejects an empty title', () => {
    const task = create('Valid');
    expect(service.update(task.id, { title: '' }).type).toBe('validation-error');
    expect(unwrap(service.get(task.id)).title).toBe('Valid');
  });
});

describe('updateStatus / updatePriority', () => {
  it('sets only the status', () => {
    const task = create('Status only', { priority: Priority.Low });
    const updated = unwrap(service.updateStatus(task.id, TaskStatus.InProgress));
    expect(updated.status).toBe(TaskStatus.InProgress);
    expect(updated.priority).toBe(Priority.Low);
    expect(updated.updatedAt > task.updatedAt).toBe(true);
  });

  it('sets only the priority', () => {
    const task = create('Priority only', { status: TaskStatus.InProgress });
    const updated = unwrap(service.updatePriority(task.id, Priority.High));
    expect(updated.priority).toBe(Priority.High);
    expect(updated.status).toBe(TaskStatus.InProgress);
  });

  it('returns not-found for a missing task', () => {
    expect(service.updateStatus(9999, TaskStatus.Completed).type).toBe('not-found');
    expect(service.updatePriority(9999, Priority.Low).type).toBe('not-found');
  });
});

describe('delete', () => {
  it('removes the task permanently', () => {
    const task = create('Delete me');
    expect(service.delete(task.id)).toEqual({ type: 'success', data: undefined });
    expect(unwrap(service.list()).total).toBe(0);
  });

  it('is not idempotent', () => {
    const task = create('Twice');
    expect(service.delete(task.id).type).toBe('success');
    expect(service.delete(task.id)).toEqual({
      type: 'not-found',
      taskId: task.id,
      message: `Task with id ${task.id} not found`,
    });
  });

  it('returns not-found for a missing task', () => {
    expect(service.delete(9999).type).toBe('not-found');
  });

  it('never reuses the id of a deleted task', () => {
    const first = create('first');
    service.delete(first.id);
    const second = create('second');
    expect(second.id).toBe(first.id + 1);
  });
});

describe('statistics', () => {
  it('is all zeros on an empty store', () => {
    expect(unwrap(service.statistics())).toEqual({
      totalTasks: 0,
      byStatus: { pending: 0, in_progress: 0, completed: 0 },
      byPriority: { high: 0, medium: 0, low: 0 },
    });
  });

  it('counts by status and priority', () => {
    create('a', { status: TaskStatus.Pending, priority: Priority.High });
    create('b', { status: TaskStatus.InProgress, priority: Priority.High });
    create('c', { status: TaskStatus.Completed, priority: Priority.Low });
    create('d');

    const stats = unwrap(service.statistics());
    expect(stats).toEqual({
      totalTasks: 4,
      byStatus: { pending: 2, in_progress: 1, completed: 1 },
      byPriority: { high: 2, medium: 1, low: 1 },
    });
  });

  it('has groups that sum to the total', () => {
    create('a', { status: TaskStatus.Completed });
    create('b', { priority: Priority.Low });
    create('c', { status: TaskStatus.InProgress, priority: Priority.High });

    const stats = unwrap(service.statistics());
    const sum = (r: Record<string, number>) => Object.values(r).reduce((a, b) => a + b, 0);
    expect(sum(stats.byStatus)).toBe(stats.totalTasks);
    expect(sum(stats.byPriority)).toBe(stats.totalTasks);
  });
});
