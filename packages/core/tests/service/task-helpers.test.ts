import { describe, it, expect } from 'vitest';
import { titleLength, checkTitle, nextTimestamp, buildTask, applyChanges } from '../../src/service/task-helpers.js';
import type { Task } from '../../src/types/task.js';

const base: Task = {
  id: 1,
  title: 'Write report',
  description: 'Q3 numbers',
  status: 'pending',
  priority: 'medium',
  dueDate: '2026-04-01',
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z',
};

describe('checkTitle', () => {
  it('accepts 1 to 200 characters', () => {
    expect(checkTitle('a')).toBeNull();
    expect(checkTitle('a'.repeat(200))).toBeNull();
  });

  it('measures emoji as single characters', () => {
    expect(titleLength('😀a')).toBe(2);
    expect(checkTitle('😀'.repeat(200))).toBeNull();
    expect(checkTitle('😀'.repeat(201))).toBe('Title must be at most 200 characters');
  });

  it('rejects empty and overlong titles', () => {
    expect(checkTitle('')).toBe('Title must not be empty');
    expect(checkTitle('a'.repeat(201))).toBe('Title must be at most 200 characters');
  });
});

describe('nextTimestamp', () => {
  it('uses the clock when it has moved on', () => {
    expect(nextTimestamp('2026-01-01T00:00:00.000Z', new Date('2026-01-01T00:00:05.000Z')))
      .toBe('2026-01-01T00:00:05.000Z');
  });

  it('steps one millisecond past a clock that has not moved', () => {
    expect(nextTimestamp('2026-01-01T00:00:00.000Z', new Date('2026-01-01T00:00:00.000Z')))
      .toBe('2026-01-01T00:00:00.001Z');
  });

  it('steps past a clock that went backwards', () => {
    expect(nextTimestamp('2026-01-01T00:00:00.000Z', new Date('2025-12-31T23:59:00.000Z')))
      .toBe('2026-01-01T00:00:00.001Z');
  });
});

describe('buildTask', () => {
  it('fills defaults and sets both timestamps', () => {
    expect(buildTask({ title: 'New' }, new Date('2026-02-02T10:00:00.000Z'))).toEqual({
      title: 'New',
      description: null,
      status: 'pending',
      priority: 'medium',
      dueDate: null,
      createdAt: '2026-02-02T10:00:00.000Z',
      updatedAt: '2026-02-02T10:00:00.000Z',
    });
  });
});

describe('applyChanges', () => {
  it('replaces only supplied fields', () => {
    const updated = applyChanges(base, { priority: 'high' }, '2026-01-02T00:00:00.000Z');
    expect(updated).toEqual({ ...base, priority: 'high', updatedAt: '2026-01-02T00:00:00.000Z' });
  });

  it('applies explicit nulls', () => {
    const updated = applyChanges(base, { description: null, dueDate: null }, '2026-01-02T00:00:00.000Z');
    expect(updated.description).toBeNull();
    expect(updated.dueDate).toBeNull();
    expect(updated.title).toBe('Write report');
  });

  it('never touches id or createdAt', () => {
    const updated = applyChanges(base, { title: 'x' }, '2026-01-02T00:00:00.000Z');
    expect(updated.id).toBe(1);
    expect(updated.createdAt).toBe('2026-01-01T00:00:00.000Z');
  });
});
