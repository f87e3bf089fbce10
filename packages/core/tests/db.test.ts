import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createDb, createTestDb, getRawDb, closeDb, resolveDbPath } from '../src/db.js';

describe('resolveDbPath', () => {
  it('strips the sqlite:// scheme from a relative URL', () => {
    expect(resolveDbPath('sqlite:///./tasks.db')).toBe('./tasks.db');
  });

  it('keeps the leading slash of an absolute URL', () => {
    expect(resolveDbPath('sqlite:////var/lib/tasks.db')).toBe('/var/lib/tasks.db');
  });

  it('maps sqlite://:memory: to :memory:', () => {
    expect(resolveDbPath('sqlite://:memory:')).toBe(':memory:');
  });

  it('passes bare paths through', () => {
    expect(resolveDbPath('/tmp/tasks.db')).toBe('/tmp/tasks.db');
    expect(resolveDbPath(':memory:')).toBe(':memory:');
  });
});

describe('createDb', () => {
  let tmpDir: string | null = null;

  afterEach(() => {
    if (tmpDir) {
      rmSync(tmpDir, { recursive: true, force: true });
      tmpDir = null;
    }
  });

  it('creates an in-memory database', () => {
    const db = createDb(':memory:');
    const raw = getRawDb(db);
    expect(raw.name).toBe(':memory:');
    closeDb(db);
    expect(raw.open).toBe(false);
  });

  it('creates a file-based database and parent directories', () => {
    tmpDir = mkdtempSync(join(tmpdir(), 'taskdeck-db-test-'));
    const dbPath = join(tmpDir, 'nested', 'dir', 'tasks.db');

    const db = createDb(dbPath);
    const raw = getRawDb(db);

    expect(existsSync(dbPath)).toBe(true);
    expect(raw.pragma('journal_mode', { simple: true })).toBe('wal');
    expect(raw.pragma('foreign_keys', { simple: true })).toBe(1);
    closeDb(db);
  });

  it('is safe to close twice', () => {
    const db = createTestDb();
    closeDb(db);
    expect(() => closeDb(db)).not.toThrow();
  });
});

describe('createTestDb', () => {
  it('creates the tasks table and its indexes', () => {
    const raw = getRawDb(createTestDb());

    const tables = raw.prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    ).all();
    expect(tables.map(t => t.name)).toEqual(['tasks']);

    const indexes = raw.prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='index' AND tbl_name='tasks' AND name LIKE 'idx_%' ORDER BY name",
    ).all();
    expect(indexes.map(i => i.name)).toEqual([
      'idx_tasks_created_at',
      'idx_tasks_due_date',
      'idx_tasks_priority',
      'idx_tasks_status',
      'idx_tasks_title',
    ]);
  });

  it('rejects out-of-range enum values at the storage level', () => {
    const raw = getRawDb(createTestDb());
    const insert = raw.prepare(
      "INSERT INTO tasks (title, status, created_at, updated_at) VALUES ('t', ?, '2026-01-01', '2026-01-01')",
    );
    expect(() => insert.run('blocked')).toThrow();
    expect(() => insert.run('pending')).not.toThrow();
  });
});
