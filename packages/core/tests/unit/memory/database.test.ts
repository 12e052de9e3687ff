import { describe, expect, it } from 'vitest';
import { getSchemaVersion, openDatabase, runMigrations } from '../../../src/memory/database.js';
import { DatabaseError } from '../../../src/utils/errors.js';

function tableNames(db: ReturnType<typeof openDatabase>): string[] {
  return db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
    .all()
    .map((t) => t.name);
}

describe('openDatabase', () => {
  it('creates the history tables in a :memory: database', () => {
    const db = openDatabase(':memory:');
    const names = tableNames(db);
    expect(names).toContain('runs');
    expect(names).toContain('run_scores');
    expect(names).toContain('schema_meta');
    db.close();
  });

  it('records the schema version', () => {
    const db = openDatabase(':memory:');
    expect(getSchemaVersion(db)).toBe('1');
    db.close();
  });

  it('enables foreign keys', () => {
    const db = openDatabase(':memory:');
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    expect(() =>
      db
        .prepare(
          "INSERT INTO run_scores (run_id, kind, label, ratio, count, population) VALUES ('nope', 'packages', 'x', 0, 0, 0)",
        )
        .run(),
    ).toThrow();
    db.close();
  });

  it('rejects ratios outside 0..1', () => {
    const db = openDatabase(':memory:');
    db.prepare(
      "INSERT INTO runs (id, server, kinds, failures, started_at, completed_at) VALUES ('run_1', NULL, '[]', 0, 1, 2)",
    ).run();
    expect(() =>
      db
        .prepare(
          "INSERT INTO run_scores (run_id, kind, label, ratio, count, population) VALUES ('run_1', 'packages', 'x', 1.5, 3, 2)",
        )
        .run(),
    ).toThrow();
    db.close();
  });

  it('wraps open failures in DatabaseError', () => {
    expect(() => openDatabase('/nonexistent-dir/for/sure/history.db')).toThrow(DatabaseError);
  });
});

describe('runMigrations', () => {
  it('is idempotent', () => {
    const db = openDatabase(':memory:');
    runMigrations(db);
    runMigrations(db);
    expect(tableNames(db).filter((n) => n === 'runs')).toHaveLength(1);
    expect(getSchemaVersion(db)).toBe('1');
    db.close();
  });
});
