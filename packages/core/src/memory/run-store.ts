// packages/core/src/memory/run-store.ts — Run history: one row per report run plus its cruft scores

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { Report } from '../report/report.js';
import type { RunRecord, ScoreRecord } from '../types/history.js';
import { REPORT_KINDS } from '../types/report.js';
import { DEFAULT_HISTORY_LIMIT } from '../utils/constants.js';
import { DatabaseError } from '../utils/errors.js';

interface RunRow {
  id: string;
  server: string | null;
  kinds: string;
  failures: number;
  started_at: number;
  completed_at: number;
}

interface ScoreRow {
  run_id: string;
  kind: string;
  label: string;
  ratio: number;
  count: number;
  population: number;
}

const kindsSchema = z.array(z.enum(REPORT_KINDS));
const kindSchema = z.enum(REPORT_KINDS);

/** Cruft entries of every report, in report then metadata order. */
export function collectScores(runId: string, reports: readonly Report[]): ScoreRecord[] {
  const scores: ScoreRecord[] = [];
  for (const report of reports) {
    for (const entries of report.metadata.values()) {
      for (const [label, entry] of entries) {
        if (entry.kind !== 'cruft') continue;
        scores.push({
          runId,
          kind: report.kind,
          label,
          ratio: entry.score.ratio,
          count: entry.count,
          population: entry.population,
        });
      }
    }
  }
  return scores;
}

export class RunStore {
  constructor(private db: Database.Database) {}

  record(run: RunRecord, scores: readonly Omit<ScoreRecord, 'runId'>[]): void {
    const insertRun = this.db.prepare(
      `INSERT INTO runs (id, server, kinds, failures, started_at, completed_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );
    const insertScore = this.db.prepare(
      `INSERT INTO run_scores (run_id, kind, label, ratio, count, population)
       VALUES (?, ?, ?, ?, ?, ?)`,
    );
    this.db.transaction(() => {
      insertRun.run(
        run.id,
        run.server,
        JSON.stringify(run.kinds),
        run.failures,
        run.startedAt,
        run.completedAt,
      );
      for (const score of scores) {
        insertScore.run(run.id, score.kind, score.label, score.ratio, score.count, score.population);
      }
    })();
  }

  get(id: string): RunRecord | null {
    const row = this.db.prepare<[string], RunRow>('SELECT * FROM runs WHERE id = ?').get(id);
    return row ? this.rowToRun(row) : null;
  }

  /** Newest first. */
  list(limit = DEFAULT_HISTORY_LIMIT): RunRecord[] {
    const rows = this.db
      .prepare<[number], RunRow>('SELECT * FROM runs ORDER BY started_at DESC, rowid DESC LIMIT ?')
      .all(limit);
    return rows.map((r) => this.rowToRun(r));
  }

  scores(runId: string): ScoreRecord[] {
    const rows = this.db
      .prepare<[string], ScoreRow>(
        'SELECT run_id, kind, label, ratio, count, population FROM run_scores WHERE run_id = ? ORDER BY id ASC',
      )
      .all(runId);
    return rows.map((r) => this.rowToScore(r));
  }

  private rowToRun(row: RunRow): RunRecord {
    const kinds = kindsSchema.safeParse(JSON.parse(row.kinds));
    if (!kinds.success) {
      throw new DatabaseError(`Run ${row.id} has unreadable report kinds`, 'read');
    }
    return {
      id: row.id,
      server: row.server,
      kinds: kinds.data,
      failures: row.failures,
      startedAt: row.started_at,
      completedAt: row.completed_at,
    };
  }

  private rowToScore(row: ScoreRow): ScoreRecord {
    const kind = kindSchema.safeParse(row.kind);
    if (!kind.success) {
      throw new DatabaseError(`Run ${row.run_id} has a score for unknown report "${row.kind}"`, 'read');
    }
    return {
      runId: row.run_id,
      kind: kind.data,
      label: row.label,
      ratio: row.ratio,
      count: row.count,
      population: row.population,
    };
  }
}
