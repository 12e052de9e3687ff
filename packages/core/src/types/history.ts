// packages/core/src/types/history.ts

import type { ReportKind } from './report.js';

export interface RunRecord {
  id: string;
  server: string | null;
  kinds: ReportKind[];
  failures: number;
  startedAt: number;
  completedAt: number;
}

export interface ScoreRecord {
  runId: string;
  kind: ReportKind;
  label: string;
  ratio: number;
  count: number;
  population: number;
}
