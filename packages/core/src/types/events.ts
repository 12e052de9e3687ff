// packages/core/src/types/events.ts

/**
 * Events emitted while a report run progresses.
 * Consumed by the CLI renderer; type names are dot-separated.
 */

import type { ReportKind } from './report.js';

export interface RunStartedEvent {
  type: 'run.started';
  runId: string;
  kinds: ReportKind[];
  timestamp: string;
}

export interface ReportStartedEvent {
  type: 'report.started';
  runId: string;
  kind: ReportKind;
  timestamp: string;
}

export interface ReportCompletedEvent {
  type: 'report.completed';
  runId: string;
  kind: ReportKind;
  resultCount: number;
  durationMs: number;
  timestamp: string;
}

export interface ReportFailedEvent {
  type: 'report.failed';
  runId: string;
  kind: ReportKind;
  error: string;
  timestamp: string;
}

export interface RunCompletedEvent {
  type: 'run.completed';
  runId: string;
  reportCount: number;
  failureCount: number;
  durationMs: number;
  timestamp: string;
}

export type RunEvent =
  | RunStartedEvent
  | ReportStartedEvent
  | ReportCompletedEvent
  | ReportFailedEvent
  | RunCompletedEvent;
