// packages/core/src/engine/runner.ts — Build the requested reports, isolating aborted ones

import { resolveCheckInDays } from '../analysis/devices.js';
import { REPORT_BUILDERS } from '../report/builders.js';
import { REPORT_TYPES } from '../report/definitions.js';
import type { Report } from '../report/report.js';
import type { CatalogAccessor } from '../types/catalog.js';
import type { ReportFailure, ReportKind, RunOptions } from '../types/report.js';
import {
  DEFAULT_COMPUTER_GROUPS,
  DEFAULT_MOBILE_DEVICE_GROUPS,
} from '../utils/constants.js';
import { ReportAbortError } from '../utils/errors.js';
import { generateRunId } from '../utils/id.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { EventBus } from './event-bus.js';

export interface RunReportsOptions {
  runId?: string;
  /** Resolved leniently: missing or not a whole number of days means the default */
  checkInDays?: number | string;
  now?: Date;
  defaultGroups?: Partial<RunOptions['defaultGroups']>;
  onCycle?: RunOptions['onCycle'];
  logger?: Logger;
  bus?: EventBus;
}

export interface RunOutcome {
  runId: string;
  /** Requested kinds, de-duplicated, in the order they ran */
  kinds: ReportKind[];
  reports: Report[];
  failures: ReportFailure[];
  startedAt: Date;
  completedAt: Date;
}

export function resolveRunOptions(options: RunReportsOptions = {}): RunOptions {
  return {
    checkInDays: resolveCheckInDays(options.checkInDays, options.logger ?? silentLogger),
    now: options.now ?? new Date(),
    defaultGroups: {
      computer: options.defaultGroups?.computer ?? [...DEFAULT_COMPUTER_GROUPS],
      mobileDevice: options.defaultGroups?.mobileDevice ?? [...DEFAULT_MOBILE_DEVICE_GROUPS],
    },
    onCycle: options.onCycle ?? 'warn',
  };
}

/**
 * Build each requested report in order. A report that aborts on a contract
 * violation or a nesting cycle is recorded as a failure and the run moves on;
 * any other error propagates.
 */
export function runReports(
  catalog: CatalogAccessor,
  kinds: readonly ReportKind[],
  options: RunReportsOptions = {},
): RunOutcome {
  const runId = options.runId ?? generateRunId();
  const logger = options.logger ?? silentLogger;
  const bus = options.bus;
  const runOptions = resolveRunOptions(options);
  const requested = [...new Set(kinds)];
  const startedAt = new Date();

  bus?.emitEvent({ type: 'run.started', runId, kinds: requested, timestamp: startedAt.toISOString() });

  const reports: Report[] = [];
  const failures: ReportFailure[] = [];
  for (const kind of requested) {
    const started = Date.now();
    bus?.emitEvent({ type: 'report.started', runId, kind, timestamp: new Date().toISOString() });
    logger.debug(`Building ${kind} report`);

    try {
      const report = REPORT_BUILDERS[kind]({ catalog, options: runOptions, logger });
      reports.push(report);
      bus?.emitEvent({
        type: 'report.completed',
        runId,
        kind,
        resultCount: report.results.length,
        durationMs: Date.now() - started,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      if (!(error instanceof ReportAbortError)) throw error;
      logger.error(`${kind} report aborted: ${error.message}`);
      failures.push({ kind, type: REPORT_TYPES[kind], error });
      bus?.emitEvent({
        type: 'report.failed',
        runId,
        kind,
        error: error.message,
        timestamp: new Date().toISOString(),
      });
    }
  }

  const completedAt = new Date();
  bus?.emitEvent({
    type: 'run.completed',
    runId,
    reportCount: reports.length,
    failureCount: failures.length,
    durationMs: completedAt.getTime() - startedAt.getTime(),
    timestamp: completedAt.toISOString(),
  });

  return { runId, kinds: requested, reports, failures, startedAt, completedAt };
}
