// packages/cli/src/commands/report.ts — Build cruft reports from a catalog snapshot

import type { ReportKind } from '@fleetsweep/core';
import {
  EventBus,
  REPORT_KINDS,
  RunStore,
  VERSION,
  buildReportDocument,
  collectScores,
  createLogger,
  loadCatalogSnapshot,
  loadConfig,
  openDatabase,
  runReports,
  writeReportDocument,
} from '@fleetsweep/core';
import chalk from 'chalk';

import { createProgressRenderer, formatReport } from '../render.js';
import { errorMessage, getDbPath } from '../utils.js';

export interface ReportFlags {
  all?: boolean;
  computers?: boolean;
  mobileDevices?: boolean;
  computerGroups?: boolean;
  mobileDeviceGroups?: boolean;
  packages?: boolean;
  scripts?: boolean;
  printers?: boolean;
  computerProfiles?: boolean;
  mobileDeviceProfiles?: boolean;
  policies?: boolean;
  macApps?: boolean;
  mobileApps?: boolean;
}

export interface ReportOptions extends ReportFlags {
  verbose?: boolean;
  ofile?: string;
  checkInDays?: string;
  history: boolean;
}

const FLAG_KINDS: Record<ReportKind, keyof ReportFlags> = {
  computers: 'computers',
  'mobile-devices': 'mobileDevices',
  'computer-groups': 'computerGroups',
  'mobile-device-groups': 'mobileDeviceGroups',
  packages: 'packages',
  scripts: 'scripts',
  printers: 'printers',
  'computer-profiles': 'computerProfiles',
  'mobile-device-profiles': 'mobileDeviceProfiles',
  policies: 'policies',
  'mac-apps': 'macApps',
  'mobile-apps': 'mobileApps',
};

/** Requested kinds in canonical order; every kind when none (or --all) is given. */
export function selectReportKinds(flags: ReportFlags): ReportKind[] {
  const selected = REPORT_KINDS.filter(kind => flags[FLAG_KINDS[kind]] === true);
  return flags.all || selected.length === 0 ? [...REPORT_KINDS] : selected;
}

export async function reportCommand(snapshot: string | undefined, options: ReportOptions): Promise<void> {
  try {
    const config = loadConfig({
      overrides: {
        output: { verbose: options.verbose || undefined },
        devices: { checkInDays: options.checkInDays },
        history: { enabled: options.history === false ? false : undefined },
      },
    });
    const verbose = config.output.verbose;
    const logger = createLogger(verbose ? 'debug' : config.advanced.logLevel);

    const snapshotPath = snapshot ?? config.catalog.snapshot;
    logger.debug(`Loading catalog snapshot ${snapshotPath}`);
    const catalog = loadCatalogSnapshot(snapshotPath);

    const bus = new EventBus();
    bus.on('event', createProgressRenderer());

    const outcome = runReports(catalog, selectReportKinds(options), {
      checkInDays: config.devices.checkInDays,
      defaultGroups: config.devices.defaultGroups,
      onCycle: config.nesting.onCycle,
      logger,
      bus,
    });

    for (const report of outcome.reports) {
      console.log(formatReport(report, { verbose }));
    }
    for (const failure of outcome.failures) {
      console.error(chalk.red(`${failure.kind} report aborted: ${failure.error.message}`));
    }

    const server = catalog.server ?? (config.server.name || null);
    if (options.ofile) {
      const document = buildReportDocument(outcome.reports, {
        runId: outcome.runId,
        server,
        generated: outcome.completedAt,
        version: VERSION,
      });
      writeReportDocument(options.ofile, document);
      console.error(chalk.green(`Report document written to ${options.ofile}`));
    }

    if (config.history.enabled) {
      const db = openDatabase(getDbPath(config.history.dbPath));
      try {
        new RunStore(db).record(
          {
            id: outcome.runId,
            server,
            kinds: outcome.kinds,
            failures: outcome.failures.length,
            startedAt: outcome.startedAt.getTime(),
            completedAt: outcome.completedAt.getTime(),
          },
          collectScores(outcome.runId, outcome.reports),
        );
      } finally {
        db.close();
      }
    }

    if (outcome.failures.length > 0) {
      process.exit(1);
    }
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  }
}
