import { Command, InvalidArgumentError } from 'commander';

import { DEFAULT_HISTORY_LIMIT, VERSION } from '@fleetsweep/core';

import { historyCommand } from './commands/history.js';
import { initCommand } from './commands/init.js';
import { removalsCommand } from './commands/removals.js';
import { reportCommand } from './commands/report.js';

function positiveInt(label: string): (v: string) => number {
  return (v: string) => {
    if (!/^\d+$/.test(v)) throw new InvalidArgumentError(`${label} must be a positive integer`);
    const n = Number.parseInt(v, 10);
    if (n <= 0) throw new InvalidArgumentError(`${label} must be a positive integer`);
    return n;
  };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('fleetsweep')
    .description('Find unused packages, scripts, groups, profiles and stale devices in a device management catalog')
    .version(VERSION);

  program
    .command('init')
    .description('Write a default .fleetsweep.yml in the current directory')
    .option('--force', 'Overwrite existing .fleetsweep.yml')
    .action(initCommand);

  // ── Reports ──

  program
    .command('report')
    .description('Report unused and out-of-date objects in a catalog snapshot')
    .argument('[snapshot]', 'Catalog snapshot (.json, .yml or .yaml); defaults to catalog.snapshot from config')
    .option('-a, --all', 'Run every report (default when no report is selected)')
    .option('-c, --computers', 'Out-of-date and orphaned computers')
    .option('-d, --mobile-devices', 'Out-of-date and orphaned mobile devices')
    .option('-g, --computer-groups', 'Unused and empty computer groups')
    .option('-r, --mobile-device-groups', 'Unused and empty mobile device groups')
    .option('-p, --packages', 'Unused packages')
    .option('-s, --scripts', 'Unused scripts')
    .option('-t, --printers', 'Unused printers')
    .option('-f, --computer-profiles', 'Unscoped computer configuration profiles')
    .option('-m, --mobile-device-profiles', 'Unscoped mobile device configuration profiles')
    .option('-l, --policies', 'Unscoped and disabled policies')
    .option('-b, --mac-apps', 'Unscoped Mac apps')
    .option('-i, --mobile-apps', 'Unscoped mobile device apps')
    .option('-v, --verbose', 'Include All and Used results, descriptions and debug logging')
    .option('-o, --ofile <path>', 'Write a report document (.yml, .yaml or .json) with a removal list')
    .option('--check-in-days <days>', 'Days without check-in before a device is out of date')
    .option('--no-history', 'Do not record this run in the history database')
    .action(reportCommand);

  program
    .command('removals')
    .description('Check a removal list from a report document against the catalog')
    .argument('<file>', 'Edited report document')
    .option('--snapshot <path>', 'Catalog snapshot to check against')
    .action(removalsCommand);

  // ── History ──

  program
    .command('history')
    .description('List recent report runs and their cruft scores')
    .option('--limit <n>', 'Number of runs to show', positiveInt('Limit'), DEFAULT_HISTORY_LIMIT)
    .action(historyCommand);

  return program;
}
