// packages/cli/src/commands/removals.ts — Check an edited removal list against the catalog

import { loadCatalogSnapshot, loadConfig, loadRemovals, planRemovals } from '@fleetsweep/core';
import chalk from 'chalk';

import { formatRemovalPlan } from '../render.js';
import { errorMessage } from '../utils.js';

interface RemovalsOptions {
  snapshot?: string;
}

export async function removalsCommand(file: string, options: RemovalsOptions): Promise<void> {
  try {
    const config = loadConfig();
    const requests = loadRemovals(file);
    if (requests.length === 0) {
      console.log(chalk.gray(`No removals listed in ${file}.`));
      return;
    }

    const catalog = loadCatalogSnapshot(options.snapshot ?? config.catalog.snapshot);
    const plan = planRemovals(requests, catalog);
    for (const line of formatRemovalPlan(plan)) {
      console.log(line);
    }
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  }
}
