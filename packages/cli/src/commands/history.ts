// packages/cli/src/commands/history.ts — Recent report runs and their cruft scores

import { RunStore, loadConfig, openDatabase } from '@fleetsweep/core';
import chalk from 'chalk';

import { formatRunHistory } from '../render.js';
import { errorMessage, getDbPath } from '../utils.js';

interface HistoryOptions {
  limit: number;
}

export async function historyCommand(options: HistoryOptions): Promise<void> {
  try {
    const config = loadConfig();
    const db = openDatabase(getDbPath(config.history.dbPath));
    try {
      const store = new RunStore(db);
      for (const line of formatRunHistory(store.list(options.limit), id => store.scores(id))) {
        console.log(line);
      }
    } finally {
      db.close();
    }
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exit(1);
  }
}
