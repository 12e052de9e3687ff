import { existsSync } from 'node:fs';
import { join } from 'node:path';

import { CONFIG_FILENAME, loadConfig, writeConfig } from '@fleetsweep/core';
import chalk from 'chalk';

interface InitOptions {
  force?: boolean;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const cwd = process.cwd();
  const configPath = join(cwd, CONFIG_FILENAME);

  // Check existing config
  if (existsSync(configPath) && !options.force) {
    console.error(chalk.red('Already initialized. Use --force to overwrite.'));
    process.exit(1);
  }

  // Defaults only on --force, so a broken file can be replaced
  const config = loadConfig({ skipFile: options.force });
  writeConfig(config, cwd);

  console.log(chalk.green(`\nWrote ${CONFIG_FILENAME}`));
  console.log(chalk.gray(`  snapshot:      ${config.catalog.snapshot}`));
  console.log(chalk.gray(`  check-in days: ${String(config.devices.checkInDays)}`));
  console.log(chalk.gray(`  on cycle:      ${config.nesting.onCycle}`));

  console.log(chalk.gray('\nNext: fleetsweep report <snapshot.json>'));
}
