// packages/core/src/config/loader.ts

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ProjectConfig } from '../types/config.js';
import { CONFIG_FILENAME, STATE_DIR } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

/** One level of partial overrides per config section, as the CLI builds them. */
export type ConfigOverrides = {
  [K in keyof ProjectConfig]?: Partial<ProjectConfig[K]>;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged; undefined source values are skipped.
 */
function deepMerge(target: object, source: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  const entries: Array<[string, unknown]> = Object.entries(source);
  for (const [key, srcVal] of entries) {
    if (srcVal === undefined) continue;
    const tgtVal = result[key];
    result[key] = isPlainObject(srcVal) && isPlainObject(tgtVal) ? deepMerge(tgtVal, srcVal) : srcVal;
  }
  return result;
}

/**
 * Load config with precedence: overrides > .fleetsweep.yml > defaults.
 *
 * 1. Start with hardcoded defaults
 * 2. Merge .fleetsweep.yml from projectDir on top
 * 3. Merge programmatic overrides on top
 * 4. Validate the final result
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: ConfigOverrides;
  skipFile?: boolean;
}): ProjectConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged = deepMerge({}, structuredClone(DEFAULT_CONFIG));

  // Layer 2: Project file (.fleetsweep.yml)
  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${CONFIG_FILENAME}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    } else if (fileConfig !== null && fileConfig !== undefined) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`);
    }
  }

  // Layer 3: Programmatic overrides
  if (options?.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged);
}

/**
 * Write a ProjectConfig to .fleetsweep.yml in the given directory.
 * Also creates the .fleetsweep/db/ directory and ignores .fleetsweep/ in git.
 */
export function writeConfig(config: ProjectConfig, dir: string): void {
  const configPath = join(dir, CONFIG_FILENAME);
  const yamlContent = stringifyYaml(config, { lineWidth: 100 });
  writeFileSync(configPath, yamlContent, 'utf-8');

  mkdirSync(join(dir, STATE_DIR, 'db'), { recursive: true });

  const gitignorePath = join(dir, '.gitignore');
  if (existsSync(gitignorePath)) {
    const content = readFileSync(gitignorePath, 'utf-8');
    if (!content.includes(`${STATE_DIR}/`)) {
      appendFileSync(gitignorePath, `\n${STATE_DIR}/\n`);
    }
  } else {
    writeFileSync(gitignorePath, `${STATE_DIR}/\n`, 'utf-8');
  }
}

export { deepMerge };
