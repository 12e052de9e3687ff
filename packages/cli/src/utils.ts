// packages/cli/src/utils.ts

import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

/** Resolve the run history database path and make sure its directory exists. */
export function getDbPath(dbPath: string, projectDir?: string): string {
  const base = projectDir ?? process.cwd();
  const fullPath = resolve(base, dbPath);
  mkdirSync(dirname(fullPath), { recursive: true });
  return fullPath;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
