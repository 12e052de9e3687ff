// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export type CycleMode = 'warn' | 'fail';

export interface ServerConfig {
  /** Label used when the snapshot does not name its server */
  name: string;
}

export interface CatalogConfig {
  /** Snapshot path used when the command line names none */
  snapshot: string;
}

export interface DevicesConfig {
  /** Days without check-in before a device is out of date; resolved leniently */
  checkInDays?: number | string;
  defaultGroups: {
    computer: string[];
    mobileDevice: string[];
  };
}

export interface NestingConfig {
  onCycle: CycleMode;
}

export interface OutputConfig {
  verbose: boolean;
}

export interface HistoryConfig {
  enabled: boolean;
  dbPath: string;
}

export interface AdvancedConfig {
  logLevel: LogLevel;
}

export interface ProjectConfig {
  server: ServerConfig;
  catalog: CatalogConfig;
  devices: DevicesConfig;
  nesting: NestingConfig;
  output: OutputConfig;
  history: HistoryConfig;
  advanced: AdvancedConfig;
}
