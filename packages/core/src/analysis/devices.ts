// packages/core/src/analysis/devices.ts — Device staleness, orphan and spread analysis

import { isBefore, isValid, parse, parseISO, subDays } from 'date-fns';
import type { DeviceRecord } from '../types/catalog.js';
import { DEFAULT_CHECK_IN_DAYS, UNKNOWN_BUCKET } from '../utils/constants.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import {
  buildHistogram,
  compareModelIdentifiers,
  compareVersions,
  normalizeVersion,
} from './histogram.js';
import type { Histogram } from './histogram.js';
import { IdentitySet } from './identity-set.js';

/** Computer last contact, then mobile device last inventory update */
const CHECK_IN_FORMATS = ['yyyy-MM-dd HH:mm:ss', "EEEE, MMMM d yyyy 'at' h:mm a"];

export interface DeviceAnalysisOptions {
  checkInDays: number;
  now: Date;
  /** Catch-all groups every device belongs to; ignored when judging orphans */
  defaultGroups: readonly string[];
}

export interface DeviceAnalysis {
  all: IdentitySet;
  outOfDate: IdentitySet;
  orphaned: IdentitySet;
  versions: Histogram;
  models: Histogram;
}

/** Parse a check-in timestamp; undefined when absent or in no known format. */
export function parseCheckIn(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const reference = new Date(0);
  for (const format of CHECK_IN_FORMATS) {
    const parsed = parse(value, format, reference);
    if (isValid(parsed)) return parsed;
  }
  const iso = parseISO(value);
  return isValid(iso) ? iso : undefined;
}

/** A device with no parseable check-in counts as out of date. */
export function isOutOfDate(device: DeviceRecord, cutoff: Date): boolean {
  const checkIn = parseCheckIn(device.lastCheckIn);
  return checkIn === undefined || isBefore(checkIn, cutoff);
}

export function isOrphaned(device: DeviceRecord, defaultGroups: ReadonlySet<string>): boolean {
  return device.groups.every(group => defaultGroups.has(group));
}

/**
 * Turn a configured or typed-in threshold into a day count. Anything missing or
 * non-numeric falls back to the default.
 */
export function resolveCheckInDays(raw: unknown, logger: Logger = silentLogger): number {
  if (raw === undefined || raw === null || raw === '') {
    logger.debug(`No check-in threshold given; using ${DEFAULT_CHECK_IN_DAYS} days`);
    return DEFAULT_CHECK_IN_DAYS;
  }
  if (typeof raw === 'number' && Number.isInteger(raw) && raw >= 0) return raw;
  if (typeof raw === 'string' && /^\d+$/.test(raw.trim())) return Number.parseInt(raw.trim(), 10);

  logger.info(`Check-in threshold "${String(raw)}" is not a whole number of days; using ${DEFAULT_CHECK_IN_DAYS}`);
  return DEFAULT_CHECK_IN_DAYS;
}

export function analyzeDevices(devices: readonly DeviceRecord[], options: DeviceAnalysisOptions): DeviceAnalysis {
  const cutoff = subDays(options.now, options.checkInDays);
  const defaultGroups = new Set(options.defaultGroups);

  return {
    all: new IdentitySet(devices.map(d => d.identity)),
    outOfDate: new IdentitySet(devices.filter(d => isOutOfDate(d, cutoff)).map(d => d.identity)),
    orphaned: new IdentitySet(devices.filter(d => isOrphaned(d, defaultGroups)).map(d => d.identity)),
    versions: buildHistogram(
      devices.map(d => normalizeVersion(d.osVersion)),
      compareVersions,
    ),
    models: buildHistogram(
      devices.map(d => d.modelIdentifier ?? UNKNOWN_BUCKET),
      compareModelIdentifiers,
    ),
  };
}
