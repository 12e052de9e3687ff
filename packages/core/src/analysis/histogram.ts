// packages/core/src/analysis/histogram.ts — Version and model spread

import { UNKNOWN_BUCKET } from '../utils/constants.js';

/** Ordered [key, count] pairs. */
export type Histogram = Array<[string, number]>;

export interface ModelIdentifier {
  name: string;
  major: number;
  minor: number;
}

const MODEL_PATTERN = /^(.*?)(\d+),(\d+)$/;

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Pad a version to at least major.minor.patch so "10.2" and "10.2.0" count as
 * one bucket. Missing versions become the Unknown bucket.
 */
export function normalizeVersion(version: string | undefined): string {
  const trimmed = version?.trim();
  if (!trimmed) return UNKNOWN_BUCKET;
  const parts = trimmed.split('.');
  while (parts.length < 3) parts.push('0');
  return parts.join('.');
}

/** Component-wise, numerically where both components are numbers. Unknown sorts last. */
export function compareVersions(a: string, b: string): number {
  if (a === b) return 0;
  if (a === UNKNOWN_BUCKET) return 1;
  if (b === UNKNOWN_BUCKET) return -1;

  const left = a.split('.');
  const right = b.split('.');
  for (let i = 0; i < Math.min(left.length, right.length); i++) {
    const l = left[i];
    const r = right[i];
    if (l === r) continue;
    if (/^\d+$/.test(l) && /^\d+$/.test(r)) {
      return Number.parseInt(l, 10) - Number.parseInt(r, 10);
    }
    return compareStrings(l, r);
  }
  return left.length - right.length;
}

/** "iMac13,3" → { name: "iMac", major: 13, minor: 3 } */
export function parseModelIdentifier(model: string): ModelIdentifier | undefined {
  const match = MODEL_PATTERN.exec(model.trim());
  if (!match || match[1] === '') return undefined;
  return {
    name: match[1],
    major: Number.parseInt(match[2], 10),
    minor: Number.parseInt(match[3], 10),
  };
}

/**
 * Name first, then major and minor numerically, so iMac9,1 < iMac13,2 < iMac13,10.
 * Identifiers that do not parse follow the ones that do, in string order, with
 * Unknown last.
 */
export function compareModelIdentifiers(a: string, b: string): number {
  if (a === b) return 0;
  if (a === UNKNOWN_BUCKET) return 1;
  if (b === UNKNOWN_BUCKET) return -1;

  const left = parseModelIdentifier(a);
  const right = parseModelIdentifier(b);
  if (left && right) {
    return (
      compareStrings(left.name, right.name) ||
      left.major - right.major ||
      left.minor - right.minor ||
      compareStrings(a, b)
    );
  }
  if (left) return -1;
  if (right) return 1;
  return compareStrings(a, b);
}

export function buildHistogram(values: Iterable<string>, compare: (a: string, b: string) => number): Histogram {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts.entries()].sort(([a], [b]) => compare(a, b));
}
