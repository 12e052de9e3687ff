// packages/core/src/analysis/cruft.ts — Cruftiness ratio and severity rank

import type { CruftRank, CruftScore, MetadataEntry } from '../types/report.js';
import { CRUFT_DECILES } from '../utils/constants.js';

type Countable = number | { readonly size: number };

/** One label per decile, then the 100% rank. */
const RANK_LABELS = [
  'Pristine',
  'Tidy',
  'Lived-in',
  'Cluttered',
  'Untidy',
  'Messy',
  'Grimy',
  'Filthy',
  'Squalid',
  'Derelict',
  'Total cruft',
] as const;

function countOf(value: Countable): number {
  return typeof value === 'number' ? value : value.size;
}

/** |subset| / |population|, clamped to [0, 1]; an empty population scores 0. */
export function score(subset: Countable, population: Countable): number {
  const total = countOf(population);
  if (total <= 0) return 0;
  const ratio = countOf(subset) / total;
  return Math.min(1, Math.max(0, ratio));
}

export function cruftRank(ratio: number): CruftRank {
  const index = ratio >= 1 ? CRUFT_DECILES : Math.max(0, Math.floor(ratio * CRUFT_DECILES));
  const range = index === CRUFT_DECILES ? '100%' : `${index * 10}-${index * 10 + 9}%`;
  return { index, range, label: RANK_LABELS[index] };
}

export function cruftScore(subset: Countable, population: Countable): CruftScore {
  const ratio = score(subset, population);
  return { ratio, rank: cruftRank(ratio) };
}

export function cruftEntry(subset: Countable, population: Countable): MetadataEntry {
  return {
    kind: 'cruft',
    score: cruftScore(subset, population),
    count: countOf(subset),
    population: countOf(population),
  };
}

export function formatPercentage(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}
