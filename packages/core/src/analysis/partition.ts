// packages/core/src/analysis/partition.ts — Used / unused split of one object type

import type { Result } from '../types/report.js';
import { IdentitySet } from './identity-set.js';

export interface UsagePartition {
  readonly all: IdentitySet;
  readonly used: IdentitySet;
  readonly unused: IdentitySet;
}

export interface UsageHeadings {
  all: string;
  used: string;
  unused: string;
  allDescription: string;
  usedDescription: string;
  unusedDescription: string;
}

/**
 * `used` keeps only references that exist in `all`, so a container pointing at a
 * deleted object changes nothing. `used` and `unused` are disjoint and cover `all`.
 */
export function partition(all: IdentitySet, used: IdentitySet): UsagePartition {
  const usedInCatalog = used.intersect(all);
  return { all, used: usedInCatalog, unused: all.difference(usedInCatalog) };
}

/** Rebuild a partition from previously emitted Used and Unused results. */
export function partitionFromResults(used: Result, unused: Result): UsagePartition {
  const usedSet = new IdentitySet(used.objects);
  const unusedSet = new IdentitySet(unused.objects);
  return { all: usedSet.union(unusedSet), used: usedSet, unused: unusedSet };
}

/** All and Used are verbose-only; Unused is always shown and feeds the removal list. */
export function usageResults(p: UsagePartition, headings: UsageHeadings): [Result, Result, Result] {
  return [
    {
      heading: headings.all,
      description: headings.allDescription,
      includeInNonVerbose: false,
      removable: false,
      objects: p.all.toArray(),
    },
    {
      heading: headings.used,
      description: headings.usedDescription,
      includeInNonVerbose: false,
      removable: false,
      objects: p.used.toArray(),
    },
    {
      heading: headings.unused,
      description: headings.unusedDescription,
      includeInNonVerbose: true,
      removable: true,
      objects: p.unused.toArray(),
    },
  ];
}
