// packages/core/src/analysis/membership.ts — Collect the identities containers reference

import { identityOf, queryPath } from '../catalog/field-tree.js';
import type { FieldPath } from '../catalog/paths.js';
import type { Identity, ManagedObject } from '../types/catalog.js';
import { IdentitySet } from './identity-set.js';

export interface MembershipSource {
  containers: readonly ManagedObject[];
  path: FieldPath;
}

/** Every reference at `path` across `containers`. Nodes without an integer id are skipped. */
export function extractMembers(containers: readonly ManagedObject[], path: FieldPath): IdentitySet {
  const found: Identity[] = [];
  for (const container of containers) {
    for (const node of queryPath(container.fields, path)) {
      const identity = identityOf(node);
      if (identity) found.push(identity);
    }
  }
  return new IdentitySet(found);
}

/**
 * Union of several (containers, path) scans. A reference in a scope list and one in
 * an exclusion list both make the referenced object used.
 */
export function extractFromSources(sources: readonly MembershipSource[]): IdentitySet {
  let used = new IdentitySet();
  for (const { containers, path } of sources) {
    used = used.union(extractMembers(containers, path));
  }
  return used;
}
