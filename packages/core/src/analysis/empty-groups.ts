// packages/core/src/analysis/empty-groups.ts

import { isGroupType } from '../catalog/records.js';
import type { GroupObject, ObjectType } from '../types/catalog.js';
import { ContractError } from '../utils/errors.js';
import { IdentitySet } from './identity-set.js';

/**
 * Groups whose cached member count is zero. Independent of scoping: a group can be
 * scoped and empty, or unscoped and populated. Groups without a known count are
 * never flagged.
 */
export function detectEmptyGroups(groups: readonly GroupObject[], type: ObjectType): IdentitySet {
  if (!isGroupType(type)) {
    throw new ContractError(`Empty group detection needs a group type, got "${type}"`, type);
  }
  const mismatched = groups.find(g => g.type !== type);
  if (mismatched) {
    throw new ContractError(
      `Group ${mismatched.identity.id} is a ${mismatched.type}, expected ${type}`,
      mismatched.type,
    );
  }
  return new IdentitySet(groups.filter(g => g.memberCount === 0).map(g => g.identity));
}
