// packages/core/src/analysis/nesting.ts — Smart group nesting closure and cycle detection

import type { GroupObject, GroupType, Identity } from '../types/catalog.js';
import { IdentitySet } from './identity-set.js';
import { partition } from './partition.js';
import type { UsagePartition } from './partition.js';

/** Criterion name that refers to another group, per group type */
const NESTING_CRITERIA: Record<GroupType, string> = {
  'computer-group': 'Computer Group',
  'mobile-device-group': 'Mobile Device Group',
};

const MEMBER_OF = 'member of';

export interface NestingResolution {
  partition: UsagePartition;
  /** Groups that moved from unused to used */
  nested: IdentitySet;
  /** Each entry is one set of groups that nest each other, ordered by id */
  cycles: Identity[][];
}

function indexByName(groups: readonly GroupObject[]): Map<string, GroupObject[]> {
  const byName = new Map<string, GroupObject[]>();
  for (const group of groups) {
    const list = byName.get(group.identity.name) ?? [];
    list.push(group);
    byName.set(group.identity.name, list);
  }
  return byName;
}

/** Groups named by a smart group's "member of" criteria. Static groups nest nothing. */
export function nestedReferences(group: GroupObject, byName: Map<string, GroupObject[]>): GroupObject[] {
  const targets: GroupObject[] = [];
  if (!group.smart) return targets;
  for (const criterion of group.criteria) {
    if (criterion.name !== NESTING_CRITERIA[group.type]) continue;
    if (criterion.searchType.toLowerCase() !== MEMBER_OF) continue;
    if (criterion.value === '') continue;
    for (const target of byName.get(criterion.value) ?? []) {
      if (target.type === group.type) targets.push(target);
    }
  }
  return targets;
}

/**
 * Reclassify every group reachable from a used group through "member of" criteria
 * as used. Breadth-first over a worklist with a visited set, so cyclic nesting
 * terminates. Returns a new partition; the input is left untouched.
 */
export function resolveNestedGroups(
  current: UsagePartition,
  groups: readonly GroupObject[],
): NestingResolution {
  const byName = indexByName(groups);
  const byId = new Map<number, GroupObject>();
  for (const group of groups) {
    if (!byId.has(group.identity.id)) byId.set(group.identity.id, group);
  }

  const visited = new Set<number>();
  const queue: GroupObject[] = [];
  for (const identity of current.used) {
    const group = byId.get(identity.id);
    if (group && !visited.has(identity.id)) {
      visited.add(identity.id);
      queue.push(group);
    }
  }

  const reached: Identity[] = [];
  for (let head = 0; head < queue.length; head++) {
    for (const target of nestedReferences(queue[head], byName)) {
      const id = target.identity.id;
      if (visited.has(id)) continue;
      visited.add(id);
      queue.push(target);
      if (!current.used.has(id)) reached.push(target.identity);
    }
  }

  const resolved = partition(current.all, current.used.union(reached));
  return {
    partition: resolved,
    nested: new IdentitySet(reached).intersect(current.all),
    cycles: findNestingCycles(groups),
  };
}

interface Frame {
  group: GroupObject;
  targets: GroupObject[];
  next: number;
}

/**
 * Strongly connected components of the nesting graph that contain a cycle
 * (two or more groups, or one group naming itself). Iterative Tarjan.
 */
export function findNestingCycles(groups: readonly GroupObject[]): Identity[][] {
  const byName = indexByName(groups);
  const index = new Map<number, number>();
  const low = new Map<number, number>();
  const onStack = new Set<number>();
  const stack: GroupObject[] = [];
  const cycles: Identity[][] = [];
  let counter = 0;

  const lowOf = (id: number): number => low.get(id) ?? Number.POSITIVE_INFINITY;

  for (const root of groups) {
    if (index.has(root.identity.id)) continue;
    const work: Frame[] = [];

    const enter = (group: GroupObject): void => {
      const id = group.identity.id;
      index.set(id, counter);
      low.set(id, counter);
      counter++;
      stack.push(group);
      onStack.add(id);
      work.push({ group, targets: nestedReferences(group, byName), next: 0 });
    };

    enter(root);
    while (work.length > 0) {
      const frame = work[work.length - 1];
      const id = frame.group.identity.id;

      if (frame.next < frame.targets.length) {
        const target = frame.targets[frame.next++];
        const targetId = target.identity.id;
        const targetIndex = index.get(targetId);
        if (targetIndex === undefined) {
          enter(target);
        } else if (onStack.has(targetId)) {
          low.set(id, Math.min(lowOf(id), targetIndex));
        }
        continue;
      }

      work.pop();
      const parent = work[work.length - 1];
      if (parent) {
        const parentId = parent.group.identity.id;
        low.set(parentId, Math.min(lowOf(parentId), lowOf(id)));
      }

      if (lowOf(id) !== index.get(id)) continue;

      const component: GroupObject[] = [];
      for (;;) {
        const member = stack.pop();
        if (!member) break;
        onStack.delete(member.identity.id);
        component.push(member);
        if (member.identity.id === id) break;
      }
      const selfNested = component.length === 1 && frame.targets.some(t => t.identity.id === id);
      if (component.length > 1 || selfNested) {
        cycles.push(component.map(g => g.identity).sort((a, b) => a.id - b.id));
      }
    }
  }

  return cycles;
}
