import { describe, expect, it } from 'vitest';
import { IdentitySet } from '../../../src/analysis/identity-set.js';
import { findNestingCycles, resolveNestedGroups } from '../../../src/analysis/nesting.js';
import { partition } from '../../../src/analysis/partition.js';
import { toGroupObject } from '../../../src/catalog/records.js';
import type { GroupObject, Identity } from '../../../src/types/catalog.js';
import { smartGroup } from '../../helpers/catalog.js';

function groups(...defs: Array<[number, string, string[]]>): GroupObject[] {
  return defs.map(([id, name, memberOf]) => toGroupObject(smartGroup('computer-group', id, name, { memberOf })));
}

function ids(set: Iterable<Identity>): number[] {
  return [...set].map(i => i.id);
}

describe('resolveNestedGroups', () => {
  it('moves a group nested inside a used group from unused to used', () => {
    const all = groups([1, 'G1', []], [2, 'G2', ['G1']], [3, 'G3', []]);
    const before = partition(
      new IdentitySet(all.map(g => g.identity)),
      new IdentitySet([{ id: 2, name: 'G2' }]),
    );

    const { partition: after, nested } = resolveNestedGroups(before, all);

    expect(ids(after.used)).toEqual([1, 2]);
    expect(ids(after.unused)).toEqual([3]);
    expect(ids(nested)).toEqual([1]);
    // input partition is left as it was
    expect(ids(before.used)).toEqual([2]);
  });

  it('follows nesting transitively', () => {
    const all = groups([1, 'A', ['B']], [2, 'B', ['C']], [3, 'C', []], [4, 'D', []]);
    const before = partition(new IdentitySet(all.map(g => g.identity)), new IdentitySet([{ id: 1, name: 'A' }]));
    expect(ids(resolveNestedGroups(before, all).partition.used)).toEqual([1, 2, 3]);
  });

  it('does not propagate from unused groups', () => {
    const all = groups([1, 'Parent', ['Child']], [2, 'Child', []]);
    const before = partition(new IdentitySet(all.map(g => g.identity)), new IdentitySet());
    expect(resolveNestedGroups(before, all).partition.used.size).toBe(0);
  });

  it('ignores criteria other than "member of" a group', () => {
    const group = toGroupObject(smartGroup('computer-group', 1, 'Parent'));
    group.criteria.push({ name: 'Computer Group', searchType: 'not member of', value: 'Child' });
    group.criteria.push({ name: 'Operating System', searchType: 'like', value: 'Child' });
    const child = toGroupObject(smartGroup('computer-group', 2, 'Child'));
    const before = partition(
      new IdentitySet([group.identity, child.identity]),
      new IdentitySet([group.identity]),
    );
    expect(ids(resolveNestedGroups(before, [group, child]).partition.used)).toEqual([1]);
  });

  it('follows no criterion without a group name', () => {
    const parent = toGroupObject(smartGroup('computer-group', 1, 'Parent'));
    parent.criteria.push({ name: 'Computer Group', searchType: 'member of', value: '' });
    const unnamed = toGroupObject(smartGroup('computer-group', 2, ''));
    const before = partition(
      new IdentitySet([parent.identity, unnamed.identity]),
      new IdentitySet([parent.identity]),
    );
    expect(ids(resolveNestedGroups(before, [parent, unnamed]).partition.used)).toEqual([1]);
  });

  it('does not nest through static groups', () => {
    const [outer, inner] = groups([1, 'Outer', ['Inner']], [2, 'Inner', []]);
    outer.smart = false;
    const before = partition(new IdentitySet([outer.identity, inner.identity]), new IdentitySet([outer.identity]));

    const resolution = resolveNestedGroups(before, [outer, inner]);
    expect(ids(resolution.partition.used)).toEqual([1]);
    expect(findNestingCycles([outer, inner])).toEqual([]);
  });

  it('terminates on a cycle and marks both groups used', () => {
    const all = groups([1, 'G1', ['G2']], [2, 'G2', ['G1']]);
    const before = partition(new IdentitySet(all.map(g => g.identity)), new IdentitySet([{ id: 1, name: 'G1' }]));

    const resolution = resolveNestedGroups(before, all);

    expect(ids(resolution.partition.used)).toEqual([1, 2]);
    expect(resolution.cycles).toEqual([
      [
        { id: 1, name: 'G1' },
        { id: 2, name: 'G2' },
      ],
    ]);
  });

  it('is idempotent', () => {
    const all = groups([1, 'A', ['B']], [2, 'B', []], [3, 'C', []]);
    const before = partition(new IdentitySet(all.map(g => g.identity)), new IdentitySet([{ id: 1, name: 'A' }]));
    const once = resolveNestedGroups(before, all).partition;
    const twice = resolveNestedGroups(once, all);
    expect(twice.partition.used.toArray()).toEqual(once.used.toArray());
    expect(twice.nested.size).toBe(0);
  });
});

describe('findNestingCycles', () => {
  it('returns nothing for an acyclic graph', () => {
    expect(findNestingCycles(groups([1, 'A', ['B']], [2, 'B', ['C']], [3, 'C', []]))).toEqual([]);
  });

  it('finds a self-nesting group', () => {
    expect(findNestingCycles(groups([1, 'Loop', ['Loop']], [2, 'Other', []]))).toEqual([[{ id: 1, name: 'Loop' }]]);
  });

  it('reports each strongly connected component once', () => {
    const cycles = findNestingCycles(
      groups([1, 'A', ['B']], [2, 'B', ['C']], [3, 'C', ['A']], [4, 'D', ['E']], [5, 'E', ['D']], [6, 'F', ['A']]),
    );
    expect(cycles.map(c => c.map(i => i.id))).toEqual([
      [1, 2, 3],
      [4, 5],
    ]);
  });
});
