// packages/core/src/analysis/identity-set.ts — Immutable set of catalog identities keyed by id

import type { Identity } from '../types/catalog.js';

/**
 * Set operations compare ids only. When two identities share an id the first one
 * seen keeps its name.
 */
export class IdentitySet implements Iterable<Identity> {
  private readonly byId = new Map<number, Identity>();

  constructor(items: Iterable<Identity> = []) {
    for (const item of items) {
      if (!this.byId.has(item.id)) this.byId.set(item.id, { id: item.id, name: item.name });
    }
  }

  get size(): number {
    return this.byId.size;
  }

  has(idOrIdentity: number | Identity): boolean {
    return this.byId.has(typeof idOrIdentity === 'number' ? idOrIdentity : idOrIdentity.id);
  }

  get(id: number): Identity | undefined {
    return this.byId.get(id);
  }

  union(other: Iterable<Identity>): IdentitySet {
    return new IdentitySet([...this, ...other]);
  }

  intersect(other: IdentitySet): IdentitySet {
    return new IdentitySet(this.toArray().filter(item => other.has(item.id)));
  }

  difference(other: IdentitySet): IdentitySet {
    return new IdentitySet(this.toArray().filter(item => !other.has(item.id)));
  }

  /** Members ordered by id. */
  toArray(): Identity[] {
    return [...this.byId.values()].sort((a, b) => a.id - b.id);
  }

  [Symbol.iterator](): Iterator<Identity> {
    return this.toArray()[Symbol.iterator]();
  }
}
