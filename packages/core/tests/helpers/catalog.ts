// tests/helpers/catalog.ts — Small builders for catalog fixtures

import { SnapshotCatalog } from '../../src/catalog/snapshot.js';
import type { FieldNode, ManagedObject, ObjectType } from '../../src/types/catalog.js';

export function ref(id: number, name: string): FieldNode {
  return { id, name };
}

export function record(type: ObjectType, id: number, name: string, fields: FieldNode = {}): ManagedObject {
  return { type, id, name, fields };
}

/** Build a catalog from records, grouping them by their own type. */
export function catalogOf(records: ManagedObject[], server?: string): SnapshotCatalog {
  const collections: Partial<Record<ObjectType, ManagedObject[]>> = {};
  for (const r of records) {
    const list = collections[r.type] ?? [];
    list.push(r);
    collections[r.type] = list;
  }
  return new SnapshotCatalog(collections, server);
}

export function smartGroup(
  type: 'computer-group' | 'mobile-device-group',
  id: number,
  name: string,
  options: { memberOf?: string[]; size?: number } = {},
): ManagedObject {
  const criterionName = type === 'computer-group' ? 'Computer Group' : 'Mobile Device Group';
  const container = type === 'computer-group' ? 'computers' : 'mobile_devices';
  const fields: FieldNode = {
    is_smart: true,
    criteria: {
      size: options.memberOf?.length ?? 0,
      criterion: (options.memberOf ?? []).map(target => ({
        name: criterionName,
        search_type: 'member of',
        value: target,
      })),
    },
  };
  if (options.size !== undefined) fields[container] = { size: options.size };
  return record(type, id, name, fields);
}
