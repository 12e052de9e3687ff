// packages/core/src/types/catalog.ts — Catalog object model

export const OBJECT_TYPES = [
  'package',
  'script',
  'printer',
  'computer-group',
  'mobile-device-group',
  'computer-profile',
  'mobile-device-profile',
  'provisioning-profile',
  'policy',
  'computer-configuration',
  'mac-app',
  'mobile-app',
  'ebook',
  'computer',
  'mobile-device',
] as const;

export type ObjectType = (typeof OBJECT_TYPES)[number];

export type GroupType = Extract<ObjectType, 'computer-group' | 'mobile-device-group'>;

export type DeviceType = Extract<ObjectType, 'computer' | 'mobile-device'>;

/** Authoritative key is `id`; `name` is display-only and may repeat or be empty. */
export interface Identity {
  id: number;
  name: string;
}

export type FieldValue = string | number | boolean | null | FieldNode | FieldValue[];

export interface FieldNode {
  [key: string]: FieldValue;
}

export interface ManagedObject {
  type: ObjectType;
  id: number;
  name: string;
  fields: FieldNode;
}

/** Smart group criterion as the platform stores it. */
export interface GroupCriterion {
  name: string;
  searchType: string;
  value: string;
}

export interface GroupObject {
  identity: Identity;
  type: GroupType;
  smart: boolean;
  criteria: GroupCriterion[];
  /** Cached member count; undefined when the record carries neither a size nor a member list */
  memberCount: number | undefined;
}

export interface DeviceRecord {
  identity: Identity;
  type: DeviceType;
  lastCheckIn?: string;
  osVersion?: string;
  modelIdentifier?: string;
  groups: string[];
}

/**
 * Read-only view of fetched platform data. The engine never fetches; whatever
 * implements this has already materialized every collection.
 */
export interface CatalogAccessor {
  readonly server: string | undefined;
  readonly fetchedAt: string | undefined;
  list(type: ObjectType): Identity[];
  records(type: ObjectType): ManagedObject[];
}
