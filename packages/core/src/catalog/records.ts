// packages/core/src/catalog/records.ts — Typed views over group and device records

import type {
  DeviceRecord,
  DeviceType,
  GroupCriterion,
  GroupObject,
  GroupType,
  ManagedObject,
  ObjectType,
} from '../types/catalog.js';
import { ContractError } from '../utils/errors.js';
import { firstText, identityOf, isFieldNode, isTrue, numberOf, queryPath, textOf } from './field-tree.js';
import { FIELD_PATHS } from './paths.js';
import type { FieldPath } from './paths.js';

export function isGroupType(type: ObjectType): type is GroupType {
  return type === 'computer-group' || type === 'mobile-device-group';
}

export function isDeviceType(type: ObjectType): type is DeviceType {
  return type === 'computer' || type === 'mobile-device';
}

const GROUP_FIELDS: Record<GroupType, { container: string; size: FieldPath; members: FieldPath }> = {
  'computer-group': {
    container: 'computers',
    size: FIELD_PATHS.computerGroupSize,
    members: FIELD_PATHS.computerGroupMembers,
  },
  'mobile-device-group': {
    container: 'mobile_devices',
    size: FIELD_PATHS.mobileDeviceGroupSize,
    members: FIELD_PATHS.mobileDeviceGroupMembers,
  },
};

const DEVICE_FIELDS: Record<DeviceType, { checkIn: FieldPath; osVersion: FieldPath; model: FieldPath; groups: FieldPath }> = {
  computer: {
    checkIn: FIELD_PATHS.computerLastContact,
    osVersion: FIELD_PATHS.computerOsVersion,
    model: FIELD_PATHS.computerModel,
    groups: FIELD_PATHS.computerGroupMemberships,
  },
  'mobile-device': {
    checkIn: FIELD_PATHS.mobileDeviceLastInventory,
    osVersion: FIELD_PATHS.mobileDeviceOsVersion,
    model: FIELD_PATHS.mobileDeviceModel,
    groups: FIELD_PATHS.mobileDeviceGroupMemberships,
  },
};

export function toGroupObject(record: ManagedObject): GroupObject {
  const { type } = record;
  if (!isGroupType(type)) {
    throw new ContractError(`Expected a computer or mobile device group, got "${type}"`, type);
  }
  const fields = GROUP_FIELDS[type];

  const criteria: GroupCriterion[] = [];
  for (const node of queryPath(record.fields, FIELD_PATHS.groupCriteria)) {
    if (!isFieldNode(node)) continue;
    criteria.push({
      name: textOf(node.name) ?? '',
      searchType: textOf(node.search_type) ?? '',
      value: textOf(node.value) ?? '',
    });
  }

  let memberCount = numberOf(queryPath(record.fields, fields.size)[0]);
  if (memberCount === undefined && record.fields[fields.container] !== undefined) {
    memberCount = queryPath(record.fields, fields.members).filter(v => identityOf(v) !== undefined).length;
  }

  return {
    identity: { id: record.id, name: record.name },
    type,
    smart: queryPath(record.fields, FIELD_PATHS.groupIsSmart).some(isTrue),
    criteria,
    memberCount,
  };
}

export function toDeviceRecord(record: ManagedObject): DeviceRecord {
  const { type } = record;
  if (!isDeviceType(type)) {
    throw new ContractError(`Expected a computer or mobile device, got "${type}"`, type);
  }
  const fields = DEVICE_FIELDS[type];

  const groups: string[] = [];
  for (const value of queryPath(record.fields, fields.groups)) {
    const name = textOf(value);
    if (name !== undefined) groups.push(name);
  }

  return {
    identity: { id: record.id, name: record.name },
    type,
    lastCheckIn: firstText(record.fields, fields.checkIn),
    osVersion: firstText(record.fields, fields.osVersion),
    modelIdentifier: firstText(record.fields, fields.model),
    groups,
  };
}
