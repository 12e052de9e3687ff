// packages/core/src/catalog/paths.ts — Every field path the engine queries

/**
 * Field paths are written the way the platform nests its records
 * (list wrapper, then item name). Queries only accept values from this table,
 * so a misspelt path fails to compile instead of silently matching nothing.
 */
export const FIELD_PATHS = {
  // Container references
  policyPackages: 'package_configuration/packages/package',
  policyScripts: 'scripts/script',
  policyPrinters: 'printers/printer',
  configurationPackages: 'packages/package',
  configurationScripts: 'scripts/script',
  configurationPrinters: 'printers/printer',

  // Scope targets
  scopeAllComputers: 'scope/all_computers',
  scopeComputers: 'scope/computers/computer',
  scopeComputerGroups: 'scope/computer_groups/computer_group',
  scopeAllMobileDevices: 'scope/all_mobile_devices',
  scopeMobileDevices: 'scope/mobile_devices/mobile_device',
  scopeMobileDeviceGroups: 'scope/mobile_device_groups/mobile_device_group',
  scopeBuildings: 'scope/buildings/building',
  scopeDepartments: 'scope/departments/department',
  exclusionComputerGroups: 'scope/exclusions/computer_groups/computer_group',
  exclusionMobileDeviceGroups: 'scope/exclusions/mobile_device_groups/mobile_device_group',

  policyEnabled: 'general/enabled',

  // Groups
  groupIsSmart: 'is_smart',
  groupCriteria: 'criteria/criterion',
  computerGroupSize: 'computers/size',
  computerGroupMembers: 'computers/computer',
  mobileDeviceGroupSize: 'mobile_devices/size',
  mobileDeviceGroupMembers: 'mobile_devices/mobile_device',

  // Devices
  computerLastContact: 'general/last_contact_time',
  computerOsVersion: 'hardware/os_version',
  computerModel: 'hardware/model_identifier',
  computerGroupMemberships: 'groups_accounts/computer_group_memberships/group',
  mobileDeviceLastInventory: 'general/last_inventory_update',
  mobileDeviceOsVersion: 'general/os_version',
  mobileDeviceModel: 'general/model_identifier',
  mobileDeviceGroupMemberships: 'mobile_device_groups/mobile_device_group',
} as const;

export type FieldPath = (typeof FIELD_PATHS)[keyof typeof FIELD_PATHS];
