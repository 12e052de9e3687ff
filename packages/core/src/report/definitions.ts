// packages/core/src/report/definitions.ts — What each report scans

import { FIELD_PATHS } from '../catalog/paths.js';
import type { FieldPath } from '../catalog/paths.js';
import type { ObjectType } from '../types/catalog.js';
import type { ReportKind } from '../types/report.js';

export const TYPE_LABELS: Record<ObjectType, { singular: string; plural: string }> = {
  package: { singular: 'Package', plural: 'Packages' },
  script: { singular: 'Script', plural: 'Scripts' },
  printer: { singular: 'Printer', plural: 'Printers' },
  'computer-group': { singular: 'Computer Group', plural: 'Computer Groups' },
  'mobile-device-group': { singular: 'Mobile Device Group', plural: 'Mobile Device Groups' },
  'computer-profile': { singular: 'Computer Configuration Profile', plural: 'Computer Configuration Profiles' },
  'mobile-device-profile': {
    singular: 'Mobile Device Configuration Profile',
    plural: 'Mobile Device Configuration Profiles',
  },
  'provisioning-profile': { singular: 'Provisioning Profile', plural: 'Provisioning Profiles' },
  policy: { singular: 'Policy', plural: 'Policies' },
  'computer-configuration': { singular: 'Computer Imaging Configuration', plural: 'Computer Imaging Configurations' },
  'mac-app': { singular: 'Mac App', plural: 'Mac Apps' },
  'mobile-app': { singular: 'Mobile Device App', plural: 'Mobile Device Apps' },
  ebook: { singular: 'eBook', plural: 'eBooks' },
  computer: { singular: 'Computer', plural: 'Computers' },
  'mobile-device': { singular: 'Mobile Device', plural: 'Mobile Devices' },
};

export const REPORT_TYPES: Record<ReportKind, ObjectType> = {
  computers: 'computer',
  'mobile-devices': 'mobile-device',
  'computer-groups': 'computer-group',
  'mobile-device-groups': 'mobile-device-group',
  packages: 'package',
  scripts: 'script',
  printers: 'printer',
  'computer-profiles': 'computer-profile',
  'mobile-device-profiles': 'mobile-device-profile',
  policies: 'policy',
  'mac-apps': 'mac-app',
  'mobile-apps': 'mobile-app',
};

export interface UsageSourceSpec {
  container: ObjectType;
  paths: FieldPath[];
}

const COMPUTER_GROUP_PATHS = [FIELD_PATHS.scopeComputerGroups, FIELD_PATHS.exclusionComputerGroups];
const MOBILE_GROUP_PATHS = [FIELD_PATHS.scopeMobileDeviceGroups, FIELD_PATHS.exclusionMobileDeviceGroups];

export type UsageReportKind = Extract<
  ReportKind,
  'packages' | 'scripts' | 'printers' | 'computer-groups' | 'mobile-device-groups'
>;

/** Containers that can reference each object type, and where. */
export const USAGE_SOURCES: Record<UsageReportKind, UsageSourceSpec[]> = {
  packages: [
    { container: 'policy', paths: [FIELD_PATHS.policyPackages] },
    { container: 'computer-configuration', paths: [FIELD_PATHS.configurationPackages] },
  ],
  scripts: [
    { container: 'policy', paths: [FIELD_PATHS.policyScripts] },
    { container: 'computer-configuration', paths: [FIELD_PATHS.configurationScripts] },
  ],
  printers: [
    { container: 'policy', paths: [FIELD_PATHS.policyPrinters] },
    { container: 'computer-configuration', paths: [FIELD_PATHS.configurationPrinters] },
  ],
  'computer-groups': [
    { container: 'policy', paths: COMPUTER_GROUP_PATHS },
    { container: 'computer-profile', paths: COMPUTER_GROUP_PATHS },
    { container: 'mac-app', paths: COMPUTER_GROUP_PATHS },
    { container: 'ebook', paths: COMPUTER_GROUP_PATHS },
  ],
  'mobile-device-groups': [
    { container: 'mobile-device-profile', paths: MOBILE_GROUP_PATHS },
    { container: 'mobile-app', paths: MOBILE_GROUP_PATHS },
    { container: 'ebook', paths: MOBILE_GROUP_PATHS },
    { container: 'provisioning-profile', paths: MOBILE_GROUP_PATHS },
  ],
};

export interface ScopeSpec {
  /** Boolean flag that scopes the object to every device */
  allFlag: FieldPath;
  targets: FieldPath[];
}

const COMPUTER_SCOPE: ScopeSpec = {
  allFlag: FIELD_PATHS.scopeAllComputers,
  targets: [
    FIELD_PATHS.scopeComputers,
    FIELD_PATHS.scopeComputerGroups,
    FIELD_PATHS.scopeBuildings,
    FIELD_PATHS.scopeDepartments,
  ],
};

const MOBILE_SCOPE: ScopeSpec = {
  allFlag: FIELD_PATHS.scopeAllMobileDevices,
  targets: [
    FIELD_PATHS.scopeMobileDevices,
    FIELD_PATHS.scopeMobileDeviceGroups,
    FIELD_PATHS.scopeBuildings,
    FIELD_PATHS.scopeDepartments,
  ],
};

export type ScopeReportKind = Extract<
  ReportKind,
  'computer-profiles' | 'mobile-device-profiles' | 'policies' | 'mac-apps' | 'mobile-apps'
>;

/** Objects judged by whether they are scoped to anything at all. */
export const SCOPE_SPECS: Record<ScopeReportKind, ScopeSpec> = {
  'computer-profiles': COMPUTER_SCOPE,
  'mobile-device-profiles': MOBILE_SCOPE,
  policies: COMPUTER_SCOPE,
  'mac-apps': COMPUTER_SCOPE,
  'mobile-apps': MOBILE_SCOPE,
};

/** "Policies, Mac Apps or eBooks" */
export function describeContainers(types: readonly ObjectType[]): string {
  const names = types.map(t => TYPE_LABELS[t].plural);
  if (names.length <= 1) return names.join('');
  return `${names.slice(0, -1).join(', ')} or ${names[names.length - 1]}`;
}
