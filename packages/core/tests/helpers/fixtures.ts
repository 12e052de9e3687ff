// tests/helpers/fixtures.ts — A small catalog exercising every report kind

import type { SnapshotCatalog } from '../../src/catalog/snapshot.js';
import type { ManagedObject } from '../../src/types/catalog.js';
import { catalogOf, record, ref, smartGroup } from './catalog.js';

/** Reference time for device staleness: 19 Oct 2026, noon local time. */
export const NOW = new Date(2026, 9, 19, 12, 0, 0);

export function fleetRecords(): ManagedObject[] {
  return [
    record('package', 1, 'Chrome'),
    record('package', 2, 'Flash'),
    record('package', 3, 'Firefox'),
    record('script', 10, 'enroll.sh'),
    record('script', 11, 'cleanup.sh'),

    smartGroup('computer-group', 20, 'Nested', { size: 4 }),
    smartGroup('computer-group', 21, 'Scoped', { memberOf: ['Nested'], size: 2 }),
    smartGroup('computer-group', 22, 'Leftover', { size: 0 }),

    record('policy', 100, 'Install Chrome', {
      general: { enabled: true },
      package_configuration: { packages: { package: ref(1, 'Chrome') } },
      scope: { computer_groups: { computer_group: ref(21, 'Scoped') } },
    }),
    record('policy', 101, 'Old policy', {
      general: { enabled: 'false' },
      scope: { all_computers: false, computers: [] },
    }),
    record('computer-configuration', 200, 'Lab image', {
      scripts: { script: ref(11, 'cleanup.sh') },
    }),

    record('computer-profile', 300, 'Wi-Fi', { scope: { all_computers: 'true' } }),
    record('computer-profile', 301, 'VPN', { scope: { buildings: { building: ref(1, 'HQ') } } }),
    record('computer-profile', 302, 'Legacy', { scope: { all_computers: false } }),

    record('computer', 500, 'lab-mac-01', {
      general: { last_contact_time: '2026-10-15 09:30:00' },
      hardware: { os_version: '10.12.6', model_identifier: 'iMac13,2' },
      groups_accounts: { computer_group_memberships: { group: ['All Managed Clients', 'Nested'] } },
    }),
    record('computer', 501, 'lost-mac', {
      hardware: { os_version: '10.12', model_identifier: 'iMac9,1' },
      groups_accounts: { computer_group_memberships: { group: ['All Managed Clients'] } },
    }),
  ];
}

export function fleetCatalog(): SnapshotCatalog {
  return catalogOf(fleetRecords(), 'https://mdm.example.test:8443');
}
