import { describe, expect, it, vi } from 'vitest';
import { resolveRunOptions } from '../../../src/engine/runner.js';
import type { BuildContext } from '../../../src/report/builders.js';
import { REPORT_BUILDERS, buildGroupReport } from '../../../src/report/builders.js';
import { CRUFTINESS_SECTION, MODEL_SECTION, VERSION_SECTION } from '../../../src/report/report.js';
import type { Report } from '../../../src/report/report.js';
import type { CatalogAccessor, CycleMode } from '../../../src/types/index.js';
import { NestingCycleError } from '../../../src/utils/errors.js';
import type { Logger } from '../../../src/utils/logger.js';
import { silentLogger } from '../../../src/utils/logger.js';
import { catalogOf, record, ref, smartGroup } from '../../helpers/catalog.js';
import { NOW, fleetCatalog } from '../../helpers/fixtures.js';

function context(catalog: CatalogAccessor, logger: Logger = silentLogger, onCycle: CycleMode = 'warn'): BuildContext {
  return { catalog, options: resolveRunOptions({ now: NOW, onCycle }), logger };
}

function objectIds(report: Report, heading: string): number[] | undefined {
  return report.getResultByHeading(heading)?.objects.map(o => o.id);
}

function ratio(report: Report, label: string): number | undefined {
  const entry = report.getMetadata(CRUFTINESS_SECTION, label);
  return entry?.kind === 'cruft' ? entry.score.ratio : undefined;
}

describe('usage reports', () => {
  it('reports packages no policy or imaging configuration installs', () => {
    const report = REPORT_BUILDERS.packages(context(fleetCatalog()));

    expect(report.heading).toBe('Package Report');
    expect(report.results.map(r => r.heading)).toEqual(['All Packages', 'Used Packages', 'Unused Packages']);
    expect(objectIds(report, 'Used Packages')).toEqual([1]);
    expect(objectIds(report, 'Unused Packages')).toEqual([2, 3]);
    expect(ratio(report, 'Unused Packages')).toBe(2 / 3);
    expect(report.getResultByHeading('Unused Packages')?.description).toBe(
      'Packages not referenced by any Policies or Computer Imaging Configurations.',
    );
  });

  it('counts scripts referenced by imaging configurations as used', () => {
    const report = REPORT_BUILDERS.scripts(context(fleetCatalog()));
    expect(objectIds(report, 'Used Scripts')).toEqual([11]);
    expect(objectIds(report, 'Unused Scripts')).toEqual([10]);
  });

  it('returns an empty report when the catalog has none of the type', () => {
    const report = REPORT_BUILDERS.printers(context(fleetCatalog()));
    expect(report.isEmpty).toBe(true);
  });
});

describe('group reports', () => {
  it('moves nested groups to used and recomputes cruftiness', () => {
    const report = REPORT_BUILDERS['computer-groups'](context(fleetCatalog()));

    expect(report.results.map(r => r.heading)).toEqual([
      'All Computer Groups',
      'Used Computer Groups',
      'Unused Computer Groups',
      'Empty Computer Groups',
    ]);
    expect(objectIds(report, 'Used Computer Groups')).toEqual([20, 21]);
    expect(objectIds(report, 'Unused Computer Groups')).toEqual([22]);
    expect(ratio(report, 'Unused Computer Groups')).toBe(1 / 3);
    expect(objectIds(report, 'Empty Computer Groups')).toEqual([22]);
    expect(ratio(report, 'Empty Computer Groups')).toBe(1 / 3);
    expect(report.getResultByHeading('Empty Computer Groups')?.removable).toBe(false);
  });

  it('counts exclusions as use', () => {
    const catalog = catalogOf([
      smartGroup('mobile-device-group', 1, 'Excluded'),
      smartGroup('mobile-device-group', 2, 'Idle'),
      record('mobile-app', 10, 'Notes', {
        scope: { exclusions: { mobile_device_groups: { mobile_device_group: ref(1, 'Excluded') } } },
      }),
    ]);
    const report = REPORT_BUILDERS['mobile-device-groups'](context(catalog));
    expect(objectIds(report, 'Used Mobile Device Groups')).toEqual([1]);
    expect(objectIds(report, 'Unused Mobile Device Groups')).toEqual([2]);
  });

  describe('nesting cycles', () => {
    const cyclic = () =>
      catalogOf([
        smartGroup('computer-group', 30, 'A', { memberOf: ['B'], size: 1 }),
        smartGroup('computer-group', 31, 'B', { memberOf: ['A'], size: 1 }),
        record('policy', 1, 'Scoped to A', { scope: { computer_groups: { computer_group: ref(30, 'A') } } }),
      ]);

    it('warns, marks both groups used and lists the cycle', () => {
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const report = buildGroupReport('computer-groups', context(cyclic(), logger));

      expect(objectIds(report, 'Used Computer Groups')).toEqual([30, 31]);
      expect(objectIds(report, 'Computer Groups in Nesting Cycles')).toEqual([30, 31]);
      expect(report.getResultByHeading('Computer Groups in Nesting Cycles')?.removable).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('Computer Groups nest each other: A <-> B');
    });

    it('leaves a cycle no used group reaches in Unused', () => {
      const catalog = catalogOf([
        smartGroup('computer-group', 30, 'A', { memberOf: ['B'], size: 1 }),
        smartGroup('computer-group', 31, 'B', { memberOf: ['A'], size: 1 }),
      ]);
      const report = buildGroupReport('computer-groups', context(catalog));

      expect(objectIds(report, 'Used Computer Groups')).toEqual([]);
      expect(objectIds(report, 'Unused Computer Groups')).toEqual([30, 31]);
      expect(objectIds(report, 'Computer Groups in Nesting Cycles')).toEqual([30, 31]);
    });

    it('aborts the report when cycles are configured to fail', () => {
      expect(() => buildGroupReport('computer-groups', context(cyclic(), silentLogger, 'fail'))).toThrow(
        NestingCycleError,
      );
    });
  });
});

describe('scope reports', () => {
  it('treats all-device flags, buildings and groups as scope', () => {
    const report = REPORT_BUILDERS['computer-profiles'](context(fleetCatalog()));
    expect(objectIds(report, 'Scoped Computer Configuration Profiles')).toEqual([300, 301]);
    expect(objectIds(report, 'Unscoped Computer Configuration Profiles')).toEqual([302]);
    expect(report.getResultByHeading('Unscoped Computer Configuration Profiles')?.removable).toBe(true);
  });

  it('adds disabled policies to the policy report', () => {
    const report = REPORT_BUILDERS.policies(context(fleetCatalog()));
    expect(report.results.map(r => r.heading)).toEqual([
      'All Policies',
      'Scoped Policies',
      'Unscoped Policies',
      'Disabled Policies',
    ]);
    expect(objectIds(report, 'Unscoped Policies')).toEqual([101]);
    expect(objectIds(report, 'Disabled Policies')).toEqual([101]);
    expect(ratio(report, 'Disabled Policies')).toBe(0.5);
  });
});

describe('device reports', () => {
  it('lists out-of-date and orphaned computers with spreads', () => {
    const report = REPORT_BUILDERS.computers(context(fleetCatalog()));

    expect(report.results.map(r => [r.heading, r.includeInNonVerbose, r.removable])).toEqual([
      ['All Computers', false, false],
      ['Out of Date Computers', true, false],
      ['Orphaned Computers', true, false],
    ]);
    expect(objectIds(report, 'Out of Date Computers')).toEqual([501]);
    expect(objectIds(report, 'Orphaned Computers')).toEqual([501]);
    expect([...report.metadata.keys()]).toEqual([CRUFTINESS_SECTION, VERSION_SECTION, MODEL_SECTION]);
    expect([...(report.metadata.get(VERSION_SECTION)?.entries() ?? [])]).toEqual([
      ['10.12.0', { kind: 'count', count: 1 }],
      ['10.12.6', { kind: 'count', count: 1 }],
    ]);
    expect([...(report.metadata.get(MODEL_SECTION)?.keys() ?? [])]).toEqual(['iMac9,1', 'iMac13,2']);
    expect(ratio(report, 'Out of Date Computers')).toBe(0.5);
  });

  it('uses the mobile default groups for mobile devices', () => {
    const catalog = catalogOf([
      record('mobile-device', 1, 'cart-ipad', {
        general: { last_inventory_update: 'Thursday, October 15 2026 at 9:30 AM', os_version: '11.2' },
        mobile_device_groups: { mobile_device_group: ref(5, 'All Managed iPads') },
      }),
    ]);
    const report = REPORT_BUILDERS['mobile-devices'](context(catalog));
    expect(objectIds(report, 'Out of Date Mobile Devices')).toEqual([]);
    expect(objectIds(report, 'Orphaned Mobile Devices')).toEqual([1]);
  });
});
