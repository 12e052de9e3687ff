// packages/core/src/report/builders.ts — One builder per report kind

import { identityOf, isFalse, isTrue, queryPath } from '../catalog/field-tree.js';
import { FIELD_PATHS } from '../catalog/paths.js';
import { toDeviceRecord, toGroupObject } from '../catalog/records.js';
import { cruftEntry } from '../analysis/cruft.js';
import { analyzeDevices } from '../analysis/devices.js';
import { detectEmptyGroups } from '../analysis/empty-groups.js';
import { IdentitySet } from '../analysis/identity-set.js';
import { extractFromSources } from '../analysis/membership.js';
import { resolveNestedGroups } from '../analysis/nesting.js';
import { partition, partitionFromResults, usageResults } from '../analysis/partition.js';
import type { UsageHeadings, UsagePartition } from '../analysis/partition.js';
import type { CatalogAccessor, ManagedObject, ObjectType } from '../types/catalog.js';
import type { ReportKind, RunOptions } from '../types/report.js';
import { ContractError, NestingCycleError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import {
  REPORT_TYPES,
  SCOPE_SPECS,
  TYPE_LABELS,
  USAGE_SOURCES,
  describeContainers,
} from './definitions.js';
import type { ScopeReportKind, ScopeSpec, UsageReportKind } from './definitions.js';
import { CRUFTINESS_SECTION, MODEL_SECTION, Report, VERSION_SECTION, createResult } from './report.js';

export interface BuildContext {
  catalog: CatalogAccessor;
  options: RunOptions;
  logger: Logger;
}

type GroupReportKind = Extract<ReportKind, 'computer-groups' | 'mobile-device-groups'>;
type DeviceReportKind = Extract<ReportKind, 'computers' | 'mobile-devices'>;

function emptyReport(kind: ReportKind): Report {
  const type = REPORT_TYPES[kind];
  return new Report(kind, type, `${TYPE_LABELS[type].singular} Report`);
}

function usageHeadings(type: ObjectType, containers: readonly ObjectType[]): UsageHeadings {
  const { plural } = TYPE_LABELS[type];
  const from = describeContainers(containers);
  return {
    all: `All ${plural}`,
    used: `Used ${plural}`,
    unused: `Unused ${plural}`,
    allDescription: `All ${plural} in the catalog.`,
    usedDescription: `${plural} referenced by ${from}.`,
    unusedDescription: `${plural} not referenced by any ${from}.`,
  };
}

function scopeHeadings(type: ObjectType): UsageHeadings {
  const { plural } = TYPE_LABELS[type];
  return {
    all: `All ${plural}`,
    used: `Scoped ${plural}`,
    unused: `Unscoped ${plural}`,
    allDescription: `All ${plural} in the catalog.`,
    usedDescription: `${plural} scoped to at least one device, group, building or department.`,
    unusedDescription: `${plural} with an empty scope.`,
  };
}

function assembleUsage(report: Report, p: UsagePartition, headings: UsageHeadings): void {
  for (const result of usageResults(p, headings)) report.addResult(result);
  report.setMetadata(CRUFTINESS_SECTION, headings.unused, cruftEntry(p.unused, p.all));
}

export function buildUsageReport(kind: UsageReportKind, ctx: BuildContext): Report {
  const report = emptyReport(kind);
  const all = new IdentitySet(ctx.catalog.list(report.type));
  if (all.size === 0) {
    ctx.logger.debug(`No ${TYPE_LABELS[report.type].plural} in the catalog`);
    return report;
  }

  const specs = USAGE_SOURCES[kind];
  const used = extractFromSources(
    specs.flatMap(spec =>
      spec.paths.map(path => ({ containers: ctx.catalog.records(spec.container), path })),
    ),
  );

  const headings = usageHeadings(report.type, specs.map(s => s.container));
  if (kind === 'computer-groups' || kind === 'mobile-device-groups') {
    headings.usedDescription = `${TYPE_LABELS[report.type].plural} referenced by ${describeContainers(
      specs.map(s => s.container),
    )}, directly or by nesting in a referenced group.`;
  }
  assembleUsage(report, partition(all, used), headings);
  return report;
}

/**
 * Usage report plus nesting resolution and empty-group detection. The Used and
 * Unused results assembled first are pulled back by heading, replaced with the
 * nesting-resolved sets, and the cruft score is recomputed from the new Unused.
 */
export function buildGroupReport(kind: GroupReportKind, ctx: BuildContext): Report {
  const report = buildUsageReport(kind, ctx);
  if (report.isEmpty) return report;

  const { type } = report;
  const { plural } = TYPE_LABELS[type];
  const headings = usageHeadings(type, []);
  const usedResult = report.getResultByHeading(headings.used);
  const unusedResult = report.getResultByHeading(headings.unused);
  if (!usedResult || !unusedResult) {
    throw new ContractError(`${report.heading} is missing its usage results`);
  }

  const groups = ctx.catalog.records(type).map(toGroupObject);
  const resolution = resolveNestedGroups(partitionFromResults(usedResult, unusedResult), groups);
  const resolved = resolution.partition;

  report.replaceResult(headings.used, { ...usedResult, objects: resolved.used.toArray() });
  report.replaceResult(headings.unused, { ...unusedResult, objects: resolved.unused.toArray() });
  report.setMetadata(CRUFTINESS_SECTION, headings.unused, cruftEntry(resolved.unused, resolved.all));
  if (resolution.nested.size > 0) {
    ctx.logger.debug(`${resolution.nested.size} ${plural} are used only through nesting`);
  }

  if (resolution.cycles.length > 0) {
    const described = resolution.cycles
      .map(cycle => cycle.map(g => g.name || `#${g.id}`).join(' <-> '))
      .join('; ');
    if (ctx.options.onCycle === 'fail') {
      throw new NestingCycleError(`${plural} nest each other: ${described}`, resolution.cycles);
    }
    ctx.logger.warn(`${plural} nest each other: ${described}`);
  }

  const emptyHeading = `Empty ${plural}`;
  const empty = detectEmptyGroups(groups, type);
  report.addResult(
    createResult(emptyHeading, empty, {
      description: `${plural} with no members.`,
      includeInNonVerbose: true,
      // empty but scoped groups stay; unscoped ones are removable under Unused
      removable: false,
    }),
  );
  report.setMetadata(CRUFTINESS_SECTION, emptyHeading, cruftEntry(empty, resolved.all));

  if (resolution.cycles.length > 0) {
    report.addResult(
      createResult(`${plural} in Nesting Cycles`, new IdentitySet(resolution.cycles.flat()), {
        description: `${plural} that include each other through "member of" criteria.`,
        includeInNonVerbose: true,
        removable: false,
      }),
    );
  }

  return report;
}

function isScoped(record: ManagedObject, spec: ScopeSpec): boolean {
  if (queryPath(record.fields, spec.allFlag).some(isTrue)) return true;
  return spec.targets.some(path =>
    queryPath(record.fields, path).some(value => identityOf(value) !== undefined),
  );
}

export function buildScopeReport(kind: ScopeReportKind, ctx: BuildContext): Report {
  const report = emptyReport(kind);
  const all = new IdentitySet(ctx.catalog.list(report.type));
  if (all.size === 0) return report;

  const spec = SCOPE_SPECS[kind];
  const scoped = new IdentitySet(
    ctx.catalog
      .records(report.type)
      .filter(record => isScoped(record, spec))
      .map(record => ({ id: record.id, name: record.name })),
  );
  assembleUsage(report, partition(all, scoped), scopeHeadings(report.type));
  return report;
}

export function buildPolicyReport(ctx: BuildContext): Report {
  const report = buildScopeReport('policies', ctx);
  if (report.isEmpty) return report;

  const all = new IdentitySet(ctx.catalog.list('policy'));
  const disabled = new IdentitySet(
    ctx.catalog
      .records('policy')
      .filter(record => queryPath(record.fields, FIELD_PATHS.policyEnabled).some(isFalse))
      .map(record => ({ id: record.id, name: record.name })),
  ).intersect(all);

  report.addResult(
    createResult('Disabled Policies', disabled, {
      description: 'Policies that are switched off.',
      includeInNonVerbose: true,
      removable: true,
    }),
  );
  report.setMetadata(CRUFTINESS_SECTION, 'Disabled Policies', cruftEntry(disabled, all));
  return report;
}

export function buildDeviceReport(kind: DeviceReportKind, ctx: BuildContext): Report {
  const report = emptyReport(kind);
  const records = ctx.catalog.records(report.type);
  if (records.length === 0) return report;

  const { plural } = TYPE_LABELS[report.type];
  const { checkInDays, now, defaultGroups } = ctx.options;
  const analysis = analyzeDevices(records.map(toDeviceRecord), {
    checkInDays,
    now,
    defaultGroups: report.type === 'computer' ? defaultGroups.computer : defaultGroups.mobileDevice,
  });

  const outOfDate = `Out of Date ${plural}`;
  const orphaned = `Orphaned ${plural}`;
  report
    .addResult(
      createResult(`All ${plural}`, analysis.all, {
        description: `All ${plural} in the catalog.`,
        includeInNonVerbose: false,
        removable: false,
      }),
    )
    .addResult(
      createResult(outOfDate, analysis.outOfDate, {
        description: `${plural} that have not checked in for more than ${checkInDays} days, or never reported a check-in.`,
        includeInNonVerbose: true,
        removable: false,
      }),
    )
    .addResult(
      createResult(orphaned, analysis.orphaned, {
        description: `${plural} in no group besides the default catch-all groups.`,
        includeInNonVerbose: true,
        removable: false,
      }),
    );

  report
    .setMetadata(CRUFTINESS_SECTION, outOfDate, cruftEntry(analysis.outOfDate, analysis.all))
    .setMetadata(CRUFTINESS_SECTION, orphaned, cruftEntry(analysis.orphaned, analysis.all));
  for (const [version, count] of analysis.versions) {
    report.setMetadata(VERSION_SECTION, version, { kind: 'count', count });
  }
  for (const [model, count] of analysis.models) {
    report.setMetadata(MODEL_SECTION, model, { kind: 'count', count });
  }
  return report;
}

export const REPORT_BUILDERS: Record<ReportKind, (ctx: BuildContext) => Report> = {
  computers: ctx => buildDeviceReport('computers', ctx),
  'mobile-devices': ctx => buildDeviceReport('mobile-devices', ctx),
  'computer-groups': ctx => buildGroupReport('computer-groups', ctx),
  'mobile-device-groups': ctx => buildGroupReport('mobile-device-groups', ctx),
  packages: ctx => buildUsageReport('packages', ctx),
  scripts: ctx => buildUsageReport('scripts', ctx),
  printers: ctx => buildUsageReport('printers', ctx),
  'computer-profiles': ctx => buildScopeReport('computer-profiles', ctx),
  'mobile-device-profiles': ctx => buildScopeReport('mobile-device-profiles', ctx),
  policies: ctx => buildPolicyReport(ctx),
  'mac-apps': ctx => buildScopeReport('mac-apps', ctx),
  'mobile-apps': ctx => buildScopeReport('mobile-apps', ctx),
};
