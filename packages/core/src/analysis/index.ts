// packages/core/src/analysis/index.ts -- barrel re-export

export { IdentitySet } from './identity-set.js';
export { extractMembers, extractFromSources } from './membership.js';
export type { MembershipSource } from './membership.js';
export { partition, partitionFromResults, usageResults } from './partition.js';
export type { UsagePartition, UsageHeadings } from './partition.js';
export { resolveNestedGroups, findNestingCycles, nestedReferences } from './nesting.js';
export type { NestingResolution } from './nesting.js';
export { detectEmptyGroups } from './empty-groups.js';
export { score, cruftRank, cruftScore, cruftEntry, formatPercentage } from './cruft.js';
export {
  normalizeVersion,
  compareVersions,
  parseModelIdentifier,
  compareModelIdentifiers,
  buildHistogram,
} from './histogram.js';
export type { Histogram, ModelIdentifier } from './histogram.js';
export {
  analyzeDevices,
  parseCheckIn,
  isOutOfDate,
  isOrphaned,
  resolveCheckInDays,
} from './devices.js';
export type { DeviceAnalysis, DeviceAnalysisOptions } from './devices.js';
