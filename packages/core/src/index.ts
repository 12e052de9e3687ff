// @fleetsweep/core - Catalog cruft auditing engine
// Usage partitioning, group nesting, cruft scoring, device staleness, report assembly

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Catalog
  ObjectType,
  GroupType,
  DeviceType,
  Identity,
  FieldValue,
  FieldNode,
  ManagedObject,
  GroupCriterion,
  GroupObject,
  DeviceRecord,
  CatalogAccessor,
  // Reports
  ReportKind,
  Result,
  CruftRank,
  CruftScore,
  MetadataEntry,
  MetadataSection,
  ReportFailure,
  RunOptions,
  // Events
  RunStartedEvent,
  ReportStartedEvent,
  ReportCompletedEvent,
  ReportFailedEvent,
  RunCompletedEvent,
  RunEvent,
  // History
  RunRecord,
  ScoreRecord,
  // Config
  CycleMode,
  ServerConfig,
  CatalogConfig,
  DevicesConfig,
  NestingConfig,
  OutputConfig,
  HistoryConfig,
  AdvancedConfig,
  ProjectConfig,
} from './types/index.js';
export { OBJECT_TYPES, REPORT_KINDS } from './types/index.js';

// Utilities
export {
  generateRunId,
  ConfigError,
  CatalogError,
  ReportAbortError,
  ContractError,
  NestingCycleError,
  RemovalFileError,
  DatabaseError,
  createLogger,
  silentLogger,
} from './utils/index.js';
export type { Logger, LogLevel } from './utils/index.js';
export {
  DEFAULT_CHECK_IN_DAYS,
  CONFIG_FILENAME,
  STATE_DIR,
  DEFAULT_DB_PATH,
  DEFAULT_HISTORY_LIMIT,
  UNKNOWN_BUCKET,
  DEFAULT_COMPUTER_GROUPS,
  DEFAULT_MOBILE_DEVICE_GROUPS,
} from './utils/constants.js';

// Configuration
export { DEFAULT_CONFIG, projectConfigSchema, validateConfig, loadConfig, writeConfig, deepMerge } from './config/index.js';
export type { ProjectConfigInput, ConfigOverrides } from './config/index.js';

// Catalog access
export {
  FIELD_PATHS,
  queryPath,
  textOf,
  firstText,
  numberOf,
  isTrue,
  isFalse,
  identityOf,
  toGroupObject,
  toDeviceRecord,
  isGroupType,
  isDeviceType,
  SnapshotCatalog,
  loadCatalogSnapshot,
  catalogSnapshotSchema,
} from './catalog/index.js';
export type { FieldPath, CatalogSnapshotInput } from './catalog/index.js';

// Analysis
export {
  IdentitySet,
  extractMembers,
  extractFromSources,
  partition,
  partitionFromResults,
  usageResults,
  resolveNestedGroups,
  findNestingCycles,
  detectEmptyGroups,
  score,
  cruftRank,
  cruftScore,
  cruftEntry,
  formatPercentage,
  normalizeVersion,
  compareVersions,
  parseModelIdentifier,
  compareModelIdentifiers,
  buildHistogram,
  analyzeDevices,
  parseCheckIn,
  isOutOfDate,
  isOrphaned,
  resolveCheckInDays,
} from './analysis/index.js';
export type {
  MembershipSource,
  UsagePartition,
  UsageHeadings,
  NestingResolution,
  Histogram,
  DeviceAnalysis,
  DeviceAnalysisOptions,
} from './analysis/index.js';

// Reports
export {
  Report,
  createResult,
  CRUFTINESS_SECTION,
  VERSION_SECTION,
  MODEL_SECTION,
  TYPE_LABELS,
  REPORT_TYPES,
  REPORT_BUILDERS,
  buildReportDocument,
  writeReportDocument,
  loadRemovals,
  planRemovals,
} from './report/index.js';
export type {
  BuildContext,
  ReportDocument,
  ReportDocumentMeta,
  RemovalEntry,
  RemovalRequest,
  RemovalPlan,
  RemovalPlanEntry,
} from './report/index.js';

// Engine (report runs + events)
export { EventBus, runReports, resolveRunOptions } from './engine/index.js';
export type { RunOutcome, RunReportsOptions } from './engine/index.js';

// Memory / Database
export { openDatabase, runMigrations, getSchemaVersion, RunStore, collectScores } from './memory/index.js';
