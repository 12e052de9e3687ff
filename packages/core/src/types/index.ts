// packages/core/src/types/index.ts -- barrel re-export

export { OBJECT_TYPES } from './catalog.js';
export type {
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
} from './catalog.js';

export { REPORT_KINDS } from './report.js';
export type {
  ReportKind,
  Result,
  CruftRank,
  CruftScore,
  MetadataEntry,
  MetadataSection,
  ReportFailure,
  RunOptions,
} from './report.js';

export type {
  RunStartedEvent,
  ReportStartedEvent,
  ReportCompletedEvent,
  ReportFailedEvent,
  RunCompletedEvent,
  RunEvent,
} from './events.js';

export type { RunRecord, ScoreRecord } from './history.js';

export type {
  CycleMode,
  ServerConfig,
  CatalogConfig,
  DevicesConfig,
  NestingConfig,
  OutputConfig,
  HistoryConfig,
  AdvancedConfig,
  ProjectConfig,
} from './config.js';
