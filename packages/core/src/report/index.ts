// packages/core/src/report/index.ts -- barrel re-export

export { Report, createResult, CRUFTINESS_SECTION, VERSION_SECTION, MODEL_SECTION } from './report.js';
export {
  TYPE_LABELS,
  REPORT_TYPES,
  USAGE_SOURCES,
  SCOPE_SPECS,
  describeContainers,
} from './definitions.js';
export type { UsageReportKind, ScopeReportKind, UsageSourceSpec, ScopeSpec } from './definitions.js';
export {
  REPORT_BUILDERS,
  buildUsageReport,
  buildGroupReport,
  buildScopeReport,
  buildPolicyReport,
  buildDeviceReport,
} from './builders.js';
export type { BuildContext } from './builders.js';
export {
  buildReportDocument,
  writeReportDocument,
  loadRemovals,
  planRemovals,
} from './document.js';
export type {
  ReportDocument,
  ReportDocumentMeta,
  DocumentReport,
  DocumentResult,
  DocumentMetadataEntry,
  RemovalEntry,
  RemovalRequest,
  RemovalPlan,
  RemovalPlanEntry,
} from './document.js';
