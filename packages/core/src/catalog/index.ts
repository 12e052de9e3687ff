// packages/core/src/catalog/index.ts -- barrel re-export

export { FIELD_PATHS } from './paths.js';
export type { FieldPath } from './paths.js';
export {
  queryPath,
  flatten,
  isFieldNode,
  textOf,
  firstText,
  numberOf,
  isTrue,
  isFalse,
  identityOf,
} from './field-tree.js';
export { toGroupObject, toDeviceRecord, isGroupType, isDeviceType } from './records.js';
export { SnapshotCatalog, loadCatalogSnapshot, catalogSnapshotSchema, idSchema } from './snapshot.js';
export type { CatalogSnapshotInput } from './snapshot.js';
