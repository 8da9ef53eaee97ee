/**
 * Snapshot / restore
 */

export {
  SNAPSHOT_FORMAT,
  NodeKind,
  catalogSnapshotSchema,
  nodeSnapshotSchema,
  fieldSnapshotSchema,
  valueSnapshotSchema,
  serializedConstraintSchema,
  type CatalogSnapshot,
  type NodeSnapshot,
  type NodeKindValue,
  type FieldSnapshot,
  type ValueSnapshot,
  type SerializedConstraint,
  type ValueCodec,
} from './format.js';
export { snapshotNode, restoreNode, serializeConstraint, type SnapshotOptions, type RestoreOptions } from './snapshot.js';
