/**
 * Fields, their values and the nodes that hold them
 */

export {
  FieldType,
  satisfies,
  describeConstraint,
  assertSatisfies,
  type TypeConstraint,
  type PrimitiveTypeName,
  type TypedArrayConstructor,
  type InstanceConstructor,
} from './type-constraint.js';
export { parsePath, navigate, resolvePath, type ParsedPath, type PathStep } from './path.js';
export { DependencySource, type DependencySpec } from './dependency-source.js';
export {
  ObservedValue,
  DerivedValue,
  isFieldValue,
  type Derivation,
  type DerivedValueOptions,
  type ReadOptions,
  type FieldValue,
} from './field-value.js';
export {
  Field,
  type FieldKey,
  type FieldNotifier,
  type FieldOptions,
  type InsertOptions,
  type InvalidationChain,
  type NotifierHandle,
  type ValueSource,
} from './field.js';
export {
  FieldNode,
  isFieldNode,
  type ExtractOptions,
  type ExtractedValues,
  type GetOptions,
  type MissingFieldPolicy,
} from './field-node.js';
