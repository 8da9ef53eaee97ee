/**
 * Snapshot and restore of catalog subtrees
 *
 * A snapshot never includes the node's parent, and includes its children
 * unless asked not to. Derived values hold functions, so they are not
 * stored: a value rebuilt from an entity schema records its position and is
 * rebuilt from the schema on restore, any other derived value either fails
 * the snapshot or is dropped with a warning.
 */

import { DEFAULT_CONFIG, DEFAULT_LOGGER, createConfiguredLogger } from '../core/config.js';
import type { CatalogConfig, SnapshotDerivedModeValue } from '../core/config.js';
import { CatalogError, SnapshotError } from '../core/errors.js';
import { computeContentAddress, verifyContentAddress } from '../core/identity/content-address.js';
import { defaultSourceRegistry } from '../core/identity/source.js';
import type { Source, SourceRegistry } from '../core/identity/source.js';
import type { Logger } from '../core/logging/types.js';
import { Field } from '../fields/field.js';
import { FieldNode } from '../fields/field-node.js';
import { DerivedValue, ObservedValue } from '../fields/field-value.js';
import { describeConstraint } from '../fields/type-constraint.js';
import type { TypeConstraint } from '../fields/type-constraint.js';
import { schemaField } from '../schema/entity-schema.js';
import type { SchemaRegistry } from '../schema/entity-schema.js';
import { StructuredFieldNode } from '../schema/structured-node.js';
import { Catalog } from '../tree/catalog.js';
import type { CatalogNode } from '../tree/node.js';
import { NodeKind, SNAPSHOT_FORMAT, catalogSnapshotSchema } from './format.js';
import type {
  CatalogSnapshot,
  FieldSnapshot,
  NodeSnapshot,
  SerializedConstraint,
  ValueCodec,
  ValueSnapshot,
} from './format.js';

export interface SnapshotOptions {
  /** Include the node's descendants (default: true) */
  readonly includeChildren?: boolean;
  /** What to do with derived values that no schema can rebuild */
  readonly derived?: SnapshotDerivedModeValue;
  readonly logger?: Logger;
  readonly codec?: ValueCodec;
  /** Supplies the derived mode and logger not given above */
  readonly config?: CatalogConfig;
}

export interface RestoreOptions {
  /** Schemas for structured nodes in the snapshot */
  readonly schemas?: SchemaRegistry;
  /** Registry sources are interned in (default: the process-wide one) */
  readonly registry?: SourceRegistry;
  readonly logger?: Logger;
  readonly codec?: ValueCodec;
  /** Supplies the logger when none is given, and is passed on to structured nodes */
  readonly config?: CatalogConfig;
}

const IDENTITY_CODEC: ValueCodec = {
  encode: (value) => value,
  decode: (encoded) => encoded,
};

interface CaptureContext {
  readonly includeChildren: boolean;
  readonly derived: SnapshotDerivedModeValue;
  readonly logger: Logger;
  readonly codec: ValueCodec;
}

interface RebuildContext {
  readonly schemas: SchemaRegistry | undefined;
  readonly registry: SourceRegistry;
  readonly logger: Logger;
  readonly config: CatalogConfig | undefined;
  readonly codec: ValueCodec;
}

function resolveLogger(options: { readonly logger?: Logger; readonly config?: CatalogConfig }): Logger {
  if (options.logger !== undefined) {
    return options.logger;
  }
  return options.config === undefined ? DEFAULT_LOGGER : createConfiguredLogger(options.config);
}

function isJsonCompatible(value: unknown): boolean {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonCompatible);
  }
  if (typeof value === 'object') {
    const prototype: unknown = Object.getPrototypeOf(value);
    return (prototype === Object.prototype || prototype === null) && Object.values(value).every(isJsonCompatible);
  }
  return false;
}

/**
 * The constraint as data, or undefined when it names classes or functions
 */
export function serializeConstraint(constraint: TypeConstraint): SerializedConstraint | undefined {
  switch (constraint.kind) {
    case 'primitive':
      return { kind: 'primitive', name: constraint.name };
    case 'array': {
      if (constraint.element === null) {
        return { kind: 'array', element: null };
      }
      const element = serializeConstraint(constraint.element);
      return element === undefined ? undefined : { kind: 'array', element };
    }
    case 'one-of': {
      const options: SerializedConstraint[] = [];
      for (const option of constraint.options) {
        const serialized = serializeConstraint(option);
        if (serialized === undefined) {
          return undefined;
        }
        options.push(serialized);
      }
      return { kind: 'one-of', options };
    }
    case 'instance':
    case 'typed-array':
    case 'predicate':
      return undefined;
  }
}

function captureField(field: Field, structured: boolean, context: CaptureContext): FieldSnapshot {
  const values: ValueSnapshot[] = [];
  let derivedPosition: number | undefined;

  for (const entry of field) {
    if (entry instanceof DerivedValue) {
      if (structured && entry.recipe === field.name && derivedPosition === undefined) {
        derivedPosition = values.length;
        continue;
      }
      if (context.derived === 'fail') {
        throw new SnapshotError(`Field ${field.name} holds derived value ${entry.source().id}, which cannot be stored`);
      }
      context.logger.warn('snapshot_derived_dropped', { field: field.name, source: entry.source().id });
      continue;
    }

    const encoded = context.codec.encode(entry.value());
    if (!isJsonCompatible(encoded)) {
      throw new SnapshotError(`Value of field ${field.name} from ${entry.source().id} is not JSON-compatible`);
    }
    const source = entry.source();
    const stored: ValueSnapshot = { source: source.id, value: encoded };
    if (source.location !== undefined) {
      stored.location = source.location;
    }
    if (source.code !== undefined) {
      stored.code = source.code;
    }
    values.push(stored);
  }

  const snapshot: FieldSnapshot = { name: field.name, values };
  if (derivedPosition !== undefined) {
    snapshot.derivedPosition = derivedPosition;
  }

  const type = field.type;
  if (type !== null) {
    const serialized = serializeConstraint(type);
    if (serialized === undefined) {
      context.logger.warn('snapshot_type_omitted', { field: field.name, type: describeConstraint(type) });
    } else {
      snapshot.type = serialized;
    }
  }
  return snapshot;
}

function captureNode(node: CatalogNode, context: CaptureContext): NodeSnapshot {
  const children = context.includeChildren ? node.children.map((child) => captureNode(child, context)) : [];

  if (node instanceof Catalog) {
    return { kind: NodeKind.CATALOG, name: node.name, fields: [], children };
  }
  if (node instanceof StructuredFieldNode) {
    return {
      kind: NodeKind.STRUCTURED,
      schema: node.schema.name,
      altered: node.alteredStructure,
      fields: [...node.fields()].map((field) => captureField(field, true, context)),
      children,
    };
  }
  if (node instanceof FieldNode) {
    return {
      kind: NodeKind.FIELDS,
      fields: [...node.fields()].map((field) => captureField(field, false, context)),
      children,
    };
  }
  throw new SnapshotError(`Cannot snapshot ${node.describe()}: unsupported node type`);
}

/**
 * Capture a node (and by default its subtree) as plain data
 *
 * @throws SnapshotError for unsupported nodes, values that are not
 *   JSON-compatible after encoding, or derived values under the 'fail' mode
 */
export function snapshotNode(node: CatalogNode, options: SnapshotOptions = {}): CatalogSnapshot {
  const context: CaptureContext = {
    includeChildren: options.includeChildren ?? true,
    derived: options.derived ?? (options.config ?? DEFAULT_CONFIG).snapshot.derived,
    logger: resolveLogger(options),
    codec: options.codec ?? IDENTITY_CODEC,
  };
  const root = captureNode(node, context);
  return { format: SNAPSHOT_FORMAT, checksum: computeContentAddress(root), root };
}

function restoreSource(stored: ValueSnapshot, registry: SourceRegistry): Source {
  const source = registry.intern(stored.source, stored.location);
  if (stored.code !== undefined && !source.isDefault) {
    source.setCode(stored.code);
  }
  return source;
}

function rebuildField(snapshot: FieldSnapshot, structured: StructuredFieldNode | undefined, context: RebuildContext): Field {
  const declaredType = structured === undefined ? undefined : schemaField(structured.schema, snapshot.name)?.type;
  const field = new Field(snapshot.name, { type: snapshot.type ?? declaredType ?? null, registry: context.registry });

  try {
    for (const stored of snapshot.values) {
      field.append(new ObservedValue(context.codec.decode(stored.value), restoreSource(stored, context.registry)), {
        checkSource: false,
      });
    }

    if (snapshot.derivedPosition !== undefined) {
      const derived = structured?.buildDerivation(snapshot.name);
      if (derived === undefined) {
        throw new SnapshotError(`No schema derivation for field ${snapshot.name}`);
      }
      field.insert(Math.min(snapshot.derivedPosition, field.length), derived);
    }
  } catch (error) {
    if (error instanceof CatalogError && !(error instanceof SnapshotError)) {
      throw new SnapshotError(`Cannot restore field ${snapshot.name}: ${error.message}`);
    }
    throw error;
  }
  return field;
}

function createNode(snapshot: NodeSnapshot, context: RebuildContext): CatalogNode {
  switch (snapshot.kind) {
    case NodeKind.CATALOG:
      return new Catalog(snapshot.name);
    case NodeKind.FIELDS: {
      const node = new FieldNode();
      for (const field of snapshot.fields) {
        node.addField(rebuildField(field, undefined, context));
      }
      return node;
    }
    case NodeKind.STRUCTURED: {
      const schemaName = snapshot.schema;
      const schema = schemaName === undefined ? undefined : context.schemas?.get(schemaName);
      if (schemaName === undefined || schema === undefined) {
        throw new SnapshotError(`No entity schema registered for structured node "${schemaName ?? '(unnamed)'}"`);
      }
      const node = new StructuredFieldNode(schema, undefined, { logger: context.logger, config: context.config });
      node.restoreFields(
        snapshot.fields.map((field) => rebuildField(field, node, context)),
        snapshot.altered ?? false
      );
      return node;
    }
  }
}

function rebuildNode(snapshot: NodeSnapshot, context: RebuildContext): CatalogNode {
  const node = createNode(snapshot, context);
  for (const child of snapshot.children) {
    rebuildNode(child, context).setParent(node);
  }
  return node;
}

/**
 * Rebuild a node from a snapshot. The node comes back detached; schema
 * derivations are rebuilt from the registered schemas.
 *
 * @throws SnapshotError for malformed snapshots, checksum mismatches and
 *   unknown schemas
 */
export function restoreNode(snapshot: unknown, options: RestoreOptions = {}): CatalogNode {
  const parsed = catalogSnapshotSchema.safeParse(snapshot);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new SnapshotError(`Malformed snapshot: ${issues.join(', ')}`);
  }
  if (!verifyContentAddress(parsed.data.root, parsed.data.checksum)) {
    throw new SnapshotError('Snapshot checksum does not match its content');
  }

  return rebuildNode(parsed.data.root, {
    schemas: options.schemas,
    registry: options.registry ?? defaultSourceRegistry,
    logger: resolveLogger(options),
    config: options.config,
    codec: options.codec ?? IDENTITY_CODEC,
  });
}
