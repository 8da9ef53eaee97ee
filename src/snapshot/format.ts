/**
 * Snapshot format
 *
 * A snapshot is plain JSON-compatible data:
 *
 * ```
 * { format: 1, checksum: "sha256:…", root: NodeSnapshot }
 * ```
 *
 * The checksum is the content address of `root`. Derived values are never
 * stored; structured nodes record where their schema derivation sat so it
 * can be rebuilt in place.
 */

import { z } from 'zod';
import type { PrimitiveTypeName } from '../fields/type-constraint.js';

export const SNAPSHOT_FORMAT = 1;

/**
 * Type constraints that can be written as data
 */
export type SerializedConstraint =
  | { kind: 'primitive'; name: PrimitiveTypeName }
  | { kind: 'array'; element: SerializedConstraint | null }
  | { kind: 'one-of'; options: SerializedConstraint[] };

export const serializedConstraintSchema: z.ZodType<SerializedConstraint> = z.lazy(() =>
  z.union([
    z.object({
      kind: z.literal('primitive'),
      name: z.enum(['string', 'number', 'boolean', 'bigint', 'object']),
    }),
    z.object({
      kind: z.literal('array'),
      element: serializedConstraintSchema.nullable(),
    }),
    z.object({
      kind: z.literal('one-of'),
      options: z.array(serializedConstraintSchema),
    }),
  ])
);

export const valueSnapshotSchema = z.object({
  /** Source identifier */
  source: z.string().min(1),
  location: z.string().optional(),
  code: z.string().optional(),
  value: z.unknown(),
});

export type ValueSnapshot = z.infer<typeof valueSnapshotSchema>;

export const fieldSnapshotSchema = z.object({
  name: z.string().min(1),
  type: serializedConstraintSchema.optional(),
  values: z.array(valueSnapshotSchema),
  /** Position of the schema derivation among the field's values */
  derivedPosition: z.number().int().nonnegative().optional(),
});

export type FieldSnapshot = z.infer<typeof fieldSnapshotSchema>;

export const NodeKind = {
  CATALOG: 'catalog',
  FIELDS: 'fields',
  STRUCTURED: 'structured',
} as const;

export type NodeKindValue = (typeof NodeKind)[keyof typeof NodeKind];

export interface NodeSnapshot {
  kind: NodeKindValue;
  /** Catalog name */
  name?: string | undefined;
  /** Entity schema of a structured node */
  schema?: string | undefined;
  /** Whether a structured node's field set differed from its schema */
  altered?: boolean | undefined;
  fields: FieldSnapshot[];
  children: NodeSnapshot[];
}

export const nodeSnapshotSchema: z.ZodType<NodeSnapshot> = z.lazy(() =>
  z.object({
    kind: z.enum([NodeKind.CATALOG, NodeKind.FIELDS, NodeKind.STRUCTURED]),
    name: z.string().optional(),
    schema: z.string().optional(),
    altered: z.boolean().optional(),
    fields: z.array(fieldSnapshotSchema),
    children: z.array(nodeSnapshotSchema),
  })
);

export const catalogSnapshotSchema = z.object({
  format: z.literal(SNAPSHOT_FORMAT),
  checksum: z.string().min(1),
  root: nodeSnapshotSchema,
});

export type CatalogSnapshot = z.infer<typeof catalogSnapshotSchema>;

/**
 * Converts leaf values to and from JSON-compatible data
 */
export interface ValueCodec {
  encode(value: unknown): unknown;
  decode(encoded: unknown): unknown;
}
