/**
 * Entity schemas
 *
 * An entity schema is registered once per kind of catalog entry and lists
 * the fields every node of that kind starts with: name, type constraint,
 * default value and, for derived fields, a recipe the node turns into a
 * DerivedValue. Schemas can extend one another; an extending schema may
 * redeclare an inherited field, which keeps its inherited position.
 *
 * @example
 * ```typescript
 * const STAR = defineEntitySchema({
 *   name: 'star',
 *   extends: ENTITY_SCHEMA,
 *   fields: [
 *     { name: 'mass', type: FieldType.number },
 *     { name: 'luminosity', derive: { dependencies: ['mass'], compute: (m) => Number(m) ** 3.5 } },
 *   ],
 * });
 * ```
 */

import type { FailurePolicyValue } from '../core/config.js';
import { DuplicateOwnershipError, LookupError } from '../core/errors.js';
import type { Derivation } from '../fields/field-value.js';
import { FieldType } from '../fields/type-constraint.js';
import type { TypeConstraint } from '../fields/type-constraint.js';

/**
 * How a derived field computes its value
 */
export interface DerivationRecipe {
  /** Path expressions resolved from the node holding the field */
  readonly dependencies: readonly string[];
  readonly compute: Derivation<unknown>;
  readonly failurePolicy?: FailurePolicyValue;
}

export interface FieldDescriptor {
  readonly name: string;
  readonly type?: TypeConstraint | null;
  /** Stored under the default source when defined */
  readonly default?: unknown;
  readonly derive?: DerivationRecipe;
}

export interface EntitySchemaInput {
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];
  readonly extends?: EntitySchema;
}

export interface EntitySchema {
  readonly name: string;
  /** Every field, inherited ones first */
  readonly fields: readonly FieldDescriptor[];
  readonly parent: EntitySchema | undefined;
}

/**
 * Build a schema, flattening inherited fields
 *
 * @throws DuplicateOwnershipError if a field name is declared twice
 */
export function defineEntitySchema(input: EntitySchemaInput): EntitySchema {
  const name = input.name.trim();
  if (name === '') {
    throw new LookupError('Entity schema needs a name', input.name);
  }

  const declared = new Set<string>();
  for (const descriptor of input.fields) {
    if (descriptor.name.trim() === '') {
      throw new LookupError(`Schema ${name} declares a field without a name`, descriptor.name);
    }
    if (declared.has(descriptor.name)) {
      throw new DuplicateOwnershipError(`Schema ${name} declares field "${descriptor.name}" twice`);
    }
    declared.add(descriptor.name);
  }

  const inherited = input.extends?.fields ?? [];
  const fields = inherited.map((descriptor) => input.fields.find((own) => own.name === descriptor.name) ?? descriptor);
  for (const descriptor of input.fields) {
    if (!inherited.some((parentField) => parentField.name === descriptor.name)) {
      fields.push(descriptor);
    }
  }

  return Object.freeze({ name, fields: Object.freeze(fields), parent: input.extends });
}

/**
 * The descriptor of a field, if the schema declares one
 */
export function schemaField(schema: EntitySchema, fieldName: string): FieldDescriptor | undefined {
  return schema.fields.find((descriptor) => descriptor.name === fieldName);
}

/**
 * Whether the schema is, or extends, another schema
 */
export function extendsSchema(schema: EntitySchema, ancestor: EntitySchema): boolean {
  for (let current: EntitySchema | undefined = schema; current !== undefined; current = current.parent) {
    if (current === ancestor) {
      return true;
    }
  }
  return false;
}

/**
 * Base schema for named catalog entries
 */
export const ENTITY_SCHEMA = defineEntitySchema({
  name: 'Entity',
  fields: [{ name: 'name', type: FieldType.string }],
});

/**
 * Schemas by name, used to rebuild structured nodes from snapshots
 */
export class SchemaRegistry {
  private readonly schemas = new Map<string, EntitySchema>();

  constructor(schemas: readonly EntitySchema[] = []) {
    for (const schema of schemas) {
      this.register(schema);
    }
  }

  /**
   * @throws DuplicateOwnershipError if another schema has the same name
   */
  register(schema: EntitySchema): this {
    const existing = this.schemas.get(schema.name);
    if (existing !== undefined && existing !== schema) {
      throw new DuplicateOwnershipError(`A different schema named "${schema.name}" is already registered`);
    }
    this.schemas.set(schema.name, schema);
    return this;
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  get(name: string): EntitySchema | undefined {
    return this.schemas.get(name);
  }

  /**
   * @throws LookupError for an unregistered name
   */
  resolve(name: string): EntitySchema {
    const schema = this.schemas.get(name);
    if (schema === undefined) {
      throw new LookupError(`No entity schema named "${name}"`, name);
    }
    return schema;
  }

  names(): string[] {
    return [...this.schemas.keys()];
  }
}
