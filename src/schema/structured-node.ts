/**
 * Structured field nodes
 *
 * A StructuredFieldNode takes its fields from an entity schema when it is
 * constructed. Derived fields get a fresh DerivedValue built from the
 * schema's recipe, placed ahead of the default value. Adding or removing
 * fields afterwards marks the node as altered; `revert()` restores the
 * schema's field set.
 */

import type { CatalogConfig, FailurePolicyValue } from '../core/config.js';
import type { Logger } from '../core/logging/types.js';
import { Field } from '../fields/field.js';
import { FieldNode } from '../fields/field-node.js';
import { DerivedValue } from '../fields/field-value.js';
import type { CatalogNode } from '../tree/node.js';
import { schemaField } from './entity-schema.js';
import type { EntitySchema, FieldDescriptor } from './entity-schema.js';

export interface StructuredNodeOptions {
  /** Written to the `name` field, when the schema has one */
  readonly name?: string;
  /** Policy for recipes that do not set their own */
  readonly failurePolicy?: FailurePolicyValue;
  readonly logger?: Logger;
  /** Passed on to the derivations this node builds */
  readonly config?: CatalogConfig;
}

export class StructuredFieldNode extends FieldNode {
  readonly schema: EntitySchema;
  private readonly failurePolicy: FailurePolicyValue | undefined;
  private readonly logger: Logger | undefined;
  private readonly config: CatalogConfig | undefined;
  private altered = false;
  private building = false;

  constructor(schema: EntitySchema, parent?: CatalogNode, options: StructuredNodeOptions = {}) {
    super(parent);
    this.schema = schema;
    this.failurePolicy = options.failurePolicy;
    this.logger = options.logger;
    this.config = options.config;

    this.building = true;
    try {
      for (const descriptor of schema.fields) {
        this.addField(this.buildField(descriptor));
      }
    } finally {
      this.building = false;
    }

    if (options.name !== undefined && this.hasField('name')) {
      this.field('name').default = options.name;
    }
  }

  override get kind(): string {
    return this.schema.name;
  }

  /**
   * True once fields were added or removed after construction. Stays true
   * even if the field set later matches the schema again; only `revert()`
   * clears it.
   */
  get alteredStructure(): boolean {
    return this.altered;
  }

  override addField(field: Field): void {
    super.addField(field);
    if (!this.building) {
      this.altered = true;
    }
  }

  override delField(name: string): Field {
    const field = super.delField(name);
    if (!this.building) {
      this.altered = true;
    }
    return field;
  }

  /**
   * Build the value a schema recipe describes for a field
   *
   * @returns undefined when the schema declares no derivation for the field
   */
  buildDerivation(fieldName: string): DerivedValue | undefined {
    const recipe = schemaField(this.schema, fieldName)?.derive;
    if (recipe === undefined) {
      return undefined;
    }
    return new DerivedValue(recipe.compute, {
      dependencies: recipe.dependencies,
      failurePolicy: recipe.failurePolicy ?? this.failurePolicy,
      logger: this.logger,
      config: this.config,
      recipe: fieldName,
      pathNode: this,
    });
  }

  /**
   * Position of the schema-built derived value in a field, or undefined
   * when the field holds none
   */
  derivationIndex(fieldName: string): number | undefined {
    if (!this.hasField(fieldName)) {
      return undefined;
    }
    const field = this.field(fieldName);
    const index = [...field].findIndex((entry) => entry instanceof DerivedValue && entry.recipe === fieldName);
    return index < 0 ? undefined : index;
  }

  /**
   * Restore the schema's field set: missing fields are recreated with their
   * defaults and derivations, extra fields are removed, and fields are put
   * back in schema order. Fields still present keep their values.
   */
  revert(): void {
    const wanted = new Set(this.schema.fields.map((descriptor) => descriptor.name));
    this.building = true;
    try {
      for (const name of this.fieldNames) {
        if (!wanted.has(name)) {
          this.delField(name);
        }
      }

      const kept = new Map<string, Field>();
      for (const descriptor of this.schema.fields) {
        kept.set(descriptor.name, this.hasField(descriptor.name) ? this.delField(descriptor.name) : this.buildField(descriptor));
      }
      for (const field of kept.values()) {
        this.addField(field);
      }
    } finally {
      this.building = false;
    }
    this.altered = false;
  }

  /**
   * @internal Replace the schema-built fields with restored ones
   */
  restoreFields(fields: readonly Field[], altered: boolean): void {
    this.building = true;
    try {
      for (const name of this.fieldNames) {
        this.delField(name).dispose();
      }
      for (const field of fields) {
        this.addField(field);
      }
    } finally {
      this.building = false;
    }
    this.altered = altered;
  }

  private buildField(descriptor: FieldDescriptor): Field {
    const field = new Field(descriptor.name, { type: descriptor.type ?? null });
    if (descriptor.default !== undefined) {
      field.default = descriptor.default;
    }
    const derived = this.buildDerivation(descriptor.name);
    if (derived !== undefined) {
      field.insert(0, derived);
    }
    return field;
  }
}
