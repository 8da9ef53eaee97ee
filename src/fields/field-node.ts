/**
 * Field containers
 *
 * A FieldNode is a catalog tree node that owns a named, ordered set of
 * Fields. Indexed access by name or position reads a field's current value;
 * `fields()` yields the Field objects themselves.
 */

import { DuplicateOwnershipError, LookupError, TypeMismatchError } from '../core/errors.js';
import type { Source } from '../core/identity/source.js';
import { CatalogNode, bumpStructureGeneration } from '../tree/node.js';
import type { TraversalOrder } from '../tree/traversal.js';
import type { Field } from './field.js';
import { DerivedValue, ObservedValue } from './field-value.js';
import { describeConstraint, satisfies } from './type-constraint.js';
import type { TypeConstraint } from './type-constraint.js';

/**
 * What extractAcrossTree does at a node lacking the field
 */
export type MissingFieldPolicy = 'fail' | 'skip' | 'null';

export interface ExtractOptions {
  readonly order?: TraversalOrder;
  readonly missing?: MissingFieldPolicy;
  /** Element type to enforce; defaults to the first visited field's declared type */
  readonly type?: TypeConstraint;
}

export interface ExtractedValues {
  readonly values: unknown[];
  readonly elementType: TypeConstraint | null;
}

export interface GetOptions {
  /** Throw EmptyFieldError instead of returning undefined for an empty field */
  readonly strict?: boolean;
}

const MISSING = Symbol('missing');

export class FieldNode extends CatalogNode {
  private readonly fieldMap = new Map<string, Field>();

  constructor(parent?: CatalogNode, fields: readonly Field[] = []) {
    super(parent);
    for (const field of fields) {
      this.addField(field);
    }
  }

  get size(): number {
    return this.fieldMap.size;
  }

  get fieldNames(): readonly string[] {
    return [...this.fieldMap.keys()];
  }

  hasField(name: string): boolean {
    return this.fieldMap.has(name);
  }

  /**
   * The Field object stored under a name
   *
   * @throws LookupError if there is no such field
   */
  field(name: string): Field {
    const field = this.fieldMap.get(name);
    if (field === undefined) {
      throw new LookupError(`Field "${name}" not found on ${this.describe()}`, name);
    }
    return field;
  }

  override findField(name: string): Field | undefined {
    return this.fieldMap.get(name);
  }

  /**
   * Take ownership of a field
   *
   * @throws DuplicateOwnershipError if the field belongs to another node or
   *   the name is taken here
   */
  addField(field: Field): void {
    const owner = field.node;
    if (owner !== undefined) {
      throw new DuplicateOwnershipError(`Field ${field.name} already belongs to ${owner.describe()}`);
    }
    if (field.disposed) {
      throw new DuplicateOwnershipError(`Field ${field.name} was disposed`);
    }
    if (this.fieldMap.has(field.name)) {
      throw new DuplicateOwnershipError(`${this.describe()} already has a field named "${field.name}"`);
    }

    this.fieldMap.set(field.name, field);
    bumpStructureGeneration();
    field.attachToNode(this);
  }

  /**
   * Remove and detach a field
   *
   * @throws LookupError if there is no such field
   */
  delField(name: string): Field {
    const field = this.field(name);
    this.fieldMap.delete(name);
    bumpStructureGeneration();
    field.detachFromNode();
    return field;
  }

  *fields(): Generator<Field> {
    yield* this.fieldMap.values();
  }

  /**
   * Current value of each field, in field order (undefined for empty fields)
   */
  *values(): Generator<unknown> {
    for (const field of this.fieldMap.values()) {
      yield field.length === 0 ? undefined : field.value();
    }
  }

  /**
   * Current value of a field addressed by name or position. An empty field
   * yields undefined unless `strict` is set.
   */
  get(key: string | number, options: GetOptions = {}): unknown {
    const field = this.resolveField(key);
    if (field.length === 0 && options.strict !== true) {
      return undefined;
    }
    return field.value();
  }

  /**
   * Make a value current on a field addressed by name or position. A bare
   * literal is stored as an observed value from the given source (the
   * default source when omitted).
   */
  set(key: string | number, value: unknown, source?: Source | string | null): void {
    const field = this.resolveField(key);
    if (value instanceof ObservedValue || value instanceof DerivedValue) {
      field.setCurrent(value);
      return;
    }
    field.setCurrent(new ObservedValue(value, source ?? null));
  }

  /**
   * Collect one field's current value from every node of this subtree
   *
   * @throws LookupError for a missing field under the 'fail' policy
   * @throws TypeMismatchError if a value does not satisfy the element type
   */
  extractAcrossTree(fieldName: string, options: ExtractOptions = {}): ExtractedValues {
    const missing = options.missing ?? 'fail';
    let elementType: TypeConstraint | null = options.type ?? null;
    let typeDecided = options.type !== undefined;

    const collected = this.traverse(
      (node): unknown => {
        const field = node.findField(fieldName);
        if (field === undefined) {
          if (missing === 'fail') {
            throw new LookupError(`${node.describe()} has no field "${fieldName}"`, fieldName);
          }
          return missing === 'skip' ? MISSING : null;
        }
        if (!typeDecided) {
          elementType = field.type;
          typeDecided = true;
        }
        return field.length === 0 ? null : field.value();
      },
      { order: options.order ?? 'postorder', filter: { exclude: MISSING } }
    );

    const constraint = elementType;
    if (constraint !== null) {
      collected.forEach((value, index) => {
        if (!satisfies(constraint, value)) {
          throw new TypeMismatchError(
            `Value ${index} of "${fieldName}" does not satisfy ${describeConstraint(constraint)}`,
            describeConstraint(constraint)
          );
        }
      });
    }

    return { values: collected, elementType: constraint };
  }

  /**
   * Selectors match the node kind or the current value of a `name` field
   */
  override matches(selector: string): boolean {
    if (super.matches(selector)) {
      return true;
    }
    const name = this.fieldMap.get('name');
    return name !== undefined && name.length > 0 && name.value() === selector;
  }

  override describe(): string {
    const name = this.fieldMap.get('name');
    if (name !== undefined && name.length > 0) {
      return `${this.kind} ${String(name.value())}`;
    }
    return this.kind;
  }

  private resolveField(key: string | number): Field {
    if (typeof key === 'string') {
      return this.field(key);
    }
    const name = this.fieldNames[key < 0 ? key + this.size : key];
    if (name === undefined) {
      throw new LookupError(`${this.describe()} has no field at position ${key}`, String(key));
    }
    return this.field(name);
  }
}

export function isFieldNode(node: CatalogNode): node is FieldNode {
  return node instanceof FieldNode;
}
