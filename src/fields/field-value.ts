/**
 * Field values
 *
 * A FieldValue is one of two variants:
 * - ObservedValue: an immutable literal tagged with the Source it came from
 * - DerivedValue: a value computed on demand from other fields and cached
 *   until one of them changes
 *
 * Derived value lifecycle:
 *
 *   unattached ──(inserted into a Field)──▶ attached     (one way)
 *   invalid ──(successful computation)──▶ valid
 *   valid ──(invalidate / upstream change)──▶ invalid
 */

import { DEFAULT_CONFIG, DEFAULT_LOGGER, FailurePolicy, createConfiguredLogger } from '../core/config.js';
import type { CatalogConfig, FailurePolicyValue } from '../core/config.js';
import { CycleError, DuplicateOwnershipError } from '../core/errors.js';
import { Handle } from '../core/handle.js';
import { toSource } from '../core/identity/source.js';
import type { Source } from '../core/identity/source.js';
import type { Logger } from '../core/logging/types.js';
import type { CatalogNode } from '../tree/node.js';
import { DependencySource } from './dependency-source.js';
import type { DependencySpec } from './dependency-source.js';
import type { Field, InvalidationChain } from './field.js';
import { assertSatisfies } from './type-constraint.js';

/**
 * Computes a derived value from the current values of its dependencies,
 * passed in declaration order
 */
export type Derivation<T> = (...args: unknown[]) => T;

export class ObservedValue<T = unknown> {
  readonly kind = 'observed';
  private readonly data: T;
  private readonly origin: Source;

  /**
   * @param source - Source, source spec string, or null for the default source
   */
  constructor(data: T, source: Source | string | null = null) {
    this.data = data;
    this.origin = toSource(source);
  }

  value(): T {
    return this.data;
  }

  source(): Source {
    return this.origin;
  }

  toString(): string {
    return `Value ${String(this.data)} from ${this.origin.id}`;
  }
}

export interface DerivedValueOptions {
  /** Path expressions or Fields, one per argument of the derivation */
  readonly dependencies?: readonly DependencySpec[];
  /** Origin for path dependencies until the value is attached to a field on a node */
  readonly pathNode?: CatalogNode;
  readonly failurePolicy?: FailurePolicyValue;
  readonly logger?: Logger;
  /** Supplies the failure policy and logger not given above (default: read from the environment) */
  readonly config?: CatalogConfig;
  /** Name of the schema derivation this value was built from */
  readonly recipe?: string;
}

export interface ReadOptions {
  /** Overrides the value's own failure policy for this read */
  readonly failurePolicy?: FailurePolicyValue;
}

export class DerivedValue<T = unknown> {
  readonly kind = 'derived';
  readonly failurePolicy: FailurePolicyValue;
  readonly recipe: string | undefined;
  private readonly compute: Derivation<T>;
  private readonly dependencySource: DependencySource;
  private readonly logger: Logger;
  private cached: T | null = null;
  private valid = false;
  private evaluating = false;
  private typeUsable = true;
  private owner: Handle<Field<T>> | undefined;
  private everAttached = false;

  constructor(compute: Derivation<T>, options: DerivedValueOptions = {}) {
    this.compute = compute;
    this.failurePolicy = options.failurePolicy ?? (options.config ?? DEFAULT_CONFIG).failurePolicy;
    this.logger = options.logger ?? (options.config === undefined ? DEFAULT_LOGGER : createConfiguredLogger(options.config));
    this.recipe = options.recipe;
    this.dependencySource = new DependencySource(
      options.dependencies ?? [],
      (chain) => this.invalidate(chain),
      options.pathNode
    );
  }

  /**
   * Whether the cached value can be returned without recomputing
   */
  get isValid(): boolean {
    return this.valid;
  }

  /**
   * False once a computed value failed the owning field's type constraint
   */
  get usable(): boolean {
    return this.typeUsable;
  }

  get attached(): boolean {
    return this.owner?.alive === true;
  }

  /** The field holding this value, if any */
  get field(): Field<T> | undefined {
    return this.owner?.deref();
  }

  source(): DependencySource {
    return this.dependencySource;
  }

  /**
   * The cached value, recomputing it first when invalid. On failure the
   * failure policy decides:
   * - 'raise': the error propagates
   * - 'warn': logs `derived_value_failed`, returns null, stays invalid
   * - 'skip': returns null, stays invalid
   * - 'ignore': returns null and caches it as valid
   *
   * A value that (indirectly) reads itself fails with CycleError whatever
   * the policy.
   */
  value(options: ReadOptions = {}): T | null {
    if (this.valid && this.dependencySource.resolved) {
      return this.cached;
    }
    if (this.evaluating) {
      throw new CycleError(`${this.dependencySource.id} depends on its own value`);
    }

    this.evaluating = true;
    try {
      if (this.valid) {
        if (this.dependencySource.refreshReferences()) {
          return this.cached;
        }
        this.invalidate();
      }
      const result = this.compute(...this.dependencySource.getDependencyValues());
      const field = this.field;
      if (field !== undefined) {
        this.typeUsable = false;
        assertSatisfies(field.type, result, `Derived value of field ${field.name}`);
      }
      this.typeUsable = true;
      this.cached = result;
      this.valid = true;
      return result;
    } catch (error) {
      if (error instanceof CycleError) {
        throw error;
      }
      return this.fail(error, options.failurePolicy ?? this.failurePolicy);
    } finally {
      this.evaluating = false;
    }
  }

  /**
   * Mark the cached value stale. When this value is its field's current
   * value the field's dependents are invalidated too.
   *
   * A value that is not current passes nothing on, so a cycle running
   * through it is only reported once it becomes current.
   *
   * @param chain - values already invalidating in this round
   * @throws CycleError if this value is already in the chain
   */
  invalidate(chain: InvalidationChain = new Set()): void {
    if (chain.has(this)) {
      throw new CycleError(`Invalidation of ${this.dependencySource.id} depends on itself`);
    }
    this.valid = false;

    const field = this.field;
    if (field !== undefined && field.isCurrent(this)) {
      field.notify(this, this, new Set([...chain, this]));
    }
  }

  /**
   * Re-anchor path dependencies at a new node
   */
  setPathNode(node: CatalogNode | undefined): void {
    const wasValid = this.valid;
    this.dependencySource.setPathNode(node);
    if (wasValid) {
      this.invalidate();
    }
  }

  /**
   * @internal Called by Field before it takes ownership
   */
  assertAttachable(field: Field<T>): void {
    if (this.everAttached) {
      const current = this.field;
      const where = current === undefined ? 'a field' : `field ${current.name}`;
      throw new DuplicateOwnershipError(
        `${this.dependencySource.id} already belongs to ${where}; cannot attach to field ${field.name}`
      );
    }
  }

  /**
   * @internal Called by Field once the value is stored
   */
  attachTo(field: Field<T>): void {
    this.assertAttachable(field);
    this.owner = new Handle(field);
    this.everAttached = true;
    const node = field.node;
    if (node !== undefined) {
      this.setPathNode(node);
    }
  }

  /**
   * @internal Called by Field when the value is removed. The value cannot
   * be attached again.
   */
  detach(): void {
    this.owner?.release();
    this.dependencySource.release();
    this.valid = false;
    this.cached = null;
  }

  toString(): string {
    return this.valid ? `Derived value ${String(this.cached)} from ${this.dependencySource.id}` : `Derived value from ${this.dependencySource.id} (invalid)`;
  }

  private fail(error: unknown, policy: FailurePolicyValue): null {
    switch (policy) {
      case FailurePolicy.RAISE:
        throw error;
      case FailurePolicy.WARN:
        this.logger.warn('derived_value_failed', {
          source: this.dependencySource.id,
          field: this.field?.name,
          error: error instanceof Error ? error.message : String(error),
        });
        this.cached = null;
        this.valid = false;
        return null;
      case FailurePolicy.SKIP:
        this.cached = null;
        this.valid = false;
        return null;
      case FailurePolicy.IGNORE:
        this.cached = null;
        this.valid = true;
        return null;
    }
  }
}

export type FieldValue<T = unknown> = ObservedValue<T> | DerivedValue<T>;

export function isFieldValue<T>(value: T | FieldValue<T>): value is FieldValue<T> {
  return value instanceof ObservedValue || value instanceof DerivedValue;
}
