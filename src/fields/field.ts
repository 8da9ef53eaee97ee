/**
 * Fields
 *
 * A Field is one attribute of a catalog entry. It holds an ordered list of
 * values, each tagged with where it came from; the first one is the
 * "current" value. At most one value per source is kept unless a caller
 * explicitly bypasses the check.
 *
 * Changes to the current value are announced to registered notifiers
 * *before* they are committed, so a notifier still sees the old current
 * value. A notifier that throws aborts the change.
 *
 * @example
 * ```typescript
 * const mass = new Field<number>('mass', { type: FieldType.number });
 * mass.set('Smith 2009', 1.4);
 * mass.set('Jones 2011', 1.6);
 * mass.value(); // 1.4
 * mass.setCurrent('Jones 2011');
 * mass.value(); // 1.6
 * ```
 */

import { CatalogError, DuplicateSourceError, EmptyFieldError, LookupError, SourceMismatchError } from '../core/errors.js';
import { Handle } from '../core/handle.js';
import { DEFAULT_SOURCE_ID, Source, defaultSourceRegistry, parseSourceSpec, toSource } from '../core/identity/source.js';
import type { SourceRegistry } from '../core/identity/source.js';
import type { FieldNode } from './field-node.js';
import { DependencySource } from './dependency-source.js';
import { DerivedValue, ObservedValue, isFieldValue } from './field-value.js';
import type { FieldValue } from './field-value.js';
import { assertSatisfies } from './type-constraint.js';
import type { TypeConstraint } from './type-constraint.js';

/**
 * Derived values currently propagating an invalidation
 */
export type InvalidationChain = ReadonlySet<DerivedValue<unknown>>;

/**
 * Called with the outgoing and incoming current value before a change is committed
 */
export type FieldNotifier = (
  previous: FieldValue<unknown> | undefined,
  next: FieldValue<unknown> | undefined,
  chain: InvalidationChain
) => void;

export interface NotifierHandle {
  readonly disposed: boolean;
  dispose(): void;
}

/**
 * Where a value came from
 */
export type ValueSource = Source | DependencySource;

/**
 * Addresses a value slot: a position, a source (or its identifier, null for
 * the default source), or the nth derived value
 */
export type FieldKey = number | ValueSource | string | null | { readonly derived: number };

export interface FieldOptions<T> {
  readonly type?: TypeConstraint | null;
  readonly default?: T;
  /** Registry used to intern source strings (default: the process-wide one) */
  readonly registry?: SourceRegistry;
}

export interface InsertOptions {
  /** Enforce one value per source (default: true) */
  readonly checkSource?: boolean;
}

class Subscription implements NotifierHandle {
  private active = true;

  constructor(readonly callback: FieldNotifier) {}

  get disposed(): boolean {
    return !this.active;
  }

  dispose(): void {
    this.active = false;
  }
}

function isDerivedSelector(key: FieldKey): key is { readonly derived: number } {
  return typeof key === 'object' && key !== null && !(key instanceof Source) && !(key instanceof DependencySource);
}

function describeKey(key: FieldKey): string {
  if (key === null) {
    return DEFAULT_SOURCE_ID;
  }
  if (typeof key === 'number') {
    return `position ${key}`;
  }
  if (typeof key === 'string') {
    return key;
  }
  if (key instanceof Source || key instanceof DependencySource) {
    return key.id;
  }
  return `derived value ${key.derived}`;
}

export class Field<T = unknown> {
  readonly name: string;
  private constraint: TypeConstraint | null;
  private entries: FieldValue<T>[] = [];
  private subscriptions: Subscription[] = [];
  private nodeHandle: Handle<FieldNode> | undefined;
  private isDisposed = false;
  private readonly registry: SourceRegistry;

  constructor(name: string, options: FieldOptions<T> = {}) {
    this.name = name;
    this.constraint = options.type ?? null;
    this.registry = options.registry ?? defaultSourceRegistry;
    if (options.default !== undefined) {
      this.set(null, options.default);
    }
  }

  // ---------------------------------------------------------------------------
  // Introspection
  // ---------------------------------------------------------------------------

  get type(): TypeConstraint | null {
    return this.constraint;
  }

  set type(constraint: TypeConstraint | null) {
    this.setType(constraint);
  }

  /**
   * Change the type constraint. Every stored observed value must satisfy the
   * new constraint, otherwise nothing changes.
   */
  setType(constraint: TypeConstraint | null): void {
    for (const entry of this.entries) {
      if (entry.kind === 'observed') {
        assertSatisfies(constraint, entry.value(), `Field ${this.name}`);
      }
    }
    this.constraint = constraint;
    for (const entry of this.derived()) {
      entry.invalidate();
    }
  }

  get length(): number {
    return this.entries.length;
  }

  get node(): FieldNode | undefined {
    return this.nodeHandle?.deref();
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  /** Subscriptions held, including disposed ones not yet pruned */
  get notifierCount(): number {
    return this.subscriptions.length;
  }

  [Symbol.iterator](): Iterator<FieldValue<T>> {
    return [...this.entries][Symbol.iterator]();
  }

  has(key: FieldKey): boolean {
    return this.indexOf(key) > -1;
  }

  /**
   * The value stored under a key
   *
   * @throws LookupError when the key matches no value
   */
  get(key: FieldKey): FieldValue<T> {
    const entry = this.entries[this.indexOf(key)];
    if (entry === undefined) {
      throw new LookupError(`Field ${this.name} has no value for ${describeKey(key)}`, describeKey(key));
    }
    return entry;
  }

  /**
   * @throws EmptyFieldError when the field holds no values
   */
  get current(): FieldValue<T> {
    const entry = this.entries[0];
    if (entry === undefined) {
      throw new EmptyFieldError(this.name);
    }
    return entry;
  }

  /**
   * The current value's payload
   */
  value(): T | null {
    return this.current.value();
  }

  isCurrent(entry: FieldValue<unknown>): boolean {
    return this.entries[0] === entry;
  }

  values(): (T | null)[] {
    return this.entries.map((entry) => entry.value());
  }

  sources(): ValueSource[] {
    return this.entries.map((entry) => entry.source());
  }

  sourceNames(): string[] {
    return this.entries.map((entry) => entry.source().id);
  }

  /**
   * Observed values, excluding the default
   */
  observed(): ObservedValue<T>[] {
    return this.entries.filter(
      (entry): entry is ObservedValue<T> => entry instanceof ObservedValue && !entry.source().isDefault
    );
  }

  derived(): DerivedValue<T>[] {
    return this.entries.filter((entry): entry is DerivedValue<T> => entry instanceof DerivedValue);
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  /**
   * Write a value. An existing slot is replaced in place after checking that
   * the new value has the slot's source; a literal takes the slot's source.
   * A key naming a new source appends a value for it.
   *
   * @throws SourceMismatchError, TypeMismatchError, DuplicateOwnershipError
   */
  set(key: FieldKey, value: T | FieldValue<T>): FieldValue<T> {
    const index = this.indexOf(key);
    const existing = this.entries[index];

    if (existing !== undefined) {
      const next = this.wrap(value, existing.source());
      if (next === existing) {
        return existing;
      }
      if (next.source() !== existing.source()) {
        throw new SourceMismatchError(
          `Value from ${next.source().id} cannot replace the ${existing.source().id} value of field ${this.name}`
        );
      }
      this.validate(next);
      if (index === 0) {
        this.notify(existing, next);
      }
      this.entries[index] = next;
      this.release(existing);
      this.adopt(next);
      return next;
    }

    if (typeof key === 'number' || isDerivedSelector(key)) {
      throw new LookupError(`Field ${this.name} has no value for ${describeKey(key)}`, describeKey(key));
    }

    const source = key instanceof DependencySource ? key : toSource(key, this.registry);
    const next = this.wrap(value, source);
    if (next.source() !== source) {
      throw new SourceMismatchError(`Value from ${next.source().id} does not match source ${source.id}`);
    }
    this.validate(next);
    if (this.entries.length === 0) {
      this.notify(undefined, next);
    }
    this.entries.push(next);
    this.adopt(next);
    return next;
  }

  /**
   * Insert a value before the slot the key addresses (a position may also
   * be the current length, which appends)
   */
  insert(key: FieldKey, value: FieldValue<T>, options: InsertOptions = {}): void {
    const index = typeof key === 'number' ? this.insertPosition(key) : this.indexOf(key);
    if (index < 0) {
      throw new LookupError(`Field ${this.name} has no value for ${describeKey(key)}`, describeKey(key));
    }

    this.validate(value, options.checkSource ?? true);
    if (index === 0) {
      this.notify(this.entries[0], value);
    }
    this.entries.splice(index, 0, value);
    this.adopt(value);
  }

  /**
   * Add a value after the existing ones
   */
  append(value: FieldValue<T>, options: InsertOptions = {}): void {
    this.insert(this.entries.length, value, options);
  }

  /**
   * Remove a value. Removing the current value promotes the next one.
   */
  delete(key: FieldKey): FieldValue<T> {
    const index = this.indexOf(key);
    const existing = this.entries[index];
    if (existing === undefined) {
      throw new LookupError(`Field ${this.name} has no value for ${describeKey(key)}`, describeKey(key));
    }

    if (index === 0) {
      this.notify(existing, this.entries[1]);
    }
    this.entries.splice(index, 1);
    this.release(existing);
    return existing;
  }

  /**
   * Make a value current. A key moves its slot to the front; a FieldValue
   * replaces the slot of the same source (or is added) and moves to the front.
   */
  setCurrent(keyOrValue: FieldKey | FieldValue<T>): void {
    if (keyOrValue instanceof ObservedValue || keyOrValue instanceof DerivedValue) {
      this.makeCurrent(keyOrValue);
      return;
    }

    const index = this.indexOf(keyOrValue);
    const entry = this.entries[index];
    if (entry === undefined) {
      throw new LookupError(`Field ${this.name} has no value for ${describeKey(keyOrValue)}`, describeKey(keyOrValue));
    }
    if (index === 0) {
      return;
    }
    this.notify(this.entries[0], entry);
    this.entries.splice(index, 1);
    this.entries.unshift(entry);
  }

  // ---------------------------------------------------------------------------
  // Default value
  // ---------------------------------------------------------------------------

  /**
   * The value stored under the default source
   *
   * @throws LookupError when there is no default
   */
  get default(): T | null {
    return this.get(null).value();
  }

  set default(value: T) {
    this.set(null, value);
  }

  deleteDefault(): void {
    this.delete(null);
  }

  // ---------------------------------------------------------------------------
  // Notification
  // ---------------------------------------------------------------------------

  /**
   * Subscribe to changes of the current value
   */
  registerNotifier(callback: FieldNotifier): NotifierHandle {
    const subscription = new Subscription(callback);
    this.subscriptions.push(subscription);
    return subscription;
  }

  /**
   * @internal Announce a change of the current value to every live notifier,
   * in registration order, then prune disposed ones.
   */
  notify(previous: FieldValue<T> | undefined, next: FieldValue<T> | undefined, chain: InvalidationChain = new Set()): void {
    try {
      for (const subscription of [...this.subscriptions]) {
        if (!subscription.disposed) {
          subscription.callback(previous, next, chain);
        }
      }
    } finally {
      this.subscriptions = this.subscriptions.filter((subscription) => !subscription.disposed);
    }
  }

  // ---------------------------------------------------------------------------
  // Ownership
  // ---------------------------------------------------------------------------

  /**
   * @internal Called by FieldNode.addField
   */
  attachToNode(node: FieldNode): void {
    this.nodeHandle = new Handle(node);
    for (const entry of this.derived()) {
      entry.setPathNode(node);
    }
  }

  /**
   * @internal Called by FieldNode.delField
   */
  detachFromNode(): void {
    this.nodeHandle?.release();
    this.nodeHandle = undefined;
    for (const entry of this.derived()) {
      entry.setPathNode(undefined);
    }
  }

  /**
   * Remove the field from its node and drop its values. References held by
   * derived values elsewhere become dead.
   */
  dispose(): void {
    this.node?.delField(this.name);
    for (const entry of this.entries) {
      this.release(entry);
    }
    this.entries = [];
    this.subscriptions = [];
    this.isDisposed = true;
  }

  /**
   * One-line summary of the current value; a derived value that cannot be
   * computed reads as "Underivable"
   */
  describeCurrent(): string {
    const entry = this.entries[0];
    if (entry === undefined) {
      return `Field ${this.name} empty`;
    }
    try {
      return `Field ${this.name}: ${String(entry.value())}`;
    } catch (error) {
      if (error instanceof CatalogError) {
        return `Field ${this.name}: Underivable`;
      }
      throw error;
    }
  }

  toString(): string {
    return `Field ${this.name} (${this.sourceNames().join(', ')})`;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private indexOf(key: FieldKey): number {
    if (typeof key === 'number') {
      if (!Number.isInteger(key)) {
        return -1;
      }
      const index = key < 0 ? key + this.entries.length : key;
      return index >= 0 && index < this.entries.length ? index : -1;
    }
    if (key === null) {
      return this.entries.findIndex((entry) => entry.source() === Source.DEFAULT);
    }
    if (typeof key === 'string') {
      const id = parseSourceSpec(key).id;
      return this.entries.findIndex((entry) => entry.source().id === id);
    }
    if (key instanceof Source || key instanceof DependencySource) {
      return this.entries.findIndex((entry) => entry.source() === key);
    }

    const wanted = this.derived()[key.derived];
    return wanted === undefined ? -1 : this.entries.indexOf(wanted);
  }

  private insertPosition(position: number): number {
    if (!Number.isInteger(position)) {
      return -1;
    }
    const index = position < 0 ? position + this.entries.length : position;
    return index >= 0 && index <= this.entries.length ? index : -1;
  }

  private wrap(value: T | FieldValue<T>, source: ValueSource): FieldValue<T> {
    if (isFieldValue(value)) {
      return value;
    }
    if (source instanceof DependencySource) {
      throw new SourceMismatchError(`Cannot write a literal to derived slot ${source.id} of field ${this.name}`);
    }
    return new ObservedValue(value, source);
  }

  /**
   * Type and ownership checks, plus the one-value-per-source rule when asked
   */
  private validate(entry: FieldValue<T>, checkSource = false): void {
    if (checkSource && this.entries.some((existing) => existing.source() === entry.source())) {
      throw new DuplicateSourceError(this.name, entry.source().id);
    }
    if (entry instanceof DerivedValue) {
      entry.assertAttachable(this);
    } else {
      assertSatisfies(this.constraint, entry.value(), `Field ${this.name}`);
    }
  }

  private makeCurrent(entry: FieldValue<T>): void {
    const index = this.entries.findIndex((existing) => existing.source() === entry.source());
    const existing = this.entries[index];
    if (existing === entry && index === 0) {
      return;
    }
    if (existing !== entry) {
      this.validate(entry);
    }

    this.notify(this.entries[0], entry);
    if (index > -1) {
      this.entries.splice(index, 1);
    }
    this.entries.unshift(entry);
    if (existing !== undefined && existing !== entry) {
      this.release(existing);
    }
    if (existing !== entry) {
      this.adopt(entry);
    }
  }

  private adopt(entry: FieldValue<T>): void {
    if (entry instanceof DerivedValue) {
      entry.attachTo(this);
    }
  }

  private release(entry: FieldValue<T>): void {
    if (entry instanceof DerivedValue) {
      entry.detach();
    }
  }
}
