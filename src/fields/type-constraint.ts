/**
 * Type constraints for field values
 *
 * A field may restrict what its values hold. Leaf values stay opaque: a
 * constraint only answers "does this value satisfy me". Null and undefined
 * payloads always pass, since they stand for "no value".
 */

import { TypeMismatchError } from '../core/errors.js';

export type PrimitiveTypeName = 'string' | 'number' | 'boolean' | 'bigint' | 'object';

export type TypedArrayConstructor =
  | Int8ArrayConstructor
  | Uint8ArrayConstructor
  | Int16ArrayConstructor
  | Uint16ArrayConstructor
  | Int32ArrayConstructor
  | Uint32ArrayConstructor
  | Float32ArrayConstructor
  | Float64ArrayConstructor;

/**
 * Any class whose instances a field accepts
 */
export type InstanceConstructor = abstract new (...args: never[]) => unknown;

export type TypeConstraint =
  | { readonly kind: 'primitive'; readonly name: PrimitiveTypeName }
  | { readonly kind: 'instance'; readonly ctor: InstanceConstructor }
  | { readonly kind: 'array'; readonly element: TypeConstraint | null }
  | { readonly kind: 'typed-array'; readonly ctor: TypedArrayConstructor }
  | {
      readonly kind: 'predicate';
      readonly test: (value: unknown) => boolean;
      readonly description: string;
    }
  | { readonly kind: 'one-of'; readonly options: readonly TypeConstraint[] };

/**
 * Constructors for type constraints
 */
export const FieldType = {
  string: { kind: 'primitive', name: 'string' },
  number: { kind: 'primitive', name: 'number' },
  boolean: { kind: 'primitive', name: 'boolean' },
  bigint: { kind: 'primitive', name: 'bigint' },
  object: { kind: 'primitive', name: 'object' },

  instanceOf(ctor: InstanceConstructor): TypeConstraint {
    return { kind: 'instance', ctor };
  },

  /** Plain array; with an element constraint every item must satisfy it */
  arrayOf(element: TypeConstraint | null = null): TypeConstraint {
    return { kind: 'array', element };
  },

  /** Typed array of exactly this element type (its "dtype") */
  typedArray(ctor: TypedArrayConstructor): TypeConstraint {
    return { kind: 'typed-array', ctor };
  },

  predicate(test: (value: unknown) => boolean, description = 'custom predicate'): TypeConstraint {
    return { kind: 'predicate', test, description };
  },

  /** Accepts a value matching any of the options */
  oneOf(...options: TypeConstraint[]): TypeConstraint {
    return { kind: 'one-of', options };
  },
} as const satisfies Record<string, TypeConstraint | ((...args: never[]) => TypeConstraint)>;

function matchesPrimitive(name: PrimitiveTypeName, value: unknown): boolean {
  if (name === 'number') {
    return typeof value === 'number' && !Number.isNaN(value);
  }
  if (name === 'object') {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
  return typeof value === name;
}

/**
 * Whether a non-null value satisfies the constraint
 */
function matches(constraint: TypeConstraint, value: unknown): boolean {
  switch (constraint.kind) {
    case 'primitive':
      return matchesPrimitive(constraint.name, value);
    case 'instance':
      return value instanceof constraint.ctor;
    case 'array': {
      if (!Array.isArray(value)) {
        return false;
      }
      const element = constraint.element;
      return element === null || value.every((item) => item === null || item === undefined || matches(element, item));
    }
    case 'typed-array':
      return value instanceof constraint.ctor;
    case 'predicate':
      return constraint.test(value);
    case 'one-of':
      return constraint.options.some((option) => matches(option, value));
  }
}

/**
 * Whether the value satisfies the constraint. A null constraint accepts anything.
 */
export function satisfies(constraint: TypeConstraint | null, value: unknown): boolean {
  if (constraint === null || value === null || value === undefined) {
    return true;
  }
  return matches(constraint, value);
}

/**
 * Describe a constraint for error messages
 */
export function describeConstraint(constraint: TypeConstraint): string {
  switch (constraint.kind) {
    case 'primitive':
      return constraint.name;
    case 'instance':
      return constraint.ctor.name || 'anonymous class';
    case 'array':
      return constraint.element === null ? 'array' : `array of ${describeConstraint(constraint.element)}`;
    case 'typed-array':
      return constraint.ctor.name;
    case 'predicate':
      return constraint.description;
    case 'one-of':
      return constraint.options.map(describeConstraint).join(' | ');
  }
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ?? 'object';
  }
  return typeof value;
}

/**
 * Throw a TypeMismatchError unless the value satisfies the constraint
 */
export function assertSatisfies(constraint: TypeConstraint | null, value: unknown, context: string): void {
  if (constraint !== null && !satisfies(constraint, value)) {
    const expected = describeConstraint(constraint);
    throw new TypeMismatchError(
      `${context}: value of type ${describeValue(value)} does not satisfy ${expected}`,
      expected
    );
  }
}
