import { describe, it, expect } from '@jest/globals';
import { FieldType, assertSatisfies, describeConstraint, satisfies } from '../../src/fields/type-constraint.js';
import { TypeMismatchError } from '../../src/core/errors.js';

class Coordinates {
  constructor(
    readonly ra: number,
    readonly dec: number
  ) {}
}

describe('Type Constraints', () => {
  describe('satisfies', () => {
    it('should check primitive types', () => {
      expect(satisfies(FieldType.number, 1.4)).toBe(true);
      expect(satisfies(FieldType.number, '1.4')).toBe(false);
      expect(satisfies(FieldType.number, Number.NaN)).toBe(false);
      expect(satisfies(FieldType.string, 'Vega')).toBe(true);
      expect(satisfies(FieldType.boolean, 0)).toBe(false);
      expect(satisfies(FieldType.object, { a: 1 })).toBe(true);
      expect(satisfies(FieldType.object, [1])).toBe(false);
    });

    it('should let null and undefined through', () => {
      expect(satisfies(FieldType.number, null)).toBe(true);
      expect(satisfies(FieldType.number, undefined)).toBe(true);
    });

    it('should accept anything without a constraint', () => {
      expect(satisfies(null, { any: 'thing' })).toBe(true);
    });

    it('should check class instances', () => {
      const constraint = FieldType.instanceOf(Coordinates);

      expect(satisfies(constraint, new Coordinates(10.5, -3.2))).toBe(true);
      expect(satisfies(constraint, { ra: 10.5, dec: -3.2 })).toBe(false);
    });

    it('should check array elements', () => {
      const constraint = FieldType.arrayOf(FieldType.number);

      expect(satisfies(constraint, [1, 2, null])).toBe(true);
      expect(satisfies(constraint, [1, 'two'])).toBe(false);
      expect(satisfies(FieldType.arrayOf(), ['anything', 1])).toBe(true);
      expect(satisfies(constraint, new Float64Array(2))).toBe(false);
    });

    it('should check the element type of typed arrays', () => {
      const constraint = FieldType.typedArray(Float64Array);

      expect(satisfies(constraint, new Float64Array([1, 2]))).toBe(true);
      expect(satisfies(constraint, new Float32Array([1, 2]))).toBe(false);
    });

    it('should accept any of several options', () => {
      const constraint = FieldType.oneOf(FieldType.number, FieldType.string);

      expect(satisfies(constraint, 3)).toBe(true);
      expect(satisfies(constraint, 'three')).toBe(true);
      expect(satisfies(constraint, true)).toBe(false);
    });

    it('should run predicates', () => {
      const positive = FieldType.predicate((value) => typeof value === 'number' && value > 0, 'positive number');

      expect(satisfies(positive, 2)).toBe(true);
      expect(satisfies(positive, -2)).toBe(false);
    });
  });

  describe('describeConstraint', () => {
    it('should name each kind of constraint', () => {
      expect(describeConstraint(FieldType.number)).toBe('number');
      expect(describeConstraint(FieldType.instanceOf(Coordinates))).toBe('Coordinates');
      expect(describeConstraint(FieldType.arrayOf())).toBe('array');
      expect(describeConstraint(FieldType.arrayOf(FieldType.string))).toBe('array of string');
      expect(describeConstraint(FieldType.typedArray(Int32Array))).toBe('Int32Array');
      expect(describeConstraint(FieldType.oneOf(FieldType.number, FieldType.boolean))).toBe('number | boolean');
      expect(describeConstraint(FieldType.predicate(() => true))).toBe('custom predicate');
    });
  });

  describe('assertSatisfies', () => {
    it('should describe the mismatch', () => {
      let caught: unknown;
      try {
        assertSatisfies(FieldType.number, 'heavy', 'Field mass');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(TypeMismatchError);
      expect(caught instanceof TypeMismatchError && caught.expected).toBe('number');
      expect(caught instanceof Error && caught.message).toBe(
        'Field mass: value of type string does not satisfy number'
      );
    });

    it('should name the class of a mismatching object', () => {
      expect(() => assertSatisfies(FieldType.string, new Coordinates(0, 0), 'Field name')).toThrow(
        'Field name: value of type Coordinates does not satisfy string'
      );
    });
  });
});
