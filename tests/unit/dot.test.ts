/**
 * Unit tests for Graphviz export
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { Field } from '../../src/fields/field.js';
import { DerivedValue } from '../../src/fields/field-value.js';
import { FieldNode } from '../../src/fields/field-node.js';
import { Catalog } from '../../src/tree/catalog.js';
import { CatalogNode } from '../../src/tree/node.js';
import { describeNode, isFieldContainer, toDot } from '../../src/visualization/dot.js';

class Group extends CatalogNode {}

describe('Graphviz export', () => {
  let catalog: Catalog;
  let star: FieldNode;
  let planet: FieldNode;

  beforeEach(() => {
    catalog = new Catalog('Nearby');
    star = new FieldNode(catalog, [new Field('name', { default: 'Vega' }), new Field('mass', { default: 2.1 })]);
    planet = new FieldNode(star, [new Field('name', { default: 'b' }), new Field('notes')]);
  });

  describe('isFieldContainer', () => {
    it('should accept field nodes only', () => {
      expect(isFieldContainer(star)).toBe(true);
      expect(isFieldContainer(catalog)).toBe(false);
      expect(isFieldContainer(new Group())).toBe(false);
    });
  });

  describe('describeNode', () => {
    it('should draw plain nodes as ellipses', () => {
      expect(describeNode(catalog)).toEqual({ label: 'Catalog Nearby', shape: 'ellipse' });
      expect(describeNode(new Group())).toEqual({ label: 'Group', shape: 'ellipse' });
    });

    it('should list current field values in a record', () => {
      expect(describeNode(planet)).toEqual({
        label: '{FieldNode b|Field name: b|Field notes empty}',
        shape: 'record',
      });
    });

    it('should draw a box when fields are not graphed', () => {
      expect(describeNode(star, { graphFields: false })).toEqual({ label: 'FieldNode Vega', shape: 'box' });
    });

    it('should label a derived value that cannot be computed', () => {
      const density = new Field('density');
      density.append(new DerivedValue((m) => Number(m), { dependencies: ['^.mass'], failurePolicy: 'raise' }));
      const node = new FieldNode(undefined, [density]);

      expect(describeNode(node).label).toBe('{FieldNode|Field density: Underivable}');
    });

    it('should escape record separators and quotes', () => {
      const node = new FieldNode(undefined, [new Field('notes', { default: 'a|b <c> "d"' })]);

      expect(describeNode(node).label).toBe('{FieldNode|Field notes: a\\|b \\<c\\> \\"d\\"}');
    });
  });

  describe('toDot', () => {
    it('should write the tree in preorder with parent edges', () => {
      expect(toDot(catalog)).toBe(
        [
          'digraph "catalog" {',
          '  n0 [label="Catalog Nearby", shape=ellipse];',
          '  n1 [label="{FieldNode Vega|Field name: Vega|Field mass: 2.1}", shape=record];',
          '  n0 -> n1;',
          '  n2 [label="{FieldNode b|Field name: b|Field notes empty}", shape=record];',
          '  n1 -> n2;',
          '}',
        ].join('\n')
      );
    });

    it('should start at a subtree root and honor options', () => {
      expect(toDot(star, { name: 'star "system"', graphFields: false })).toBe(
        [
          'digraph "star \\"system\\"" {',
          '  n0 [label="FieldNode Vega", shape=box];',
          '  n1 [label="FieldNode b", shape=box];',
          '  n0 -> n1;',
          '}',
        ].join('\n')
      );
    });
  });
});
