/**
 * Unit tests for the catalog tree
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { Catalog } from '../../src/tree/catalog.js';
import { currentStructureGeneration } from '../../src/tree/node.js';
import type { CatalogNode } from '../../src/tree/node.js';
import { rootPosition } from '../../src/tree/traversal.js';
import { Field } from '../../src/fields/field.js';
import { FieldNode } from '../../src/fields/field-node.js';
import { CycleError, InvalidOrderError, RootNodeError } from '../../src/core/errors.js';

function entry(name: string, parent?: CatalogNode): FieldNode {
  return new FieldNode(parent, [new Field('name', { default: name })]);
}

function label(node: CatalogNode): string {
  return node instanceof FieldNode ? String(node.get('name')) : node.describe();
}

describe('Catalog Tree', () => {
  let root: FieldNode;
  let a: FieldNode;
  let b: FieldNode;
  let a1: FieldNode;
  let a2: FieldNode;

  beforeEach(() => {
    root = entry('r');
    a = entry('a', root);
    b = entry('b', root);
    a1 = entry('a1', a);
    a2 = entry('a2', a);
  });

  describe('Parent links', () => {
    it('should append a node to its new parent', () => {
      expect(a.parent).toBe(root);
      expect(root.children).toEqual([a, b]);
      expect(a1.root).toBe(root);
      expect(a1.depth).toBe(2);
      expect(a1.ancestors()).toEqual([a, root]);
      expect(a1.path()).toEqual([root, a, a1]);
    });

    it('should move a node between parents', () => {
      a2.setParent(b);

      expect(a.children).toEqual([a1]);
      expect(b.children).toEqual([a2]);
      expect(a2.parent).toBe(b);
    });

    it('should detach a node with its subtree', () => {
      a.detach();

      expect(root.children).toEqual([b]);
      expect(a.parent).toBeUndefined();
      expect(a.children).toEqual([a1, a2]);
      expect(a1.root).toBe(a);
    });

    it('should reject making a node its own ancestor and leave the tree unchanged', () => {
      expect(() => a.setParent(a1)).toThrow(CycleError);
      expect(() => a.setParent(a)).toThrow(CycleError);

      expect(a.parent).toBe(root);
      expect(root.children).toEqual([a, b]);
      expect(a.children).toEqual([a1, a2]);
      expect(a1.children).toEqual([]);
    });

    it('should bump the structure generation on reparenting', () => {
      const before = currentStructureGeneration();

      a2.setParent(b);

      expect(currentStructureGeneration()).toBe(before + 1);
    });
  });

  describe('Catalog', () => {
    it('should never take a parent', () => {
      const catalog = new Catalog('stars');

      expect(() => catalog.setParent(root)).toThrow(RootNodeError);
      expect(catalog.parent).toBeUndefined();
      expect(root.children).toEqual([a, b]);
    });

    it('should hold children and match its name', () => {
      const catalog = new Catalog('stars');
      root.setParent(catalog);

      expect(catalog.children).toEqual([root]);
      expect(a1.root).toBe(catalog);
      expect(catalog.matches('stars')).toBe(true);
      expect(catalog.matches('Catalog')).toBe(true);
      expect(catalog.describe()).toBe('Catalog stars');
      expect(new Catalog().name).toBe('default Catalog');
    });
  });

  describe('countNodes', () => {
    it('should count the subtree including its root', () => {
      expect(root.countNodes()).toBe(5);
      expect(a.countNodes()).toBe(3);
      expect(b.countNodes()).toBe(1);
    });
  });

  describe('reorderChildren', () => {
    it('should apply a permutation', () => {
      const c = entry('c', root);

      root.reorderChildren([2, 0, 1]);

      expect(root.children).toEqual([c, a, b]);
    });

    it('should reverse and sort', () => {
      root.reorderChildren('reverse');
      expect(root.children).toEqual([b, a]);

      root.reorderChildren((x, y) => label(x).localeCompare(label(y)));
      expect(root.children).toEqual([a, b]);
    });

    it('should reject malformed permutations and keep the order', () => {
      entry('c', root);
      const before = root.children;

      expect(() => root.reorderChildren([0, 0, 1])).toThrow(InvalidOrderError);
      expect(() => root.reorderChildren([0, 1])).toThrow(InvalidOrderError);
      expect(() => root.reorderChildren([0, 1, 3])).toThrow(InvalidOrderError);
      expect(() => root.reorderChildren([0, 1, 1.5])).toThrow(InvalidOrderError);

      expect(root.children).toEqual(before);
    });
  });

  describe('traverse', () => {
    it('should default to postorder', () => {
      expect(root.traverse(label)).toEqual(['a1', 'a2', 'a', 'b', 'r']);
    });

    it('should visit in preorder', () => {
      expect(root.traverse(label, { order: 'preorder' })).toEqual(['r', 'a', 'a1', 'a2', 'b']);
    });

    it('should visit level by level', () => {
      expect(root.traverse(label, { order: 'level' })).toEqual(['r', 'a', 'b', 'a1', 'a2']);
      expect(root.traverse(label, { order: 'breadthfirst' })).toEqual(['r', 'a', 'b', 'a1', 'a2']);
    });

    it('should visit the root before the numbered child', () => {
      expect(root.traverse(label, { order: 1 })).toEqual(['a1', 'a', 'a2', 'r', 'b']);
      expect(root.traverse(label, { order: 0 })).toEqual(['r', 'a', 'a1', 'a2', 'b']);
      expect(root.traverse(label, { order: -1 })).toEqual(['a1', 'a2', 'a', 'b', 'r']);
      expect(root.traverse(label, { order: 7 })).toEqual(['a1', 'a2', 'a', 'b', 'r']);
    });

    it('should scale a fractional order to the child count', () => {
      expect(root.traverse(label, { order: 0.5 })).toEqual(['a1', 'a', 'a2', 'r', 'b']);
    });

    it('should reject unknown orders before visiting', () => {
      const visited: string[] = [];

      expect(() => root.traverse((node) => visited.push(label(node)), { order: 2.5 })).toThrow(InvalidOrderError);
      expect(visited).toEqual([]);
    });

    it('should filter with a predicate', () => {
      const leaves = root.traverse(label, { order: 'preorder', filter: (node) => node.children.length === 0 });

      expect(leaves).toEqual(['a1', 'a2', 'b']);
    });

    it('should drop an excluded result', () => {
      const inner = root.traverse((node) => (node.children.length > 0 ? label(node) : null), {
        order: 'preorder',
        filter: { exclude: null },
      });

      expect(inner).toEqual(['r', 'a']);
    });
  });

  describe('rootPosition', () => {
    it('should resolve negative and fractional orders', () => {
      expect(rootPosition(0, 3)).toBe(0);
      expect(rootPosition(-1, 3)).toBe(3);
      expect(rootPosition(-2, 3)).toBe(2);
      expect(rootPosition(0.5, 4)).toBe(2);
      expect(rootPosition(-0.5, 4)).toBe(3);
    });
  });
});
