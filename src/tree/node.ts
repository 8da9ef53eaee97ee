/**
 * Catalog tree nodes
 *
 * Every element of a catalog is a CatalogNode. A node owns its ordered
 * children and holds a non-owning handle to its parent. Reparenting is
 * cycle-checked: a node can never become its own ancestor.
 */

import { CycleError, InvalidOrderError } from '../core/errors.js';
import { Handle } from '../core/handle.js';
import type { Field } from '../fields/field.js';
import { traverseTree } from './traversal.js';
import type { TraverseOptions } from './traversal.js';

/**
 * New child order: a permutation of current indices, 'reverse', or a comparator
 */
export type ChildOrder = readonly number[] | 'reverse' | ((a: CatalogNode, b: CatalogNode) => number);

let structureGeneration = 0;

/**
 * Counter bumped on every structural change (reparenting, reordering, fields
 * added or removed). Path-resolved dependency links remember the generation
 * they were resolved in and are re-resolved once it moves on.
 */
export function currentStructureGeneration(): number {
  return structureGeneration;
}

export function bumpStructureGeneration(): void {
  structureGeneration += 1;
}

export abstract class CatalogNode {
  private parentHandle: Handle<CatalogNode> | undefined;
  private readonly childList: CatalogNode[] = [];

  constructor(parent?: CatalogNode) {
    if (parent !== undefined) {
      this.setParent(parent);
    }
  }

  /**
   * Type name used by path navigation and visualization
   */
  get kind(): string {
    return this.constructor.name;
  }

  get parent(): CatalogNode | undefined {
    const parent = this.parentHandle?.deref();
    if (parent === undefined && this.parentHandle !== undefined) {
      this.parentHandle = undefined;
    }
    return parent;
  }

  get children(): readonly CatalogNode[] {
    return [...this.childList];
  }

  get root(): CatalogNode {
    let node: CatalogNode = this;
    for (let parent = node.parent; parent !== undefined; parent = parent.parent) {
      node = parent;
    }
    return node;
  }

  /** Number of ancestors (a root has depth 0) */
  get depth(): number {
    return this.ancestors().length;
  }

  /**
   * Ancestors from the parent up to the root
   */
  ancestors(): CatalogNode[] {
    const result: CatalogNode[] = [];
    for (let parent = this.parent; parent !== undefined; parent = parent.parent) {
      result.push(parent);
    }
    return result;
  }

  /**
   * Nodes from the root down to this one
   */
  path(): CatalogNode[] {
    return [...this.ancestors().reverse(), this];
  }

  /**
   * Whether this node is `other` or lies below it
   */
  isDescendantOf(other: CatalogNode): boolean {
    for (let node: CatalogNode | undefined = this; node !== undefined; node = node.parent) {
      if (node === other) {
        return true;
      }
    }
    return false;
  }

  /**
   * Move this node under a new parent (appended as its last child), or detach
   * it with undefined. Fails with CycleError, leaving the tree untouched, if
   * the new parent is this node or one of its descendants.
   */
  setParent(newParent: CatalogNode | undefined): void {
    if (newParent !== undefined) {
      if (newParent.isDescendantOf(this)) {
        throw new CycleError(`Cannot attach ${this.describe()} below itself`);
      }
    }

    const oldParent = this.parent;
    if (oldParent !== undefined) {
      const index = oldParent.childList.indexOf(this);
      if (index > -1) {
        oldParent.childList.splice(index, 1);
      }
    }
    this.parentHandle?.release();
    this.parentHandle = undefined;

    if (newParent !== undefined) {
      newParent.childList.push(this);
      this.parentHandle = new Handle(newParent);
    }
    bumpStructureGeneration();
  }

  /**
   * Detach from the parent; the subtree stays intact under this node
   */
  detach(): void {
    this.setParent(undefined);
  }

  /**
   * Reorder children. A malformed permutation fails with InvalidOrderError
   * and the order is left unchanged.
   */
  reorderChildren(order: ChildOrder): void {
    if (order === 'reverse') {
      this.childList.reverse();
      bumpStructureGeneration();
      return;
    }

    if (typeof order === 'function') {
      this.childList.sort(order);
      bumpStructureGeneration();
      return;
    }

    const count = this.childList.length;
    if (order.length !== count) {
      throw new InvalidOrderError(`Expected ${count} indices but got ${order.length}`);
    }

    const seen = new Set<number>();
    const reordered: CatalogNode[] = [];
    for (const index of order) {
      const child = Number.isInteger(index) ? this.childList[index] : undefined;
      if (child === undefined) {
        throw new InvalidOrderError(`Index ${index} is not a child position (0..${count - 1})`);
      }
      if (seen.has(index)) {
        throw new InvalidOrderError(`Index ${index} appears more than once`);
      }
      seen.add(index);
      reordered.push(child);
    }

    this.childList.splice(0, count, ...reordered);
    bumpStructureGeneration();
  }

  /**
   * Number of nodes in this subtree, including this one
   */
  countNodes(): number {
    return this.childList.reduce((total, child) => total + child.countNodes(), 1);
  }

  /**
   * Visit every node in this subtree and collect the results
   */
  traverse<R>(visit: (node: CatalogNode) => R, options: TraverseOptions<CatalogNode, R> = {}): R[] {
    return traverseTree<CatalogNode, R>(this, visit, options);
  }

  /**
   * Whether a path selector names this node
   */
  matches(selector: string): boolean {
    return this.kind === selector;
  }

  /**
   * Field of the given name held by this node. Plain nodes hold none.
   */
  findField(_name: string): Field | undefined {
    return undefined;
  }

  /**
   * Short text used in messages and graph labels
   */
  describe(): string {
    return this.kind;
  }

  toString(): string {
    return this.describe();
  }
}
