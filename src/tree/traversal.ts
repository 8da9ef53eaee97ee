/**
 * Tree traversal orders
 *
 * Orders:
 * - 'preorder': root, then each child subtree
 * - 'postorder': each child subtree, then root
 * - 'level' / 'breadthfirst': level by level, left to right
 * - an integer k: the root is visited just before child k (k >= child count
 *   visits it after all children); negative k counts from the end, so 0 is
 *   preorder and -1 is postorder
 * - a fraction in (-1, 1): the same, with k scaled to the child count
 */

import { InvalidOrderError } from '../core/errors.js';

export type TraversalOrder = 'preorder' | 'postorder' | 'level' | 'breadthfirst' | number;

export interface TreeLike<T> {
  readonly children: readonly T[];
}

/**
 * Either a predicate deciding which nodes get visited, or a sentinel result
 * removed from the output
 */
export type TraversalFilter<T, R> = ((node: T) => boolean) | { readonly exclude: R };

export interface TraverseOptions<T, R> {
  readonly order?: TraversalOrder;
  readonly filter?: TraversalFilter<T, R>;
}

/**
 * Index of the child the root is visited before, for a numeric order
 */
export function rootPosition(order: number, childCount: number): number {
  if (Number.isInteger(order)) {
    return order < 0 ? order + childCount + 1 : order;
  }
  if (order > -1 && order < 1) {
    const scaled = Math.trunc(order * childCount);
    return order < 0 ? scaled + childCount + 1 : scaled;
  }
  throw new InvalidOrderError(`Unrecognized traversal order ${order}`);
}

function walkDepthFirst<T extends TreeLike<T>>(node: T, position: number | 'post', visit: (node: T) => void): void {
  const children = node.children;
  const rootAt = position === 'post' ? children.length : rootPosition(position, children.length);
  let visitedRoot = false;

  children.forEach((child, index) => {
    if (index === rootAt) {
      visit(node);
      visitedRoot = true;
    }
    walkDepthFirst(child, position, visit);
  });

  if (!visitedRoot) {
    visit(node);
  }
}

function walkLevels<T extends TreeLike<T>>(root: T, visit: (node: T) => void): void {
  const queue: T[] = [root];
  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    if (node === undefined) {
      break;
    }
    visit(node);
    queue.push(...node.children);
  }
}

/**
 * Visit every node of the subtree in the given order and collect the results
 */
export function traverseTree<T extends TreeLike<T>, R>(
  root: T,
  visit: (node: T) => R,
  options: TraverseOptions<T, R> = {}
): R[] {
  const order = options.order ?? 'postorder';
  const filter = options.filter;
  const results: R[] = [];

  const collect = (node: T): void => {
    if (typeof filter === 'function' && !filter(node)) {
      return;
    }
    results.push(visit(node));
  };

  switch (order) {
    case 'preorder':
      walkDepthFirst(root, 0, collect);
      break;
    case 'postorder':
      walkDepthFirst(root, 'post', collect);
      break;
    case 'level':
    case 'breadthfirst':
      walkLevels(root, collect);
      break;
    default:
      // validates the order before anything is visited
      rootPosition(order, 0);
      walkDepthFirst(root, order, collect);
  }

  if (filter !== undefined && typeof filter !== 'function') {
    return results.filter((result) => !Object.is(result, filter.exclude));
  }
  return results;
}
