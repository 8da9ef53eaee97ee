/**
 * Dependency path expressions
 *
 * A path locates a field relative to a tree node. Segments are separated by
 * dots; the last segment is the field name and every segment before it is a
 * navigation step:
 *
 * | Segment      | Step                                                   |
 * |--------------|--------------------------------------------------------|
 * | `^`, `^^`... | one parent step per caret                              |
 * | `^name`      | nearest ancestor, starting at the parent, named `name` |
 * | (empty)      | first child                                            |
 * | `3`          | child at position 3                                    |
 * | `name`       | first child named `name`                               |
 *
 * "Named" means {@link CatalogNode.matches} accepts the selector: the node's
 * kind, or the current value of its `name` field.
 *
 * @example
 * ```typescript
 * resolvePath('mass', star);              // star's own mass field
 * resolvePath('^.distance', star);        // the parent's distance field
 * resolvePath('^cluster.distance', star); // closest enclosing "cluster"
 * resolvePath('0.mass', cluster);         // first child's mass field
 * ```
 */

import { InvalidPathError, LookupError } from '../core/errors.js';
import type { CatalogNode } from '../tree/node.js';
import type { Field } from './field.js';

export type PathStep =
  | { readonly kind: 'parent'; readonly count: number }
  | { readonly kind: 'ancestor'; readonly selector: string }
  | { readonly kind: 'first-child' }
  | { readonly kind: 'child-index'; readonly index: number }
  | { readonly kind: 'child-match'; readonly selector: string };

export interface ParsedPath {
  readonly source: string;
  readonly steps: readonly PathStep[];
  readonly fieldName: string;
}

const CARETS = /^\^+$/;
const INDEX = /^\d+$/;

function parseStep(segment: string, path: string): PathStep {
  if (segment === '') {
    return { kind: 'first-child' };
  }
  if (CARETS.test(segment)) {
    return { kind: 'parent', count: segment.length };
  }
  if (segment.startsWith('^')) {
    const selector = segment.slice(1);
    if (selector.includes('^')) {
      throw new InvalidPathError(`Malformed ancestor segment "${segment}"`, path);
    }
    return { kind: 'ancestor', selector };
  }
  if (segment.includes('^')) {
    throw new InvalidPathError(`Unexpected "^" inside segment "${segment}"`, path);
  }
  if (INDEX.test(segment)) {
    return { kind: 'child-index', index: Number(segment) };
  }
  return { kind: 'child-match', selector: segment };
}

/**
 * Split a path expression into navigation steps and a field name
 */
export function parsePath(path: string): ParsedPath {
  const segments = path.trim().split('.');
  const fieldName = segments.pop() ?? '';

  if (fieldName === '') {
    throw new InvalidPathError('Missing field name', path);
  }
  if (fieldName.includes('^')) {
    throw new InvalidPathError(`Field name "${fieldName}" cannot contain "^"`, path);
  }

  return {
    source: path,
    steps: segments.map((segment) => parseStep(segment, path)),
    fieldName,
  };
}

function describeStep(step: PathStep): string {
  switch (step.kind) {
    case 'parent':
      return '^'.repeat(step.count);
    case 'ancestor':
      return `^${step.selector}`;
    case 'first-child':
      return '(first child)';
    case 'child-index':
      return String(step.index);
    case 'child-match':
      return step.selector;
  }
}

function applyStep(node: CatalogNode, step: PathStep, path: string): CatalogNode {
  const fail = (reason: string): never => {
    throw new LookupError(`${reason} while resolving "${path}" from ${node.describe()}`, describeStep(step));
  };

  switch (step.kind) {
    case 'parent': {
      let current = node;
      for (let i = 0; i < step.count; i++) {
        current = current.parent ?? fail('No parent');
      }
      return current;
    }
    case 'ancestor': {
      for (let ancestor = node.parent; ancestor !== undefined; ancestor = ancestor.parent) {
        if (ancestor.matches(step.selector)) {
          return ancestor;
        }
      }
      return fail(`No ancestor matching "${step.selector}"`);
    }
    case 'first-child':
      return node.children[0] ?? fail('No children');
    case 'child-index':
      return node.children[step.index] ?? fail(`No child at position ${step.index}`);
    case 'child-match':
      return node.children.find((child) => child.matches(step.selector)) ?? fail(`No child matching "${step.selector}"`);
  }
}

/**
 * Follow the navigation steps of a path from the origin node
 */
export function navigate(path: ParsedPath, origin: CatalogNode): CatalogNode {
  return path.steps.reduce((node, step) => applyStep(node, step, path.source), origin);
}

/**
 * Find the field a path expression points at
 */
export function resolvePath(path: string | ParsedPath, origin: CatalogNode): Field {
  const parsed = typeof path === 'string' ? parsePath(path) : path;
  const target = navigate(parsed, origin);
  const field = target.findField(parsed.fieldName);

  if (field === undefined) {
    throw new LookupError(
      `${target.describe()} has no field "${parsed.fieldName}" (path "${parsed.source}")`,
      parsed.fieldName
    );
  }
  return field;
}
