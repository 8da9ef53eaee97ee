/**
 * Graphviz export
 *
 * Walks a catalog tree in preorder and writes it as a DOT digraph. Field
 * nodes become record shapes listing each field's current value; other
 * nodes are plain ellipses.
 */

import { isFieldNode } from '../fields/field-node.js';
import type { FieldNode } from '../fields/field-node.js';
import type { CatalogNode } from '../tree/node.js';

export type NodeShape = 'record' | 'box' | 'ellipse';

export interface NodeDescription {
  readonly label: string;
  readonly shape: NodeShape;
}

export interface DotOptions {
  /** List fields inside record shapes (default: true) */
  readonly graphFields?: boolean;
  /** Graph name (default: "catalog") */
  readonly name?: string;
}

/**
 * Whether the node holds fields and is drawn as a record
 */
export function isFieldContainer(node: CatalogNode): node is FieldNode {
  return isFieldNode(node);
}

function escapeString(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function escapeRecordText(text: string): string {
  return escapeString(text).replace(/[{}|<>]/g, (char) => `\\${char}`);
}

/**
 * Label and shape used for a node
 */
export function describeNode(node: CatalogNode, options: Pick<DotOptions, 'graphFields'> = {}): NodeDescription {
  if (!isFieldContainer(node)) {
    return { label: escapeString(node.describe()), shape: 'ellipse' };
  }
  if (options.graphFields === false) {
    return { label: escapeString(node.describe()), shape: 'box' };
  }

  const parts = [node.describe(), ...[...node.fields()].map((field) => field.describeCurrent())];
  return { label: `{${parts.map(escapeRecordText).join('|')}}`, shape: 'record' };
}

/**
 * DOT source for the subtree rooted at `root`
 */
export function toDot(root: CatalogNode, options: DotOptions = {}): string {
  const ids = new Map<CatalogNode, string>();
  const lines: string[] = [`digraph "${escapeString(options.name ?? 'catalog')}" {`];

  root.traverse(
    (node) => {
      const id = `n${ids.size}`;
      ids.set(node, id);
      const { label, shape } = describeNode(node, options);
      lines.push(`  ${id} [label="${label}", shape=${shape}];`);

      const parentId = node === root || node.parent === undefined ? undefined : ids.get(node.parent);
      if (parentId !== undefined) {
        lines.push(`  ${parentId} -> ${id};`);
      }
    },
    { order: 'preorder' }
  );

  lines.push('}');
  return lines.join('\n');
}
