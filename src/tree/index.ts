/**
 * Catalog tree
 */

export { CatalogNode, currentStructureGeneration, bumpStructureGeneration, type ChildOrder } from './node.js';
export { Catalog } from './catalog.js';
export {
  traverseTree,
  rootPosition,
  type TraversalOrder,
  type TraversalFilter,
  type TraverseOptions,
  type TreeLike,
} from './traversal.js';
