/**
 * Graph export
 */

export { toDot, describeNode, isFieldContainer, type DotOptions, type NodeDescription, type NodeShape } from './dot.js';
