/**
 * Field catalogs
 *
 * Hierarchical catalogs of entries whose fields carry values tagged with
 * their source, including values derived lazily from other fields.
 *
 * @packageDocumentation
 */

// Core module exports
export * from './core/index.js';

// Catalog tree exports
export * from './tree/index.js';

// Fields and values exports
export * from './fields/index.js';

// Entity schema exports
export * from './schema/index.js';

// Snapshot exports
export * from './snapshot/index.js';

// Bibliographic enrichment exports
export * from './bibliography/index.js';

// Visualization exports
export * from './visualization/index.js';

// Version
export const VERSION = '0.1.0';
