/**
 * Core module
 *
 * Errors, configuration, logging, source identity and content addressing.
 */

export * from './errors.js';
export * from './config.js';
export * from './logging/index.js';
export * from './handle.js';
export * from './identity/content-address.js';
export * from './identity/source.js';
