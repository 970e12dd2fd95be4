/**
 * Database module barrel export.
 */

export * from './manager.js';
export * from './schema.js';
