/**
 * Question tree module barrel export.
 */
export * from './types.js';
export * from './repository.js';
export * from './view.js';
export * from './priority.js';
export * from './tree.js';
