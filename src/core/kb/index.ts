/**
 * Similarity store and knowledge base exports.
 */

export * from './types.js';
export * from './embedder.js';
export * from './sqlite-store.js';
export * from './knowledge-base.js';
