/**
 * LLM module exports.
 */

export * from './types.js';
export * from './providers/index.js';
export * from './prompts.js';
export * from './rewording.js';
export * from './qa-extractor.js';
