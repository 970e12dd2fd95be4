/**
 * qa-store - question hierarchy with a similarity-searchable answer store.
 * Main library exports.
 */

// Configuration
export * from './core/config/index.js';

// Storage
export * from './core/db/index.js';

// Question tree and priorities
export * from './core/tree/index.js';

// Similarity store and knowledge base
export * from './core/kb/index.js';

// Synchronizer
export * from './core/sync/index.js';

// Service façade
export * from './core/service/index.js';

// Completion providers, rewording, QA extraction
export * from './llm/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
