export * from './synchronizer.js';
