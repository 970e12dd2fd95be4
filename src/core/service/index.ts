export * from './question-service.js';
