// Re-export all schema tables
export * from './nodes.js';
export * from './grants.js';
