// Re-export all protocol types

export * from './common.js';
export * from './nodes.js';
export * from './grants.js';
export * from './identity.js';
export * from './storage.js';
export * from './audit.js';
