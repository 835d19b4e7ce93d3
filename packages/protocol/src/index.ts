// @arbor/protocol
// Shared types and pure helpers for the node identity and permission engine.

export * from './types/index.js';
export * from './ids/index.js';
