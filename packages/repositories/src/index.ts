// @arbor/repositories
// Repository interfaces and implementations for substrate-independent data access.
//
// This package defines the "contract" for data operations. The actual implementations
// (Postgres, in-memory) fulfill these contracts, allowing the runtime
// to work with any storage backend.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection
// - Code against interfaces to maintain substrate independence

export * from './interfaces/index.js';
export * as postgres from './postgres/index.js';
export {
  createInMemoryRepositoryContext,
  ReadWriteLock,
  type InMemoryDataStore,
  type InMemoryRepositoryContext,
  type InMemoryRepositoryOptions,
  type LockMode,
} from './in-memory/index.js';
