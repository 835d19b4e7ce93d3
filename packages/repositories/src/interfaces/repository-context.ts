import type { NodeRepository } from './node-repository.js';
import type { GrantRepository } from './grant-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the primary dependency injection point for the runtime.
 * Pass a RepositoryContext to any code that needs data access,
 * and you can swap implementations (Postgres, in-memory)
 * without changing the consuming code.
 */
export interface RepositoryContext {
  readonly nodes: NodeRepository;
  readonly grants: GrantRepository;
}

/**
 * Transaction wrapper type for atomic operations across repositories.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

export type TransactionOptions = {
  /**
   * The transaction only reads. Read-only transactions see one consistent
   * snapshot and may run alongside each other.
   */
  readOnly?: boolean;
};

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a database transaction.
   * All repository operations within the function will be atomic.
   *
   * Use only the repositories passed to `fn`; calling back into the outer
   * context from inside may wait on the transaction itself.
   *
   * @throws Rolls back the transaction if the function throws
   */
  transaction<T>(fn: TransactionFn<T>, options?: TransactionOptions): Promise<T>;
}
