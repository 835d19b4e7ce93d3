import type { PgTransactionConfig } from 'drizzle-orm/pg-core';
import type { Database, DatabaseExecutor } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
  TransactionOptions,
} from '../../interfaces/index.js';
import { PgNodeRepository } from './node-repository.js';
import { PgGrantRepository } from './grant-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 *
 * const node = await repos.nodes.get(id);
 * ```
 */
export function createPgRepositoryContext(db: DatabaseExecutor): RepositoryContext {
  return {
    nodes: new PgNodeRepository(db),
    grants: new PgGrantRepository(db),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * This extends the basic RepositoryContext with transaction support,
 * allowing multiple operations to be executed atomically.
 *
 * Usage:
 * ```ts
 * const repos = createTransactionalPgRepositoryContext(db);
 *
 * await repos.transaction(async (txRepos) => {
 *   await txRepos.nodes.lockWorkspace(workspaceId);
 *   await txRepos.nodes.setParent(nodeId, newParentId);
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Database
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

/**
 * Read-only transactions run at REPEATABLE READ so every query sees the same
 * snapshot. Writing transactions run at READ COMMITTED and rely on
 * `nodes.lockWorkspace` to serialize conflicting tree mutations; reads made
 * after taking the lock see everything earlier lock holders committed.
 */
export function transactionConfig(options: TransactionOptions = {}): PgTransactionConfig {
  return options.readOnly
    ? { isolationLevel: 'repeatable read', accessMode: 'read only' }
    : { isolationLevel: 'read committed', accessMode: 'read write' };
}

/**
 * TransactionalRepositoryContext implementation for Postgres.
 */
class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly nodes: PgNodeRepository;
  readonly grants: PgGrantRepository;

  constructor(private db: Database) {
    this.nodes = new PgNodeRepository(db);
    this.grants = new PgGrantRepository(db);
  }

  /**
   * Execute a function within a database transaction configured by `transactionConfig`.
   */
  async transaction<T>(fn: TransactionFn<T>, options: TransactionOptions = {}): Promise<T> {
    return this.db.transaction(
      async (tx) => fn(createPgRepositoryContext(tx)),
      transactionConfig(options)
    );
  }
}
