// Postgres repository implementations
export { PgNodeRepository, lockWorkspaceStatement } from './node-repository.js';
export { PgGrantRepository } from './grant-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
  transactionConfig,
} from './context.js';
