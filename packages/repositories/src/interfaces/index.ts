// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  NodeRepository,
  InsertNodeInput,
  ChildPageQuery,
} from './node-repository.js';

export type {
  GrantRepository,
  UpsertGrantInput,
} from './grant-repository.js';

export type {
  RepositoryContext,
  TransactionFn,
  TransactionOptions,
  TransactionalRepositoryContext,
} from './repository-context.js';
