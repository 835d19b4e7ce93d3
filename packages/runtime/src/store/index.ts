export {
  NodeStore,
  MAX_NODE_NAME_LENGTH,
  type CreateNodeInput,
  type ListChildrenOptions,
  type NodeStoreOptions,
} from './node-store.js';
export { GrantStore, type SetGrantInput } from './grant-store.js';
