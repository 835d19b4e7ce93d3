// @arbor/runtime
// Id minting, permission resolution and the access gateway

// Bootstrap
export { createEngine, type Engine, type EngineOptions } from './engine.js';

// Configuration
export { loadConfig, type EngineConfig } from './config.js';

// Error types
export {
  EngineError,
  isEngineError,
  ValidationError,
  NotFoundError,
  ParentNotFoundError,
  PermissionDeniedError,
  InvalidParentError,
  CycleError,
  ClockSkewError,
  ConfigError,
} from './errors.js';

// Logging
export {
  createConsoleLogger,
  createCapturingLogger,
  silentLogger,
  type LogEntry,
  type LogLevel,
  type Logger,
} from './logger.js';

// Snowflake ids
export {
  SnowflakeGenerator,
  createSnowflakeGenerator,
  type Clock,
  type IdGenerator,
  type SnowflakeGeneratorOptions,
} from './ids/index.js';

// Identity context
export { IdentitySchema, parseIdentity, nativeIdentity, oidcIdentity } from './identity/index.js';

// Node and grant stores
export {
  NodeStore,
  GrantStore,
  MAX_NODE_NAME_LENGTH,
  type CreateNodeInput,
  type ListChildrenOptions,
  type NodeStoreOptions,
  type SetGrantInput,
} from './store/index.js';

// Access control
export {
  Capability,
  CapabilityScope,
  requireCapability,
  type RequireCapabilityOptions,
  PermissionResolver,
  createPermissionResolver,
  computeEffectiveLevel,
  collectEffectivePermissions,
  type Resolution,
  type ResolutionSource,
} from './access/index.js';

// Access gateway and audit
export {
  AccessGateway,
  createAccessGateway,
  createInMemoryAuditStore,
  type AccessGatewayOptions,
  type AuditQueryFilter,
  type AuditStore,
  type AuthorizedOperation,
  type AuthorizedScope,
  type CreateNodeRequest,
} from './gateway/index.js';

// Storage signing
export {
  S3StorageSigner,
  createS3StorageSigner,
  storageKeyFor,
  type SignRequest,
  type SignedRequest,
  type StorageSigner,
} from './storage/index.js';
