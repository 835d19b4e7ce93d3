// Access Gateway
//
// The one call path for every read, mutation and storage authorization on the
// node tree. Each call:
// 1. Resolves the caller's effective level inside a transaction
// 2. Issues a capability only when the level suffices
// 3. Runs the guarded operation in that same transaction
// 4. Logs the decision and appends an audit entry
//
// Write calls lock the target's workspace before resolving, so the decision
// and the write see the same tree and grants. Capabilities are issued in a
// scope that closes when the call returns; stores reject them afterwards.

import type {
  GatewayAction,
  Grant,
  Identity,
  Node,
  ScopedStorageGrant,
  Snowflake,
  StorageOperation,
  UserId,
} from '@arbor/protocol';
import { PermissionLevel, STORED_NODE_TYPES, describeAuthMethod } from '@arbor/protocol';
import type { RepositoryContext, TransactionalRepositoryContext } from '@arbor/repositories';
import { type Capability, CapabilityScope, issueCapability } from '../access/capability.js';
import { PermissionResolver, type Resolution } from '../access/resolver.js';
import {
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
  isEngineError,
} from '../errors.js';
import type { IdGenerator } from '../ids/index.js';
import { type Logger, silentLogger } from '../logger.js';
import { type StorageSigner, storageKeyFor } from '../storage/index.js';
import { GrantStore, NodeStore } from '../store/index.js';
import { type AuditStore, createInMemoryAuditStore } from './audit.js';

// --- Types ---

export type AccessGatewayOptions = {
  repos: TransactionalRepositoryContext;
  ids: IdGenerator;
  signer: StorageSigner;

  /** Defaults to an in-memory store */
  auditStore?: AuditStore;

  logger?: Logger;

  /** Lifetime of pre-signed storage URLs. Defaults to 300. */
  storageUrlTtlSeconds?: number;

  /** Page size for child listings. Defaults to 100. */
  listPageSize?: number;

  /** Epoch milliseconds, for audit timestamps and URL expiry */
  now?: () => number;
};

/**
 * Everything an authorized operation may touch. Valid only until the
 * operation's promise settles.
 */
export type AuthorizedScope = {
  identity: Identity;
  store: NodeStore;
  grants: GrantStore;

  /**
   * Authorize a further node against the same transaction, e.g. the
   * destination of a move.
   */
  authorize(nodeId: Snowflake, required: PermissionLevel): Promise<Capability>;
};

export type AuthorizedOperation<T> = (capability: Capability, scope: AuthorizedScope) => Promise<T>;

export type CreateNodeRequest = {
  type: Node['type'];
  name: string;
};

// --- Gateway ---

export class AccessGateway {
  private readonly repos: TransactionalRepositoryContext;
  private readonly ids: IdGenerator;
  private readonly signer: StorageSigner;
  private readonly auditStore: AuditStore;
  private readonly logger: Logger;
  private readonly storageUrlTtlSeconds: number;
  private readonly listPageSize: number;
  private readonly now: () => number;

  constructor(options: AccessGatewayOptions) {
    this.repos = options.repos;
    this.ids = options.ids;
    this.signer = options.signer;
    this.auditStore = options.auditStore ?? createInMemoryAuditStore();
    this.logger = options.logger ?? silentLogger;
    this.storageUrlTtlSeconds = options.storageUrlTtlSeconds ?? 300;
    this.listPageSize = options.listPageSize ?? 100;
    this.now = options.now ?? Date.now;
  }

  /**
   * Check that `identity` holds at least `required` on a node.
   *
   * Missing nodes and nodes the caller cannot read are refused with the same
   * PermissionDeniedError. A soft-deleted node, or anything beneath one, is
   * visible only at Owner level.
   *
   * The capability records the decision and the node as it was observed. Its
   * scope is closed by the time it is returned, so no store accepts it; to act
   * on the node, use withAuthorization so the check and the write share a
   * transaction.
   */
  authorize(
    identity: Identity,
    nodeId: Snowflake,
    required: PermissionLevel,
    action: GatewayAction
  ): Promise<Capability> {
    return this.audited(identity, action, nodeId, () =>
      this.inScope(identity, { writable: false }, (scope) =>
        this.repos.transaction((tx) => this.authorizeIn(tx, scope, nodeId, required, action), {
          readOnly: true,
        })
      )
    );
  }

  /**
   * Authorize and run `operation` as one unit. The operation receives the
   * capability and a scope bound to the transaction; a throw rolls back
   * everything it wrote.
   */
  withAuthorization<T>(
    identity: Identity,
    nodeId: Snowflake,
    required: PermissionLevel,
    action: GatewayAction,
    operation: AuthorizedOperation<T>
  ): Promise<T> {
    return this.audited(identity, action, nodeId, () =>
      this.inWriteScope(identity, nodeId, required, action, operation)
    );
  }

  // --- Nodes ---

  createWorkspace(identity: Identity, name: string): Promise<Node> {
    return this.audited(identity, 'node.create', undefined, () =>
      this.inScope(identity, { writable: true }, (scope) =>
        this.repos.transaction((tx) =>
          this.storeFor(tx, scope).create({
            type: 'workspace',
            name,
            parentId: null,
            ownerId: identity.userId,
          })
        )
      )
    );
  }

  /**
   * Create a node under `parentId`, owned by the caller. Requires Edit on the parent.
   */
  createNode(identity: Identity, parentId: Snowflake, request: CreateNodeRequest): Promise<Node> {
    return this.withAuthorization(
      identity,
      parentId,
      PermissionLevel.Edit,
      'node.create',
      (capability, scope) =>
        scope.store.create(
          { type: request.type, name: request.name, parentId, ownerId: identity.userId },
          capability
        )
    );
  }

  async getNode(identity: Identity, nodeId: Snowflake): Promise<Node> {
    const capability = await this.authorize(identity, nodeId, PermissionLevel.Read, 'node.read');
    return capability.node;
  }

  renameNode(identity: Identity, nodeId: Snowflake, name: string): Promise<Node> {
    return this.withAuthorization(
      identity,
      nodeId,
      PermissionLevel.Edit,
      'node.rename',
      (capability, scope) => scope.store.rename(nodeId, name, capability)
    );
  }

  /**
   * Re-parent a node. Requires Edit on both the node and its new parent.
   */
  moveNode(identity: Identity, nodeId: Snowflake, newParentId: Snowflake): Promise<Node> {
    return this.withAuthorization(
      identity,
      nodeId,
      PermissionLevel.Edit,
      'node.move',
      async (capability, scope) => {
        const parentCapability = await scope.authorize(newParentId, PermissionLevel.Edit);
        return scope.store.move(nodeId, newParentId, capability, parentCapability);
      }
    );
  }

  softDeleteNode(identity: Identity, nodeId: Snowflake): Promise<Node> {
    return this.withAuthorization(
      identity,
      nodeId,
      PermissionLevel.Owner,
      'node.delete',
      (capability, scope) => scope.store.softDelete(nodeId, capability)
    );
  }

  restoreNode(identity: Identity, nodeId: Snowflake): Promise<Node> {
    return this.withAuthorization(
      identity,
      nodeId,
      PermissionLevel.Owner,
      'node.restore',
      (capability, scope) => scope.store.restore(nodeId, capability)
    );
  }

  /**
   * Children of a node. Requires Read, or Owner to include soft-deleted children.
   *
   * Access is checked each time the result is iterated, so a revoked grant
   * takes effect on the next pass. Each pass holds its own scope, closed when
   * the pass ends.
   */
  listChildren(
    identity: Identity,
    parentId: Snowflake,
    options: { includeDeleted?: boolean } = {}
  ): AsyncIterable<Node> {
    const required = options.includeDeleted ? PermissionLevel.Owner : PermissionLevel.Read;
    const authorizePass = (scope: CapabilityScope) =>
      this.audited(identity, 'node.list_children', parentId, () =>
        this.repos.transaction(
          (tx) => this.authorizeIn(tx, scope, parentId, required, 'node.list_children'),
          { readOnly: true }
        )
      );
    const storeFor = (scope: CapabilityScope) => this.storeFor(this.repos, scope);

    return {
      async *[Symbol.asyncIterator]() {
        const scope = new CapabilityScope(identity, { writable: false });
        try {
          const capability = await authorizePass(scope);
          yield* storeFor(scope).listChildren(parentId, capability, options);
        } finally {
          scope.close();
        }
      },
    };
  }

  // --- Grants ---

  /**
   * Set `subjectId`'s explicit level on a node, replacing any previous grant.
   * Requires Owner.
   */
  grantAccess(
    identity: Identity,
    nodeId: Snowflake,
    subjectId: UserId,
    level: PermissionLevel
  ): Promise<Grant> {
    return this.withAuthorization(
      identity,
      nodeId,
      PermissionLevel.Owner,
      'grant.set',
      (capability, scope) => scope.grants.set({ nodeId, subjectId, level }, capability)
    );
  }

  /**
   * @throws NotFoundError if `subjectId` holds no explicit grant on the node
   */
  revokeAccess(identity: Identity, nodeId: Snowflake, subjectId: UserId): Promise<void> {
    return this.withAuthorization(
      identity,
      nodeId,
      PermissionLevel.Owner,
      'grant.revoke',
      (capability, scope) => scope.grants.revoke(nodeId, subjectId, capability)
    );
  }

  // --- Resolution ---

  /**
   * The caller's effective level on a node; None for nodes that do not exist.
   */
  resolve(identity: Identity, nodeId: Snowflake): Promise<PermissionLevel> {
    return this.audited(identity, 'permissions.resolve', nodeId, () =>
      this.repos.transaction((tx) => new PermissionResolver(tx).resolve(identity, nodeId), {
        readOnly: true,
      })
    );
  }

  /**
   * Effective level of every user with access to a node. Requires Owner.
   */
  listEffectivePermissions(
    identity: Identity,
    nodeId: Snowflake
  ): Promise<Map<UserId, PermissionLevel>> {
    return this.audited(identity, 'permissions.list', nodeId, () =>
      this.inScope(identity, { writable: false }, (scope) =>
        this.repos.transaction(
          async (tx) => {
            await this.authorizeIn(tx, scope, nodeId, PermissionLevel.Owner, 'permissions.list');
            const permissions = await new PermissionResolver(tx).listEffectivePermissions(nodeId);
            if (!permissions) {
              throw new NotFoundError('node', nodeId);
            }
            return permissions;
          },
          { readOnly: true }
        )
      )
    );
  }

  // --- Storage ---

  /**
   * Issue a short-lived URL for one transfer of a node's stored object.
   * Reading requires Read; writing requires Edit.
   *
   * @throws ValidationError if the node type carries no stored object
   */
  authorizeStorageAccess(
    identity: Identity,
    nodeId: Snowflake,
    operation: StorageOperation
  ): Promise<ScopedStorageGrant> {
    const action = operation === 'write' ? 'storage.write' : 'storage.read';
    const required = operation === 'write' ? PermissionLevel.Edit : PermissionLevel.Read;

    return this.audited(identity, action, nodeId, async () => {
      const capability = await this.inScope(identity, { writable: false }, (scope) =>
        this.repos.transaction((tx) => this.authorizeIn(tx, scope, nodeId, required, action), {
          readOnly: true,
        })
      );

      const { node } = capability;
      if (!STORED_NODE_TYPES.includes(node.type)) {
        throw new ValidationError(`A ${node.type} node has no stored object`, {
          field: 'nodeId',
          details: { nodeId, type: node.type },
        });
      }

      const storageKey = storageKeyFor(node);
      const issuedAt = this.now();
      const signed = await this.signer.sign({
        storageKey,
        operation,
        expiresInSeconds: this.storageUrlTtlSeconds,
      });

      return {
        nodeId,
        storageKey,
        operation,
        url: signed.url,
        method: signed.method,
        issuedTo: identity.userId,
        expiresAt: new Date(issuedAt + this.storageUrlTtlSeconds * 1000).toISOString(),
      };
    });
  }

  // --- Internals ---

  private storeFor(repos: RepositoryContext, scope: CapabilityScope): NodeStore {
    return new NodeStore(repos, this.ids, scope, { pageSize: this.listPageSize, now: this.now });
  }

  /**
   * Run `fn` with a fresh scope and close it once `fn` settles.
   */
  private async inScope<T>(
    identity: Identity,
    options: { writable: boolean },
    fn: (scope: CapabilityScope) => Promise<T>
  ): Promise<T> {
    const scope = new CapabilityScope(identity, options);
    try {
      return await fn(scope);
    } finally {
      scope.close();
    }
  }

  private async authorizeIn(
    repos: RepositoryContext,
    scope: CapabilityScope,
    nodeId: Snowflake,
    required: PermissionLevel,
    action: GatewayAction
  ): Promise<Capability> {
    const resolution = await new PermissionResolver(repos).resolveDetailed(scope.identity, nodeId);
    if (!resolution || !permits(resolution, required)) {
      throw new PermissionDeniedError(nodeId, required);
    }
    return issueCapability(scope, resolution.node, resolution.level, action);
  }

  private inWriteScope<T>(
    identity: Identity,
    nodeId: Snowflake,
    required: PermissionLevel,
    action: GatewayAction,
    operation: AuthorizedOperation<T>
  ): Promise<T> {
    return this.inScope(identity, { writable: true }, (capabilities) =>
      this.repos.transaction(async (tx) => {
        const target = await tx.nodes.get(nodeId);
        if (!target) {
          throw new PermissionDeniedError(nodeId, required);
        }
        await tx.nodes.lockWorkspace(target.workspaceId);

        const capability = await this.authorizeIn(tx, capabilities, nodeId, required, action);
        const scope: AuthorizedScope = {
          identity,
          store: this.storeFor(tx, capabilities),
          grants: new GrantStore(tx.grants, capabilities),
          authorize: (otherId, otherRequired) =>
            this.authorizeIn(tx, capabilities, otherId, otherRequired, action),
        };

        return operation(capability, scope);
      })
    );
  }

  private async audited<T>(
    identity: Identity,
    action: GatewayAction,
    nodeId: Snowflake | undefined,
    operation: () => Promise<T>
  ): Promise<T> {
    const startedAt = this.now();
    const context = { action, actorId: identity.userId, nodeId };

    try {
      const result = await operation();
      this.logger.debug('Gateway call allowed', context);
      await this.record(identity, action, nodeId, startedAt);
      return result;
    } catch (error) {
      this.logFailure(context, error);
      await this.record(identity, action, nodeId, startedAt, { error });
      throw error;
    }
  }

  private logFailure(context: Record<string, unknown>, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);

    if (error instanceof PermissionDeniedError) {
      this.logger.info('Gateway call denied', { ...context, error: message });
    } else if (error instanceof ValidationError || error instanceof NotFoundError) {
      this.logger.warn('Gateway call rejected', { ...context, error: message });
    } else {
      this.logger.error('Gateway call failed', { ...context, error: message });
    }
  }

  private async record(
    identity: Identity,
    action: GatewayAction,
    nodeId: Snowflake | undefined,
    startedAt: number,
    failure?: { error: unknown }
  ): Promise<void> {
    try {
      const finishedAt = this.now();
      await this.auditStore.append({
        id: this.ids.next(),
        timestamp: new Date(finishedAt).toISOString(),
        actorId: identity.userId,
        authMethod: describeAuthMethod(identity.authMethod),
        action,
        nodeId,
        success: failure === undefined,
        error: failure && (isEngineError(failure.error) ? failure.error.code : 'INTERNAL_ERROR'),
        durationMs: finishedAt - startedAt,
      });
    } catch (auditError) {
      this.logger.error('Failed to record audit entry', {
        action,
        actorId: identity.userId,
        nodeId,
        error: auditError instanceof Error ? auditError.message : String(auditError),
      });
    }
  }
}

/**
 * Whether a resolution admits `required`. Reading is a precondition of every
 * other level, and a trashed subtree is readable only by its owners.
 */
function permits(resolution: Resolution, required: PermissionLevel): boolean {
  if (resolution.level < PermissionLevel.Read) return false;
  if (resolution.trashed && resolution.level < PermissionLevel.Owner) return false;
  return resolution.level >= required;
}

export function createAccessGateway(options: AccessGatewayOptions): AccessGateway {
  return new AccessGateway(options);
}
