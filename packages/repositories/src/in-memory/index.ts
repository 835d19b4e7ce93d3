// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
//
// Data does not persist between restarts.
//
// Transactions take a readers-writer lock over the whole store: read-only
// transactions share it, writing transactions hold it alone and restore the
// previous maps if their function throws.

import type { Grant, Node, Snowflake } from '@arbor/protocol';
import { compareSnowflakes } from '@arbor/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
  TransactionOptions,
  NodeRepository,
  GrantRepository,
} from '../interfaces/index.js';
import { ReadWriteLock } from './rw-lock.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  nodes: Map<Snowflake, Node>;
  /** Keyed by `${nodeId}:${subjectId}` */
  grants: Map<string, Grant>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  readonly _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

export type InMemoryRepositoryOptions = {
  /** Epoch milliseconds for createdAt, updatedAt and grantedAt. Defaults to Date.now. */
  now?: () => number;
};

function grantKey(nodeId: Snowflake, subjectId: string): string {
  return `${nodeId}:${subjectId}`;
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * await repos.transaction(async (tx) => {
 *   await tx.nodes.insert({ id, type: 'workspace', name: 'Docs', parentId: null, workspaceId: id, ownerId: 'user-1' });
 * });
 *
 * console.log(repos._data.nodes.size);
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(
  options: InMemoryRepositoryOptions = {}
): InMemoryRepositoryContext {
  const clock = options.now ?? Date.now;
  const timestamp = () => new Date(clock()).toISOString();
  const data: InMemoryDataStore = {
    nodes: new Map(),
    grants: new Map(),
  };
  const lock = new ReadWriteLock();

  const nodeRepo: NodeRepository = {
    async insert(input) {
      if (data.nodes.has(input.id)) {
        throw new Error(`Duplicate node id: ${input.id}`);
      }
      const now = timestamp();
      const node: Node = {
        id: input.id,
        type: input.type,
        name: input.name,
        parentId: input.parentId,
        workspaceId: input.workspaceId,
        ownerId: input.ownerId,
        createdAt: now,
        updatedAt: now,
      };
      data.nodes.set(node.id, node);
      return node;
    },

    async get(id) {
      return data.nodes.get(id) ?? null;
    },

    async getAncestry(id) {
      const chain: Node[] = [];
      const seen = new Set<Snowflake>();
      let next = data.nodes.get(id);

      while (next) {
        if (seen.has(next.id)) {
          throw new Error(`Parent links loop at node ${next.id}`);
        }
        seen.add(next.id);
        chain.push(next);
        next = next.parentId === null ? undefined : data.nodes.get(next.parentId);
      }

      return chain;
    },

    async listChildren(parentId, query) {
      const { after } = query;
      return Array.from(data.nodes.values())
        .filter((n) => n.parentId === parentId)
        .filter((n) => query.includeDeleted || !n.deletedAt)
        .filter((n) => after === undefined || compareSnowflakes(n.id, after) > 0)
        .sort((a, b) => compareSnowflakes(a.id, b.id))
        .slice(0, query.limit);
    },

    async rename(id, name) {
      return update(id, { name });
    },

    async setParent(id, parentId) {
      return update(id, { parentId });
    },

    async setDeletedAt(id, deletedAt) {
      return update(id, { deletedAt: deletedAt ?? undefined });
    },

    async lockWorkspace() {
      // Writing transactions already hold the store exclusively
    },
  };

  function update(id: Snowflake, changes: Partial<Node>): Node | null {
    const existing = data.nodes.get(id);
    if (!existing) return null;

    const updated: Node = {
      ...existing,
      ...changes,
      updatedAt: timestamp(),
    };
    if (updated.deletedAt === undefined) {
      delete updated.deletedAt;
    }
    data.nodes.set(id, updated);
    return updated;
  }

  const grantRepo: GrantRepository = {
    async upsert(input) {
      const grant: Grant = {
        nodeId: input.nodeId,
        subjectId: input.subjectId,
        level: input.level,
        grantedBy: input.grantedBy,
        grantedAt: timestamp(),
      };
      data.grants.set(grantKey(input.nodeId, input.subjectId), grant);
      return grant;
    },

    async get(nodeId, subjectId) {
      return data.grants.get(grantKey(nodeId, subjectId)) ?? null;
    },

    async remove(nodeId, subjectId) {
      return data.grants.delete(grantKey(nodeId, subjectId));
    },

    async getForSubject(subjectId, nodeIds) {
      return nodeIds.flatMap((nodeId) => {
        const grant = data.grants.get(grantKey(nodeId, subjectId));
        return grant ? [grant] : [];
      });
    },

    async getForNodes(nodeIds) {
      const wanted = new Set(nodeIds);
      return Array.from(data.grants.values()).filter((g) => wanted.has(g.nodeId));
    },
  };

  const repos: RepositoryContext = {
    nodes: nodeRepo,
    grants: grantRepo,
  };

  return {
    ...repos,

    async transaction<T>(fn: TransactionFn<T>, options: TransactionOptions = {}): Promise<T> {
      const release = await lock.acquire(options.readOnly ? 'read' : 'write');
      const before = options.readOnly
        ? null
        : { nodes: new Map(data.nodes), grants: new Map(data.grants) };

      try {
        return await fn(repos);
      } catch (error) {
        if (before) {
          data.nodes = before.nodes;
          data.grants = before.grants;
        }
        throw error;
      } finally {
        release();
      }
    },

    _data: data,

    clear() {
      data.nodes.clear();
      data.grants.clear();
    },
  };
}

export { ReadWriteLock, type LockMode } from './rw-lock.js';
