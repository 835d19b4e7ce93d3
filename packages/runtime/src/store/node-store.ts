// Node Store
//
// Structural integrity of the workspace trees: roots, live parents, acyclic
// moves. The store makes no access decisions of its own. Every call that
// reads or writes an existing node takes a capability the access gateway
// issued in this store's scope, and checks only that it covers the node.

import type { Node, NodeType, Snowflake, UserId } from '@arbor/protocol';
import { PermissionLevel } from '@arbor/protocol';
import type { RepositoryContext } from '@arbor/repositories';
import type { IdGenerator } from '../ids/index.js';
import { type Capability, type CapabilityScope, requireCapability } from '../access/capability.js';
import {
  CycleError,
  InvalidParentError,
  NotFoundError,
  ParentNotFoundError,
  ValidationError,
} from '../errors.js';

// --- Types ---

export type CreateNodeInput = {
  type: NodeType;
  name: string;
  /** Must be null for a workspace and set for everything else */
  parentId: Snowflake | null;
  ownerId: UserId;
};

export type ListChildrenOptions = {
  /** Include soft-deleted children */
  includeDeleted?: boolean;
};

export type NodeStoreOptions = {
  /** Rows fetched per round trip when listing children. Defaults to 100. */
  pageSize?: number;

  /** Epoch milliseconds, for soft-delete timestamps */
  now?: () => number;
};

export const MAX_NODE_NAME_LENGTH = 255;

// --- Node Store ---

export class NodeStore {
  private readonly pageSize: number;
  private readonly now: () => number;

  constructor(
    private repos: RepositoryContext,
    private ids: IdGenerator,
    private scope: CapabilityScope,
    options: NodeStoreOptions = {}
  ) {
    this.pageSize = options.pageSize ?? 100;
    this.now = options.now ?? Date.now;
  }

  /**
   * Create a node.
   *
   * Workspaces are roots and need no capability. Any other node
   * needs an Edit capability on its parent, and the parent must exist and be
   * live. The capability is checked before the parent is looked up.
   *
   * @throws InvalidParentError for a workspace with a parent, a non-workspace
   * without one, or a soft-deleted parent
   * @throws ParentNotFoundError if the parent named by the capability does not exist
   */
  async create(input: CreateNodeInput, parentCapability?: Capability): Promise<Node> {
    const name = validateName(input.name);

    if (input.type === 'workspace') {
      if (input.parentId !== null) {
        throw new InvalidParentError('A workspace cannot have a parent', {
          parentId: input.parentId,
        });
      }
      const id = this.ids.next();
      return this.repos.nodes.insert({
        id,
        type: 'workspace',
        name,
        parentId: null,
        workspaceId: id,
        ownerId: input.ownerId,
      });
    }

    if (input.parentId === null) {
      throw new InvalidParentError(`A ${input.type} must have a parent`);
    }

    requireCapability(parentCapability, this.scope, input.parentId, PermissionLevel.Edit, {
      write: true,
    });

    const parent = await this.repos.nodes.get(input.parentId);
    if (!parent) {
      throw new ParentNotFoundError(input.parentId);
    }
    if (parent.deletedAt) {
      throw new InvalidParentError(`Parent node ${parent.id} is deleted`, { parentId: parent.id });
    }

    return this.repos.nodes.insert({
      id: this.ids.next(),
      type: input.type,
      name,
      parentId: parent.id,
      workspaceId: parent.workspaceId,
      ownerId: input.ownerId,
    });
  }

  /**
   * Read a node. Requires a Read capability on it.
   *
   * @throws NotFoundError if the node does not exist
   */
  async get(id: Snowflake, capability: Capability): Promise<Node> {
    requireCapability(capability, this.scope, id, PermissionLevel.Read);
    return this.load(id);
  }

  async rename(id: Snowflake, name: string, capability: Capability): Promise<Node> {
    requireCapability(capability, this.scope, id, PermissionLevel.Edit, { write: true });
    const validName = validateName(name);

    const renamed = await this.repos.nodes.rename(id, validName);
    if (!renamed) {
      throw new NotFoundError('node', id);
    }
    return renamed;
  }

  /**
   * Re-parent a node within its workspace.
   *
   * Run inside a transaction that holds the workspace lock: the descendant
   * check and the write must see the same tree.
   *
   * @throws CycleError if the new parent is the node itself or one of its descendants
   * @throws InvalidParentError when moving a workspace, leaving the workspace,
   * or moving under a soft-deleted parent
   * @throws NotFoundError if either node does not exist
   */
  async move(
    id: Snowflake,
    newParentId: Snowflake,
    capability: Capability,
    parentCapability: Capability
  ): Promise<Node> {
    requireCapability(capability, this.scope, id, PermissionLevel.Edit, { write: true });
    requireCapability(parentCapability, this.scope, newParentId, PermissionLevel.Edit, {
      write: true,
    });

    const node = await this.load(id);
    if (node.type === 'workspace') {
      throw new InvalidParentError('A workspace cannot be moved', { nodeId: id });
    }
    if (newParentId === id) {
      throw new CycleError(id, newParentId);
    }

    const parentAncestry = await this.repos.nodes.getAncestry(newParentId);
    if (parentAncestry.length === 0) {
      throw new NotFoundError('node', newParentId);
    }
    if (parentAncestry.some((ancestor) => ancestor.id === id)) {
      throw new CycleError(id, newParentId);
    }

    const [newParent] = parentAncestry;
    if (newParent.workspaceId !== node.workspaceId) {
      throw new InvalidParentError('Nodes cannot be moved between workspaces', {
        nodeId: id,
        parentId: newParentId,
      });
    }
    if (newParent.deletedAt) {
      throw new InvalidParentError(`Parent node ${newParentId} is deleted`, {
        parentId: newParentId,
      });
    }

    if (node.parentId === newParentId) {
      return node;
    }

    const moved = await this.repos.nodes.setParent(id, newParentId);
    if (!moved) {
      throw new NotFoundError('node', id);
    }
    return moved;
  }

  /**
   * Flag a node as deleted. Children keep their parent link and become
   * reachable only to Owner-level identities. Deleting twice is a no-op.
   */
  async softDelete(id: Snowflake, capability: Capability): Promise<Node> {
    requireCapability(capability, this.scope, id, PermissionLevel.Owner, { write: true });

    const node = await this.load(id);
    if (node.deletedAt) {
      return node;
    }

    const deleted = await this.repos.nodes.setDeletedAt(id, new Date(this.now()).toISOString());
    if (!deleted) {
      throw new NotFoundError('node', id);
    }
    return deleted;
  }

  /**
   * Clear the delete flag. Restoring a live node is a no-op.
   */
  async restore(id: Snowflake, capability: Capability): Promise<Node> {
    requireCapability(capability, this.scope, id, PermissionLevel.Owner, { write: true });

    const node = await this.load(id);
    if (!node.deletedAt) {
      return node;
    }

    const restored = await this.repos.nodes.setDeletedAt(id, null);
    if (!restored) {
      throw new NotFoundError('node', id);
    }
    return restored;
  }

  /**
   * Children of a node, fetched a page at a time. Requires Read on the parent,
   * or Owner to include soft-deleted children.
   *
   * Each iteration checks the capability and starts a fresh query, so
   * iterating again after a mutation reflects the current tree. A single pass
   * makes no snapshot guarantee.
   */
  listChildren(
    parentId: Snowflake,
    capability: Capability,
    options: ListChildrenOptions = {}
  ): AsyncIterable<Node> {
    const { repos, pageSize, scope } = this;
    const includeDeleted = options.includeDeleted ?? false;
    const required = includeDeleted ? PermissionLevel.Owner : PermissionLevel.Read;

    return {
      async *[Symbol.asyncIterator]() {
        requireCapability(capability, scope, parentId, required);
        let after: Snowflake | undefined;

        while (true) {
          const page = await repos.nodes.listChildren(parentId, {
            after,
            limit: pageSize,
            includeDeleted,
          });
          yield* page;

          if (page.length < pageSize) return;
          after = page[page.length - 1].id;
        }
      },
    };
  }

  private async load(id: Snowflake): Promise<Node> {
    const node = await this.repos.nodes.get(id);
    if (!node) {
      throw new NotFoundError('node', id);
    }
    return node;
  }
}

function validateName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0 || trimmed.length > MAX_NODE_NAME_LENGTH) {
    throw new ValidationError(`Node name must be 1 to ${MAX_NODE_NAME_LENGTH} characters`, {
      field: 'name',
    });
  }
  return trimmed;
}
