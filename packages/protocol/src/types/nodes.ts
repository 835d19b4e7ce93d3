// Node types - the workspace tree

import type { Snowflake, Timestamp, UserId } from './common.js';

/**
 * Node types. A workspace is always a root; every other type hangs under a parent.
 */
export type NodeType = 'workspace' | 'category' | 'document' | 'resource';

export const NODE_TYPES: readonly NodeType[] = ['workspace', 'category', 'document', 'resource'];

/**
 * Node types that carry an object in storage
 */
export const STORED_NODE_TYPES: readonly NodeType[] = ['document', 'resource'];

/**
 * A Node is one entry in a workspace tree.
 *
 * Nodes are never physically removed. Deletion sets `deletedAt`, which keeps
 * every child's parent reference intact so the subtree can be restored.
 */
export type Node = {
  id: Snowflake;
  type: NodeType;

  /**
   * Human-readable name
   */
  name: string;

  /**
   * Parent node, null only for workspaces
   */
  parentId: Snowflake | null;

  /**
   * Root of the tree this node lives in. Fixed at creation.
   */
  workspaceId: Snowflake;

  ownerId: UserId;

  createdAt: Timestamp;
  updatedAt: Timestamp;

  /**
   * Set when the node has been soft-deleted
   */
  deletedAt?: Timestamp;
};

export function isNodeType(value: unknown): value is NodeType {
  return NODE_TYPES.some((type) => type === value);
}
