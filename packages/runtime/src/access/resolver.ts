// Permission Resolver
//
// Effective level of an identity on a node:
// - Owner if the identity owns the node or any of its ancestors
// - otherwise the highest grant the identity holds on the node or any ancestor
// - otherwise None
//
// Grants inherit downward only. A grant on a document says nothing about its workspace.

import type { Grant, Identity, Node, Snowflake, UserId } from '@arbor/protocol';
import { PermissionLevel, maxLevel } from '@arbor/protocol';
import type { RepositoryContext } from '@arbor/repositories';

// --- Types ---

/**
 * Where an effective level came from
 */
export type ResolutionSource = 'owner' | 'grant' | 'none';

/**
 * Result of resolving an identity against a node
 */
export type Resolution = {
  node: Node;

  /** The node followed by its ancestors up to the workspace root */
  ancestry: Node[];

  level: PermissionLevel;

  source: ResolutionSource;

  /** The node or one of its ancestors is soft-deleted */
  trashed: boolean;
};

// --- Pure resolution ---

/**
 * Effective level of `userId` given a node's ancestry and grants on it.
 * Grants outside the ancestry or for other subjects are ignored.
 */
export function computeEffectiveLevel(
  userId: UserId,
  ancestry: Node[],
  grants: Grant[]
): { level: PermissionLevel; source: ResolutionSource } {
  for (const node of ancestry) {
    if (node.ownerId === userId) {
      return { level: PermissionLevel.Owner, source: 'owner' };
    }
  }

  const chain = new Set(ancestry.map((n) => n.id));
  const level = maxLevel(
    grants.filter((g) => g.subjectId === userId && chain.has(g.nodeId)).map((g) => g.level)
  );

  return { level, source: level === PermissionLevel.None ? 'none' : 'grant' };
}

/**
 * Effective level of every subject holding ownership or a grant on the ancestry.
 * Subjects at None are left out.
 */
export function collectEffectivePermissions(
  ancestry: Node[],
  grants: Grant[]
): Map<UserId, PermissionLevel> {
  const levels = new Map<UserId, PermissionLevel>();

  for (const node of ancestry) {
    levels.set(node.ownerId, PermissionLevel.Owner);
  }

  const chain = new Set(ancestry.map((n) => n.id));
  for (const grant of grants) {
    if (!chain.has(grant.nodeId)) continue;
    const current = levels.get(grant.subjectId) ?? PermissionLevel.None;
    if (grant.level > current) {
      levels.set(grant.subjectId, grant.level);
    }
  }

  return levels;
}

// --- Resolver ---

/**
 * PermissionResolver reads the tree and grants through the repositories it is given.
 *
 * It takes no locks. For a consistent answer, hand it the repositories of a
 * transaction; the access gateway always does.
 *
 * @example
 * ```typescript
 * const level = await repos.transaction(
 *   (tx) => new PermissionResolver(tx).resolve(identity, documentId),
 *   { readOnly: true }
 * );
 * ```
 */
export class PermissionResolver {
  constructor(private repos: RepositoryContext) {}

  /**
   * Resolve with the evidence behind the answer.
   * @returns null if the node does not exist
   */
  async resolveDetailed(identity: Identity, nodeId: Snowflake): Promise<Resolution | null> {
    const ancestry = await this.repos.nodes.getAncestry(nodeId);
    if (ancestry.length === 0) {
      return null;
    }

    const trashed = ancestry.some((n) => n.deletedAt !== undefined);
    const owned = computeEffectiveLevel(identity.userId, ancestry, []);
    if (owned.source === 'owner') {
      return { node: ancestry[0], ancestry, trashed, ...owned };
    }

    const grants = await this.repos.grants.getForSubject(
      identity.userId,
      ancestry.map((n) => n.id)
    );

    return {
      node: ancestry[0],
      ancestry,
      trashed,
      ...computeEffectiveLevel(identity.userId, ancestry, grants),
    };
  }

  /**
   * Effective level of `identity` on a node; None if the node does not exist.
   */
  async resolve(identity: Identity, nodeId: Snowflake): Promise<PermissionLevel> {
    const resolution = await this.resolveDetailed(identity, nodeId);
    return resolution?.level ?? PermissionLevel.None;
  }

  /**
   * Effective level of everyone with access to a node.
   * @returns null if the node does not exist
   */
  async listEffectivePermissions(nodeId: Snowflake): Promise<Map<UserId, PermissionLevel> | null> {
    const ancestry = await this.repos.nodes.getAncestry(nodeId);
    if (ancestry.length === 0) {
      return null;
    }

    const grants = await this.repos.grants.getForNodes(ancestry.map((n) => n.id));
    return collectEffectivePermissions(ancestry, grants);
  }
}

export function createPermissionResolver(repos: RepositoryContext): PermissionResolver {
  return new PermissionResolver(repos);
}
