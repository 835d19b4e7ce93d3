import type { Grant, PermissionLevel, Snowflake, UserId } from '@arbor/protocol';

/**
 * Input for creating or replacing a Grant
 */
export type UpsertGrantInput = {
  nodeId: Snowflake;
  subjectId: UserId;
  level: PermissionLevel;
  grantedBy: UserId;
};

/**
 * Repository interface for Grant operations.
 *
 * There is at most one grant per (node, subject). Inherited access is never
 * stored; it is computed from the grants on a node's ancestry.
 */
export interface GrantRepository {
  /**
   * Create the grant, or replace the level of an existing one
   */
  upsert(input: UpsertGrantInput): Promise<Grant>;

  /**
   * @returns Grant or null if not found
   */
  get(nodeId: Snowflake, subjectId: UserId): Promise<Grant | null>;

  /**
   * @returns true if removed, false if not found
   */
  remove(nodeId: Snowflake, subjectId: UserId): Promise<boolean>;

  /**
   * Grants held by one subject on any of the given nodes
   */
  getForSubject(subjectId: UserId, nodeIds: Snowflake[]): Promise<Grant[]>;

  /**
   * Every grant on any of the given nodes
   */
  getForNodes(nodeIds: Snowflake[]): Promise<Grant[]>;
}
