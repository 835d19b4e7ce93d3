// Audit types - record of every gated operation

import type { Snowflake, Timestamp, UserId } from './common.js';

/**
 * Operations that pass through the access gateway
 */
export type GatewayAction =
  | 'node.read'
  | 'node.create'
  | 'node.rename'
  | 'node.move'
  | 'node.delete'
  | 'node.restore'
  | 'node.list_children'
  | 'grant.set'
  | 'grant.revoke'
  | 'permissions.resolve'
  | 'permissions.list'
  | 'storage.read'
  | 'storage.write';

export type AuditEntry = {
  id: Snowflake;
  timestamp: Timestamp;

  actorId: UserId;

  /**
   * Auth method of the actor, as `native` or `oidc:<provider>`
   */
  authMethod: string;

  action: GatewayAction;

  /**
   * Target node, absent when creating a workspace
   */
  nodeId?: Snowflake;

  success: boolean;

  /**
   * Error code on failure
   */
  error?: string;

  durationMs: number;
};
