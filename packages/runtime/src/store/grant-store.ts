// Grant Store
//
// Explicit shares on nodes. Like the node store, it takes capabilities issued
// in its own scope: setting or revoking a grant needs Owner on the node.

import type { Grant, Snowflake, UserId } from '@arbor/protocol';
import { PermissionLevel, isPermissionLevel } from '@arbor/protocol';
import type { GrantRepository } from '@arbor/repositories';
import { type Capability, type CapabilityScope, requireCapability } from '../access/capability.js';
import { NotFoundError, ValidationError } from '../errors.js';

export type SetGrantInput = {
  nodeId: Snowflake;
  subjectId: UserId;
  level: PermissionLevel;
};

export class GrantStore {
  constructor(
    private grants: GrantRepository,
    private scope: CapabilityScope
  ) {}

  /**
   * Set `subjectId`'s explicit level on a node, replacing any previous grant.
   * The grant is recorded as made by the capability's holder.
   *
   * @throws ValidationError for a level outside Read..Owner or a blank subject
   */
  async set(input: SetGrantInput, capability: Capability): Promise<Grant> {
    requireCapability(capability, this.scope, input.nodeId, PermissionLevel.Owner, { write: true });

    if (!isPermissionLevel(input.level) || input.level === PermissionLevel.None) {
      throw new ValidationError('Grant level must be between Read and Owner', {
        field: 'level',
        details: { level: input.level },
      });
    }
    if (input.subjectId.trim().length === 0) {
      throw new ValidationError('Grant subject must not be empty', { field: 'subjectId' });
    }

    return this.grants.upsert({
      nodeId: input.nodeId,
      subjectId: input.subjectId,
      level: input.level,
      grantedBy: capability.identity.userId,
    });
  }

  /**
   * @throws NotFoundError if `subjectId` holds no explicit grant on the node
   */
  async revoke(nodeId: Snowflake, subjectId: UserId, capability: Capability): Promise<void> {
    requireCapability(capability, this.scope, nodeId, PermissionLevel.Owner, { write: true });

    const removed = await this.grants.remove(nodeId, subjectId);
    if (!removed) {
      throw new NotFoundError('grant', `${nodeId}:${subjectId}`);
    }
  }
}
