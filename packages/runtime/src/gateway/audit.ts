// Audit Store
//
// Records every call that passes through the access gateway, allowed or denied.
// An in-memory store is provided for tests and single-process deployments.

import type { AuditEntry, GatewayAction, Snowflake, UserId } from '@arbor/protocol';
import { compareSnowflakes } from '@arbor/protocol';

/**
 * Interface for storing and querying audit entries.
 */
export interface AuditStore {
  append(entry: AuditEntry): Promise<void>;

  /**
   * Entries matching every given filter field, most recent first.
   */
  query(filter?: AuditQueryFilter): Promise<AuditEntry[]>;
}

export type AuditQueryFilter = {
  nodeId?: Snowflake;
  actorId?: UserId;
  action?: GatewayAction;
  success?: boolean;

  /** Maximum entries to return */
  limit?: number;
};

/**
 * Create an in-memory audit store.
 *
 * Entries are ordered by id, which is a snowflake and so follows mint time.
 */
export function createInMemoryAuditStore(): AuditStore {
  const entries: AuditEntry[] = [];

  return {
    async append(entry: AuditEntry): Promise<void> {
      entries.push(entry);
    },

    async query(filter: AuditQueryFilter = {}): Promise<AuditEntry[]> {
      const result = entries
        .filter(
          (e) =>
            (filter.nodeId === undefined || e.nodeId === filter.nodeId) &&
            (filter.actorId === undefined || e.actorId === filter.actorId) &&
            (filter.action === undefined || e.action === filter.action) &&
            (filter.success === undefined || e.success === filter.success)
        )
        .sort((a, b) => compareSnowflakes(b.id, a.id));

      return filter.limit !== undefined ? result.slice(0, filter.limit) : result;
    },
  };
}
