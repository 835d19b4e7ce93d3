// Storage types - scoped access to the object behind a node

import type { Snowflake, Timestamp, UserId } from './common.js';

export type StorageOperation = 'read' | 'write';

/**
 * A short-lived reference that lets one caller perform one operation
 * on one stored object.
 */
export type ScopedStorageGrant = {
  nodeId: Snowflake;
  storageKey: string;
  operation: StorageOperation;

  /**
   * Pre-signed URL for the transfer
   */
  url: string;

  /**
   * HTTP method the URL was signed for
   */
  method: 'GET' | 'PUT';

  issuedTo: UserId;
  expiresAt: Timestamp;
};
