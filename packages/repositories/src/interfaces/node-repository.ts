import type { Node, NodeType, Snowflake, Timestamp, UserId } from '@arbor/protocol';

/**
 * Input for inserting a Node. Ids are minted by the caller.
 */
export type InsertNodeInput = {
  id: Snowflake;
  type: NodeType;
  name: string;
  parentId: Snowflake | null;
  workspaceId: Snowflake;
  ownerId: UserId;
};

/**
 * One page of a child listing
 */
export type ChildPageQuery = {
  /** Only return children with an id greater than this one */
  after?: Snowflake;
  limit: number;
  includeDeleted?: boolean;
};

/**
 * Repository interface for the node tree.
 *
 * The repository keeps rows and links only. Structural rules (acyclic parents,
 * live parents, workspace roots) are enforced by the runtime's node store.
 */
export interface NodeRepository {
  insert(input: InsertNodeInput): Promise<Node>;

  /**
   * Get a Node by ID, including soft-deleted nodes
   * @returns Node or null if not found
   */
  get(id: Snowflake): Promise<Node | null>;

  /**
   * The node followed by each of its ancestors up to the workspace root.
   * @returns An empty list if the node does not exist
   * @throws Error if the stored parent links loop
   */
  getAncestry(id: Snowflake): Promise<Node[]>;

  /**
   * Children of a node ordered by id ascending
   */
  listChildren(parentId: Snowflake, query: ChildPageQuery): Promise<Node[]>;

  /**
   * @returns Updated Node or null if not found
   */
  rename(id: Snowflake, name: string): Promise<Node | null>;

  /**
   * @returns Updated Node or null if not found
   */
  setParent(id: Snowflake, parentId: Snowflake): Promise<Node | null>;

  /**
   * Set or clear the soft-delete timestamp
   * @returns Updated Node or null if not found
   */
  setDeletedAt(id: Snowflake, deletedAt: Timestamp | null): Promise<Node | null>;

  /**
   * Serialize tree mutations within the current transaction.
   * Held until the transaction ends; a no-op outside one.
   */
  lockWorkspace(workspaceId: Snowflake): Promise<void>;
}
