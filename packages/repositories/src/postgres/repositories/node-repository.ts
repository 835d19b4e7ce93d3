import { and, asc, eq, gt, isNull, sql, type SQL } from 'drizzle-orm';
import type { DatabaseExecutor } from '../db.js';
import { nodes } from '../schema/index.js';
import type {
  NodeRepository,
  InsertNodeInput,
  ChildPageQuery,
} from '../../interfaces/index.js';
import type { Node, Snowflake, Timestamp } from '@arbor/protocol';

/**
 * Transaction-scoped advisory lock on a workspace, keyed by its id.
 */
export function lockWorkspaceStatement(workspaceId: Snowflake): SQL {
  return sql`select pg_advisory_xact_lock(${workspaceId}::bigint)`;
}

export class PgNodeRepository implements NodeRepository {
  constructor(private db: DatabaseExecutor) {}

  async insert(input: InsertNodeInput): Promise<Node> {
    const now = new Date();

    const [row] = await this.db
      .insert(nodes)
      .values({
        id: BigInt(input.id),
        type: input.type,
        name: input.name,
        parentId: input.parentId === null ? null : BigInt(input.parentId),
        workspaceId: BigInt(input.workspaceId),
        ownerId: input.ownerId,
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    return this.rowToNode(row);
  }

  async get(id: Snowflake): Promise<Node | null> {
    const [row] = await this.db.select().from(nodes).where(eq(nodes.id, BigInt(id)));
    return row ? this.rowToNode(row) : null;
  }

  async getAncestry(id: Snowflake): Promise<Node[]> {
    const chain: Node[] = [];
    const seen = new Set<Snowflake>();
    let nextId: Snowflake | null = id;

    while (nextId !== null) {
      if (seen.has(nextId)) {
        throw new Error(`Parent links loop at node ${nextId}`);
      }
      seen.add(nextId);

      const node = await this.get(nextId);
      if (!node) break;
      chain.push(node);
      nextId = node.parentId;
    }

    return chain;
  }

  async listChildren(parentId: Snowflake, query: ChildPageQuery): Promise<Node[]> {
    const rows = await this.selectChildren(parentId, query);
    return rows.map((r) => this.rowToNode(r));
  }

  /**
   * One page of children, keyset-paginated on id.
   */
  selectChildren(parentId: Snowflake, query: ChildPageQuery) {
    const conditions: SQL[] = [eq(nodes.parentId, BigInt(parentId))];

    if (query.after) {
      conditions.push(gt(nodes.id, BigInt(query.after)));
    }

    if (!query.includeDeleted) {
      conditions.push(isNull(nodes.deletedAt));
    }

    return this.db
      .select()
      .from(nodes)
      .where(and(...conditions))
      .orderBy(asc(nodes.id))
      .limit(query.limit);
  }

  async rename(id: Snowflake, name: string): Promise<Node | null> {
    const [row] = await this.db
      .update(nodes)
      .set({ name, updatedAt: new Date() })
      .where(eq(nodes.id, BigInt(id)))
      .returning();

    return row ? this.rowToNode(row) : null;
  }

  async setParent(id: Snowflake, parentId: Snowflake): Promise<Node | null> {
    const [row] = await this.db
      .update(nodes)
      .set({ parentId: BigInt(parentId), updatedAt: new Date() })
      .where(eq(nodes.id, BigInt(id)))
      .returning();

    return row ? this.rowToNode(row) : null;
  }

  async setDeletedAt(id: Snowflake, deletedAt: Timestamp | null): Promise<Node | null> {
    const [row] = await this.db
      .update(nodes)
      .set({
        deletedAt: deletedAt === null ? null : new Date(deletedAt),
        updatedAt: new Date(),
      })
      .where(eq(nodes.id, BigInt(id)))
      .returning();

    return row ? this.rowToNode(row) : null;
  }

  async lockWorkspace(workspaceId: Snowflake): Promise<void> {
    await this.db.execute(lockWorkspaceStatement(workspaceId));
  }

  private rowToNode(row: typeof nodes.$inferSelect): Node {
    return {
      id: row.id.toString(),
      type: row.type,
      name: row.name,
      parentId: row.parentId === null ? null : row.parentId.toString(),
      workspaceId: row.workspaceId.toString(),
      ownerId: row.ownerId,
      createdAt: row.createdAt.toISOString(),
      updatedAt: row.updatedAt.toISOString(),
      deletedAt: row.deletedAt?.toISOString(),
    };
  }
}
