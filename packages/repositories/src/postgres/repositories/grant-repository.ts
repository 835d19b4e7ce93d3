import { and, eq, inArray } from 'drizzle-orm';
import type { DatabaseExecutor } from '../db.js';
import { grants } from '../schema/index.js';
import type { GrantRepository, UpsertGrantInput } from '../../interfaces/index.js';
import type { Grant, Snowflake, UserId } from '@arbor/protocol';

export class PgGrantRepository implements GrantRepository {
  constructor(private db: DatabaseExecutor) {}

  async upsert(input: UpsertGrantInput): Promise<Grant> {
    const [row] = await this.upsertQuery(input, new Date());
    return this.rowToGrant(row);
  }

  /**
   * Insert a grant, or replace the level of the existing one for the same node and subject.
   */
  upsertQuery(input: UpsertGrantInput, now: Date) {
    return this.db
      .insert(grants)
      .values({
        nodeId: BigInt(input.nodeId),
        subjectId: input.subjectId,
        level: input.level,
        grantedBy: input.grantedBy,
        grantedAt: now,
      })
      .onConflictDoUpdate({
        target: [grants.nodeId, grants.subjectId],
        set: {
          level: input.level,
          grantedBy: input.grantedBy,
          grantedAt: now,
        },
      })
      .returning();
  }

  async get(nodeId: Snowflake, subjectId: UserId): Promise<Grant | null> {
    const [row] = await this.db
      .select()
      .from(grants)
      .where(and(eq(grants.nodeId, BigInt(nodeId)), eq(grants.subjectId, subjectId)));

    return row ? this.rowToGrant(row) : null;
  }

  async remove(nodeId: Snowflake, subjectId: UserId): Promise<boolean> {
    const removed = await this.db
      .delete(grants)
      .where(and(eq(grants.nodeId, BigInt(nodeId)), eq(grants.subjectId, subjectId)))
      .returning({ nodeId: grants.nodeId });

    return removed.length > 0;
  }

  async getForSubject(subjectId: UserId, nodeIds: Snowflake[]): Promise<Grant[]> {
    if (nodeIds.length === 0) return [];

    const rows = await this.db
      .select()
      .from(grants)
      .where(
        and(
          eq(grants.subjectId, subjectId),
          inArray(
            grants.nodeId,
            nodeIds.map((id) => BigInt(id))
          )
        )
      );

    return rows.map((r) => this.rowToGrant(r));
  }

  async getForNodes(nodeIds: Snowflake[]): Promise<Grant[]> {
    if (nodeIds.length === 0) return [];

    const rows = await this.db
      .select()
      .from(grants)
      .where(
        inArray(
          grants.nodeId,
          nodeIds.map((id) => BigInt(id))
        )
      );

    return rows.map((r) => this.rowToGrant(r));
  }

  private rowToGrant(row: typeof grants.$inferSelect): Grant {
    return {
      nodeId: row.nodeId.toString(),
      subjectId: row.subjectId,
      level: row.level,
      grantedBy: row.grantedBy,
      grantedAt: row.grantedAt.toISOString(),
    };
  }
}
