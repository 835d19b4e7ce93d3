import {
  pgTable,
  bigint,
  text,
  timestamp,
  index,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';

/**
 * Nodes table - the workspace trees.
 *
 * Rows are never deleted; `deleted_at` marks a soft delete so child links stay valid.
 */
export const nodes = pgTable(
  'nodes',
  {
    id: bigint('id', { mode: 'bigint' }).primaryKey(),
    type: text('type', { enum: ['workspace', 'category', 'document', 'resource'] }).notNull(),
    name: text('name').notNull(),
    parentId: bigint('parent_id', { mode: 'bigint' }).references((): AnyPgColumn => nodes.id),
    workspaceId: bigint('workspace_id', { mode: 'bigint' }).notNull(),
    ownerId: text('owner_id').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => [
    index('nodes_parent_idx').on(table.parentId, table.id),
    index('nodes_workspace_idx').on(table.workspaceId),
  ]
);
