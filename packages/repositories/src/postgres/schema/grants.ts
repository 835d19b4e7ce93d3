import { sql } from 'drizzle-orm';
import {
  pgTable,
  bigint,
  smallint,
  text,
  timestamp,
  index,
  primaryKey,
  check,
} from 'drizzle-orm/pg-core';
import type { PermissionLevel } from '@arbor/protocol';
import { nodes } from './nodes.js';

/**
 * Grants table - explicit shares, one row per (node, subject).
 */
export const grants = pgTable(
  'grants',
  {
    nodeId: bigint('node_id', { mode: 'bigint' })
      .notNull()
      .references(() => nodes.id),
    subjectId: text('subject_id').notNull(),
    level: smallint('level').notNull().$type<PermissionLevel>(),
    grantedBy: text('granted_by').notNull(),
    grantedAt: timestamp('granted_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.nodeId, table.subjectId] }),
    index('grants_subject_idx').on(table.subjectId),
    check('grants_level_range', sql`${table.level} between 1 and 4`),
  ]
);
