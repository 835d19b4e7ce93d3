// Grant types - explicit shares of a node to a user

import type { Snowflake, Timestamp, UserId } from './common.js';

/**
 * Ordered permission scale. A higher level carries every capability of the lower ones.
 */
export const PermissionLevel = {
  None: 0,
  Read: 1,
  Comment: 2,
  Edit: 3,
  Owner: 4,
} as const;

export type PermissionLevel = (typeof PermissionLevel)[keyof typeof PermissionLevel];

export type PermissionLevelName = keyof typeof PermissionLevel;

/**
 * A Grant shares one node with one subject at a level.
 *
 * Grants are stored only where they were made. Descendants inherit them at
 * resolution time; nothing is copied down the tree.
 */
export type Grant = {
  nodeId: Snowflake;
  subjectId: UserId;
  level: PermissionLevel;

  /**
   * Who made the share
   */
  grantedBy: UserId;

  grantedAt: Timestamp;
};

export const PERMISSION_LEVELS: readonly PermissionLevel[] = [0, 1, 2, 3, 4];

const LEVEL_NAMES: Record<PermissionLevel, PermissionLevelName> = {
  0: 'None',
  1: 'Read',
  2: 'Comment',
  3: 'Edit',
  4: 'Owner',
};

export function isPermissionLevel(value: unknown): value is PermissionLevel {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 4;
}

export function permissionLevelName(level: PermissionLevel): PermissionLevelName {
  return LEVEL_NAMES[level];
}

/**
 * Parse a level from its name (case-insensitive) or its number.
 * @returns The level, or null when the input names no level
 */
export function parsePermissionLevel(input: string | number): PermissionLevel | null {
  if (typeof input === 'number') {
    return isPermissionLevel(input) ? input : null;
  }
  const wanted = input.trim().toLowerCase();
  const named = PERMISSION_LEVELS.find((level) => LEVEL_NAMES[level].toLowerCase() === wanted);
  if (named !== undefined) {
    return named;
  }
  const numeric = Number(wanted);
  return wanted !== '' && isPermissionLevel(numeric) ? numeric : null;
}

/**
 * The most permissive of the given levels; None for an empty list.
 */
export function maxLevel(levels: Iterable<PermissionLevel>): PermissionLevel {
  let best: PermissionLevel = PermissionLevel.None;
  for (const level of levels) {
    if (level > best) best = level;
  }
  return best;
}
