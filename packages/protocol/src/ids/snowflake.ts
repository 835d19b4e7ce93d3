// Snowflake layout
//
// 64-bit ids, most significant bit unused:
//   41 bits  milliseconds since a fixed epoch
//   10 bits  generator id
//   12 bits  per-millisecond sequence
//
// Ids from one generator sort by issue order; ids from distinct generators never collide.

import type { Snowflake } from '../types/common.js';

export const TIMESTAMP_BITS = 41;
export const GENERATOR_ID_BITS = 10;
export const SEQUENCE_BITS = 12;

export const MAX_GENERATOR_ID = (1 << GENERATOR_ID_BITS) - 1;
export const MAX_SEQUENCE = (1 << SEQUENCE_BITS) - 1;
export const MAX_TIMESTAMP_OFFSET = 2 ** TIMESTAMP_BITS - 1;

/**
 * 2024-01-01T00:00:00.000Z
 */
export const DEFAULT_SNOWFLAKE_EPOCH_MS = 1_704_067_200_000;

const GENERATOR_SHIFT = BigInt(SEQUENCE_BITS);
const TIMESTAMP_SHIFT = BigInt(SEQUENCE_BITS + GENERATOR_ID_BITS);
const MAX_ID = (1n << 63n) - 1n;

export type SnowflakeParts = {
  /** Milliseconds since the epoch the id was minted against */
  timestampOffsetMs: number;
  generatorId: number;
  sequence: number;
};

/**
 * Pack the three fields into an id. Callers are expected to pass in-range values.
 */
export function composeSnowflake(parts: SnowflakeParts): Snowflake {
  const value =
    (BigInt(parts.timestampOffsetMs) << TIMESTAMP_SHIFT) |
    (BigInt(parts.generatorId) << GENERATOR_SHIFT) |
    BigInt(parts.sequence);
  return value.toString();
}

export function decodeSnowflake(id: Snowflake): SnowflakeParts {
  const value = BigInt(id);
  return {
    timestampOffsetMs: Number(value >> TIMESTAMP_SHIFT),
    generatorId: Number((value >> GENERATOR_SHIFT) & BigInt(MAX_GENERATOR_ID)),
    sequence: Number(value & BigInt(MAX_SEQUENCE)),
  };
}

/**
 * Wall-clock time an id was minted at, in epoch milliseconds.
 */
export function snowflakeTimestamp(
  id: Snowflake,
  epochMs: number = DEFAULT_SNOWFLAKE_EPOCH_MS
): number {
  return decodeSnowflake(id).timestampOffsetMs + epochMs;
}

export function isSnowflake(value: unknown): value is Snowflake {
  if (typeof value !== 'string' || !/^(0|[1-9][0-9]{0,18})$/.test(value)) {
    return false;
  }
  return BigInt(value) <= MAX_ID;
}

/**
 * Numeric ordering of two ids.
 * @returns Negative, zero or positive, as for `Array.prototype.sort`
 */
export function compareSnowflakes(a: Snowflake, b: Snowflake): number {
  const left = BigInt(a);
  const right = BigInt(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}
