// Snowflake Generator
//
// Mints 64-bit ids: 41 bits of milliseconds since the epoch, 10 bits of
// generator id, 12 bits of sequence. `next()` is synchronous, so concurrent
// callers in one process are serialized by the event loop and the
// read-and-increment of the sequence cannot interleave.

import {
  composeSnowflake,
  DEFAULT_SNOWFLAKE_EPOCH_MS,
  MAX_GENERATOR_ID,
  MAX_SEQUENCE,
  MAX_TIMESTAMP_OFFSET,
  type Snowflake,
} from '@arbor/protocol';
import { ClockSkewError, ValidationError } from '../errors.js';

/**
 * Source of the current time in epoch milliseconds
 */
export type Clock = () => number;

export type SnowflakeGeneratorOptions = {
  /** 0..1023, unique among every running generator sharing the id space */
  generatorId: number;

  epochMs?: number;

  /**
   * How far the clock may step back before minting fails.
   * Smaller steps are waited out. Defaults to 5ms.
   */
  clockSkewToleranceMs?: number;

  clock?: Clock;
};

/**
 * Anything that hands out fresh ids
 */
export interface IdGenerator {
  next(): Snowflake;
}

export class SnowflakeGenerator implements IdGenerator {
  readonly generatorId: number;
  readonly epochMs: number;
  private readonly toleranceMs: number;
  private readonly clock: Clock;
  private lastTimestamp = -1;
  private sequence = 0;

  constructor(options: SnowflakeGeneratorOptions) {
    const { generatorId, epochMs = DEFAULT_SNOWFLAKE_EPOCH_MS } = options;

    if (!Number.isInteger(generatorId) || generatorId < 0 || generatorId > MAX_GENERATOR_ID) {
      throw new ValidationError(`Generator id must be an integer in 0..${MAX_GENERATOR_ID}`, {
        field: 'generatorId',
        details: { generatorId },
      });
    }

    this.generatorId = generatorId;
    this.epochMs = epochMs;
    this.toleranceMs = options.clockSkewToleranceMs ?? 5;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Mint the next id.
   *
   * Blocks only when 4096 ids have been minted within one millisecond, until
   * the clock reaches the next one.
   *
   * @throws ClockSkewError if the clock is further behind the last issued
   * timestamp than the tolerance allows. Nothing is minted and the generator's
   * state is unchanged, so every call fails until the clock catches up.
   */
  next(): Snowflake {
    let now = this.clock();

    if (now < this.lastTimestamp) {
      if (this.lastTimestamp - now > this.toleranceMs) {
        throw new ClockSkewError(this.lastTimestamp, now);
      }
      now = this.waitFor(this.lastTimestamp);
    }

    let sequence = 0;
    if (now === this.lastTimestamp) {
      sequence = (this.sequence + 1) & MAX_SEQUENCE;
      if (sequence === 0) {
        // Sequence space for this millisecond is used up
        now = this.waitFor(this.lastTimestamp + 1);
      }
    }

    const offset = now - this.epochMs;
    if (offset < 0 || offset > MAX_TIMESTAMP_OFFSET) {
      throw new ValidationError(`Clock reading ${now} is outside the id range of epoch ${this.epochMs}`, {
        field: 'epochMs',
      });
    }

    this.lastTimestamp = now;
    this.sequence = sequence;
    return composeSnowflake({
      timestampOffsetMs: offset,
      generatorId: this.generatorId,
      sequence,
    });
  }

  private waitFor(target: number): number {
    let now = this.clock();
    while (now < target) {
      now = this.clock();
    }
    return now;
  }
}

export function createSnowflakeGenerator(options: SnowflakeGeneratorOptions): SnowflakeGenerator {
  return new SnowflakeGenerator(options);
}
