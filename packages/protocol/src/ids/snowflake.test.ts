import { describe, it, expect } from 'vitest';
import {
  composeSnowflake,
  decodeSnowflake,
  snowflakeTimestamp,
  isSnowflake,
  compareSnowflakes,
  MAX_GENERATOR_ID,
  MAX_SEQUENCE,
  DEFAULT_SNOWFLAKE_EPOCH_MS,
} from './snowflake.js';

describe('composeSnowflake', () => {
  it('places timestamp, generator and sequence in their bit ranges', () => {
    // 1000 << 22 = 4194304000, 5 << 12 = 20480
    expect(composeSnowflake({ timestampOffsetMs: 1000, generatorId: 5, sequence: 7 })).toBe(
      '4194324487'
    );
  });

  it('decodes back to the fields it was built from', () => {
    const id = composeSnowflake({
      timestampOffsetMs: 123_456_789,
      generatorId: MAX_GENERATOR_ID,
      sequence: MAX_SEQUENCE,
    });

    expect(decodeSnowflake(id)).toEqual({
      timestampOffsetMs: 123_456_789,
      generatorId: 1023,
      sequence: 4095,
    });
  });
});

describe('snowflakeTimestamp', () => {
  it('adds the epoch back', () => {
    const id = composeSnowflake({ timestampOffsetMs: 250, generatorId: 0, sequence: 0 });
    expect(snowflakeTimestamp(id)).toBe(DEFAULT_SNOWFLAKE_EPOCH_MS + 250);
    expect(snowflakeTimestamp(id, 1000)).toBe(1250);
  });
});

describe('isSnowflake', () => {
  it('accepts decimal strings within 63 bits', () => {
    expect(isSnowflake('0')).toBe(true);
    expect(isSnowflake('4194324487')).toBe(true);
    expect(isSnowflake('9223372036854775807')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isSnowflake('9223372036854775808')).toBe(false);
    expect(isSnowflake('0123')).toBe(false);
    expect(isSnowflake('-1')).toBe(false);
    expect(isSnowflake('abc')).toBe(false);
    expect(isSnowflake(42)).toBe(false);
  });
});

describe('compareSnowflakes', () => {
  it('orders numerically rather than lexically', () => {
    expect(compareSnowflakes('9', '10')).toBe(-1);
    expect(compareSnowflakes('10', '9')).toBe(1);
    expect(compareSnowflakes('10', '10')).toBe(0);
    expect(['100', '20', '3'].sort(compareSnowflakes)).toEqual(['3', '20', '100']);
  });
});
