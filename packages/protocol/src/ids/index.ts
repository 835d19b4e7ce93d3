export {
  TIMESTAMP_BITS,
  GENERATOR_ID_BITS,
  SEQUENCE_BITS,
  MAX_GENERATOR_ID,
  MAX_SEQUENCE,
  MAX_TIMESTAMP_OFFSET,
  DEFAULT_SNOWFLAKE_EPOCH_MS,
  composeSnowflake,
  decodeSnowflake,
  snowflakeTimestamp,
  isSnowflake,
  compareSnowflakes,
  type SnowflakeParts,
} from './snowflake.js';
