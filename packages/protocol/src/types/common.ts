// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Snowflake identifier, carried as the decimal string of an unsigned 64-bit integer.
 *
 * Strings keep ids lossless through JSON; compare them with `compareSnowflakes`,
 * never lexically.
 */
export type Snowflake = string;

/**
 * Opaque user identifier issued by the authentication boundary
 */
export type UserId = string;
