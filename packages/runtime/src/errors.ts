// Engine error types
//
// Every error the engine raises on purpose extends EngineError and carries a
// stable `code` the transport layer maps to a response status.

import type { PermissionLevel, Snowflake } from '@arbor/protocol';
import { permissionLevelName } from '@arbor/protocol';

/**
 * Base class for all engine errors.
 * Provides structured error information for debugging and logging.
 */
export class EngineError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
  }
}

export function isEngineError(value: unknown): value is EngineError {
  return value instanceof EngineError;
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends EngineError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown>; code?: string }
  ) {
    super(options?.code ?? 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a referenced record does not exist.
 */
export class NotFoundError extends EngineError {
  readonly resourceType: 'node' | 'grant';
  readonly resourceId: string;

  constructor(resourceType: 'node' | 'grant', resourceId: string) {
    super('NOT_FOUND', `${resourceType === 'node' ? 'Node' : 'Grant'} not found: ${resourceId}`);
    this.name = 'NotFoundError';
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

/**
 * Error when the parent named for a new node does not exist.
 */
export class ParentNotFoundError extends NotFoundError {
  constructor(parentId: Snowflake) {
    super('node', parentId);
    this.name = 'ParentNotFoundError';
    this.message = `Parent node not found: ${parentId}`;
  }
}

/**
 * Error when the caller's effective level is below what the operation needs.
 *
 * The message depends only on the node id and the required level, so a caller
 * cannot tell a hidden node from a missing one.
 */
export class PermissionDeniedError extends EngineError {
  readonly nodeId: Snowflake;
  readonly required: PermissionLevel;

  constructor(nodeId: Snowflake, required: PermissionLevel) {
    super(
      'PERMISSION_DENIED',
      `Permission denied: ${permissionLevelName(required)} access to node ${nodeId} is required`
    );
    this.name = 'PermissionDeniedError';
    this.nodeId = nodeId;
    this.required = required;
  }
}

/**
 * Error when a parent link would break the tree's shape.
 */
export class InvalidParentError extends ValidationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { field: 'parentId', details, code: 'INVALID_PARENT' });
    this.name = 'InvalidParentError';
  }
}

/**
 * Error when a move would put a node under itself.
 */
export class CycleError extends ValidationError {
  readonly nodeId: Snowflake;
  readonly newParentId: Snowflake;

  constructor(nodeId: Snowflake, newParentId: Snowflake) {
    super(`Moving node ${nodeId} under ${newParentId} would create a cycle`, {
      field: 'parentId',
      details: { nodeId, newParentId },
      code: 'CYCLE',
    });
    this.name = 'CycleError';
    this.nodeId = nodeId;
    this.newParentId = newParentId;
  }
}

/**
 * Error when the system clock has moved backwards past the tolerance.
 * No id is minted until the clock passes the last timestamp again.
 */
export class ClockSkewError extends EngineError {
  readonly lastTimestampMs: number;
  readonly observedTimestampMs: number;

  constructor(lastTimestampMs: number, observedTimestampMs: number) {
    super(
      'CLOCK_SKEW',
      `Clock moved backwards by ${lastTimestampMs - observedTimestampMs}ms; refusing to mint ids`
    );
    this.name = 'ClockSkewError';
    this.lastTimestampMs = lastTimestampMs;
    this.observedTimestampMs = observedTimestampMs;
  }
}

/**
 * Error when the environment does not describe a usable configuration.
 */
export class ConfigError extends EngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
