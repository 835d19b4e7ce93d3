// Capabilities
//
// Proof that the access gateway authorized an identity on a node. Node-store
// and grant-store calls demand one, so an operation that skipped the gateway
// does not type-check, and a capability built any other way is rejected at run
// time.
//
// Every capability belongs to the scope it was issued in. A scope lives as long
// as one gateway call: capabilities are accepted only while it is open, only by
// stores bound to it, and for writes only when the scope's transaction writes.

import type { GatewayAction, Identity, Node, PermissionLevel, Snowflake } from '@arbor/protocol';
import { PermissionDeniedError } from '../errors.js';

const ISSUER = Symbol('capability-issuer');
const issued = new WeakSet<Capability>();

/**
 * One identity's authorization context, usually one transaction.
 */
export class CapabilityScope {
  readonly identity: Identity;

  /** Capabilities from this scope may back writes */
  readonly writable: boolean;

  private open = true;

  constructor(identity: Identity, options: { writable: boolean }) {
    this.identity = identity;
    this.writable = options.writable;
  }

  get isOpen(): boolean {
    return this.open;
  }

  /**
   * Invalidate every capability issued in this scope.
   */
  close(): void {
    this.open = false;
  }
}

export class Capability {
  readonly scope: CapabilityScope;

  /** The node as observed when the decision was made */
  readonly node: Node;

  /** Effective level the identity resolved to */
  readonly level: PermissionLevel;

  readonly action: GatewayAction;

  constructor(
    issuer: symbol,
    scope: CapabilityScope,
    node: Node,
    level: PermissionLevel,
    action: GatewayAction
  ) {
    if (issuer !== ISSUER) {
      throw new TypeError('Capabilities are issued by the access gateway');
    }
    this.scope = scope;
    this.node = node;
    this.level = level;
    this.action = action;
  }

  get identity(): Identity {
    return this.scope.identity;
  }

  get nodeId(): Snowflake {
    return this.node.id;
  }
}

/**
 * Mint a capability. Not exported from the package; the access gateway is the only caller.
 */
export function issueCapability(
  scope: CapabilityScope,
  node: Node,
  level: PermissionLevel,
  action: GatewayAction
): Capability {
  const capability = new Capability(ISSUER, scope, node, level, action);
  issued.add(capability);
  return capability;
}

export type RequireCapabilityOptions = {
  /** The caller is about to write */
  write?: boolean;
};

/**
 * Check that a capability was minted by the gateway in `scope`, which is still
 * open, for `nodeId` at `required` or above.
 *
 * @throws PermissionDeniedError otherwise
 */
export function requireCapability(
  capability: Capability | undefined,
  scope: CapabilityScope,
  nodeId: Snowflake,
  required: PermissionLevel,
  options: RequireCapabilityOptions = {}
): Capability {
  if (
    !capability ||
    !issued.has(capability) ||
    capability.scope !== scope ||
    !scope.isOpen ||
    (options.write && !scope.writable) ||
    capability.identity.userId !== scope.identity.userId ||
    capability.nodeId !== nodeId ||
    capability.level < required
  ) {
    throw new PermissionDeniedError(nodeId, required);
  }
  return capability;
}
