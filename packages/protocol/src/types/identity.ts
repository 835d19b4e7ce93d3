// Identity types - the authenticated principal behind a request

import type { Timestamp, UserId } from './common.js';

/**
 * How the principal proved who they are
 */
export type AuthMethod = { kind: 'native' } | { kind: 'oidc'; provider: string };

/**
 * An already-verified identity claim.
 *
 * Produced by the authentication boundary and trusted as-is by the engine.
 */
export type Identity = {
  userId: UserId;
  authMethod: AuthMethod;
  sessionIssuedAt: Timestamp;
};

export function describeAuthMethod(method: AuthMethod): string {
  return method.kind === 'oidc' ? `oidc:${method.provider}` : 'native';
}
