// Identity Context
//
// The authentication boundary hands the engine an already-verified claim.
// The engine checks only that the claim is well-formed; it never re-verifies
// credentials.

import { z } from 'zod';
import type { Identity } from '@arbor/protocol';
import { ValidationError } from '../errors.js';

const AuthMethodSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('native') }),
  z.object({ kind: z.literal('oidc'), provider: z.string().trim().min(1) }),
]);

export const IdentitySchema = z.object({
  userId: z.string().trim().min(1),
  authMethod: AuthMethodSchema,
  sessionIssuedAt: z.string().datetime({ offset: true }),
});

/**
 * Validate an identity claim received from the authentication boundary.
 *
 * @throws ValidationError naming the first malformed field
 */
export function parseIdentity(input: unknown): Identity {
  const parsed = IdentitySchema.safeParse(input);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue.path.join('.');
    throw new ValidationError(`Invalid identity: ${field || 'value'}: ${issue.message}`, {
      field: field || undefined,
    });
  }
  return parsed.data;
}

export function nativeIdentity(userId: string, sessionIssuedAt: Date = new Date()): Identity {
  return parseIdentity({
    userId,
    authMethod: { kind: 'native' },
    sessionIssuedAt: sessionIssuedAt.toISOString(),
  });
}

export function oidcIdentity(
  userId: string,
  provider: string,
  sessionIssuedAt: Date = new Date()
): Identity {
  return parseIdentity({
    userId,
    authMethod: { kind: 'oidc', provider },
    sessionIssuedAt: sessionIssuedAt.toISOString(),
  });
}
