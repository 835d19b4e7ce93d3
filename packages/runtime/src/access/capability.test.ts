import { describe, it, expect } from 'vitest';
import type { Node } from '@arbor/protocol';
import { PermissionLevel } from '@arbor/protocol';
import { PermissionDeniedError } from '../errors.js';
import { nativeIdentity } from '../identity/index.js';
import { Capability, CapabilityScope, issueCapability, requireCapability } from './capability.js';

const identity = nativeIdentity('user-1');

const node: Node = {
  id: '10',
  type: 'document',
  name: 'Notes',
  parentId: '1',
  workspaceId: '1',
  ownerId: 'user-1',
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z',
};

describe('requireCapability', () => {
  it('accepts an issued capability at or above the required level', () => {
    const scope = new CapabilityScope(identity, { writable: true });
    const capability = issueCapability(scope, node, PermissionLevel.Edit, 'node.rename');

    expect(requireCapability(capability, scope, '10', PermissionLevel.Comment)).toBe(capability);
    expect(requireCapability(capability, scope, '10', PermissionLevel.Edit, { write: true })).toBe(
      capability
    );
  });

  it('rejects a lower level, another node or no capability', () => {
    const scope = new CapabilityScope(identity, { writable: true });
    const capability = issueCapability(scope, node, PermissionLevel.Read, 'node.read');

    expect(() => requireCapability(capability, scope, '10', PermissionLevel.Edit)).toThrow(
      PermissionDeniedError
    );
    expect(() => requireCapability(capability, scope, '11', PermissionLevel.Read)).toThrow(
      PermissionDeniedError
    );
    expect(() => requireCapability(undefined, scope, '10', PermissionLevel.Read)).toThrow(
      PermissionDeniedError
    );
  });

  it('rejects a capability presented in another scope', () => {
    const issuedIn = new CapabilityScope(identity, { writable: true });
    const other = new CapabilityScope(identity, { writable: true });
    const capability = issueCapability(issuedIn, node, PermissionLevel.Owner, 'node.rename');

    expect(() => requireCapability(capability, other, '10', PermissionLevel.Read)).toThrow(
      PermissionDeniedError
    );
  });

  it('rejects capabilities once their scope is closed', () => {
    const scope = new CapabilityScope(identity, { writable: true });
    const capability = issueCapability(scope, node, PermissionLevel.Owner, 'node.rename');
    scope.close();

    expect(() => requireCapability(capability, scope, '10', PermissionLevel.Read)).toThrow(
      PermissionDeniedError
    );
  });

  it('rejects writes backed by a read-only scope', () => {
    const scope = new CapabilityScope(identity, { writable: false });
    const capability = issueCapability(scope, node, PermissionLevel.Owner, 'node.read');

    expect(requireCapability(capability, scope, '10', PermissionLevel.Read)).toBe(capability);
    expect(() =>
      requireCapability(capability, scope, '10', PermissionLevel.Edit, { write: true })
    ).toThrow(PermissionDeniedError);
  });

  it('cannot be constructed outside the issuer', () => {
    const scope = new CapabilityScope(identity, { writable: true });

    expect(
      () => new Capability(Symbol('capability-issuer'), scope, node, PermissionLevel.Owner, 'node.delete')
    ).toThrow(TypeError);
  });
});
