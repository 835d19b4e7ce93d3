// Access control: capabilities and permission resolution

export {
  Capability,
  CapabilityScope,
  requireCapability,
  type RequireCapabilityOptions,
} from './capability.js';
export {
  PermissionResolver,
  createPermissionResolver,
  computeEffectiveLevel,
  collectEffectivePermissions,
  type Resolution,
  type ResolutionSource,
} from './resolver.js';
