export { IdentitySchema, parseIdentity, nativeIdentity, oidcIdentity } from './identity.js';
