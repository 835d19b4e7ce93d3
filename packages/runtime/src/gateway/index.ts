export {
  AccessGateway,
  createAccessGateway,
  type AccessGatewayOptions,
  type AuthorizedOperation,
  type AuthorizedScope,
  type CreateNodeRequest,
} from './gateway.js';
export { createInMemoryAuditStore, type AuditQueryFilter, type AuditStore } from './audit.js';
