export { createAuthzApi, toRequestingPartyForm } from './authz-api.js';
export type { AuthzApi } from './authz-api.js';
export type {
  PermissionResponseByMode,
  PermissionResponseMode,
  RequestingPartyPermission,
  RequestingPartyPermissionDecision,
  RequestingPartyTokenOptions,
} from './types.js';
