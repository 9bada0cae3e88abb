/**
 * Keycloak REST client: OpenID Connect flows, authorization services and
 * admin resource management.
 *
 * @packageDocumentation
 */

// Public types
export type * from './types.js';

// ============================================================================
// CORE: Client
// ============================================================================

export { createKeycloakClient } from './client.js';
export type { KeycloakClient } from './client.js';

// ============================================================================
// CORE: Errors and logging
// ============================================================================

export { isInvalidGrant } from './rest/errors.js';
export { createConsoleLog, silentLog } from './logging.js';
export type { Log, LogLevel } from './logging.js';

// ============================================================================
// OpenID Connect
// ============================================================================

export { createOidcApi, toTokenForm } from './oidc/index.js';
export type {
  OidcApi,
  DecodeAccessTokenOptions,
  AccessTokenClaims,
  CertResponse,
  IntrospectTokenResult,
  IssuerResponse,
  JWT,
  ResourcePermission,
  TokenOptions,
  UserInfo,
  UserInfoAddress,
  WellKnownConfiguration,
} from './oidc/index.js';

// ============================================================================
// Authorization services
// ============================================================================

export { createAuthzApi, toRequestingPartyForm } from './authz/index.js';
export type {
  AuthzApi,
  PermissionResponseByMode,
  PermissionResponseMode,
  RequestingPartyPermission,
  RequestingPartyPermissionDecision,
  RequestingPartyTokenOptions,
} from './authz/index.js';

// ============================================================================
// Admin
// ============================================================================

export {
  createRealmsApi,
  createUsersApi,
  createRolesApi,
  createClientsApi,
  createClientRolesApi,
  createGroupsApi,
} from './admin/index.js';
export type {
  RealmsApi,
  UsersApi,
  RolesApi,
  ClientsApi,
  ClientRolesApi,
  GroupsApi,
} from './admin/index.js';
export type * from './admin/types.js';

// ============================================================================
// ADVANCED: Custom HTTP Implementations
// ============================================================================

export { createFetchClient } from './http/index.js';
export type {
  HttpClient,
  HttpClientOptions,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './http/index.js';

export { createRestTransport } from './rest/transport.js';
export type { RestTransport, RestRequest, RequestAuth } from './rest/transport.js';
export { createKeycloakUrls } from './rest/urls.js';
export type { KeycloakUrls } from './rest/urls.js';
