/**
 * Keycloak client: every API area bound to one server.
 *
 * @packageDocumentation
 */

import { createFetchClient } from './http/index.js';
import type { HttpClient } from './http/index.js';
import { silentLog } from './logging.js';
import type { KeycloakClientConfig } from './types.js';
import { createKeycloakUrls, type KeycloakUrls } from './rest/urls.js';
import { createRestTransport } from './rest/transport.js';
import { createOidcApi, type OidcApi } from './oidc/index.js';
import { createAuthzApi, type AuthzApi } from './authz/index.js';
import {
  createClientRolesApi,
  createClientsApi,
  createGroupsApi,
  createRealmsApi,
  createRolesApi,
  createUsersApi,
  type ClientRolesApi,
  type ClientsApi,
  type GroupsApi,
  type RealmsApi,
  type RolesApi,
  type UsersApi,
} from './admin/index.js';

/**
 * Client for a Keycloak server.
 * Every operation sends exactly one request (decodeAccessToken: one for the
 * keys) and resolves to a Result; nothing is cached between calls.
 */
export type KeycloakClient = OidcApi &
  AuthzApi &
  RealmsApi &
  UsersApi &
  RolesApi &
  ClientsApi &
  ClientRolesApi &
  GroupsApi & {
    /** URL builders for the configured server */
    readonly urls: KeycloakUrls;
  };

/**
 * Creates a Keycloak client.
 *
 * @param config - Server configuration
 * @param httpClient - HTTP client (default: fetch with `config.timeoutMs` and `config.headers`).
 *   A supplied client sets its own timeout and headers; those two settings are not applied to it.
 * @returns KeycloakClient instance
 *
 * @example
 * ```typescript
 * const keycloak = createKeycloakClient({ baseUrl: 'https://sso.example.com' });
 *
 * const login = await keycloak.loginAdmin('admin', process.env.ADMIN_PASSWORD ?? '', 'master');
 * if (login.isErr()) {
 *   throw new Error(login.error.message);
 * }
 *
 * const users = await keycloak.getUsers(login.value.data.access_token, 'demo', { max: 10 });
 * ```
 */
export const createKeycloakClient = (
  config: KeycloakClientConfig,
  httpClient: HttpClient = createFetchClient({
    ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
    ...(config.headers !== undefined ? { baseHeaders: config.headers } : {}),
  })
): KeycloakClient => {
  const urls = createKeycloakUrls(config.baseUrl, config.basePath);
  const rest = createRestTransport(urls, httpClient, config.log ?? silentLog);

  return {
    urls,
    ...createOidcApi(rest),
    ...createAuthzApi(rest),
    ...createRealmsApi(rest),
    ...createUsersApi(rest),
    ...createRolesApi(rest),
    ...createClientsApi(rest),
    ...createClientRolesApi(rest),
    ...createGroupsApi(rest),
  };
};
