/**
 * Authorization services: requesting party tokens (UMA) and permission
 * evaluation against a resource server.
 *
 * @packageDocumentation
 */

import type { ApiResult } from '../types.js';
import type { JWT } from '../oidc/types.js';
import type { Params } from '../rest/params.js';
import { bearer, type RestTransport } from '../rest/transport.js';
import type {
  PermissionResponseByMode,
  PermissionResponseMode,
  RequestingPartyPermission,
  RequestingPartyPermissionDecision,
  RequestingPartyTokenOptions,
} from './types.js';

const GRANT_UMA_TICKET = 'urn:ietf:params:oauth:grant-type:uma-ticket';

const DESCRIPTION = 'could not get requesting party token';

/**
 * Authorization services operations.
 */
export interface AuthzApi {
  /**
   * Requests a requesting party token (RPT).
   *
   * @param token - Access token of the requesting party
   * @param realm - Realm name
   * @param options - UMA grant options
   */
  readonly getRequestingPartyToken: (
    token: string,
    realm: string,
    options: RequestingPartyTokenOptions
  ) => Promise<ApiResult<JWT>>;

  /** Lists the granted permissions instead of issuing a token */
  readonly getRequestingPartyPermissions: (
    token: string,
    realm: string,
    options: RequestingPartyTokenOptions
  ) => Promise<ApiResult<readonly RequestingPartyPermission[]>>;

  /** Asks only whether every requested permission is granted */
  readonly getRequestingPartyPermissionDecision: (
    token: string,
    realm: string,
    options: RequestingPartyTokenOptions
  ) => Promise<ApiResult<RequestingPartyPermissionDecision>>;

  /**
   * Evaluates permissions of a user against a resource server.
   * The result type follows `responseMode`.
   *
   * @param userToken - The user's access token
   * @param realm - Realm name
   * @param audience - Client id of the resource server
   * @param responseMode - `token`, `decision` or `permissions`
   * @param permissions - Requested permissions, `resource#scope`
   *
   * @example
   * ```typescript
   * const result = await authz.evaluatePermission(token, 'demo', 'orders-api', 'decision', [
   *   'orders#read',
   * ]);
   * const allowed = result.isOk() && result.value.data.result;
   * ```
   */
  readonly evaluatePermission: <M extends PermissionResponseMode>(
    userToken: string,
    realm: string,
    audience: string,
    responseMode: M,
    permissions: readonly string[]
  ) => Promise<ApiResult<PermissionResponseByMode[M]>>;
}

/**
 * Converts UMA grant options to the token endpoint's form fields.
 */
export const toRequestingPartyForm = (options: RequestingPartyTokenOptions): Params => ({
  grant_type: options.grantType ?? GRANT_UMA_TICKET,
  ticket: options.ticket,
  claim_token: options.claimToken,
  claim_token_format: options.claimTokenFormat,
  rpt: options.rpt,
  permission: options.permissions,
  audience: options.audience,
  response_include_resource_name: options.responseIncludeResourceName,
  response_permissions_limit: options.responsePermissionsLimit,
  submit_request: options.submitRequest,
  response_mode: options.responseMode,
});

/**
 * Creates the authorization services operations.
 *
 * @param rest - REST transport
 * @returns AuthzApi instance
 */
export const createAuthzApi = (rest: RestTransport): AuthzApi => {
  const requestingParty = <T>(
    token: string,
    realm: string,
    options: RequestingPartyTokenOptions
  ): Promise<ApiResult<T>> =>
    rest.json<T>(DESCRIPTION, {
      method: 'POST',
      url: rest.urls.openIdConnect(realm, 'token'),
      auth: bearer(token),
      form: toRequestingPartyForm(options),
    });

  return {
    getRequestingPartyToken: (token, realm, options) => requestingParty<JWT>(token, realm, options),

    getRequestingPartyPermissions: (token, realm, options) =>
      requestingParty<readonly RequestingPartyPermission[]>(token, realm, {
        ...options,
        responseMode: 'permissions',
      }),

    getRequestingPartyPermissionDecision: (token, realm, options) =>
      requestingParty<RequestingPartyPermissionDecision>(token, realm, {
        ...options,
        responseMode: 'decision',
      }),

    evaluatePermission: <M extends PermissionResponseMode>(
      userToken: string,
      realm: string,
      audience: string,
      responseMode: M,
      permissions: readonly string[]
    ) =>
      requestingParty<PermissionResponseByMode[M]>(userToken, realm, {
        grantType: GRANT_UMA_TICKET,
        audience,
        permissions,
        // the server issues a token when no mode is sent
        ...(responseMode === 'token' ? {} : { responseMode }),
      }),
  };
};
