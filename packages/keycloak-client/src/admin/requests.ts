import { err, type Err } from 'neverthrow';
import type { ApiResult, ApiStatusResult, KeycloakError } from '../types.js';
import { invalidArgument } from '../rest/errors.js';
import type { Params } from '../rest/params.js';
import { bearer, type RestTransport } from '../rest/transport.js';

type WriteMethod = 'POST' | 'PUT' | 'DELETE';

/**
 * Bearer-authenticated admin requests, shared by every admin area.
 */
export interface AdminRequests {
  /** `{base}/admin/realms/{realm}/...` */
  readonly url: (realm: string, ...segments: readonly string[]) => string;

  /** GET with an optional query, decoding the JSON body */
  readonly get: <T>(
    description: string,
    token: string,
    url: string,
    query?: Params
  ) => Promise<ApiResult<T>>;

  /** Write request with an optional JSON body; the response body is ignored */
  readonly send: (
    description: string,
    token: string,
    method: WriteMethod,
    url: string,
    body?: unknown,
    query?: Params
  ) => Promise<ApiStatusResult>;

  /** POST returning the id of the created resource */
  readonly create: (
    description: string,
    token: string,
    url: string,
    body: unknown
  ) => Promise<ApiResult<string>>;
}

/**
 * Creates the admin request helpers.
 *
 * @param rest - REST transport
 */
export const createAdminRequests = (rest: RestTransport): AdminRequests => ({
  url: (realm, ...segments) => rest.urls.adminRealm(realm, ...segments),

  get: <T>(description: string, token: string, url: string, query?: Params) =>
    rest.json<T>(description, {
      method: 'GET',
      url,
      auth: bearer(token),
      ...(query !== undefined ? { query } : {}),
    }),

  send: (description, token, method, url, body, query) =>
    rest.empty(description, {
      method,
      url,
      auth: bearer(token),
      ...(body !== undefined ? { json: body } : {}),
      ...(query !== undefined ? { query } : {}),
    }),

  create: (description, token, url, body) =>
    rest.created(description, { method: 'POST', url, auth: bearer(token), json: body }),
});

/**
 * Fails a call whose arguments are unusable, without sending anything.
 *
 * @param description - Static description of the call
 * @param reason - What was wrong with the arguments
 */
export const rejected = (
  description: string,
  reason: string
): Promise<Err<never, KeycloakError>> => Promise.resolve(err(invalidArgument(description, reason)));

/**
 * Checks that an id argument is set.
 *
 * @returns true when the id is a non-empty string
 */
export const hasId = (id: string | undefined): id is string => id !== undefined && id.length > 0;
