/**
 * REST transport shared by every API area.
 *
 * Turns a {@link RestRequest} into an HTTP call, decodes the response and
 * translates every failure into a {@link KeycloakError}.
 *
 * @packageDocumentation
 */

import { ok, err, type Err } from 'neverthrow';
import type { HttpClient, HttpError, HttpMethod, HttpRequest } from '../http/types.js';
import type { Log } from '../logging.js';
import type { ApiResult, ApiStatusResult, KeycloakError } from '../types.js';
import { toKeycloakError } from './errors.js';
import { toFormBody, withQuery, type Params } from './params.js';
import type { KeycloakUrls } from './urls.js';

/**
 * How a request authenticates.
 */
export type RequestAuth =
  | { readonly type: 'bearer'; readonly token: string }
  | { readonly type: 'basic'; readonly username: string; readonly password: string };

/**
 * A request against the Keycloak REST API.
 * At most one of `form` and `json` is set.
 */
export interface RestRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly auth?: RequestAuth;
  readonly query?: Params;
  /** Body sent as application/x-www-form-urlencoded */
  readonly form?: Params;
  /** Body sent as application/json */
  readonly json?: unknown;
}

/**
 * REST transport interface.
 */
export interface RestTransport {
  /** URL builders for the configured server */
  readonly urls: KeycloakUrls;

  /**
   * Sends a request and decodes the JSON response body.
   *
   * @param description - Static description used as the error prefix
   * @param request - The request
   * @returns Result with status and decoded body
   */
  readonly json: <T>(description: string, request: RestRequest) => Promise<ApiResult<T>>;

  /**
   * Sends a request and ignores the response body.
   *
   * @param description - Static description used as the error prefix
   * @param request - The request
   * @returns Result with the status
   */
  readonly empty: (description: string, request: RestRequest) => Promise<ApiStatusResult>;

  /**
   * Sends a create request and returns the id of the new resource, taken
   * from the last segment of the `Location` header ("" when absent).
   *
   * @param description - Static description used as the error prefix
   * @param request - The request
   * @returns Result with status and the new resource id
   */
  readonly created: (description: string, request: RestRequest) => Promise<ApiResult<string>>;
}

/**
 * Creates a bearer authentication.
 */
export const bearer = (token: string): RequestAuth => ({ type: 'bearer', token });

/**
 * Creates a Basic authentication from client credentials.
 */
export const basic = (username: string, password: string): RequestAuth => ({
  type: 'basic',
  username,
  password,
});

const toAuthorizationHeader = (auth: RequestAuth): string =>
  auth.type === 'bearer'
    ? `Bearer ${auth.token}`
    : `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString('base64')}`;

/**
 * Extracts the id of a created resource from its Location header.
 *
 * @param location - Location header value (optional)
 * @returns The decoded last path segment, or "" when absent
 */
export const idFromLocation = (location: string | undefined): string => {
  if (location === undefined) {
    return '';
  }
  const path = location.split(/[?#]/)[0] ?? '';
  const segment = path.replace(/\/+$/, '').split('/').pop() ?? '';
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
};

/**
 * Builds the HTTP request for a RestRequest.
 */
const toHttpRequest = (request: RestRequest): HttpRequest => {
  const headers: Record<string, string> = {};

  if (request.auth !== undefined) {
    headers['Authorization'] = toAuthorizationHeader(request.auth);
  }

  let body: string | undefined;
  if (request.form !== undefined) {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
    body = toFormBody(request.form);
  } else if (request.json !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(request.json);
  }

  return {
    url: withQuery(request.url, request.query),
    method: request.method,
    headers,
    ...(body !== undefined ? { body } : {}),
  };
};

/**
 * Creates the REST transport.
 *
 * @param urls - URL builders for the server
 * @param httpClient - HTTP client used for every request
 * @param log - Log function
 * @returns RestTransport instance
 */
export const createRestTransport = (
  urls: KeycloakUrls,
  httpClient: HttpClient,
  log: Log
): RestTransport => {
  const logRequest = (request: HttpRequest): void => {
    // URL and verb only: headers and bodies carry credentials
    log('debug', `${request.method} ${request.url}`);
  };

  const fail = (description: string, httpError: HttpError): Err<never, KeycloakError> => {
    const error = toKeycloakError(description, httpError);
    log('warn', error.message, { type: error.type, status: error.status });
    return err(error);
  };

  const json = async <T>(description: string, request: RestRequest): Promise<ApiResult<T>> => {
    const httpRequest = toHttpRequest(request);
    logRequest(httpRequest);

    const result = await httpClient.json<T>(httpRequest);

    if (result.isErr()) {
      return fail(description, result.error);
    }

    return ok({ status: result.value.status, data: result.value.body });
  };

  const empty = async (description: string, request: RestRequest): Promise<ApiStatusResult> => {
    const httpRequest = toHttpRequest(request);
    logRequest(httpRequest);

    const result = await httpClient.text(httpRequest);

    if (result.isErr()) {
      return fail(description, result.error);
    }

    return ok({ status: result.value.status });
  };

  const created = async (description: string, request: RestRequest): Promise<ApiResult<string>> => {
    const httpRequest = toHttpRequest(request);
    logRequest(httpRequest);

    const result = await httpClient.text(httpRequest);

    if (result.isErr()) {
      return fail(description, result.error);
    }

    return ok({
      status: result.value.status,
      data: idFromLocation(result.value.headers['location']),
    });
  };

  return {
    urls,
    json,
    empty,
    created,
  };
};
