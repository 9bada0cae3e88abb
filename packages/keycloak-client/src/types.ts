import type { Result } from 'neverthrow';
import type { Log } from './logging.js';

/**
 * Configuration for connecting to a Keycloak server.
 */
export interface KeycloakClientConfig {
  /** The base URL of the Keycloak server (e.g., "https://sso.example.com") */
  readonly baseUrl: string;
  /**
   * Path prefix in front of `realms/` and `admin/` (default: "").
   * Legacy WildFly-based distributions serve everything under "/auth".
   */
  readonly basePath?: string;
  /**
   * Request timeout in milliseconds (default: 10000).
   * Applies to the default fetch client only.
   */
  readonly timeoutMs?: number;
  /**
   * Headers added to every request.
   * Applies to the default fetch client only.
   */
  readonly headers?: Readonly<Record<string, string>>;
  /** Log function; logging is disabled when omitted */
  readonly log?: Log;
}

/**
 * Status of a call whose response body carries nothing of interest.
 */
export interface ApiStatus {
  /** HTTP status code returned by the server */
  readonly status: number;
}

/**
 * Decoded response of a successful call.
 */
export interface ApiResponse<T> extends ApiStatus {
  readonly data: T;
}

/**
 * Error categories.
 *
 * - `http`: the server answered with a non-2xx status
 * - `network`: the request could not be sent or the connection failed
 * - `timeout`: the request was aborted after the configured timeout
 * - `parse`: a 2xx body could not be decoded
 * - `invalid_argument`: the call was rejected before any request was sent
 * - `invalid_token`: a token failed local verification
 */
export type KeycloakErrorType =
  | 'http'
  | 'network'
  | 'timeout'
  | 'parse'
  | 'invalid_argument'
  | 'invalid_token';

/**
 * Normalized error returned by every operation.
 */
export interface KeycloakError {
  readonly type: KeycloakErrorType;
  /** Static description of the failed call, e.g. "could not get users" */
  readonly description: string;
  /** Description followed by the failure detail */
  readonly message: string;
  /** HTTP status code, when the server answered */
  readonly status?: number;
  readonly statusText?: string;
  /** Raw response body of an `http` error */
  readonly body?: string;
  /** Server error code (`error` field of the error body), e.g. "invalid_grant" */
  readonly error?: string;
  /** Server error description (`error_description` or `errorMessage`) */
  readonly errorDescription?: string;
  readonly cause?: unknown;
}

/**
 * Result of an operation returning a decoded body.
 */
export type ApiResult<T> = Result<ApiResponse<T>, KeycloakError>;

/**
 * Result of an operation whose response body is ignored.
 */
export type ApiStatusResult = Result<ApiStatus, KeycloakError>;
