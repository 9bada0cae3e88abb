import type { HttpError } from '../http/types.js';
import type { KeycloakError } from '../types.js';

/**
 * Fields Keycloak uses in its JSON error bodies.
 * OAuth endpoints send `error`/`error_description`, admin endpoints send
 * `error` or `errorMessage`.
 */
interface ServerErrorBody {
  readonly error?: string;
  readonly errorMessage?: string;
  readonly errorDescription?: string;
}

const stringField = (record: Record<string, unknown>, key: string): string | undefined => {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

/**
 * Extracts the known error fields from a raw error body.
 * Bodies that are not JSON objects yield an empty result.
 *
 * @param body - Raw response body
 * @returns The recognized error fields
 */
export const parseServerErrorBody = (body: string | undefined): ServerErrorBody => {
  if (body === undefined || body.length === 0) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return {};
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return {};
  }

  const record = parsed as Record<string, unknown>;
  const error = stringField(record, 'error');
  const errorMessage = stringField(record, 'errorMessage');
  const errorDescription = stringField(record, 'error_description');

  return {
    ...(error !== undefined ? { error } : {}),
    ...(errorMessage !== undefined ? { errorMessage } : {}),
    ...(errorDescription !== undefined ? { errorDescription } : {}),
  };
};

/**
 * Formats "<status> <statusText>" the way HTTP status lines read.
 */
const formatStatus = (status: number | undefined, statusText: string | undefined): string => {
  const code = status === undefined ? 'unknown status' : String(status);
  return statusText !== undefined && statusText.length > 0 ? `${code} ${statusText}` : code;
};

/**
 * Translates an HTTP-layer failure into a KeycloakError.
 *
 * The message always starts with the static description of the call.
 * For `http` failures it continues with the status line and the server's
 * error detail: `could not get user by id: 404 Not Found: User not found`.
 *
 * @param description - Static description of the call
 * @param error - The HTTP-layer error
 * @returns A KeycloakError
 */
export const toKeycloakError = (description: string, error: HttpError): KeycloakError => {
  if (error.type !== 'http') {
    return {
      type: error.type,
      description,
      message: `${description}: ${error.message}`,
      ...(error.status !== undefined ? { status: error.status } : {}),
      cause: error.cause ?? error,
    };
  }

  const server = parseServerErrorBody(error.body);
  const detail = [server.error, server.errorMessage, server.errorDescription]
    .filter((part): part is string => part !== undefined)
    .join(': ');
  const statusLine = formatStatus(error.status, error.statusText);
  const serverDescription = server.errorDescription ?? server.errorMessage;

  return {
    type: 'http',
    description,
    message:
      detail.length > 0 ? `${description}: ${statusLine}: ${detail}` : `${description}: ${statusLine}`,
    ...(error.status !== undefined ? { status: error.status } : {}),
    ...(error.statusText !== undefined ? { statusText: error.statusText } : {}),
    ...(error.body !== undefined ? { body: error.body } : {}),
    ...(server.error !== undefined ? { error: server.error } : {}),
    ...(serverDescription !== undefined ? { errorDescription: serverDescription } : {}),
  };
};

/**
 * Creates the error returned when a call is rejected before sending.
 *
 * @param description - Static description of the call
 * @param reason - What was wrong with the arguments
 * @returns A KeycloakError of type `invalid_argument`
 */
export const invalidArgument = (description: string, reason: string): KeycloakError => ({
  type: 'invalid_argument',
  description,
  message: `${description}: ${reason}`,
});

/**
 * Checks whether the server rejected a grant (wrong credentials, expired
 * or revoked refresh token, ...).
 *
 * @param error - The error to check
 * @returns true when the server's error code is `invalid_grant`
 */
export const isInvalidGrant = (error: KeycloakError): boolean => error.error === 'invalid_grant';

/**
 * Creates the error returned when a token fails local verification.
 *
 * @param description - Static description of the call
 * @param cause - The verification failure
 * @returns A KeycloakError of type `invalid_token`
 */
export const invalidToken = (description: string, cause: unknown): KeycloakError => ({
  type: 'invalid_token',
  description,
  message: `${description}: ${cause instanceof Error ? cause.message : 'token verification failed'}`,
  cause,
});
