import type { Result } from 'neverthrow';

/**
 * Verbs the Keycloak REST API uses. Role mapping removals are DELETE
 * requests with a JSON body.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface HttpRequest {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers?: Readonly<Record<string, string>>;
  /** Serialized JSON or form body */
  readonly body?: string;
}

export interface HttpResponse<T> {
  readonly status: number;
  readonly statusText: string;
  /** Keys lower-cased; the admin API returns new ids in `location` */
  readonly headers: Readonly<Record<string, string>>;
  readonly body: T;
}

/**
 * Transport-level failure, before translation to a KeycloakError.
 *
 * `http` failures keep `statusText` and the raw `body` so the server's
 * `error`, `errorMessage` and `error_description` fields can be recovered.
 */
export interface HttpError {
  readonly type: 'network' | 'timeout' | 'parse' | 'http';
  readonly message: string;
  readonly status?: number;
  readonly statusText?: string;
  readonly body?: string;
  readonly cause?: unknown;
}

/**
 * Sends requests for the REST transport. Replace it to route calls
 * through another HTTP stack or to record requests in tests.
 */
export interface HttpClient {
  /** Sends the request and decodes a JSON body */
  readonly json: <T>(request: HttpRequest) => Promise<Result<HttpResponse<T>, HttpError>>;
  /** Sends the request and returns the body as text (empty for 201 and 204) */
  readonly text: (request: HttpRequest) => Promise<Result<HttpResponse<string>, HttpError>>;
}

/**
 * Options of the default fetch client.
 */
export interface HttpClientOptions {
  /** Abort each request after this many milliseconds (default: 10000) */
  readonly timeoutMs?: number;
  /** Sent with every request; request headers win on conflict */
  readonly baseHeaders?: Readonly<Record<string, string>>;
}
