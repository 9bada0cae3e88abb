import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type {
  HttpClient,
  HttpClientOptions,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './types.js';

const DEFAULT_TIMEOUT_MS = 10_000;

type HttpResult<T> = Result<HttpResponse<T>, HttpError>;

const collectHeaders = (headers: Headers): Record<string, string> => {
  const collected: Record<string, string> = {};
  headers.forEach((value, key) => {
    collected[key] = value;
  });
  return collected;
};

/**
 * Body of a 4xx or 5xx response, carrying Keycloak's `error` and
 * `errorMessage` fields. Empty when the stream cannot be read.
 */
const readFailureBody = async (response: Response): Promise<string> => {
  try {
    return await response.text();
  } catch {
    return '';
  }
};

/**
 * Reads a 2xx body with `read`, reporting a stream or syntax failure
 * as a `parse` error.
 */
const decode = async <T>(
  response: Response,
  read: (response: Response) => Promise<T>,
  failure: string
): Promise<HttpResult<T>> => {
  try {
    const body = await read(response);
    return ok({
      status: response.status,
      statusText: response.statusText,
      headers: collectHeaders(response.headers),
      body,
    });
  } catch (error) {
    return err({ type: 'parse', message: failure, status: response.status, cause: error });
  }
};

/**
 * Creates the HttpClient the Keycloak client uses by default.
 *
 * Each request gets its own AbortController, aborted after `timeoutMs`.
 * Non-2xx responses become `http` errors that keep the status line and
 * the raw body for error translation.
 *
 * @example
 * ```typescript
 * const client = createFetchClient({ timeoutMs: 5000 });
 * const result = await client.json<UserRepresentation[]>({
 *   url: 'https://sso.example.com/admin/realms/demo/users',
 *   method: 'GET',
 *   headers: { Authorization: `Bearer ${token}` },
 * });
 * ```
 */
export const createFetchClient = (options: HttpClientOptions = {}): HttpClient => {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, baseHeaders = {} } = options;

  const send = async (request: HttpRequest): Promise<Result<Response, HttpError>> => {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    const init: RequestInit = {
      method: request.method,
      headers: { ...baseHeaders, ...request.headers },
      signal: controller.signal,
    };
    if (request.body !== undefined) {
      init.body = request.body;
    }

    try {
      const response = await fetch(request.url, init);
      if (response.ok) {
        return ok(response);
      }

      return err({
        type: 'http',
        message: `HTTP ${String(response.status)}: ${response.statusText}`,
        status: response.status,
        statusText: response.statusText,
        body: await readFailureBody(response),
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return err({
          type: 'timeout',
          message: `Request timed out after ${String(timeoutMs)}ms`,
          cause: error,
        });
      }

      return err({
        type: 'network',
        message: error instanceof Error ? error.message : 'Network error',
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }
  };

  const json = async <T>(request: HttpRequest): Promise<HttpResult<T>> => {
    const sent = await send({
      ...request,
      headers: {
        Accept: 'application/json',
        ...(request.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        ...request.headers,
      },
    });
    if (sent.isErr()) {
      return err(sent.error);
    }

    return decode(
      sent.value,
      async (response) => (await response.json()) as T,
      'Failed to parse JSON response'
    );
  };

  const text = async (request: HttpRequest): Promise<HttpResult<string>> => {
    const sent = await send(request);
    if (sent.isErr()) {
      return err(sent.error);
    }

    return decode(sent.value, (response) => response.text(), 'Failed to read response text');
  };

  return { json, text };
};
