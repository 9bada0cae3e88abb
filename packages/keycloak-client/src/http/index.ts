export { createFetchClient } from './fetch-client.js';
export type {
  HttpClient,
  HttpClientOptions,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './types.js';
