/**
 * Query-string and form-body encoding.
 *
 * @packageDocumentation
 */

/**
 * A single parameter value. Arrays repeat the key.
 */
export type ParamValue = string | number | boolean | readonly string[];

/**
 * Parameters keyed by the server's own names. Undefined entries are skipped.
 */
export type Params = Readonly<Record<string, ParamValue | undefined>>;

/**
 * Builds URLSearchParams from a parameter record.
 *
 * @param params - Parameters to encode
 * @returns The encoded parameters, in insertion order
 */
export const toSearchParams = (params: Params): URLSearchParams => {
  const search = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      search.append(key, String(value));
      continue;
    }
    for (const item of value) {
      search.append(key, item);
    }
  }

  return search;
};

/**
 * Appends encoded parameters to a URL.
 *
 * @param url - URL without a query string
 * @param params - Query parameters (optional)
 * @returns The URL, with `?query` when at least one parameter is set
 *
 * @example
 * ```typescript
 * withQuery('https://sso.example.com/admin/realms/demo/users', { max: 10, search: undefined });
 * // 'https://sso.example.com/admin/realms/demo/users?max=10'
 * ```
 */
export const withQuery = (url: string, params?: Params): string => {
  if (params === undefined) {
    return url;
  }
  const query = toSearchParams(params).toString();
  return query.length === 0 ? url : `${url}?${query}`;
};

/**
 * Encodes a form body (application/x-www-form-urlencoded).
 *
 * @param fields - Form fields
 * @returns The encoded body
 */
export const toFormBody = (fields: Params): string => toSearchParams(fields).toString();

/**
 * Joins a list of values with spaces, as OAuth expects for `scope` and
 * `response_type`. Empty or missing lists yield undefined.
 */
export const joinSpaced = (values: readonly string[] | undefined): string | undefined =>
  values === undefined || values.length === 0 ? undefined : values.join(' ');
