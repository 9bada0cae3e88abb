/**
 * URL builders for the Keycloak REST surface.
 *
 * @packageDocumentation
 */

/** Path of the OpenID Connect protocol endpoints below a realm */
const OPENID_CONNECT_PATH = ['protocol', 'openid-connect'] as const;

/**
 * Builders for the four URL roots the client talks to.
 * Every segment is percent-encoded.
 */
export interface KeycloakUrls {
  /** `{base}/realms/{realm}/...` */
  readonly realm: (realm: string, ...segments: readonly string[]) => string;
  /** `{base}/realms/{realm}/protocol/openid-connect/...` */
  readonly openIdConnect: (realm: string, ...segments: readonly string[]) => string;
  /** `{base}/admin/realms/{realm}/...` */
  readonly adminRealm: (realm: string, ...segments: readonly string[]) => string;
  /** `{base}/admin/...` */
  readonly admin: (...segments: readonly string[]) => string;
}

/**
 * Normalizes a base path to either "" or "/segment[/segment...]".
 */
export const normalizeBasePath = (basePath: string): string => {
  const trimmed = basePath.replace(/^\/+|\/+$/g, '');
  return trimmed.length === 0 ? '' : `/${trimmed}`;
};

/**
 * Joins percent-encoded segments onto a root URL.
 */
const join = (root: string, segments: readonly string[]): string =>
  segments.length === 0
    ? root
    : `${root}/${segments.map((segment) => encodeURIComponent(segment)).join('/')}`;

/**
 * Creates the URL builders for a Keycloak server.
 *
 * @param baseUrl - Server URL, e.g. "https://sso.example.com"
 * @param basePath - Optional path prefix, e.g. "/auth" on legacy deployments
 * @returns KeycloakUrls instance
 *
 * @example
 * ```typescript
 * const urls = createKeycloakUrls('https://sso.example.com/', 'auth');
 * urls.adminRealm('demo', 'users', 'count');
 * // 'https://sso.example.com/auth/admin/realms/demo/users/count'
 * ```
 */
export const createKeycloakUrls = (baseUrl: string, basePath = ''): KeycloakUrls => {
  const root = `${baseUrl.replace(/\/+$/, '')}${normalizeBasePath(basePath)}`;

  return {
    realm: (realm, ...segments) => join(root, ['realms', realm, ...segments]),
    openIdConnect: (realm, ...segments) =>
      join(root, ['realms', realm, ...OPENID_CONNECT_PATH, ...segments]),
    adminRealm: (realm, ...segments) => join(root, ['admin', 'realms', realm, ...segments]),
    admin: (...segments) => join(root, ['admin', ...segments]),
  };
};
