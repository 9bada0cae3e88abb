/**
 * Realm Admin Configuration
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { createConsoleLog, type KeycloakClientConfig } from 'keycloak-rest-client';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  KEYCLOAK_URL: z.string().url(),
  KEYCLOAK_BASE_PATH: z.string().default(''),
  KEYCLOAK_ADMIN_REALM: z.string().min(1).default('master'),
  KEYCLOAK_ADMIN_USERNAME: z.string().min(1),
  KEYCLOAK_ADMIN_PASSWORD: z.string().min(1),
  KEYCLOAK_REALM: z.string().min(1),
  KEYCLOAK_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  KEYCLOAK_DEBUG: booleanFlag,
});

/**
 * Configuration for the realm admin tool.
 */
export interface AdminConfig {
  /** Client configuration for the Keycloak server */
  readonly client: KeycloakClientConfig;
  /** Realm the admin user logs in to */
  readonly adminRealm: string;
  readonly username: string;
  readonly password: string;
  /** Realm the commands operate on */
  readonly realm: string;
}

/**
 * Creates the admin configuration from environment variables.
 *
 * Required env vars:
 * - KEYCLOAK_URL: Server URL (e.g., https://sso.example.com)
 * - KEYCLOAK_ADMIN_USERNAME / KEYCLOAK_ADMIN_PASSWORD: Admin credentials
 * - KEYCLOAK_REALM: Realm to manage
 *
 * Optional env vars:
 * - KEYCLOAK_BASE_PATH: Path prefix, "/auth" on legacy servers (default: none)
 * - KEYCLOAK_ADMIN_REALM: Realm of the admin user (default: master)
 * - KEYCLOAK_TIMEOUT_MS: Request timeout
 * - KEYCLOAK_DEBUG: "true" logs every request to stderr
 *
 * @throws Error listing every invalid or missing variable
 */
export function loadAdminConfig(env: Readonly<Record<string, string | undefined>>): AdminConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;

  return {
    client: {
      baseUrl: vars.KEYCLOAK_URL,
      basePath: vars.KEYCLOAK_BASE_PATH,
      ...(vars.KEYCLOAK_TIMEOUT_MS !== undefined ? { timeoutMs: vars.KEYCLOAK_TIMEOUT_MS } : {}),
      log: createConsoleLog(vars.KEYCLOAK_DEBUG ? 'debug' : 'warn'),
    },
    adminRealm: vars.KEYCLOAK_ADMIN_REALM,
    username: vars.KEYCLOAK_ADMIN_USERNAME,
    password: vars.KEYCLOAK_ADMIN_PASSWORD,
    realm: vars.KEYCLOAK_REALM,
  };
}
