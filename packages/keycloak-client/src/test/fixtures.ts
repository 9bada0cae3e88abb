/**
 * Shared test fixtures and constants.
 */

import type { JWT } from '../oidc/types.js';
import type {
  GroupRepresentation,
  RoleRepresentation,
  UserRepresentation,
} from '../admin/types.js';

// ============================================================================
// Server
// ============================================================================

export const TEST_BASE_URL = 'https://sso.example.com';
export const TEST_REALM = 'demo';

export const TEST_REALM_URL = `${TEST_BASE_URL}/realms/${TEST_REALM}`;
export const TEST_OIDC_URL = `${TEST_REALM_URL}/protocol/openid-connect`;
export const TEST_TOKEN_URL = `${TEST_OIDC_URL}/token`;
export const TEST_ADMIN_URL = `${TEST_BASE_URL}/admin/realms/${TEST_REALM}`;

// ============================================================================
// Credentials
// ============================================================================

export const TEST_CLIENT_ID = 'test-client';
export const TEST_CLIENT_SECRET = 'test-secret';
export const TEST_USERNAME = 'alice';
export const TEST_PASSWORD = 'test-password';
export const TEST_ACCESS_TOKEN = 'test-access-token';
export const TEST_REFRESH_TOKEN = 'test-refresh-token';

/** Authorization header for TEST_ACCESS_TOKEN */
export const TEST_BEARER = `Bearer ${TEST_ACCESS_TOKEN}`;

/** Basic authorization header for TEST_CLIENT_ID / TEST_CLIENT_SECRET */
export const TEST_BASIC = `Basic ${Buffer.from(`${TEST_CLIENT_ID}:${TEST_CLIENT_SECRET}`).toString('base64')}`;

// ============================================================================
// Resource ids
// ============================================================================

export const TEST_USER_ID = '6b0f3a52-user';
export const TEST_GROUP_ID = '1c9e77d0-group';
export const TEST_ROLE_ID = '9a41b3f2-role';
export const TEST_CLIENT_UUID = '4d2c8e11-client';
export const TEST_SESSION_ID = '83f5c0aa-session';

// ============================================================================
// Representations
// ============================================================================

/**
 * Creates a token response.
 */
export const createJwt = (overrides: Partial<JWT> = {}): JWT => ({
  access_token: TEST_ACCESS_TOKEN,
  expires_in: 300,
  refresh_expires_in: 1800,
  refresh_token: TEST_REFRESH_TOKEN,
  token_type: 'Bearer',
  'not-before-policy': 0,
  session_state: 'session-state-1',
  scope: 'profile email',
  ...overrides,
});

export const createUser = (overrides: Partial<UserRepresentation> = {}): UserRepresentation => ({
  id: TEST_USER_ID,
  username: TEST_USERNAME,
  email: 'alice@example.com',
  enabled: true,
  ...overrides,
});

export const createRole = (overrides: Partial<RoleRepresentation> = {}): RoleRepresentation => ({
  id: TEST_ROLE_ID,
  name: 'auditor',
  composite: false,
  clientRole: false,
  ...overrides,
});

export const createGroup = (overrides: Partial<GroupRepresentation> = {}): GroupRepresentation => ({
  id: TEST_GROUP_ID,
  name: 'engineering',
  path: '/engineering',
  ...overrides,
});
