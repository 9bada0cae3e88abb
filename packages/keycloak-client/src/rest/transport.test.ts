import { describe, it, expect } from 'vitest';
import { basic, bearer, idFromLocation } from './transport.js';
import {
  createErrorHttpClient,
  createMockHttpClient,
  createRecordingLog,
  createSuccessHttpClient,
  createTestTransport,
} from '../test/mocks.js';
import {
  TEST_ACCESS_TOKEN,
  TEST_ADMIN_URL,
  TEST_BASIC,
  TEST_BEARER,
  TEST_CLIENT_ID,
  TEST_CLIENT_SECRET,
} from '../test/fixtures.js';

describe('idFromLocation', () => {
  it.each([
    [`${TEST_ADMIN_URL}/users/6b0f3a52`, '6b0f3a52'],
    [`${TEST_ADMIN_URL}/roles/team%20lead`, 'team lead'],
    [`${TEST_ADMIN_URL}/groups/1c9e/`, '1c9e'],
    [`${TEST_ADMIN_URL}/clients/4d2c?x=1`, '4d2c'],
  ])('reads the id from %s', (location, expected) => {
    expect(idFromLocation(location)).toBe(expected);
  });

  it('returns an empty id without a location', () => {
    expect(idFromLocation(undefined)).toBe('');
  });
});

describe('createRestTransport', () => {
  describe('json', () => {
    describe('given a bearer request with query parameters', () => {
      it('sends the authorization header and query string', async () => {
        const httpClient = createSuccessHttpClient([]);
        const rest = createTestTransport(httpClient);

        await rest.json('could not get users', {
          method: 'GET',
          url: rest.urls.adminRealm('demo', 'users'),
          auth: bearer(TEST_ACCESS_TOKEN),
          query: { max: 5, search: undefined },
        });

        expect(httpClient.lastRequest()).toEqual({
          method: 'GET',
          url: `${TEST_ADMIN_URL}/users?max=5`,
          headers: { Authorization: TEST_BEARER },
        });
      });
    });

    describe('given a form request with basic authentication', () => {
      it('encodes the form and credentials', async () => {
        const httpClient = createSuccessHttpClient({ active: true });
        const rest = createTestTransport(httpClient);

        const result = await rest.json<{ active: boolean }>('could not introspect token', {
          method: 'POST',
          url: 'https://sso.example.com/introspect',
          auth: basic(TEST_CLIENT_ID, TEST_CLIENT_SECRET),
          form: { token: 'abc', token_type_hint: 'requesting_party_token' },
        });

        expect(httpClient.lastRequest()).toEqual({
          method: 'POST',
          url: 'https://sso.example.com/introspect',
          headers: {
            Authorization: TEST_BASIC,
            'Content-Type': 'application/x-www-form-urlencoded',
          },
          body: 'token=abc&token_type_hint=requesting_party_token',
        });
        expect(result._unsafeUnwrap()).toEqual({ status: 200, data: { active: true } });
      });
    });

    describe('given the server fails', () => {
      it('returns the translated error and logs a warning', async () => {
        const httpClient = createErrorHttpClient(403, 'Forbidden', '{"error":"unknown_error"}');
        const log = createRecordingLog();
        const rest = createTestTransport(httpClient, log);

        const result = await rest.json('could not get realm', {
          method: 'GET',
          url: rest.urls.adminRealm('demo'),
        });

        expect(result.isErr()).toBe(true);
        if (result.isErr()) {
          expect(result.error.message).toBe('could not get realm: 403 Forbidden: unknown_error');
          expect(result.error.status).toBe(403);
        }
        expect(log.calls).toEqual([
          { level: 'debug', message: `GET ${TEST_ADMIN_URL}`, data: undefined },
          {
            level: 'warn',
            message: 'could not get realm: 403 Forbidden: unknown_error',
            data: { type: 'http', status: 403 },
          },
        ]);
      });
    });
  });

  describe('empty', () => {
    describe('given a JSON body', () => {
      it('serializes it and returns only the status', async () => {
        const httpClient = createMockHttpClient([{ status: 204 }]);
        const rest = createTestTransport(httpClient);

        const result = await rest.empty('could not delete realm role from user', {
          method: 'DELETE',
          url: rest.urls.adminRealm('demo', 'users', 'u1', 'role-mappings', 'realm'),
          auth: bearer(TEST_ACCESS_TOKEN),
          json: [{ name: 'auditor' }],
        });

        expect(result._unsafeUnwrap()).toEqual({ status: 204 });
        expect(httpClient.lastRequest()).toEqual({
          method: 'DELETE',
          url: `${TEST_ADMIN_URL}/users/u1/role-mappings/realm`,
          headers: { Authorization: TEST_BEARER, 'Content-Type': 'application/json' },
          body: '[{"name":"auditor"}]',
        });
      });
    });

    describe('given a network failure', () => {
      it('returns a network error prefixed with the description', async () => {
        const httpClient = createMockHttpClient([
          { error: { type: 'network', message: 'connect ECONNREFUSED' } },
        ]);
        const rest = createTestTransport(httpClient);

        const result = await rest.empty('could not logout', {
          method: 'POST',
          url: rest.urls.openIdConnect('demo', 'logout'),
        });

        expect(result._unsafeUnwrapErr().type).toBe('network');
        expect(result._unsafeUnwrapErr().message).toBe('could not logout: connect ECONNREFUSED');
      });
    });
  });

  describe('created', () => {
    it('returns the id from the location header', async () => {
      const httpClient = createSuccessHttpClient('', 201, {
        location: `${TEST_ADMIN_URL}/users/6b0f3a52`,
      });
      const rest = createTestTransport(httpClient);

      const result = await rest.created('could not create user', {
        method: 'POST',
        url: rest.urls.adminRealm('demo', 'users'),
        auth: bearer(TEST_ACCESS_TOKEN),
        json: { username: 'alice' },
      });

      expect(result._unsafeUnwrap()).toEqual({ status: 201, data: '6b0f3a52' });
    });
  });
});
