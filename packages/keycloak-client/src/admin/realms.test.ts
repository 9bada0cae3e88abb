import { describe, it, expect } from 'vitest';
import { createRealmsApi } from './realms.js';
import {
  createMockHttpClient,
  createSuccessHttpClient,
  createTestTransport,
  jsonOf,
  type RecordingHttpClient,
} from '../test/mocks.js';
import { TEST_ACCESS_TOKEN, TEST_ADMIN_URL, TEST_BASE_URL, TEST_BEARER, TEST_REALM } from '../test/fixtures.js';

const setup = (httpClient: RecordingHttpClient = createMockHttpClient([{ status: 204 }])) => ({
  httpClient,
  realms: createRealmsApi(createTestTransport(httpClient)),
});

describe('createRealmsApi', () => {
  describe('getRealm', () => {
    it('reads the realm representation', async () => {
      const { httpClient, realms } = setup(
        createSuccessHttpClient({ realm: TEST_REALM, enabled: true })
      );

      const result = await realms.getRealm(TEST_ACCESS_TOKEN, TEST_REALM);

      expect(result._unsafeUnwrap()).toEqual({
        status: 200,
        data: { realm: TEST_REALM, enabled: true },
      });
      expect(httpClient.lastRequest()).toEqual({
        method: 'GET',
        url: TEST_ADMIN_URL,
        headers: { Authorization: TEST_BEARER },
      });
    });
  });

  describe('getRealms', () => {
    it('lists every realm', async () => {
      const { httpClient, realms } = setup(
        createSuccessHttpClient([{ realm: 'master' }, { realm: TEST_REALM }])
      );

      const result = await realms.getRealms(TEST_ACCESS_TOKEN);

      expect(result._unsafeUnwrap().data.map((realm) => realm.realm)).toEqual(['master', TEST_REALM]);
      expect(httpClient.lastRequest().url).toBe(`${TEST_BASE_URL}/admin/realms`);
    });
  });

  describe('createRealm', () => {
    it('returns the realm name from the location header', async () => {
      const { httpClient, realms } = setup(
        createSuccessHttpClient('', 201, { location: `${TEST_BASE_URL}/admin/realms/staging` })
      );

      const result = await realms.createRealm(TEST_ACCESS_TOKEN, { realm: 'staging', enabled: true });

      expect(result._unsafeUnwrap().data).toBe('staging');
      expect(jsonOf(httpClient.lastRequest())).toEqual({ realm: 'staging', enabled: true });
    });
  });

  describe('updateRealm', () => {
    it('puts the realm to the url of its name', async () => {
      const { httpClient, realms } = setup();

      await realms.updateRealm(TEST_ACCESS_TOKEN, { realm: TEST_REALM, displayName: 'Demo' });

      expect(httpClient.lastRequest().method).toBe('PUT');
      expect(httpClient.lastRequest().url).toBe(TEST_ADMIN_URL);
    });

    it('rejects a realm without a name', async () => {
      const { httpClient, realms } = setup();

      const result = await realms.updateRealm(TEST_ACCESS_TOKEN, { displayName: 'Demo' });

      expect(result._unsafeUnwrapErr().message).toBe(
        'could not update realm: realm name shall not be empty'
      );
      expect(httpClient.requests).toHaveLength(0);
    });
  });

  describe('deleteRealm', () => {
    it('deletes the realm', async () => {
      const { httpClient, realms } = setup();

      await realms.deleteRealm(TEST_ACCESS_TOKEN, TEST_REALM);

      expect(httpClient.lastRequest().method).toBe('DELETE');
      expect(httpClient.lastRequest().url).toBe(TEST_ADMIN_URL);
    });
  });

  describe('caches', () => {
    it.each([
      ['clearRealmCache', 'clear-realm-cache'],
      ['clearUserCache', 'clear-user-cache'],
      ['clearKeysCache', 'clear-keys-cache'],
    ] as const)('%s posts to %s', async (operation, path) => {
      const { httpClient, realms } = setup();

      const result = await realms[operation](TEST_ACCESS_TOKEN, TEST_REALM);

      expect(result._unsafeUnwrap()).toEqual({ status: 204 });
      expect(httpClient.lastRequest().method).toBe('POST');
      expect(httpClient.lastRequest().url).toBe(`${TEST_ADMIN_URL}/${path}`);
    });
  });

  describe('getServerInfo', () => {
    it('reads the server info', async () => {
      const { httpClient, realms } = setup(
        createSuccessHttpClient({ systemInfo: { version: '26.0.0' } })
      );

      const result = await realms.getServerInfo(TEST_ACCESS_TOKEN);

      expect(result._unsafeUnwrap().data.systemInfo?.version).toBe('26.0.0');
      expect(httpClient.lastRequest().url).toBe(`${TEST_BASE_URL}/admin/serverinfo`);
    });
  });
});
