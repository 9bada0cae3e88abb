import { describe, it, expect } from 'vitest';
import { createClientRolesApi } from './client-roles.js';
import {
  createMockHttpClient,
  createSuccessHttpClient,
  createTestTransport,
  jsonOf,
  type RecordingHttpClient,
} from '../test/mocks.js';
import {
  TEST_ACCESS_TOKEN,
  TEST_ADMIN_URL,
  TEST_CLIENT_UUID,
  TEST_GROUP_ID,
  TEST_REALM,
  TEST_USER_ID,
  createRole,
} from '../test/fixtures.js';

const setup = (httpClient: RecordingHttpClient = createMockHttpClient([{ status: 204 }])) => ({
  httpClient,
  clientRoles: createClientRolesApi(createTestTransport(httpClient)),
});

const CLIENT_URL = `${TEST_ADMIN_URL}/clients/${TEST_CLIENT_UUID}`;
const USER_MAPPINGS_URL = `${TEST_ADMIN_URL}/users/${TEST_USER_ID}/role-mappings/clients/${TEST_CLIENT_UUID}`;
const GROUP_MAPPINGS_URL = `${TEST_ADMIN_URL}/groups/${TEST_GROUP_ID}/role-mappings/clients/${TEST_CLIENT_UUID}`;

const viewer = createRole({ name: 'viewer', clientRole: true, containerId: TEST_CLIENT_UUID });

describe('createClientRolesApi', () => {
  describe('role definitions', () => {
    it('createClientRole posts the role and returns its name', async () => {
      const { httpClient, clientRoles } = setup(
        createSuccessHttpClient('', 201, { location: `${CLIENT_URL}/roles/viewer` })
      );

      const result = await clientRoles.createClientRole(
        TEST_ACCESS_TOKEN,
        TEST_REALM,
        TEST_CLIENT_UUID,
        { name: 'viewer' }
      );

      expect(result._unsafeUnwrap().data).toBe('viewer');
      expect(httpClient.lastRequest().url).toBe(`${CLIENT_URL}/roles`);
    });

    it('getClientRole reads the role by name', async () => {
      const { httpClient, clientRoles } = setup(createSuccessHttpClient(viewer));

      const result = await clientRoles.getClientRole(
        TEST_ACCESS_TOKEN,
        TEST_REALM,
        TEST_CLIENT_UUID,
        'viewer'
      );

      expect(result._unsafeUnwrap().data).toEqual(viewer);
      expect(httpClient.lastRequest().url).toBe(`${CLIENT_URL}/roles/viewer`);
    });

    it('getClientRoles sends the paging parameters', async () => {
      const { httpClient, clientRoles } = setup(createSuccessHttpClient([viewer]));

      await clientRoles.getClientRoles(TEST_ACCESS_TOKEN, TEST_REALM, TEST_CLIENT_UUID, {
        first: 10,
        max: 10,
      });

      expect(httpClient.lastRequest().url).toBe(`${CLIENT_URL}/roles?first=10&max=10`);
    });

    it('deleteClientRole deletes the role', async () => {
      const { httpClient, clientRoles } = setup();

      await clientRoles.deleteClientRole(TEST_ACCESS_TOKEN, TEST_REALM, TEST_CLIENT_UUID, 'viewer');

      expect(httpClient.lastRequest().method).toBe('DELETE');
      expect(httpClient.lastRequest().url).toBe(`${CLIENT_URL}/roles/viewer`);
    });
  });

  describe('user mappings', () => {
    it('addClientRolesToUser posts the roles', async () => {
      const { httpClient, clientRoles } = setup();

      await clientRoles.addClientRolesToUser(
        TEST_ACCESS_TOKEN,
        TEST_REALM,
        TEST_CLIENT_UUID,
        TEST_USER_ID,
        [viewer]
      );

      const request = httpClient.lastRequest();
      expect(request.method).toBe('POST');
      expect(request.url).toBe(USER_MAPPINGS_URL);
      expect(jsonOf(request)).toEqual([viewer]);
    });

    it('deleteClientRolesFromUser sends the roles in a DELETE body', async () => {
      const { httpClient, clientRoles } = setup();

      await clientRoles.deleteClientRolesFromUser(
        TEST_ACCESS_TOKEN,
        TEST_REALM,
        TEST_CLIENT_UUID,
        TEST_USER_ID,
        [viewer]
      );

      expect(httpClient.lastRequest().method).toBe('DELETE');
      expect(jsonOf(httpClient.lastRequest())).toEqual([viewer]);
    });

    it.each([
      ['getClientRolesByUserId', USER_MAPPINGS_URL],
      ['getCompositeClientRolesByUserId', `${USER_MAPPINGS_URL}/composite`],
      ['getAvailableClientRolesByUserId', `${USER_MAPPINGS_URL}/available`],
    ] as const)('%s reads %s', async (operation, url) => {
      const { httpClient, clientRoles } = setup(createSuccessHttpClient([viewer]));

      const result = await clientRoles[operation](
        TEST_ACCESS_TOKEN,
        TEST_REALM,
        TEST_CLIENT_UUID,
        TEST_USER_ID
      );

      expect(result._unsafeUnwrap().data).toEqual([viewer]);
      expect(httpClient.lastRequest().url).toBe(url);
    });
  });

  describe('group mappings', () => {
    it('addClientRolesToGroup posts the roles', async () => {
      const { httpClient, clientRoles } = setup();

      await clientRoles.addClientRolesToGroup(
        TEST_ACCESS_TOKEN,
        TEST_REALM,
        TEST_CLIENT_UUID,
        TEST_GROUP_ID,
        [viewer]
      );

      expect(httpClient.lastRequest().method).toBe('POST');
      expect(httpClient.lastRequest().url).toBe(GROUP_MAPPINGS_URL);
    });

    it('deleteClientRolesFromGroup deletes the mapping', async () => {
      const { httpClient, clientRoles } = setup();

      await clientRoles.deleteClientRolesFromGroup(
        TEST_ACCESS_TOKEN,
        TEST_REALM,
        TEST_CLIENT_UUID,
        TEST_GROUP_ID,
        [viewer]
      );

      expect(httpClient.lastRequest().method).toBe('DELETE');
      expect(jsonOf(httpClient.lastRequest())).toEqual([viewer]);
    });

    it('getClientRolesByGroupId reads the mapping', async () => {
      const { httpClient, clientRoles } = setup(createSuccessHttpClient([]));

      await clientRoles.getClientRolesByGroupId(
        TEST_ACCESS_TOKEN,
        TEST_REALM,
        TEST_CLIENT_UUID,
        TEST_GROUP_ID
      );

      expect(httpClient.lastRequest().url).toBe(GROUP_MAPPINGS_URL);
    });
  });
});
