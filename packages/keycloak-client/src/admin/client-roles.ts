import type { ApiResult, ApiStatusResult } from '../types.js';
import type { RestTransport } from '../rest/transport.js';
import { createAdminRequests } from './requests.js';
import type { GetRoleParams, RoleRepresentation } from './types.js';

type Roles = Promise<ApiResult<readonly RoleRepresentation[]>>;

/**
 * Client roles and their mappings to users and groups.
 * `clientUuid` is the internal id of the client owning the roles.
 */
export interface ClientRolesApi {
  /** Creates a client role; returns its name */
  readonly createClientRole: (
    token: string,
    realm: string,
    clientUuid: string,
    role: RoleRepresentation
  ) => Promise<ApiResult<string>>;
  readonly getClientRole: (
    token: string,
    realm: string,
    clientUuid: string,
    roleName: string
  ) => Promise<ApiResult<RoleRepresentation>>;
  readonly getClientRoles: (
    token: string,
    realm: string,
    clientUuid: string,
    params?: GetRoleParams
  ) => Roles;
  readonly deleteClientRole: (
    token: string,
    realm: string,
    clientUuid: string,
    roleName: string
  ) => Promise<ApiStatusResult>;
  readonly addClientRolesToUser: (
    token: string,
    realm: string,
    clientUuid: string,
    userId: string,
    roles: readonly RoleRepresentation[]
  ) => Promise<ApiStatusResult>;
  readonly deleteClientRolesFromUser: (
    token: string,
    realm: string,
    clientUuid: string,
    userId: string,
    roles: readonly RoleRepresentation[]
  ) => Promise<ApiStatusResult>;
  readonly getClientRolesByUserId: (
    token: string,
    realm: string,
    clientUuid: string,
    userId: string
  ) => Roles;
  readonly getCompositeClientRolesByUserId: (
    token: string,
    realm: string,
    clientUuid: string,
    userId: string
  ) => Roles;
  readonly getAvailableClientRolesByUserId: (
    token: string,
    realm: string,
    clientUuid: string,
    userId: string
  ) => Roles;
  readonly addClientRolesToGroup: (
    token: string,
    realm: string,
    clientUuid: string,
    groupId: string,
    roles: readonly RoleRepresentation[]
  ) => Promise<ApiStatusResult>;
  readonly deleteClientRolesFromGroup: (
    token: string,
    realm: string,
    clientUuid: string,
    groupId: string,
    roles: readonly RoleRepresentation[]
  ) => Promise<ApiStatusResult>;
  readonly getClientRolesByGroupId: (
    token: string,
    realm: string,
    clientUuid: string,
    groupId: string
  ) => Roles;
}

export const createClientRolesApi = (rest: RestTransport): ClientRolesApi => {
  const admin = createAdminRequests(rest);

  const userMappings = (
    realm: string,
    userId: string,
    clientUuid: string,
    ...segments: string[]
  ): string => admin.url(realm, 'users', userId, 'role-mappings', 'clients', clientUuid, ...segments);

  const groupMappings = (realm: string, groupId: string, clientUuid: string): string =>
    admin.url(realm, 'groups', groupId, 'role-mappings', 'clients', clientUuid);

  return {
    createClientRole: (token, realm, clientUuid, role) =>
      admin.create(
        'could not create client role',
        token,
        admin.url(realm, 'clients', clientUuid, 'roles'),
        role
      ),

    getClientRole: (token, realm, clientUuid, roleName) =>
      admin.get<RoleRepresentation>(
        'could not get client role',
        token,
        admin.url(realm, 'clients', clientUuid, 'roles', roleName)
      ),

    getClientRoles: (token, realm, clientUuid, params) =>
      admin.get<readonly RoleRepresentation[]>(
        'could not get client roles',
        token,
        admin.url(realm, 'clients', clientUuid, 'roles'),
        params
      ),

    deleteClientRole: (token, realm, clientUuid, roleName) =>
      admin.send(
        'could not delete client role',
        token,
        'DELETE',
        admin.url(realm, 'clients', clientUuid, 'roles', roleName)
      ),

    addClientRolesToUser: (token, realm, clientUuid, userId, roles) =>
      admin.send(
        'could not add client role to user',
        token,
        'POST',
        userMappings(realm, userId, clientUuid),
        roles
      ),

    deleteClientRolesFromUser: (token, realm, clientUuid, userId, roles) =>
      admin.send(
        'could not delete client role from user',
        token,
        'DELETE',
        userMappings(realm, userId, clientUuid),
        roles
      ),

    getClientRolesByUserId: (token, realm, clientUuid, userId) =>
      admin.get<readonly RoleRepresentation[]>(
        'could not get client roles by user id',
        token,
        userMappings(realm, userId, clientUuid)
      ),

    getCompositeClientRolesByUserId: (token, realm, clientUuid, userId) =>
      admin.get<readonly RoleRepresentation[]>(
        'could not get composite client roles by user id',
        token,
        userMappings(realm, userId, clientUuid, 'composite')
      ),

    getAvailableClientRolesByUserId: (token, realm, clientUuid, userId) =>
      admin.get<readonly RoleRepresentation[]>(
        'could not get available client roles by user id',
        token,
        userMappings(realm, userId, clientUuid, 'available')
      ),

    addClientRolesToGroup: (token, realm, clientUuid, groupId, roles) =>
      admin.send(
        'could not add client role to group',
        token,
        'POST',
        groupMappings(realm, groupId, clientUuid),
        roles
      ),

    deleteClientRolesFromGroup: (token, realm, clientUuid, groupId, roles) =>
      admin.send(
        'could not delete client role from group',
        token,
        'DELETE',
        groupMappings(realm, groupId, clientUuid),
        roles
      ),

    getClientRolesByGroupId: (token, realm, clientUuid, groupId) =>
      admin.get<readonly RoleRepresentation[]>(
        'could not get client roles by group id',
        token,
        groupMappings(realm, groupId, clientUuid)
      ),
  };
};
