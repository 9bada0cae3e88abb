/**
 * Realm roles: definitions, composites and role mappings of users and groups.
 * Mapping removals are DELETE requests carrying the roles as a JSON array.
 *
 * @packageDocumentation
 */

import type { ApiResult, ApiStatusResult } from '../types.js';
import type { RestTransport } from '../rest/transport.js';
import { createAdminRequests } from './requests.js';
import type { GetRoleParams, RoleRepresentation } from './types.js';

type Roles = Promise<ApiResult<readonly RoleRepresentation[]>>;

export interface RolesApi {
  /** Creates a realm role; returns its name */
  readonly createRealmRole: (
    token: string,
    realm: string,
    role: RoleRepresentation
  ) => Promise<ApiResult<string>>;
  readonly getRealmRole: (
    token: string,
    realm: string,
    roleName: string
  ) => Promise<ApiResult<RoleRepresentation>>;
  readonly getRealmRoleById: (
    token: string,
    realm: string,
    roleId: string
  ) => Promise<ApiResult<RoleRepresentation>>;
  readonly getRealmRoles: (token: string, realm: string, params?: GetRoleParams) => Roles;
  readonly getRealmRolesByUserId: (token: string, realm: string, userId: string) => Roles;
  readonly getRealmRolesByGroupId: (token: string, realm: string, groupId: string) => Roles;
  readonly updateRealmRole: (
    token: string,
    realm: string,
    roleName: string,
    role: RoleRepresentation
  ) => Promise<ApiStatusResult>;
  readonly updateRealmRoleById: (
    token: string,
    realm: string,
    roleId: string,
    role: RoleRepresentation
  ) => Promise<ApiStatusResult>;
  readonly deleteRealmRole: (token: string, realm: string, roleName: string) => Promise<ApiStatusResult>;
  readonly addRealmRoleToUser: (
    token: string,
    realm: string,
    userId: string,
    roles: readonly RoleRepresentation[]
  ) => Promise<ApiStatusResult>;
  readonly deleteRealmRoleFromUser: (
    token: string,
    realm: string,
    userId: string,
    roles: readonly RoleRepresentation[]
  ) => Promise<ApiStatusResult>;
  readonly addRealmRoleToGroup: (
    token: string,
    realm: string,
    groupId: string,
    roles: readonly RoleRepresentation[]
  ) => Promise<ApiStatusResult>;
  readonly deleteRealmRoleFromGroup: (
    token: string,
    realm: string,
    groupId: string,
    roles: readonly RoleRepresentation[]
  ) => Promise<ApiStatusResult>;
  /** Adds roles to the composite role `roleName` */
  readonly addRealmRoleComposite: (
    token: string,
    realm: string,
    roleName: string,
    roles: readonly RoleRepresentation[]
  ) => Promise<ApiStatusResult>;
  readonly deleteRealmRoleComposite: (
    token: string,
    realm: string,
    roleName: string,
    roles: readonly RoleRepresentation[]
  ) => Promise<ApiStatusResult>;
  readonly getCompositeRealmRoles: (token: string, realm: string, roleName: string) => Roles;
  /** Realm and client composites of a role */
  readonly getCompositeRolesByRoleId: (token: string, realm: string, roleId: string) => Roles;
  readonly getCompositeRealmRolesByRoleId: (token: string, realm: string, roleId: string) => Roles;
  /** Effective realm roles of a user, composites expanded */
  readonly getCompositeRealmRolesByUserId: (token: string, realm: string, userId: string) => Roles;
  readonly getCompositeRealmRolesByGroupId: (token: string, realm: string, groupId: string) => Roles;
  /** Realm roles that can still be mapped to a user */
  readonly getAvailableRealmRolesByUserId: (token: string, realm: string, userId: string) => Roles;
  readonly getAvailableRealmRolesByGroupId: (token: string, realm: string, groupId: string) => Roles;
}

/**
 * Creates the realm role operations.
 *
 * @param rest - REST transport
 * @returns RolesApi instance
 */
export const createRolesApi = (rest: RestTransport): RolesApi => {
  const admin = createAdminRequests(rest);

  const getRoles = (description: string, token: string, url: string, params?: GetRoleParams): Roles =>
    admin.get<readonly RoleRepresentation[]>(description, token, url, params);

  return {
    createRealmRole: (token, realm, role) =>
      admin.create('could not create realm role', token, admin.url(realm, 'roles'), role),

    getRealmRole: (token, realm, roleName) =>
      admin.get<RoleRepresentation>(
        'could not get realm role',
        token,
        admin.url(realm, 'roles', roleName)
      ),

    getRealmRoleById: (token, realm, roleId) =>
      admin.get<RoleRepresentation>(
        'could not get realm role',
        token,
        admin.url(realm, 'roles-by-id', roleId)
      ),

    getRealmRoles: (token, realm, params) =>
      getRoles('could not get realm roles', token, admin.url(realm, 'roles'), params),

    getRealmRolesByUserId: (token, realm, userId) =>
      getRoles(
        'could not get realm roles by user id',
        token,
        admin.url(realm, 'users', userId, 'role-mappings', 'realm')
      ),

    getRealmRolesByGroupId: (token, realm, groupId) =>
      getRoles(
        'could not get realm roles by group id',
        token,
        admin.url(realm, 'groups', groupId, 'role-mappings', 'realm')
      ),

    updateRealmRole: (token, realm, roleName, role) =>
      admin.send('could not update realm role', token, 'PUT', admin.url(realm, 'roles', roleName), role),

    updateRealmRoleById: (token, realm, roleId, role) =>
      admin.send(
        'could not update realm role',
        token,
        'PUT',
        admin.url(realm, 'roles-by-id', roleId),
        role
      ),

    deleteRealmRole: (token, realm, roleName) =>
      admin.send('could not delete realm role', token, 'DELETE', admin.url(realm, 'roles', roleName)),

    addRealmRoleToUser: (token, realm, userId, roles) =>
      admin.send(
        'could not add realm role to user',
        token,
        'POST',
        admin.url(realm, 'users', userId, 'role-mappings', 'realm'),
        roles
      ),

    deleteRealmRoleFromUser: (token, realm, userId, roles) =>
      admin.send(
        'could not delete realm role from user',
        token,
        'DELETE',
        admin.url(realm, 'users', userId, 'role-mappings', 'realm'),
        roles
      ),

    addRealmRoleToGroup: (token, realm, groupId, roles) =>
      admin.send(
        'could not add realm role to group',
        token,
        'POST',
        admin.url(realm, 'groups', groupId, 'role-mappings', 'realm'),
        roles
      ),

    deleteRealmRoleFromGroup: (token, realm, groupId, roles) =>
      admin.send(
        'could not delete realm role from group',
        token,
        'DELETE',
        admin.url(realm, 'groups', groupId, 'role-mappings', 'realm'),
        roles
      ),

    addRealmRoleComposite: (token, realm, roleName, roles) =>
      admin.send(
        'could not add realm role composite',
        token,
        'POST',
        admin.url(realm, 'roles', roleName, 'composites'),
        roles
      ),

    deleteRealmRoleComposite: (token, realm, roleName, roles) =>
      admin.send(
        'could not delete realm role composite',
        token,
        'DELETE',
        admin.url(realm, 'roles', roleName, 'composites'),
        roles
      ),

    getCompositeRealmRoles: (token, realm, roleName) =>
      getRoles(
        'could not get composite realm roles by role',
        token,
        admin.url(realm, 'roles', roleName, 'composites')
      ),

    getCompositeRolesByRoleId: (token, realm, roleId) =>
      getRoles(
        'could not get composite roles by role id',
        token,
        admin.url(realm, 'roles-by-id', roleId, 'composites')
      ),

    getCompositeRealmRolesByRoleId: (token, realm, roleId) =>
      getRoles(
        'could not get composite realm roles by role id',
        token,
        admin.url(realm, 'roles-by-id', roleId, 'composites', 'realm')
      ),

    getCompositeRealmRolesByUserId: (token, realm, userId) =>
      getRoles(
        'could not get composite realm roles by user id',
        token,
        admin.url(realm, 'users', userId, 'role-mappings', 'realm', 'composite')
      ),

    getCompositeRealmRolesByGroupId: (token, realm, groupId) =>
      getRoles(
        'could not get composite realm roles by group id',
        token,
        admin.url(realm, 'groups', groupId, 'role-mappings', 'realm', 'composite')
      ),

    getAvailableRealmRolesByUserId: (token, realm, userId) =>
      getRoles(
        'could not get available realm roles by user id',
        token,
        admin.url(realm, 'users', userId, 'role-mappings', 'realm', 'available')
      ),

    getAvailableRealmRolesByGroupId: (token, realm, groupId) =>
      getRoles(
        'could not get available realm roles by group id',
        token,
        admin.url(realm, 'groups', groupId, 'role-mappings', 'realm', 'available')
      ),
  };
};
