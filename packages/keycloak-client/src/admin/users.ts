/**
 * User administration: accounts, credentials, group membership, sessions and
 * federated identities.
 *
 * @packageDocumentation
 */

import type { ApiResult, ApiStatusResult } from '../types.js';
import type { RestTransport } from '../rest/transport.js';
import { createAdminRequests, hasId, rejected } from './requests.js';
import type {
  CredentialRepresentation,
  ExecuteActionsEmailParams,
  FederatedIdentityRepresentation,
  GetGroupsParams,
  GetUsersByRoleParams,
  GetUsersParams,
  GroupRepresentation,
  UserRepresentation,
  UserSessionRepresentation,
} from './types.js';

export interface UsersApi {
  /** Creates a user; returns the new user's id */
  readonly createUser: (
    token: string,
    realm: string,
    user: UserRepresentation
  ) => Promise<ApiResult<string>>;

  readonly deleteUser: (token: string, realm: string, userId: string) => Promise<ApiStatusResult>;

  /** Rejects an empty `userId` without sending a request */
  readonly getUserById: (
    token: string,
    realm: string,
    userId: string
  ) => Promise<ApiResult<UserRepresentation>>;

  readonly getUserCount: (
    token: string,
    realm: string,
    params?: GetUsersParams
  ) => Promise<ApiResult<number>>;

  readonly getUserGroups: (
    token: string,
    realm: string,
    userId: string,
    params?: GetGroupsParams
  ) => Promise<ApiResult<readonly GroupRepresentation[]>>;

  readonly getUsers: (
    token: string,
    realm: string,
    params?: GetUsersParams
  ) => Promise<ApiResult<readonly UserRepresentation[]>>;

  readonly getUsersByRoleName: (
    token: string,
    realm: string,
    roleName: string,
    params?: GetUsersByRoleParams
  ) => Promise<ApiResult<readonly UserRepresentation[]>>;

  /**
   * @param clientUuid - Internal id of the client owning the role
   */
  readonly getUsersByClientRoleName: (
    token: string,
    realm: string,
    clientUuid: string,
    roleName: string,
    params?: GetUsersByRoleParams
  ) => Promise<ApiResult<readonly UserRepresentation[]>>;

  /**
   * Resets the user's password.
   *
   * @param temporary - Require a change on next login
   */
  readonly setPassword: (
    token: string,
    realm: string,
    userId: string,
    password: string,
    temporary: boolean
  ) => Promise<ApiStatusResult>;

  /** Updates the user identified by `user.id` */
  readonly updateUser: (
    token: string,
    realm: string,
    user: UserRepresentation
  ) => Promise<ApiStatusResult>;

  readonly addUserToGroup: (
    token: string,
    realm: string,
    userId: string,
    groupId: string
  ) => Promise<ApiStatusResult>;

  readonly deleteUserFromGroup: (
    token: string,
    realm: string,
    userId: string,
    groupId: string
  ) => Promise<ApiStatusResult>;

  readonly getUserSessions: (
    token: string,
    realm: string,
    userId: string
  ) => Promise<ApiResult<readonly UserSessionRepresentation[]>>;

  readonly getUserOfflineSessionsForClient: (
    token: string,
    realm: string,
    userId: string,
    clientUuid: string
  ) => Promise<ApiResult<readonly UserSessionRepresentation[]>>;

  /** Ends every session of the user */
  readonly logoutAllSessions: (
    token: string,
    realm: string,
    userId: string
  ) => Promise<ApiStatusResult>;

  readonly logoutUserSession: (
    token: string,
    realm: string,
    sessionId: string
  ) => Promise<ApiStatusResult>;

  /** Sends the user an email asking them to perform the given required actions */
  readonly executeActionsEmail: (
    token: string,
    realm: string,
    params: ExecuteActionsEmailParams
  ) => Promise<ApiStatusResult>;

  readonly getUserFederatedIdentities: (
    token: string,
    realm: string,
    userId: string
  ) => Promise<ApiResult<readonly FederatedIdentityRepresentation[]>>;

  /** Links the user to an account at an identity provider */
  readonly createUserFederatedIdentity: (
    token: string,
    realm: string,
    userId: string,
    providerId: string,
    identity: FederatedIdentityRepresentation
  ) => Promise<ApiStatusResult>;

  readonly deleteUserFederatedIdentity: (
    token: string,
    realm: string,
    userId: string,
    providerId: string
  ) => Promise<ApiStatusResult>;
}

/**
 * Creates the user administration operations.
 *
 * @param rest - REST transport
 * @returns UsersApi instance
 */
export const createUsersApi = (rest: RestTransport): UsersApi => {
  const admin = createAdminRequests(rest);

  return {
    createUser: (token, realm, user) =>
      admin.create('could not create user', token, admin.url(realm, 'users'), user),

    deleteUser: (token, realm, userId) =>
      admin.send('could not delete user', token, 'DELETE', admin.url(realm, 'users', userId)),

    getUserById: (token, realm, userId) => {
      const description = 'could not get user by id';
      if (!hasId(userId)) {
        return rejected(description, 'userId shall not be empty');
      }
      return admin.get<UserRepresentation>(description, token, admin.url(realm, 'users', userId));
    },

    getUserCount: (token, realm, params) =>
      admin.get<number>(
        'could not get user count',
        token,
        admin.url(realm, 'users', 'count'),
        params
      ),

    getUserGroups: (token, realm, userId, params) =>
      admin.get<readonly GroupRepresentation[]>(
        'could not get user groups',
        token,
        admin.url(realm, 'users', userId, 'groups'),
        params
      ),

    getUsers: (token, realm, params) =>
      admin.get<readonly UserRepresentation[]>(
        'could not get users',
        token,
        admin.url(realm, 'users'),
        params
      ),

    getUsersByRoleName: (token, realm, roleName, params) =>
      admin.get<readonly UserRepresentation[]>(
        'could not get users by role name',
        token,
        admin.url(realm, 'roles', roleName, 'users'),
        params
      ),

    getUsersByClientRoleName: (token, realm, clientUuid, roleName, params) =>
      admin.get<readonly UserRepresentation[]>(
        'could not get users by client role name',
        token,
        admin.url(realm, 'clients', clientUuid, 'roles', roleName, 'users'),
        params
      ),

    setPassword: (token, realm, userId, password, temporary) => {
      const credential: CredentialRepresentation = { type: 'password', value: password, temporary };
      return admin.send(
        'could not set password',
        token,
        'PUT',
        admin.url(realm, 'users', userId, 'reset-password'),
        credential
      );
    },

    updateUser: (token, realm, user) => {
      const description = 'could not update user';
      if (!hasId(user.id)) {
        return rejected(description, 'user id shall not be empty');
      }
      return admin.send(description, token, 'PUT', admin.url(realm, 'users', user.id), user);
    },

    addUserToGroup: (token, realm, userId, groupId) =>
      admin.send(
        'could not add user to group',
        token,
        'PUT',
        admin.url(realm, 'users', userId, 'groups', groupId)
      ),

    deleteUserFromGroup: (token, realm, userId, groupId) =>
      admin.send(
        'could not delete user from group',
        token,
        'DELETE',
        admin.url(realm, 'users', userId, 'groups', groupId)
      ),

    getUserSessions: (token, realm, userId) =>
      admin.get<readonly UserSessionRepresentation[]>(
        'could not get user sessions',
        token,
        admin.url(realm, 'users', userId, 'sessions')
      ),

    getUserOfflineSessionsForClient: (token, realm, userId, clientUuid) =>
      admin.get<readonly UserSessionRepresentation[]>(
        'could not get user offline sessions for client',
        token,
        admin.url(realm, 'users', userId, 'offline-sessions', clientUuid)
      ),

    logoutAllSessions: (token, realm, userId) =>
      admin.send(
        'could not logout all sessions',
        token,
        'POST',
        admin.url(realm, 'users', userId, 'logout')
      ),

    logoutUserSession: (token, realm, sessionId) =>
      admin.send(
        'could not logout user session',
        token,
        'DELETE',
        admin.url(realm, 'sessions', sessionId)
      ),

    executeActionsEmail: (token, realm, params) =>
      admin.send(
        'could not execute actions email',
        token,
        'PUT',
        admin.url(realm, 'users', params.userId, 'execute-actions-email'),
        params.actions,
        {
          client_id: params.clientId,
          lifespan: params.lifespan,
          redirect_uri: params.redirectUri,
        }
      ),

    getUserFederatedIdentities: (token, realm, userId) =>
      admin.get<readonly FederatedIdentityRepresentation[]>(
        'could not get user federated identities',
        token,
        admin.url(realm, 'users', userId, 'federated-identity')
      ),

    createUserFederatedIdentity: (token, realm, userId, providerId, identity) =>
      admin.send(
        'could not create user federated identity',
        token,
        'POST',
        admin.url(realm, 'users', userId, 'federated-identity', providerId),
        identity
      ),

    deleteUserFederatedIdentity: (token, realm, userId, providerId) =>
      admin.send(
        'could not delete user federated identity',
        token,
        'DELETE',
        admin.url(realm, 'users', userId, 'federated-identity', providerId)
      ),
  };
};
