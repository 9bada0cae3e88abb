import type { ApiResult, ApiStatusResult } from '../types.js';
import type { RestTransport } from '../rest/transport.js';
import { createAdminRequests, hasId, rejected } from './requests.js';
import type {
  GetGroupsCountParams,
  GetGroupsParams,
  GetMembersParams,
  GroupRepresentation,
  UserRepresentation,
} from './types.js';

/**
 * Group administration.
 */
export interface GroupsApi {
  /** Creates a top-level group; returns its id */
  readonly createGroup: (
    token: string,
    realm: string,
    group: GroupRepresentation
  ) => Promise<ApiResult<string>>;
  /** Creates a subgroup of `parentId`; returns its id */
  readonly createChildGroup: (
    token: string,
    realm: string,
    parentId: string,
    group: GroupRepresentation
  ) => Promise<ApiResult<string>>;
  readonly getGroups: (
    token: string,
    realm: string,
    params?: GetGroupsParams
  ) => Promise<ApiResult<readonly GroupRepresentation[]>>;
  readonly getGroup: (
    token: string,
    realm: string,
    groupId: string
  ) => Promise<ApiResult<GroupRepresentation>>;
  /**
   * Looks a group up by its path, e.g. `/engineering/platform`.
   */
  readonly getGroupByPath: (
    token: string,
    realm: string,
    path: string
  ) => Promise<ApiResult<GroupRepresentation>>;
  readonly getGroupsCount: (
    token: string,
    realm: string,
    params?: GetGroupsCountParams
  ) => Promise<ApiResult<number>>;
  readonly getGroupMembers: (
    token: string,
    realm: string,
    groupId: string,
    params?: GetMembersParams
  ) => Promise<ApiResult<readonly UserRepresentation[]>>;
  /** Updates the group identified by `group.id` */
  readonly updateGroup: (
    token: string,
    realm: string,
    group: GroupRepresentation
  ) => Promise<ApiStatusResult>;
  readonly deleteGroup: (token: string, realm: string, groupId: string) => Promise<ApiStatusResult>;
}

export const createGroupsApi = (rest: RestTransport): GroupsApi => {
  const admin = createAdminRequests(rest);

  return {
    createGroup: (token, realm, group) =>
      admin.create('could not create group', token, admin.url(realm, 'groups'), group),

    createChildGroup: (token, realm, parentId, group) =>
      admin.create(
        'could not create child group',
        token,
        admin.url(realm, 'groups', parentId, 'children'),
        group
      ),

    getGroups: (token, realm, params) =>
      admin.get<readonly GroupRepresentation[]>(
        'could not get groups',
        token,
        admin.url(realm, 'groups'),
        params
      ),

    getGroup: (token, realm, groupId) =>
      admin.get<GroupRepresentation>('could not get group', token, admin.url(realm, 'groups', groupId)),

    getGroupByPath: (token, realm, path) => {
      const segments = path.split('/').filter((segment) => segment.length > 0);
      return admin.get<GroupRepresentation>(
        'could not get group by path',
        token,
        admin.url(realm, 'group-by-path', ...segments)
      );
    },

    getGroupsCount: async (token, realm, params) => {
      const result = await admin.get<{ readonly count: number }>(
        'could not get groups count',
        token,
        admin.url(realm, 'groups', 'count'),
        params
      );
      return result.map(({ status, data }) => ({ status, data: data.count }));
    },

    getGroupMembers: (token, realm, groupId, params) =>
      admin.get<readonly UserRepresentation[]>(
        'could not get group members',
        token,
        admin.url(realm, 'groups', groupId, 'members'),
        params
      ),

    updateGroup: (token, realm, group) => {
      const description = 'could not update group';
      if (!hasId(group.id)) {
        return rejected(description, 'group id shall not be empty');
      }
      return admin.send(description, token, 'PUT', admin.url(realm, 'groups', group.id), group);
    },

    deleteGroup: (token, realm, groupId) =>
      admin.send('could not delete group', token, 'DELETE', admin.url(realm, 'groups', groupId)),
  };
};
