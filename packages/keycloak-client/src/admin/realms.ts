import type { ApiResult, ApiStatusResult } from '../types.js';
import type { RestTransport } from '../rest/transport.js';
import { createAdminRequests, hasId, rejected } from './requests.js';
import type { RealmRepresentation, ServerInfoRepresentation } from './types.js';

/**
 * Realm administration.
 */
export interface RealmsApi {
  readonly getRealm: (token: string, realm: string) => Promise<ApiResult<RealmRepresentation>>;
  readonly getRealms: (token: string) => Promise<ApiResult<readonly RealmRepresentation[]>>;
  /** Creates a realm; returns its name */
  readonly createRealm: (token: string, realm: RealmRepresentation) => Promise<ApiResult<string>>;
  /** Updates the realm named by `realm.realm` */
  readonly updateRealm: (token: string, realm: RealmRepresentation) => Promise<ApiStatusResult>;
  readonly deleteRealm: (token: string, realm: string) => Promise<ApiStatusResult>;
  readonly clearRealmCache: (token: string, realm: string) => Promise<ApiStatusResult>;
  readonly clearUserCache: (token: string, realm: string) => Promise<ApiStatusResult>;
  readonly clearKeysCache: (token: string, realm: string) => Promise<ApiStatusResult>;
  readonly getServerInfo: (token: string) => Promise<ApiResult<ServerInfoRepresentation>>;
}

export const createRealmsApi = (rest: RestTransport): RealmsApi => {
  const admin = createAdminRequests(rest);
  const { urls } = rest;

  return {
    getRealm: (token, realm) =>
      admin.get<RealmRepresentation>('could not get realm', token, urls.adminRealm(realm)),

    getRealms: (token) =>
      admin.get<readonly RealmRepresentation[]>('could not get realms', token, urls.admin('realms')),

    createRealm: (token, realm) =>
      admin.create('could not create realm', token, urls.admin('realms'), realm),

    updateRealm: (token, realm) => {
      const description = 'could not update realm';
      if (!hasId(realm.realm)) {
        return rejected(description, 'realm name shall not be empty');
      }
      return admin.send(description, token, 'PUT', urls.adminRealm(realm.realm), realm);
    },

    deleteRealm: (token, realm) =>
      admin.send('could not delete realm', token, 'DELETE', urls.adminRealm(realm)),

    clearRealmCache: (token, realm) =>
      admin.send('could not clear realm cache', token, 'POST', admin.url(realm, 'clear-realm-cache')),

    clearUserCache: (token, realm) =>
      admin.send('could not clear user cache', token, 'POST', admin.url(realm, 'clear-user-cache')),

    clearKeysCache: (token, realm) =>
      admin.send('could not clear keys cache', token, 'POST', admin.url(realm, 'clear-keys-cache')),

    getServerInfo: (token) =>
      admin.get<ServerInfoRepresentation>(
        'could not get server info',
        token,
        urls.admin('serverinfo')
      ),
  };
};
