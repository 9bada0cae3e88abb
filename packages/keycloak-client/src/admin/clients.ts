import type { ApiResult, ApiStatusResult } from '../types.js';
import type { RestTransport } from '../rest/transport.js';
import { createAdminRequests, hasId, rejected } from './requests.js';
import type { ClientRepresentation, CredentialRepresentation, GetClientsParams } from './types.js';

/**
 * Client administration. Clients are addressed by their internal id
 * (`clientUuid`), not by the public `clientId`.
 */
export interface ClientsApi {
  readonly getClients: (
    token: string,
    realm: string,
    params?: GetClientsParams
  ) => Promise<ApiResult<readonly ClientRepresentation[]>>;
  readonly getClient: (
    token: string,
    realm: string,
    clientUuid: string
  ) => Promise<ApiResult<ClientRepresentation>>;
  /** Creates a client; returns its internal id */
  readonly createClient: (
    token: string,
    realm: string,
    client: ClientRepresentation
  ) => Promise<ApiResult<string>>;
  /** Updates the client identified by `client.id` */
  readonly updateClient: (
    token: string,
    realm: string,
    client: ClientRepresentation
  ) => Promise<ApiStatusResult>;
  readonly deleteClient: (token: string, realm: string, clientUuid: string) => Promise<ApiStatusResult>;
  readonly getClientSecret: (
    token: string,
    realm: string,
    clientUuid: string
  ) => Promise<ApiResult<CredentialRepresentation>>;
}

export const createClientsApi = (rest: RestTransport): ClientsApi => {
  const admin = createAdminRequests(rest);

  return {
    getClients: (token, realm, params) =>
      admin.get<readonly ClientRepresentation[]>(
        'could not get clients',
        token,
        admin.url(realm, 'clients'),
        params
      ),

    getClient: (token, realm, clientUuid) =>
      admin.get<ClientRepresentation>(
        'could not get client',
        token,
        admin.url(realm, 'clients', clientUuid)
      ),

    createClient: (token, realm, client) =>
      admin.create('could not create client', token, admin.url(realm, 'clients'), client),

    updateClient: (token, realm, client) => {
      const description = 'could not update client';
      if (!hasId(client.id)) {
        return rejected(description, 'client id shall not be empty');
      }
      return admin.send(description, token, 'PUT', admin.url(realm, 'clients', client.id), client);
    },

    deleteClient: (token, realm, clientUuid) =>
      admin.send('could not delete client', token, 'DELETE', admin.url(realm, 'clients', clientUuid)),

    getClientSecret: (token, realm, clientUuid) =>
      admin.get<CredentialRepresentation>(
        'could not get client secret',
        token,
        admin.url(realm, 'clients', clientUuid, 'client-secret')
      ),
  };
};
