/**
 * Realm Admin Commands
 *
 * @packageDocumentation
 */

import { err, type Result } from 'neverthrow';
import type { KeycloakClient, KeycloakError } from 'keycloak-rest-client';

export const USAGE = 'usage: realm-admin <users [search] | groups | roles | sessions <userId> | realms>';

/**
 * Client operations the commands use.
 */
export type AdminCommandsClient = Pick<
  KeycloakClient,
  'getUsers' | 'getGroups' | 'getRealmRoles' | 'getUserSessions' | 'getRealms'
>;

/**
 * Invalid command line.
 */
export interface UsageError {
  readonly type: 'usage';
  readonly message: string;
}

export type CommandError = KeycloakError | UsageError;

const usage = (reason: string): UsageError => ({ type: 'usage', message: `${reason}\n${USAGE}` });

/**
 * Runs one command and returns the data to print.
 *
 * @param client - Keycloak client
 * @param token - Admin access token
 * @param realm - Realm to operate on
 * @param argv - Command and its arguments
 */
export async function runCommand(
  client: AdminCommandsClient,
  token: string,
  realm: string,
  argv: readonly string[]
): Promise<Result<unknown, CommandError>> {
  const [command, argument] = argv;

  switch (command) {
    case 'users': {
      const result = await client.getUsers(
        token,
        realm,
        argument !== undefined ? { search: argument } : {}
      );
      return result.map(({ data }) => data);
    }
    case 'groups': {
      const result = await client.getGroups(token, realm);
      return result.map(({ data }) => data);
    }
    case 'roles': {
      const result = await client.getRealmRoles(token, realm);
      return result.map(({ data }) => data);
    }
    case 'sessions': {
      if (argument === undefined) {
        return err(usage('sessions requires a user id'));
      }
      const result = await client.getUserSessions(token, realm, argument);
      return result.map(({ data }) => data);
    }
    case 'realms': {
      const result = await client.getRealms(token);
      return result.map(({ data }) => data);
    }
    case undefined:
      return err(usage('missing command'));
    default:
      return err(usage(`unknown command: ${command}`));
  }
}
