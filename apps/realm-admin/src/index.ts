#!/usr/bin/env node

/**
 * Realm Admin
 *
 * Logs in as an administrator and prints realm data as JSON:
 *
 *   realm-admin users alice
 *   realm-admin sessions 6b0f3a52-...
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import { createKeycloakClient } from 'keycloak-rest-client';
import { loadAdminConfig } from './config.js';
import { runCommand } from './commands.js';

async function main(): Promise<void> {
  const config = loadAdminConfig(process.env);
  const keycloak = createKeycloakClient(config.client);

  const login = await keycloak.loginAdmin(config.username, config.password, config.adminRealm);
  if (login.isErr()) {
    console.error(`[realm-admin] ${login.error.message}`);
    process.exitCode = 1;
    return;
  }

  const result = await runCommand(
    keycloak,
    login.value.data.access_token,
    config.realm,
    process.argv.slice(2)
  );

  if (result.isErr()) {
    console.error(`[realm-admin] ${result.error.message}`);
    process.exitCode = 1;
    return;
  }

  console.log(JSON.stringify(result.value, null, 2));
}

main().catch((error: unknown) => {
  console.error('[realm-admin] Fatal error:', error);
  process.exitCode = 1;
});
