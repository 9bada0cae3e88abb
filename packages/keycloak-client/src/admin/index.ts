export { createRealmsApi } from './realms.js';
export type { RealmsApi } from './realms.js';
export { createUsersApi } from './users.js';
export type { UsersApi } from './users.js';
export { createRolesApi } from './roles.js';
export type { RolesApi } from './roles.js';
export { createClientsApi } from './clients.js';
export type { ClientsApi } from './clients.js';
export { createClientRolesApi } from './client-roles.js';
export type { ClientRolesApi } from './client-roles.js';
export { createGroupsApi } from './groups.js';
export type { GroupsApi } from './groups.js';
export type * from './types.js';
