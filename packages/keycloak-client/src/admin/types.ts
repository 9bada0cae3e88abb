/**
 * Admin REST representations and query parameter types.
 * Field names follow Keycloak's JSON; every field is optional because the
 * server omits what it does not set.
 *
 * @packageDocumentation
 */

/**
 * Attributes as Keycloak stores them: every key maps to a list of values.
 */
export type Attributes = Readonly<Record<string, readonly string[]>>;

export interface RealmRepresentation {
  readonly id?: string;
  readonly realm?: string;
  readonly displayName?: string;
  readonly displayNameHtml?: string;
  readonly enabled?: boolean;
  readonly sslRequired?: string;
  readonly registrationAllowed?: boolean;
  readonly registrationEmailAsUsername?: boolean;
  readonly rememberMe?: boolean;
  readonly verifyEmail?: boolean;
  readonly loginWithEmailAllowed?: boolean;
  readonly duplicateEmailsAllowed?: boolean;
  readonly resetPasswordAllowed?: boolean;
  readonly editUsernameAllowed?: boolean;
  readonly bruteForceProtected?: boolean;
  readonly accessTokenLifespan?: number;
  readonly ssoSessionIdleTimeout?: number;
  readonly ssoSessionMaxLifespan?: number;
  readonly offlineSessionIdleTimeout?: number;
  readonly notBefore?: number;
  readonly defaultSignatureAlgorithm?: string;
  readonly passwordPolicy?: string;
  readonly loginTheme?: string;
  readonly accountTheme?: string;
  readonly adminTheme?: string;
  readonly emailTheme?: string;
  readonly internationalizationEnabled?: boolean;
  readonly supportedLocales?: readonly string[];
  readonly defaultLocale?: string;
  readonly attributes?: Readonly<Record<string, string>>;
}

export interface CredentialRepresentation {
  readonly id?: string;
  readonly type?: string;
  readonly value?: string;
  readonly temporary?: boolean;
  readonly userLabel?: string;
  readonly createdDate?: number;
  readonly secretData?: string;
  readonly credentialData?: string;
  readonly priority?: number;
}

export interface FederatedIdentityRepresentation {
  readonly identityProvider?: string;
  readonly userId?: string;
  readonly userName?: string;
}

export interface UserRepresentation {
  readonly id?: string;
  readonly createdTimestamp?: number;
  readonly username?: string;
  readonly enabled?: boolean;
  readonly totp?: boolean;
  readonly emailVerified?: boolean;
  readonly firstName?: string;
  readonly lastName?: string;
  readonly email?: string;
  readonly federationLink?: string;
  readonly attributes?: Attributes;
  readonly disableableCredentialTypes?: readonly string[];
  readonly requiredActions?: readonly string[];
  readonly access?: Readonly<Record<string, boolean>>;
  readonly clientRoles?: Readonly<Record<string, readonly string[]>>;
  readonly realmRoles?: readonly string[];
  readonly groups?: readonly string[];
  readonly serviceAccountClientId?: string;
  readonly credentials?: readonly CredentialRepresentation[];
  readonly federatedIdentities?: readonly FederatedIdentityRepresentation[];
}

export interface RoleRepresentation {
  readonly id?: string;
  readonly name?: string;
  readonly description?: string;
  readonly scopeParamRequired?: boolean;
  readonly composite?: boolean;
  readonly composites?: {
    readonly realm?: readonly string[];
    readonly client?: Readonly<Record<string, readonly string[]>>;
  };
  readonly clientRole?: boolean;
  /** Realm id for realm roles, client id (uuid) for client roles */
  readonly containerId?: string;
  readonly attributes?: Attributes;
}

export interface GroupRepresentation {
  readonly id?: string;
  readonly name?: string;
  readonly path?: string;
  readonly parentId?: string;
  readonly subGroupCount?: number;
  readonly subGroups?: readonly GroupRepresentation[];
  readonly attributes?: Attributes;
  readonly access?: Readonly<Record<string, boolean>>;
  readonly clientRoles?: Readonly<Record<string, readonly string[]>>;
  readonly realmRoles?: readonly string[];
}

export interface ClientRepresentation {
  /** Internal id (uuid) */
  readonly id?: string;
  /** Public client identifier used in OAuth requests */
  readonly clientId?: string;
  readonly name?: string;
  readonly description?: string;
  readonly rootUrl?: string;
  readonly adminUrl?: string;
  readonly baseUrl?: string;
  readonly enabled?: boolean;
  readonly clientAuthenticatorType?: string;
  readonly secret?: string;
  readonly redirectUris?: readonly string[];
  readonly webOrigins?: readonly string[];
  readonly bearerOnly?: boolean;
  readonly consentRequired?: boolean;
  readonly standardFlowEnabled?: boolean;
  readonly implicitFlowEnabled?: boolean;
  readonly directAccessGrantsEnabled?: boolean;
  readonly serviceAccountsEnabled?: boolean;
  readonly authorizationServicesEnabled?: boolean;
  readonly publicClient?: boolean;
  readonly frontchannelLogout?: boolean;
  readonly protocol?: string;
  readonly attributes?: Readonly<Record<string, string>>;
  readonly fullScopeAllowed?: boolean;
  readonly defaultClientScopes?: readonly string[];
  readonly optionalClientScopes?: readonly string[];
}

export interface UserSessionRepresentation {
  readonly id?: string;
  readonly username?: string;
  readonly userId?: string;
  readonly ipAddress?: string;
  readonly start?: number;
  readonly lastAccess?: number;
  readonly rememberMe?: boolean;
  /** Client uuid → clientId */
  readonly clients?: Readonly<Record<string, string>>;
}

/**
 * Subset of `GET admin/serverinfo` the client reads; the rest passes through.
 */
export interface ServerInfoRepresentation {
  readonly systemInfo?: {
    readonly version?: string;
    readonly serverTime?: string;
    readonly uptime?: string;
    readonly javaVersion?: string;
    readonly osName?: string;
  };
  readonly memoryInfo?: {
    readonly total?: number;
    readonly used?: number;
    readonly free?: number;
  };
  readonly themes?: Readonly<Record<string, readonly { readonly name: string }[]>>;
  readonly [key: string]: unknown;
}

// ============================================================================
// Query parameters
// ============================================================================
// Type aliases rather than interfaces: they must be assignable to Params.

/**
 * `GET users` and `GET users/count` filters.
 */
export type GetUsersParams = {
  readonly briefRepresentation?: boolean;
  readonly email?: string;
  readonly emailVerified?: boolean;
  readonly enabled?: boolean;
  readonly exact?: boolean;
  readonly first?: number;
  readonly firstName?: string;
  readonly idpAlias?: string;
  readonly idpUserId?: string;
  readonly lastName?: string;
  readonly max?: number;
  /** Custom attribute query, `key1:value1 key2:value2` */
  readonly q?: string;
  readonly search?: string;
  readonly username?: string;
};

/** Paging for `GET roles/{role}/users` */
export type GetUsersByRoleParams = {
  readonly first?: number;
  readonly max?: number;
};

export type GetRoleParams = {
  readonly first?: number;
  readonly max?: number;
  readonly search?: string;
  readonly briefRepresentation?: boolean;
};

export type GetGroupsParams = {
  readonly first?: number;
  readonly max?: number;
  readonly search?: string;
  readonly q?: string;
  readonly exact?: boolean;
  readonly briefRepresentation?: boolean;
  readonly populateHierarchy?: boolean;
};

export type GetGroupsCountParams = {
  readonly search?: string;
  readonly top?: boolean;
};

export type GetMembersParams = {
  readonly first?: number;
  readonly max?: number;
  readonly briefRepresentation?: boolean;
};

export type GetClientsParams = {
  /** Public client identifier */
  readonly clientId?: string;
  readonly first?: number;
  readonly max?: number;
  /** Match `clientId` as a substring */
  readonly search?: boolean;
  readonly viewableOnly?: boolean;
};

/**
 * `PUT users/{id}/execute-actions-email` parameters.
 */
export interface ExecuteActionsEmailParams {
  readonly userId: string;
  /** Required actions, e.g. ["UPDATE_PASSWORD", "VERIFY_EMAIL"] */
  readonly actions: readonly string[];
  readonly clientId?: string;
  readonly lifespan?: number;
  readonly redirectUri?: string;
}
