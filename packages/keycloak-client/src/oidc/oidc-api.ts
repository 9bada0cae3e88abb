/**
 * OpenID Connect endpoint operations: token issuance, userinfo,
 * introspection, logout, revocation and realm key discovery.
 *
 * @packageDocumentation
 */

import { ok, err } from 'neverthrow';
import { SignJWT, createLocalJWKSet, jwtVerify, type KeyLike } from 'jose';
import type { ApiResult, ApiStatusResult } from '../types.js';
import { invalidArgument, invalidToken } from '../rest/errors.js';
import { joinSpaced, type Params } from '../rest/params.js';
import { basic, bearer, type RestTransport } from '../rest/transport.js';
import type {
  AccessTokenClaims,
  CertResponse,
  IntrospectTokenResult,
  IssuerResponse,
  JWT,
  TokenOptions,
  UserInfo,
  WellKnownConfiguration,
} from './types.js';

/** Client used by the admin console for password logins */
const ADMIN_CLI_CLIENT_ID = 'admin-cli';

const GRANT_PASSWORD = 'password';
const GRANT_CLIENT_CREDENTIALS = 'client_credentials';
const GRANT_REFRESH_TOKEN = 'refresh_token';
const GRANT_TOKEN_EXCHANGE = 'urn:ietf:params:oauth:grant-type:token-exchange';
const TOKEN_TYPE_REFRESH = 'urn:ietf:params:oauth:token-type:refresh_token';
const CLIENT_ASSERTION_JWT_BEARER = 'urn:ietf:params:oauth:client-assertion-type:jwt-bearer';

/**
 * Options for verifying an access token locally.
 */
export interface DecodeAccessTokenOptions {
  /** Expected `aud` value(s) */
  readonly audience?: string | readonly string[];
  /** Expected `iss` value (default: the realm URL) */
  readonly issuer?: string;
}

const toAudience = (audience: string | readonly string[]): string | string[] =>
  typeof audience === 'string' ? audience : [...audience];

/**
 * OpenID Connect operations.
 */
export interface OidcApi {
  /**
   * Requests a token from the realm's token endpoint.
   *
   * @param realm - Realm name
   * @param options - Token request options
   */
  readonly getToken: (realm: string, options: TokenOptions) => Promise<ApiResult<JWT>>;

  /** Resource owner password login for a confidential client */
  readonly login: (
    clientId: string,
    clientSecret: string,
    realm: string,
    username: string,
    password: string
  ) => Promise<ApiResult<JWT>>;

  /** Password login with a one-time password */
  readonly loginOtp: (
    clientId: string,
    clientSecret: string,
    realm: string,
    username: string,
    password: string,
    totp: string
  ) => Promise<ApiResult<JWT>>;

  /** Client credentials login */
  readonly loginClient: (
    clientId: string,
    clientSecret: string,
    realm: string,
    scopes?: readonly string[]
  ) => Promise<ApiResult<JWT>>;

  /** Password login through the `admin-cli` client */
  readonly loginAdmin: (username: string, password: string, realm: string) => Promise<ApiResult<JWT>>;

  /**
   * Exchanges a token for a refresh token issued to another client,
   * optionally impersonating a user.
   */
  readonly loginClientTokenExchange: (
    clientId: string,
    token: string,
    clientSecret: string,
    realm: string,
    targetClient: string,
    userId?: string
  ) => Promise<ApiResult<JWT>>;

  /**
   * Client credentials login authenticated by a locally signed JWT
   * (`private_key_jwt` / `client_secret_jwt`).
   *
   * @param key - Signing key matching `algorithm`
   * @param algorithm - JWS algorithm, e.g. "RS256" or "HS256"
   * @param expiresInSeconds - Lifetime of the client assertion
   */
  readonly loginClientSignedJwt: (
    clientId: string,
    realm: string,
    key: KeyLike | Uint8Array,
    algorithm: string,
    expiresInSeconds: number
  ) => Promise<ApiResult<JWT>>;

  readonly refreshToken: (
    refreshToken: string,
    clientId: string,
    clientSecret: string,
    realm: string
  ) => Promise<ApiResult<JWT>>;

  /** Ends the session bound to a refresh token */
  readonly logout: (
    clientId: string,
    clientSecret: string,
    realm: string,
    refreshToken: string
  ) => Promise<ApiStatusResult>;

  /** Ends the session of a public client, authenticated by its access token */
  readonly logoutPublicClient: (
    clientId: string,
    realm: string,
    accessToken: string,
    refreshToken: string
  ) => Promise<ApiStatusResult>;

  readonly revokeToken: (
    realm: string,
    clientId: string,
    clientSecret: string,
    refreshToken: string
  ) => Promise<ApiStatusResult>;

  readonly getUserInfo: (accessToken: string, realm: string) => Promise<ApiResult<UserInfo>>;

  /** Userinfo including custom claims, undecoded */
  readonly getRawUserInfo: (
    accessToken: string,
    realm: string
  ) => Promise<ApiResult<Record<string, unknown>>>;

  readonly introspectToken: (
    accessToken: string,
    clientId: string,
    clientSecret: string,
    realm: string
  ) => Promise<ApiResult<IntrospectTokenResult>>;

  readonly getIssuer: (realm: string) => Promise<ApiResult<IssuerResponse>>;

  readonly getCerts: (realm: string) => Promise<ApiResult<CertResponse>>;

  readonly getWellKnownOpenidConfiguration: (
    realm: string
  ) => Promise<ApiResult<WellKnownConfiguration>>;

  /**
   * Verifies an access token against the realm's current signing keys and
   * returns its claims. Signature, issuer and expiry are checked; keys are
   * fetched on every call.
   */
  readonly decodeAccessToken: (
    accessToken: string,
    realm: string,
    options?: DecodeAccessTokenOptions
  ) => Promise<ApiResult<AccessTokenClaims>>;
}

/**
 * Converts token options to the token endpoint's form fields.
 *
 * @param options - Token request options
 * @returns Form fields
 */
export const toTokenForm = (options: TokenOptions): Params => ({
  grant_type: options.grantType,
  client_id: options.clientId,
  client_secret: options.clientSecret,
  refresh_token: options.refreshToken,
  scope: joinSpaced(options.scopes),
  response_type: joinSpaced(options.responseTypes) ?? 'token',
  permission: options.permissions,
  username: options.username,
  password: options.password,
  totp: options.totp,
  code: options.code,
  code_verifier: options.codeVerifier,
  redirect_uri: options.redirectUri,
  client_assertion_type: options.clientAssertionType,
  client_assertion: options.clientAssertion,
  subject_token: options.subjectToken,
  subject_issuer: options.subjectIssuer,
  requested_subject: options.requestedSubject,
  audience: options.audience,
  requested_token_type: options.requestedTokenType,
});

/**
 * Creates the OpenID Connect operations.
 *
 * @param rest - REST transport
 * @returns OidcApi instance
 *
 * @example
 * ```typescript
 * const result = await oidc.login('my-app', 'my-secret', 'demo', 'alice', 'password');
 *
 * if (result.isOk()) {
 *   console.log('Access token:', result.value.data.access_token);
 * } else if (isInvalidGrant(result.error)) {
 *   console.error('Wrong username or password');
 * }
 * ```
 */
export const createOidcApi = (rest: RestTransport): OidcApi => {
  const { urls } = rest;

  const getToken = (realm: string, options: TokenOptions): Promise<ApiResult<JWT>> =>
    rest.json<JWT>('could not get token', {
      method: 'POST',
      url: urls.openIdConnect(realm, 'token'),
      form: toTokenForm(options),
    });

  const login = (
    clientId: string,
    clientSecret: string,
    realm: string,
    username: string,
    password: string
  ): Promise<ApiResult<JWT>> =>
    getToken(realm, { grantType: GRANT_PASSWORD, clientId, clientSecret, username, password });

  const loginOtp = (
    clientId: string,
    clientSecret: string,
    realm: string,
    username: string,
    password: string,
    totp: string
  ): Promise<ApiResult<JWT>> =>
    getToken(realm, {
      grantType: GRANT_PASSWORD,
      clientId,
      clientSecret,
      username,
      password,
      totp,
    });

  const loginClient = (
    clientId: string,
    clientSecret: string,
    realm: string,
    scopes?: readonly string[]
  ): Promise<ApiResult<JWT>> =>
    getToken(realm, {
      grantType: GRANT_CLIENT_CREDENTIALS,
      clientId,
      clientSecret,
      ...(scopes !== undefined ? { scopes } : {}),
    });

  const loginAdmin = (username: string, password: string, realm: string): Promise<ApiResult<JWT>> =>
    getToken(realm, { grantType: GRANT_PASSWORD, clientId: ADMIN_CLI_CLIENT_ID, username, password });

  const loginClientTokenExchange = (
    clientId: string,
    token: string,
    clientSecret: string,
    realm: string,
    targetClient: string,
    userId?: string
  ): Promise<ApiResult<JWT>> =>
    getToken(realm, {
      grantType: GRANT_TOKEN_EXCHANGE,
      clientId,
      clientSecret,
      subjectToken: token,
      requestedTokenType: TOKEN_TYPE_REFRESH,
      audience: targetClient,
      ...(userId !== undefined && userId.length > 0 ? { requestedSubject: userId } : {}),
    });

  const loginClientSignedJwt = async (
    clientId: string,
    realm: string,
    key: KeyLike | Uint8Array,
    algorithm: string,
    expiresInSeconds: number
  ): Promise<ApiResult<JWT>> => {
    const description = 'could not sign client assertion';
    const now = Math.floor(Date.now() / 1000);

    let assertion: string;
    try {
      assertion = await new SignJWT({})
        .setProtectedHeader({ alg: algorithm })
        .setIssuer(clientId)
        .setSubject(clientId)
        .setAudience(urls.realm(realm))
        .setJti(crypto.randomUUID())
        .setIssuedAt(now)
        .setExpirationTime(now + expiresInSeconds)
        .sign(key);
    } catch (error) {
      return err({
        ...invalidArgument(
          description,
          error instanceof Error ? error.message : 'unsupported key or algorithm'
        ),
        cause: error,
      });
    }

    return getToken(realm, {
      grantType: GRANT_CLIENT_CREDENTIALS,
      clientId,
      clientAssertionType: CLIENT_ASSERTION_JWT_BEARER,
      clientAssertion: assertion,
    });
  };

  const refreshToken = (
    refreshToken: string,
    clientId: string,
    clientSecret: string,
    realm: string
  ): Promise<ApiResult<JWT>> =>
    getToken(realm, { grantType: GRANT_REFRESH_TOKEN, clientId, clientSecret, refreshToken });

  const logout = (
    clientId: string,
    clientSecret: string,
    realm: string,
    refreshToken: string
  ): Promise<ApiStatusResult> =>
    rest.empty('could not logout', {
      method: 'POST',
      url: urls.openIdConnect(realm, 'logout'),
      form: { client_id: clientId, client_secret: clientSecret, refresh_token: refreshToken },
    });

  const logoutPublicClient = (
    clientId: string,
    realm: string,
    accessToken: string,
    refreshToken: string
  ): Promise<ApiStatusResult> =>
    rest.empty('could not logout public client', {
      method: 'POST',
      url: urls.openIdConnect(realm, 'logout'),
      auth: bearer(accessToken),
      form: { client_id: clientId, refresh_token: refreshToken },
    });

  const revokeToken = (
    realm: string,
    clientId: string,
    clientSecret: string,
    refreshToken: string
  ): Promise<ApiStatusResult> =>
    rest.empty('could not revoke token', {
      method: 'POST',
      url: urls.openIdConnect(realm, 'revoke'),
      form: { client_id: clientId, client_secret: clientSecret, token: refreshToken },
    });

  const getUserInfo = (accessToken: string, realm: string): Promise<ApiResult<UserInfo>> =>
    rest.json<UserInfo>('could not get user info', {
      method: 'GET',
      url: urls.openIdConnect(realm, 'userinfo'),
      auth: bearer(accessToken),
    });

  const getRawUserInfo = (
    accessToken: string,
    realm: string
  ): Promise<ApiResult<Record<string, unknown>>> =>
    rest.json<Record<string, unknown>>('could not get user info', {
      method: 'GET',
      url: urls.openIdConnect(realm, 'userinfo'),
      auth: bearer(accessToken),
    });

  const introspectToken = (
    accessToken: string,
    clientId: string,
    clientSecret: string,
    realm: string
  ): Promise<ApiResult<IntrospectTokenResult>> =>
    rest.json<IntrospectTokenResult>('could not introspect requesting party token', {
      method: 'POST',
      url: urls.openIdConnect(realm, 'token', 'introspect'),
      auth: basic(clientId, clientSecret),
      form: { token_type_hint: 'requesting_party_token', token: accessToken },
    });

  const getIssuer = (realm: string): Promise<ApiResult<IssuerResponse>> =>
    rest.json<IssuerResponse>('could not get issuer', {
      method: 'GET',
      url: urls.realm(realm),
    });

  const getCerts = (realm: string): Promise<ApiResult<CertResponse>> =>
    rest.json<CertResponse>('could not get certs', {
      method: 'GET',
      url: urls.openIdConnect(realm, 'certs'),
    });

  const getWellKnownOpenidConfiguration = (
    realm: string
  ): Promise<ApiResult<WellKnownConfiguration>> =>
    rest.json<WellKnownConfiguration>('could not get well-known configuration', {
      method: 'GET',
      url: urls.realm(realm, '.well-known', 'openid-configuration'),
    });

  const decodeAccessToken = async (
    accessToken: string,
    realm: string,
    options: DecodeAccessTokenOptions = {}
  ): Promise<ApiResult<AccessTokenClaims>> => {
    const description = 'could not decode access token';

    const certs = await rest.json<CertResponse>(description, {
      method: 'GET',
      url: urls.openIdConnect(realm, 'certs'),
    });

    if (certs.isErr()) {
      return err(certs.error);
    }

    try {
      const { payload } = await jwtVerify<AccessTokenClaims>(
        accessToken,
        createLocalJWKSet(certs.value.data),
        {
          issuer: options.issuer ?? urls.realm(realm),
          ...(options.audience !== undefined ? { audience: toAudience(options.audience) } : {}),
        }
      );
      return ok({ status: certs.value.status, data: payload });
    } catch (error) {
      return err(invalidToken(description, error));
    }
  };

  return {
    getToken,
    login,
    loginOtp,
    loginClient,
    loginAdmin,
    loginClientTokenExchange,
    loginClientSignedJwt,
    refreshToken,
    logout,
    logoutPublicClient,
    revokeToken,
    getUserInfo,
    getRawUserInfo,
    introspectToken,
    getIssuer,
    getCerts,
    getWellKnownOpenidConfiguration,
    decodeAccessToken,
  };
};
