/**
 * OpenID Connect payload and option types.
 * Field names follow Keycloak's JSON.
 *
 * @packageDocumentation
 */

import type { JSONWebKeySet, JWTPayload } from 'jose';

/**
 * Token endpoint response.
 */
export interface JWT {
  readonly access_token: string;
  readonly id_token?: string;
  readonly expires_in: number;
  readonly refresh_expires_in?: number;
  readonly refresh_token?: string;
  readonly token_type: string;
  readonly 'not-before-policy'?: number;
  readonly session_state?: string;
  readonly scope?: string;
}

/**
 * Options for the token endpoint.
 * Each field maps to the form field named in its comment.
 */
export interface TokenOptions {
  /** grant_type */
  readonly grantType: string;
  /** client_id */
  readonly clientId?: string;
  /** client_secret */
  readonly clientSecret?: string;
  /** refresh_token */
  readonly refreshToken?: string;
  /** scope, space-joined */
  readonly scopes?: readonly string[];
  /** response_type, space-joined (default: "token") */
  readonly responseTypes?: readonly string[];
  /** permission (repeated) */
  readonly permissions?: readonly string[];
  /** username */
  readonly username?: string;
  /** password */
  readonly password?: string;
  /** totp */
  readonly totp?: string;
  /** code */
  readonly code?: string;
  /** code_verifier */
  readonly codeVerifier?: string;
  /** redirect_uri */
  readonly redirectUri?: string;
  /** client_assertion_type */
  readonly clientAssertionType?: string;
  /** client_assertion */
  readonly clientAssertion?: string;
  /** subject_token */
  readonly subjectToken?: string;
  /** subject_issuer */
  readonly subjectIssuer?: string;
  /** requested_subject */
  readonly requestedSubject?: string;
  /** audience */
  readonly audience?: string;
  /** requested_token_type */
  readonly requestedTokenType?: string;
}

/**
 * Userinfo endpoint response (standard OIDC claims).
 */
export interface UserInfo {
  readonly sub: string;
  readonly name?: string;
  readonly given_name?: string;
  readonly family_name?: string;
  readonly middle_name?: string;
  readonly nickname?: string;
  readonly preferred_username?: string;
  readonly profile?: string;
  readonly picture?: string;
  readonly website?: string;
  readonly email?: string;
  readonly email_verified?: boolean;
  readonly gender?: string;
  readonly zoneinfo?: string;
  readonly locale?: string;
  readonly phone_number?: string;
  readonly phone_number_verified?: boolean;
  readonly address?: UserInfoAddress;
  readonly updated_at?: number;
}

export interface UserInfoAddress {
  readonly formatted?: string;
  readonly street_address?: string;
  readonly locality?: string;
  readonly region?: string;
  readonly postal_code?: string;
  readonly country?: string;
}

/**
 * A resource permission carried by a requesting party token.
 */
export interface ResourcePermission {
  readonly rsid?: string;
  readonly rsname?: string;
  readonly resource_id?: string;
  readonly scopes?: readonly string[];
  readonly resource_scopes?: readonly string[];
}

/**
 * Token introspection response.
 */
export interface IntrospectTokenResult {
  readonly active: boolean;
  readonly permissions?: readonly ResourcePermission[];
  readonly exp?: number;
  readonly nbf?: number;
  readonly iat?: number;
  readonly aud?: string | readonly string[];
  readonly auth_time?: number;
  readonly jti?: string;
  readonly typ?: string;
  readonly iss?: string;
  readonly sub?: string;
  readonly scope?: string;
  readonly client_id?: string;
  readonly username?: string;
  readonly token_type?: string;
}

/**
 * Public realm information (`GET /realms/{realm}`).
 */
export interface IssuerResponse {
  readonly realm?: string;
  readonly public_key?: string;
  readonly 'token-service'?: string;
  readonly 'account-service'?: string;
  readonly 'tokens-not-before'?: number;
}

/**
 * Realm signing keys (`GET .../certs`).
 */
export type CertResponse = JSONWebKeySet;

/**
 * OpenID Provider metadata.
 */
export interface WellKnownConfiguration {
  readonly issuer: string;
  readonly authorization_endpoint: string;
  readonly token_endpoint: string;
  readonly introspection_endpoint?: string;
  readonly userinfo_endpoint?: string;
  readonly end_session_endpoint?: string;
  readonly revocation_endpoint?: string;
  readonly jwks_uri: string;
  readonly registration_endpoint?: string;
  readonly grant_types_supported?: readonly string[];
  readonly response_types_supported: readonly string[];
  readonly response_modes_supported?: readonly string[];
  readonly subject_types_supported?: readonly string[];
  readonly id_token_signing_alg_values_supported?: readonly string[];
  readonly token_endpoint_auth_methods_supported?: readonly string[];
  readonly claims_supported?: readonly string[];
  readonly scopes_supported?: readonly string[];
  readonly code_challenge_methods_supported?: readonly string[];
}

/**
 * Verified access token claims, including Keycloak's role claims.
 */
export interface AccessTokenClaims extends JWTPayload {
  readonly typ?: string;
  readonly azp?: string;
  readonly sid?: string;
  readonly scope?: string;
  readonly preferred_username?: string;
  readonly email?: string;
  readonly realm_access?: { readonly roles: readonly string[] };
  readonly resource_access?: Readonly<Record<string, { readonly roles: readonly string[] }>>;
}
