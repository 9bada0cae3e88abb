/**
 * UMA / authorization services types.
 *
 * @packageDocumentation
 */

import type { JWT } from '../oidc/types.js';

/**
 * Options for the UMA ticket grant.
 * Each field maps to the form field named in its comment.
 */
export interface RequestingPartyTokenOptions {
  /** grant_type (default: "urn:ietf:params:oauth:grant-type:uma-ticket") */
  readonly grantType?: string;
  /** ticket */
  readonly ticket?: string;
  /** claim_token */
  readonly claimToken?: string;
  /** claim_token_format */
  readonly claimTokenFormat?: string;
  /** rpt, a previously issued token to upgrade */
  readonly rpt?: string;
  /** permission (repeated), `resource#scope` */
  readonly permissions?: readonly string[];
  /** audience, the resource server's client id */
  readonly audience?: string;
  /** response_include_resource_name */
  readonly responseIncludeResourceName?: boolean;
  /** response_permissions_limit */
  readonly responsePermissionsLimit?: number;
  /** submit_request */
  readonly submitRequest?: boolean;
  /** response_mode */
  readonly responseMode?: string;
}

/**
 * A permission granted in `response_mode=permissions`.
 */
export interface RequestingPartyPermission {
  readonly rsid?: string;
  readonly rsname?: string;
  readonly scopes?: readonly string[];
  readonly claims?: Readonly<Record<string, readonly string[]>>;
}

/**
 * Result of `response_mode=decision`.
 */
export interface RequestingPartyPermissionDecision {
  readonly result: boolean;
}

/**
 * Response body per response mode. `token` asks for a full RPT.
 */
export interface PermissionResponseByMode {
  readonly token: JWT;
  readonly decision: RequestingPartyPermissionDecision;
  readonly permissions: readonly RequestingPartyPermission[];
}

export type PermissionResponseMode = keyof PermissionResponseByMode;
