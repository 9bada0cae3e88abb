export { createOidcApi, toTokenForm } from './oidc-api.js';
export type { OidcApi, DecodeAccessTokenOptions } from './oidc-api.js';
export type {
  AccessTokenClaims,
  CertResponse,
  IntrospectTokenResult,
  IssuerResponse,
  JWT,
  ResourcePermission,
  TokenOptions,
  UserInfo,
  UserInfoAddress,
  WellKnownConfiguration,
} from './types.js';
