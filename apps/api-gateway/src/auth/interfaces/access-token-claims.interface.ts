/**
 * Claims signed into every access token.
 *
 * `sub` carries the username. `iat`/`exp` appear only when expiry
 * embedding is enabled.
 */
export interface AccessTokenClaims {
  sub: string;
  iat?: number;
  exp?: number;
}

/**
 * Whatever a correctly signed token carries: a JSON object or array, or the
 * raw string when the payload is not JSON.
 */
export type SignedPayload = object | string;
