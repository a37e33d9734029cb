import { Injectable } from '@nestjs/common';
import { JwtService, JwtVerifyOptions } from '@nestjs/jwt';
import { InvalidSignatureError } from '../exceptions';
import type { AccessTokenClaims, SignedPayload } from '../interfaces';

/**
 * TokenService — issues and verifies HS256 access tokens.
 *
 * The secret, algorithm and optional lifetime come from JwtModule's
 * registration in AuthModule, so this class never touches configuration.
 * Every verification failure surfaces as InvalidSignatureError: callers
 * must not learn whether a token was malformed, foreign or tampered with.
 */
@Injectable()
export class TokenService {
  constructor(private readonly jwtService: JwtService) {}

  issue(claims: AccessTokenClaims): string {
    return this.jwtService.sign({ ...claims });
  }

  /**
   * Verify signature, algorithm and (when present) `exp` and `nbf`.
   *
   * @throws InvalidSignatureError also when `sub` is missing or not a string
   */
  verify(token: string): AccessTokenClaims {
    const payload = this.decode(token, {});
    if (!isPlainObject(payload)) {
      throw new InvalidSignatureError();
    }

    const { sub, iat, exp } = payload;
    if (typeof sub !== 'string') {
      throw new InvalidSignatureError();
    }

    const claims: AccessTokenClaims = { sub };
    if (typeof iat === 'number') {
      claims.iat = iat;
    }
    if (typeof exp === 'number') {
      claims.exp = exp;
    }
    return claims;
  }

  /**
   * Signature-only check. The payload is returned as signed, whatever its
   * claims; `exp` and `nbf` are not enforced. A payload that is not JSON
   * comes back as the raw string.
   *
   * @throws InvalidSignatureError
   */
  verifySignature(token: string): SignedPayload {
    const payload = this.decode(token, {
      ignoreExpiration: true,
      ignoreNotBefore: true,
    });
    if (typeof payload === 'string' || isObject(payload)) {
      return payload;
    }
    throw new InvalidSignatureError();
  }

  private decode(
    token: string,
    options: Pick<JwtVerifyOptions, 'ignoreExpiration' | 'ignoreNotBefore'>,
  ): unknown {
    try {
      return this.jwtService.verify(token, options);
    } catch (error) {
      throw new InvalidSignatureError(error);
    }
  }
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return isObject(value) && !Array.isArray(value);
}
