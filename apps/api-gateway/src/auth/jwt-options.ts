import type { JwtModuleOptions } from '@nestjs/jwt';
import type { EnvironmentVariables } from '../config/env.validation';
import { JWT_ALGORITHM } from './auth.constants';

export type JwtEnvironment = Pick<
  EnvironmentVariables,
  'JWT_SECRET' | 'JWT_EMBED_EXPIRY' | 'ACCESS_TOKEN_EXPIRE_MINUTES'
>;

/**
 * JwtModule options: HS256 both ways, secret from configuration.
 *
 * Without JWT_EMBED_EXPIRY tokens carry no time claims at all (not even
 * `iat`) and stay valid until the secret changes. With it, `exp` is set to
 * ACCESS_TOKEN_EXPIRE_MINUTES after issuance and enforced on verify.
 */
export function jwtModuleOptions(env: JwtEnvironment): JwtModuleOptions {
  return {
    secret: env.JWT_SECRET,
    signOptions: env.JWT_EMBED_EXPIRY
      ? {
          algorithm: JWT_ALGORITHM,
          expiresIn: env.ACCESS_TOKEN_EXPIRE_MINUTES * 60,
        }
      : { algorithm: JWT_ALGORITHM, noTimestamp: true },
    verifyOptions: {
      algorithms: [JWT_ALGORITHM],
    },
  };
}
