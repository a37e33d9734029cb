import { Injectable, Logger } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import type { Request } from 'express';
import { Strategy } from 'passport-custom';
import { UsersRepository } from '@tokengate/database';
import { InvalidSignatureError, UnauthenticatedException } from '../exceptions';
import type { AccessTokenClaims, RequestUser } from '../interfaces';
import { TokenService } from '../services/token.service';
import { extractCandidateToken } from './token-sources';

/**
 * JWT Strategy — resolves the caller from a bearer header or the session cookie.
 *
 * Flow:
 * 1. extractCandidateToken picks the header token, else the cookie token
 * 2. TokenService.verify checks the HS256 signature (and `exp`, if present)
 *    and requires a string `sub`
 * 3. We check that `sub` names an existing user
 * 4. The user row is attached to request.user
 *
 * The store is re-checked on every request because tokens are stateless:
 * a user deleted after issuance must stop resolving.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  private readonly logger = new Logger(JwtStrategy.name);

  constructor(
    private readonly tokenService: TokenService,
    private readonly usersRepository: UsersRepository,
  ) {
    super();
  }

  /**
   * Returns the user for request.user, or throws to reject the request.
   */
  async validate(request: Request): Promise<RequestUser> {
    const token = extractCandidateToken(request);

    if (!token) {
      this.logger.debug('Token rejected: no credentials');
      throw new UnauthenticatedException();
    }

    const claims = this.verify(token);
    const user = await this.usersRepository.getUser(claims.sub);

    if (!user) {
      this.logger.warn(`Token rejected: user "${claims.sub}" not found`);
      throw new UnauthenticatedException();
    }

    return user;
  }

  private verify(token: string): AccessTokenClaims {
    try {
      return this.tokenService.verify(token);
    } catch (error) {
      if (error instanceof InvalidSignatureError) {
        const reason = error.cause instanceof Error ? error.cause : error;
        this.logger.debug(`Token rejected: ${reason.message}`);
        throw new UnauthenticatedException();
      }
      throw error;
    }
  }
}
