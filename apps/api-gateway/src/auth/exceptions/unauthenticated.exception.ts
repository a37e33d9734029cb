import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown for every authentication failure: unknown user, wrong password,
 * missing token, bad token, token for a deleted user.
 *
 * HTTP 401 Unauthorized, with one message for all causes so callers cannot
 * tell them apart. BearerChallengeFilter adds the WWW-Authenticate header.
 */
export class UnauthenticatedException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Invalid authentication credentials',
    });
  }
}
