import { ArgumentsHost, Catch, ExceptionFilter } from '@nestjs/common';
import type { Response } from 'express';
import { AUTH_CHALLENGE_SCHEME } from '../auth.constants';
import { UnauthenticatedException } from '../exceptions';

/**
 * Renders UnauthenticatedException with a `WWW-Authenticate: Bearer`
 * challenge so clients know to re-authenticate.
 */
@Catch(UnauthenticatedException)
export class BearerChallengeFilter implements ExceptionFilter {
  catch(exception: UnauthenticatedException, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    response
      .status(exception.getStatus())
      .setHeader('WWW-Authenticate', AUTH_CHALLENGE_SCHEME)
      .json(exception.getResponse());
  }
}
