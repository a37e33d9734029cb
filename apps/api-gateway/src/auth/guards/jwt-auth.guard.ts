import { Injectable, Logger } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { UnauthenticatedException } from '../exceptions';

/**
 * Protects routes that need a resolved user.
 *
 * Usage:
 * ```ts
 * @UseGuards(JwtAuthGuard)
 * @Get('users/me')
 * readMe(@CurrentUser() user: RequestUser): UserProfileDto { ... }
 * ```
 *
 * Every failure (no token, malformed or foreign token, bad signature,
 * unknown subject) becomes the same UnauthenticatedException. The reason is
 * logged, never returned.
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(JwtAuthGuard.name);

  handleRequest<TUser>(
    err: Error | null,
    user: TUser | false,
    info: Error | undefined,
  ): TUser {
    if (err || !user) {
      this.logger.debug(
        `Authentication rejected: ${this.getFailureReason(err, info)}`,
      );
      throw new UnauthenticatedException();
    }

    return user;
  }

  private getFailureReason(err: Error | null, info: Error | undefined): string {
    if (err) {
      return err.message;
    }

    if (!info) {
      return 'no credentials';
    }

    return `${info.name}: ${info.message}`;
  }
}
