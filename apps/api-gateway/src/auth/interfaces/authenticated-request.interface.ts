import type { Request } from 'express';
import type { User } from '@tokengate/database';

/**
 * Shape of request.user after token resolution.
 * Populated by JwtStrategy.validate() and attached by Passport.
 */
export type RequestUser = User;

/**
 * Express Request extended with the resolved user.
 * Use this type in handlers behind JwtAuthGuard.
 */
export interface AuthenticatedRequest extends Request {
  user: RequestUser;
}
