import { ConflictException } from '@nestjs/common';

/**
 * Thrown by a UsersRepository when the username is already taken.
 *
 * HTTP 409 Conflict: the request conflicts with an existing user row.
 */
export class UsernameAlreadyExistsException extends ConflictException {
  constructor(username: string, cause?: Error) {
    super(
      {
        statusCode: 409,
        error: 'Conflict',
        message: `User "${username}" already exists`,
      },
      { cause },
    );
  }
}
