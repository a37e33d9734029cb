import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown by the standalone validate endpoint when a token fails
 * signature verification.
 *
 * HTTP 422 Unprocessable Entity with body `{ detail: "invalid token" }`.
 */
export class InvalidTokenException extends HttpException {
  constructor(cause?: Error) {
    super({ detail: 'invalid token' }, HttpStatus.UNPROCESSABLE_ENTITY, {
      cause,
    });
  }
}
