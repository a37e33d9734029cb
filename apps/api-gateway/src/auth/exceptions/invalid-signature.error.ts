/**
 * Raised by TokenService when a token cannot be verified.
 *
 * Covers malformed input, a foreign algorithm, a bad signature and an
 * elapsed `exp` alike. Not an HttpException: callers decide how it surfaces.
 */
export class InvalidSignatureError extends Error {
  constructor(cause?: unknown) {
    super('Token signature could not be verified', { cause });
    this.name = 'InvalidSignatureError';
  }
}
