import type { Request } from 'express';
import { ExtractJwt, JwtFromRequestFunction } from 'passport-jwt';
import { ACCESS_TOKEN_COOKIE } from '../auth.constants';

/**
 * Raw value of the session cookie, empty string included, or undefined when
 * the request does not carry it. Requires cookie-parser.
 */
export function readAccessTokenCookie(
  request: Pick<Request, 'cookies'>,
): string | undefined {
  const cookies: unknown = request.cookies;
  if (typeof cookies !== 'object' || cookies === null) {
    return undefined;
  }
  const token: unknown = Reflect.get(cookies, ACCESS_TOKEN_COOKIE);
  return typeof token === 'string' ? token : undefined;
}

/** Token source for the session cookie; an empty cookie counts as absent. */
export const fromAccessTokenCookie: JwtFromRequestFunction = (
  request: Request,
) => {
  const token = readAccessTokenCookie(request);
  return token ? token : null;
};

/**
 * Where an access token may come from, highest priority first.
 *
 * The first source that yields a token wins and the rest are not consulted:
 * a present Authorization header is never overridden by the cookie, even if
 * the header token turns out to be invalid.
 */
export const TOKEN_SOURCES: ReadonlyArray<JwtFromRequestFunction> = [
  ExtractJwt.fromAuthHeaderAsBearerToken(),
  fromAccessTokenCookie,
];

/** Resolves the candidate token for a request from TOKEN_SOURCES. */
export const extractCandidateToken: JwtFromRequestFunction =
  ExtractJwt.fromExtractors([...TOKEN_SOURCES]);
