import type { CookieOptions, Request } from 'express';

/**
 * Cookie attributes for the access-token cookie, chosen per request.
 *
 * A request whose Origin contains the development marker (e.g. a frontend on
 * http://localhost:3000) gets `SameSite=Lax` without `Secure`, so the cookie
 * survives plain-HTTP local setups. Every other origin gets
 * `SameSite=None; Secure`, the combination browsers require for a
 * cross-site cookie. Set and clear must use the same attributes or browsers
 * keep the old cookie.
 */
export function sessionCookieOptions(
  request: Pick<Request, 'headers'>,
  devOriginMarker: string,
): CookieOptions {
  const origin = request.headers.origin;
  const isDevOrigin =
    typeof origin === 'string' && origin.includes(devOriginMarker);

  return {
    httpOnly: true,
    sameSite: isDevOrigin ? 'lax' : 'none',
    secure: !isDevOrigin,
  };
}
