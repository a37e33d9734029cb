import type { Request } from 'express';
import { ACCESS_TOKEN_COOKIE } from '../auth.constants';
import {
  extractCandidateToken,
  fromAccessTokenCookie,
  readAccessTokenCookie,
  TOKEN_SOURCES,
} from './token-sources';

function requestWith(
  authorization: string | undefined,
  cookies: Record<string, string> | undefined,
): Request {
  const headers = authorization === undefined ? {} : { authorization };
  return { headers, cookies } as unknown as Request;
}

describe('token sources', () => {
  it('consults the header before the cookie', () => {
    expect(TOKEN_SOURCES).toHaveLength(2);
    expect(TOKEN_SOURCES[0](requestWith('Bearer header-token', undefined))).toBe(
      'header-token',
    );
    expect(TOKEN_SOURCES[1]).toBe(fromAccessTokenCookie);
  });

  describe('fromAccessTokenCookie', () => {
    it('reads the session cookie', () => {
      const request = requestWith(undefined, { [ACCESS_TOKEN_COOKIE]: 'cookie-token' });

      expect(fromAccessTokenCookie(request)).toBe('cookie-token');
    });

    it('returns null without parsed cookies or with an empty value', () => {
      expect(fromAccessTokenCookie(requestWith(undefined, undefined))).toBeNull();
      expect(
        fromAccessTokenCookie(requestWith(undefined, { [ACCESS_TOKEN_COOKIE]: '' })),
      ).toBeNull();
      expect(fromAccessTokenCookie(requestWith(undefined, { other: 'x' }))).toBeNull();
    });
  });

  describe('readAccessTokenCookie', () => {
    it('keeps an empty cookie distinct from a missing one', () => {
      expect(
        readAccessTokenCookie(requestWith(undefined, { [ACCESS_TOKEN_COOKIE]: '' })),
      ).toBe('');
      expect(readAccessTokenCookie(requestWith(undefined, { other: 'x' }))).toBeUndefined();
      expect(readAccessTokenCookie(requestWith(undefined, undefined))).toBeUndefined();
    });
  });

  describe('extractCandidateToken', () => {
    const cookies = { [ACCESS_TOKEN_COOKIE]: 'cookie-token' };

    it('prefers the bearer header when both are present', () => {
      expect(extractCandidateToken(requestWith('Bearer header-token', cookies))).toBe(
        'header-token',
      );
    });

    it('keeps the header token even if it is garbage', () => {
      expect(extractCandidateToken(requestWith('Bearer garbage', cookies))).toBe(
        'garbage',
      );
    });

    it('falls back to the cookie when no bearer header is sent', () => {
      expect(extractCandidateToken(requestWith(undefined, cookies))).toBe(
        'cookie-token',
      );
    });

    it('treats a non-bearer scheme as no header', () => {
      expect(extractCandidateToken(requestWith('Basic dXNlcjpwYXNz', cookies))).toBe(
        'cookie-token',
      );
    });

    it('returns null when neither transport carries a token', () => {
      expect(extractCandidateToken(requestWith(undefined, {}))).toBeNull();
    });
  });
});
