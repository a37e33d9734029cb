import { JwtService } from '@nestjs/jwt';
import { InvalidSignatureError } from '../exceptions';
import { jwtModuleOptions } from '../jwt-options';
import { TokenService } from './token.service';

const SECRET = 'test-secret';

function base64url(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

function decodeSegment(segment: string): unknown {
  return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
}

function createTokenService(embedExpiry = false): TokenService {
  return new TokenService(
    new JwtService(
      jwtModuleOptions({
        JWT_SECRET: SECRET,
        JWT_EMBED_EXPIRY: embedExpiry,
        ACCESS_TOKEN_EXPIRE_MINUTES: 30,
      }),
    ),
  );
}

describe('TokenService', () => {
  const tokens = createTokenService();
  const rawSigner = new JwtService({ secret: SECRET });

  describe('issue', () => {
    it('produces a compact HS256 JWS carrying only the given claims', () => {
      const token = tokens.issue({ sub: 'alice' });
      const [header, payload, signature] = token.split('.');

      expect(decodeSegment(header)).toEqual({ alg: 'HS256', typ: 'JWT' });
      expect(decodeSegment(payload)).toEqual({ sub: 'alice' });
      expect(signature).toMatch(/^[A-Za-z0-9_-]{43}$/);
    });
  });

  describe('verify', () => {
    it('returns the claims a token was issued with', () => {
      expect(tokens.verify(tokens.issue({ sub: 'alice' }))).toEqual({
        sub: 'alice',
      });
    });

    it('rejects a token whose signature was altered', () => {
      const token = tokens.issue({ sub: 'alice' });
      const [header, payload, signature] = token.split('.');
      const flipped = signature[10] === 'A' ? 'B' : 'A';
      const tampered = `${header}.${payload}.${signature.slice(0, 10)}${flipped}${signature.slice(11)}`;

      expect(() => tokens.verify(tampered)).toThrow(InvalidSignatureError);
    });

    it('rejects a token whose payload was swapped', () => {
      const [header, , signature] = tokens.issue({ sub: 'alice' }).split('.');
      const forged = `${header}.${base64url({ sub: 'mallory' })}.${signature}`;

      expect(() => tokens.verify(forged)).toThrow(InvalidSignatureError);
    });

    it('rejects a token signed under a different secret', () => {
      const foreign = new JwtService({ secret: 'other-secret' }).sign({
        sub: 'alice',
      });

      expect(() => tokens.verify(foreign)).toThrow(InvalidSignatureError);
    });

    it('rejects an unsigned "none" token', () => {
      const unsigned = `${base64url({ alg: 'none', typ: 'JWT' })}.${base64url({ sub: 'alice' })}.`;

      expect(() => tokens.verify(unsigned)).toThrow(InvalidSignatureError);
    });

    it('rejects a token signed with another HMAC algorithm', () => {
      const hs512 = rawSigner.sign({ sub: 'alice' }, { algorithm: 'HS512' });

      expect(() => tokens.verify(hs512)).toThrow(InvalidSignatureError);
    });

    it('rejects structurally broken input', () => {
      expect(() => tokens.verify('not-a-token')).toThrow(InvalidSignatureError);
      expect(() => tokens.verify('')).toThrow(InvalidSignatureError);
    });

    it('rejects a validly signed token without a string subject', () => {
      const noSubject = rawSigner.sign({ role: 'admin' });
      const numericSubject = rawSigner.sign({ sub: 42 });

      expect(() => tokens.verify(noSubject)).toThrow(InvalidSignatureError);
      expect(() => tokens.verify(numericSubject)).toThrow(InvalidSignatureError);
    });

    it('rejects an elapsed exp claim', () => {
      const expired = rawSigner.sign({
        sub: 'alice',
        exp: Math.floor(Date.now() / 1000) - 60,
      });

      expect(() => tokens.verify(expired)).toThrow(InvalidSignatureError);
    });

    it('rejects a token that is not valid yet', () => {
      const early = rawSigner.sign(
        { sub: 'alice', nbf: Math.floor(Date.now() / 1000) + 3600 },
        { noTimestamp: true },
      );

      expect(() => tokens.verify(early)).toThrow(InvalidSignatureError);
    });

    it('rejects a validly signed payload that is not JSON', () => {
      expect(() => tokens.verify(rawSigner.sign('hello'))).toThrow(
        InvalidSignatureError,
      );
    });
  });

  describe('verifySignature', () => {
    it('returns the payload of any token signed with the secret', () => {
      const noSubject = rawSigner.sign({ role: 'admin' }, { noTimestamp: true });

      expect(tokens.verifySignature(noSubject)).toEqual({ role: 'admin' });
    });

    it('ignores exp', () => {
      const exp = Math.floor(Date.now() / 1000) - 60;
      const expired = rawSigner.sign({ sub: 'alice', exp }, { noTimestamp: true });

      expect(tokens.verifySignature(expired)).toEqual({ sub: 'alice', exp });
    });

    it('ignores nbf', () => {
      const nbf = Math.floor(Date.now() / 1000) + 3600;
      const early = rawSigner.sign({ sub: 'alice', nbf }, { noTimestamp: true });

      expect(tokens.verifySignature(early)).toEqual({ sub: 'alice', nbf });
    });

    it('returns a payload that is not JSON as the raw string', () => {
      expect(tokens.verifySignature(rawSigner.sign('hello'))).toBe('hello');
    });

    it('rejects a token signed under a different secret', () => {
      const foreign = new JwtService({ secret: 'other-secret' }).sign({
        sub: 'alice',
      });

      expect(() => tokens.verifySignature(foreign)).toThrow(
        InvalidSignatureError,
      );
    });
  });

  describe('with expiry embedding enabled', () => {
    const expiring = createTokenService(true);

    it('adds iat and an exp thirty minutes later', () => {
      const claims = expiring.verify(expiring.issue({ sub: 'alice' }));

      expect(claims.sub).toBe('alice');
      expect(typeof claims.iat).toBe('number');
      expect(claims.exp).toBe((claims.iat ?? 0) + 30 * 60);
    });
  });
});
