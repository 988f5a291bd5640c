import { createHmac } from 'crypto';
import {
  createIssuerToken,
  encodeIssuerKey,
  generateIssuerSecret,
  ISSUER_SECRET_BYTES
} from '../../src/auth/trusted_issuer';

function decodeSegment(segment: string): unknown {
  return JSON.parse(Buffer.from(segment, 'base64url').toString('utf-8'));
}

describe('Trusted issuer helpers', () => {
  const secret = new Uint8Array(ISSUER_SECRET_BYTES).fill(7);

  describe('generateIssuerSecret', () => {
    it('should generate 32 random bytes', () => {
      const first = generateIssuerSecret();
      const second = generateIssuerSecret();

      expect(first).toHaveLength(32);
      expect(Buffer.from(first).equals(Buffer.from(second))).toBe(false);
    });
  });

  describe('encodeIssuerKey', () => {
    it('should wrap the secret in an oct JWK using URL-safe base64', () => {
      const key = encodeIssuerKey(new Uint8Array([0xfb, 0xff]));

      expect(key).toEqual({ kty: 'oct', k: '-_8=' });
    });

    it('should keep the padding of a 32-byte secret', () => {
      const { k } = encodeIssuerKey(secret);

      expect(k).toBe(`${'BwcH'.repeat(10)}Bwc=`);
    });
  });

  describe('createIssuerToken', () => {
    it('should sign an HS256 JWT with the secret', () => {
      const token = createIssuerToken(secret);
      const [header, payload, signature] = token.split('.');

      expect(decodeSegment(header)).toEqual({ alg: 'HS256', typ: 'JWT' });
      expect(signature).toBe(
        createHmac('sha256', secret).update(`${header}.${payload}`).digest('base64url')
      );
    });

    it('should expire five minutes after issue by default', () => {
      const token = createIssuerToken(secret, { now: 1_700_000_000_500 });

      expect(decodeSegment(token.split('.')[1])).toEqual({ iat: 1_700_000_000, exp: 1_700_000_300 });
    });

    it('should honour a custom lifetime', () => {
      const token = createIssuerToken(secret, { now: 1_700_000_000_000, ttlSeconds: 60 });

      expect(decodeSegment(token.split('.')[1])).toEqual({ iat: 1_700_000_000, exp: 1_700_000_060 });
    });

    it('should produce different signatures for different secrets', () => {
      const options = { now: 1_700_000_000_000 };
      const otherSecret = new Uint8Array(ISSUER_SECRET_BYTES).fill(8);

      expect(createIssuerToken(secret, options)).not.toBe(createIssuerToken(otherSecret, options));
    });
  });
});
