import { describe, it, expect } from 'vitest';
import { SignJWT, decodeProtectedHeader } from 'jose';

import type { AuthConfig } from '../../config.ts';
import { signAccessToken, verifyAccessToken } from './jwt.ts';

const TEST_SECRET = 'primary-test-secret-0123456789abcdef';
const TEST_SECRET_PREVIOUS = 'previous-test-secret-0123456789abcdef';

const USER_ID = 42;

const auth: AuthConfig = { jwtSecret: TEST_SECRET, accessTokenTtlSeconds: 3600 };

function encode(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

describe('JWT signing infrastructure', () => {
  describe('signAccessToken', () => {
    it('should produce a three-part JWT string', async () => {
      const token = await signAccessToken(auth, USER_ID);
      expect(token.split('.')).toHaveLength(3);
    });

    it('should carry the user id as subject', async () => {
      const token = await signAccessToken(auth, USER_ID);
      const payload = await verifyAccessToken(auth, token);

      expect(payload.sub).toBe('42');
      expect(typeof payload.jti).toBe('string');
    });

    it('should expire after the configured lifetime', async () => {
      const token = await signAccessToken({ ...auth, accessTokenTtlSeconds: 120 }, USER_ID);
      const payload = await verifyAccessToken(auth, token);

      const diff = payload.exp - payload.iat;
      expect(diff).toBeGreaterThanOrEqual(120);
      expect(diff).toBeLessThanOrEqual(121);
    });

    it('should generate unique jti for each token', async () => {
      const payload1 = await verifyAccessToken(auth, await signAccessToken(auth, USER_ID));
      const payload2 = await verifyAccessToken(auth, await signAccessToken(auth, USER_ID));

      expect(payload1.jti).not.toBe(payload2.jti);
    });

    it('should include an 8-hex-char kid in the header', async () => {
      const token = await signAccessToken(auth, USER_ID);
      const header = decodeProtectedHeader(token);

      expect(header.alg).toBe('HS256');
      expect(header.kid).toMatch(/^[0-9a-f]{8}$/);
    });

    it('should refuse to sign with a short secret', async () => {
      await expect(signAccessToken({ ...auth, jwtSecret: 'too-short' }, USER_ID)).rejects.toThrow(
        'JWT_SECRET must be at least 32 bytes',
      );
    });
  });

  describe('verifyAccessToken', () => {
    it('should reject a token signed with an unknown secret', async () => {
      const token = await signAccessToken({ ...auth, jwtSecret: TEST_SECRET_PREVIOUS }, USER_ID);
      await expect(verifyAccessToken(auth, token)).rejects.toThrow();
    });

    it('should accept a token signed with the previous secret during rotation', async () => {
      const token = await signAccessToken({ ...auth, jwtSecret: TEST_SECRET_PREVIOUS }, USER_ID);
      const payload = await verifyAccessToken({ ...auth, jwtSecretPrevious: TEST_SECRET_PREVIOUS }, token);

      expect(payload.sub).toBe('42');
    });

    it('should reject a token of another type', async () => {
      const token = await new SignJWT({ type: 'refresh' })
        .setProtectedHeader({ alg: 'HS256', kid: 'abcd1234' })
        .setSubject('42')
        .setIssuedAt()
        .setExpirationTime('5m')
        .setJti('test-jti')
        .sign(encode(TEST_SECRET));

      await expect(verifyAccessToken(auth, token)).rejects.toThrow('[JWT] Invalid token type: refresh');
    });

    it('should reject an expired token beyond the clock tolerance', async () => {
      const now = Math.floor(Date.now() / 1000);
      const token = await new SignJWT({ type: 'access' })
        .setProtectedHeader({ alg: 'HS256', kid: 'abcd1234' })
        .setSubject('42')
        .setIssuedAt(now - 600)
        .setExpirationTime(now - 120)
        .setJti('test-jti')
        .sign(encode(TEST_SECRET));

      await expect(verifyAccessToken(auth, token)).rejects.toThrow();
    });

    it('should reject a token without a kid', async () => {
      const token = await new SignJWT({ type: 'access' })
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject('42')
        .setIssuedAt()
        .setExpirationTime('5m')
        .setJti('test-jti')
        .sign(encode(TEST_SECRET));

      await expect(verifyAccessToken(auth, token)).rejects.toThrow('[JWT] Missing kid in token header');
    });
  });
});
