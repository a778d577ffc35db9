import { createHash, randomUUID } from 'node:crypto';
import { SignJWT, jwtVerify, errors as joseErrors } from 'jose';

import { MIN_SECRET_BYTES, type AuthConfig } from '../../config.ts';

/** JWT payload returned by verifyAccessToken. */
export interface JwtPayload {
  /** Subject: the user's id, as a decimal string. */
  sub: string;
  /** Issued-at timestamp (seconds since epoch). */
  iat: number;
  /** Expiration timestamp (seconds since epoch). */
  exp: number;
  /** Unique token identifier (UUID v4). */
  jti: string;
  /** Key ID: identifies which secret signed this token. */
  kid: string;
}

const ALG = 'HS256' as const;
const TOKEN_TYPE = 'access';
const CLOCK_TOLERANCE_SECONDS = 30;

/**
 * Derives a short, deterministic key ID from a secret.
 * Uses SHA-256 of the first 8 bytes, truncated to 8 hex characters.
 */
function deriveKid(secret: string): string {
  const hash = createHash('sha256')
    .update(secret.slice(0, 8))
    .digest('hex');
  return hash.slice(0, 8);
}

/** Encodes a secret string into a Uint8Array for jose. */
function encodeSecret(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Validates that a secret meets the minimum length requirement.
 * Throws if the secret is missing or too short.
 */
function requireSecret(secret: string | undefined): asserts secret is string {
  if (!secret || secret.trim().length === 0) {
    throw new Error('[JWT] No signing secret configured. Set JWT_SECRET (minimum 32 bytes).');
  }
  if (Buffer.byteLength(secret, 'utf-8') < MIN_SECRET_BYTES) {
    throw new Error(
      `[JWT] JWT_SECRET must be at least ${MIN_SECRET_BYTES} bytes. ` +
        `Current length: ${Buffer.byteLength(secret, 'utf-8')} bytes.`,
    );
  }
}

/**
 * Signs an HS256 access token for a user.
 *
 * The token carries `sub` (user id), `iat`, `exp`, `jti` and a `kid` header
 * for key-rotation support. The id, unlike the email, never changes hands.
 */
export async function signAccessToken(auth: AuthConfig, userId: number): Promise<string> {
  requireSecret(auth.jwtSecret);

  return new SignJWT({ type: TOKEN_TYPE })
    .setProtectedHeader({ alg: ALG, kid: deriveKid(auth.jwtSecret) })
    .setSubject(String(userId))
    .setIssuedAt()
    .setExpirationTime(`${auth.accessTokenTtlSeconds}s`)
    .setJti(randomUUID())
    .sign(encodeSecret(auth.jwtSecret));
}

/**
 * Verifies an HS256 access token and returns its payload.
 *
 * Supports key rotation: tries the primary secret first, then falls back to
 * the previous secret if one is configured and the primary fails with a
 * signature-verification error.
 *
 * @throws If the token is invalid, expired (beyond clock skew), or not signed by a known key.
 */
export async function verifyAccessToken(auth: AuthConfig, token: string): Promise<JwtPayload> {
  requireSecret(auth.jwtSecret);

  try {
    return await verifyWith(token, auth.jwtSecret);
  } catch (err) {
    if (auth.jwtSecretPrevious && isSignatureError(err)) {
      return verifyWith(token, auth.jwtSecretPrevious);
    }
    throw err;
  }
}

/**
 * Verifies a token against a specific secret and validates required claims.
 */
async function verifyWith(token: string, secret: string): Promise<JwtPayload> {
  const { payload, protectedHeader } = await jwtVerify(token, encodeSecret(secret), {
    algorithms: [ALG],
    clockTolerance: CLOCK_TOLERANCE_SECONDS,
    requiredClaims: ['sub', 'iat', 'exp', 'jti'],
  });

  if (payload.type !== TOKEN_TYPE) {
    throw new Error(`[JWT] Invalid token type: ${String(payload.type)}`);
  }

  if (typeof protectedHeader.kid !== 'string') {
    throw new Error('[JWT] Missing kid in token header');
  }

  const { sub, iat, exp, jti } = payload;
  if (sub === undefined || iat === undefined || exp === undefined || jti === undefined) {
    throw new Error('[JWT] Missing required claim');
  }

  return { sub, iat, exp, jti, kid: protectedHeader.kid } satisfies JwtPayload;
}

/** Returns true if the error is a jose signature verification failure. */
function isSignatureError(err: unknown): boolean {
  return (
    err instanceof joseErrors.JWSSignatureVerificationFailed ||
    (err instanceof Error && err.message.includes('signature verification failed'))
  );
}
