import type { FastifyReply, FastifyRequest } from 'fastify';
import { errors as joseErrors } from 'jose';

import type { User } from '../accounts/types.ts';
import type { AuthConfig } from '../../config.ts';
import { AuthenticationError } from '../errors.ts';
import { parseIdString } from '../ids.ts';
import type { UserRepository } from '../store/types.ts';
import { verifyAccessToken, type JwtPayload } from './jwt.ts';

// Augment Fastify request with the authenticated user (set by the preHandler below)
declare module 'fastify' {
  interface FastifyRequest {
    user: User | null;
  }
}

const INVALID_TOKEN_MESSAGE = 'Invalid token.';
const INACTIVE_USER_MESSAGE = 'User inactive or deleted.';

export interface AuthenticateOptions {
  users: UserRepository;
  auth: AuthConfig;
}

/** Extracts the token from an `Authorization: Bearer <token>` header. */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const [scheme, token, ...rest] = header.trim().split(/\s+/);
  if (scheme?.toLowerCase() !== 'bearer' || !token || rest.length > 0) return null;
  return token;
}

/** True for failures caused by the token itself rather than by the server. */
function isTokenError(err: unknown): boolean {
  if (err instanceof joseErrors.JOSEError) return true;
  return err instanceof Error && /^\[JWT\] (Invalid|Missing)/.test(err.message);
}

/**
 * Builds a preHandler that resolves the bearer token to an active user and
 * stores it on `req.user`.
 *
 * Missing header → "credentials not provided"; a bad or expired token, or a
 * token for an unknown or inactive user → a specific 401.
 */
export function createAuthenticate(opts: AuthenticateOptions) {
  const { users, auth } = opts;

  return async function authenticate(req: FastifyRequest, _reply: FastifyReply): Promise<void> {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      throw new AuthenticationError();
    }

    let payload: JwtPayload;
    try {
      payload = await verifyAccessToken(auth, token);
    } catch (err) {
      if (isTokenError(err)) {
        req.log.debug({ err }, 'rejected access token');
        throw new AuthenticationError(INVALID_TOKEN_MESSAGE);
      }
      throw err;
    }

    const userId = parseIdString(payload.sub);
    if (userId === null) {
      req.log.debug({ sub: payload.sub }, 'rejected access token subject');
      throw new AuthenticationError(INVALID_TOKEN_MESSAGE);
    }

    const user = await users.findById(userId);
    if (!user || !user.is_active) {
      throw new AuthenticationError(INACTIVE_USER_MESSAGE);
    }

    req.user = user;
  };
}

/**
 * Returns the authenticated user for a request that went through the
 * authenticate preHandler.
 */
export function requireUser(req: FastifyRequest): User {
  if (!req.user) {
    throw new AuthenticationError();
  }
  return req.user;
}
