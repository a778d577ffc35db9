/**
 * Fastify routes for user accounts.
 * Registers /user/create/, /user/token/ and /user/me/.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import type { AuthConfig } from '../../config.ts';
import { signAccessToken } from '../auth/jwt.ts';
import { createAuthenticate, requireUser } from '../auth/middleware.ts';
import { NON_FIELD_ERRORS, ValidationError, parsePayload } from '../errors.ts';
import type { UserRepository } from '../store/types.ts';
import { TokenRequestSchema, UserInputSchema, UserPatchSchema, serializeProfile, type TokenResponse } from './schemas.ts';
import { authenticate, createUser, toProfile, updateProfile } from './service.ts';

const BAD_CREDENTIALS_MESSAGE = 'Unable to authenticate with provided credentials';

export interface UserRoutesOptions {
  users: UserRepository;
  auth: AuthConfig;
}

/**
 * Fastify plugin that registers the account routes.
 *
 * Usage:
 * ```ts
 * app.register(userRoutesPlugin, { users: store.users, auth: config.auth });
 * ```
 */
export async function userRoutesPlugin(app: FastifyInstance, opts: UserRoutesOptions): Promise<void> {
  const { users, auth } = opts;
  const authenticateRequest = createAuthenticate({ users, auth });

  app.post('/user/create/', async (req: FastifyRequest, reply: FastifyReply) => {
    const input = parsePayload(UserInputSchema, req.body);
    const user = await createUser(users, input);
    req.log.info({ userId: user.id }, 'user created');
    return reply.code(201).send(serializeProfile(toProfile(user)));
  });

  app.post('/user/token/', async (req: FastifyRequest): Promise<TokenResponse> => {
    const { email, password } = parsePayload(TokenRequestSchema, req.body);
    const user = await authenticate(users, email, password);
    if (!user) {
      throw ValidationError.forField(NON_FIELD_ERRORS, BAD_CREDENTIALS_MESSAGE);
    }
    return { token: await signAccessToken(auth, user.id) };
  });

  app.get('/user/me/', { preHandler: authenticateRequest }, async (req: FastifyRequest) => {
    return serializeProfile(toProfile(requireUser(req)));
  });

  app.put('/user/me/', { preHandler: authenticateRequest }, async (req: FastifyRequest) => {
    const user = requireUser(req);
    const input = parsePayload(UserInputSchema, req.body);
    return serializeProfile(toProfile(await updateProfile(users, user.id, input)));
  });

  app.patch('/user/me/', { preHandler: authenticateRequest }, async (req: FastifyRequest) => {
    const user = requireUser(req);
    const input = parsePayload(UserPatchSchema, req.body);
    return serializeProfile(toProfile(await updateProfile(users, user.id, input)));
  });
}
