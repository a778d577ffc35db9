/**
 * Fastify routes for tags, ingredients and recipes.
 * Registers all /recipe/* endpoints. Every route requires a bearer token and
 * only ever sees the caller's own records.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import type { AuthConfig } from '../../config.ts';
import { createAuthenticate, requireUser } from '../auth/middleware.ts';
import { NotFoundError } from '../errors.ts';
import { parseIdString } from '../ids.ts';
import type { NamedEntityRepository, Store } from '../store/types.ts';
import { displayName, serializeNamedEntity, serializeRecipe, serializeRecipeDetail } from './schemas.ts';
import {
  createNamed,
  createRecipe,
  deleteNamed,
  deleteRecipe,
  getNamed,
  getRecipeDetail,
  listNamed,
  listRecipes,
  updateNamed,
  updateRecipe,
} from './service.ts';
import type { NamedEntityKind } from './types.ts';

// ---------- types ----------

interface IdParams {
  id: string;
}

// ---------- helpers ----------

/** Parses a path id. Anything that is not a positive int4 cannot exist. */
function parseId(raw: string): number {
  const id = parseIdString(raw);
  if (id === null) {
    throw new NotFoundError();
  }
  return id;
}

// ---------- plugin ----------

export interface RecipeRoutesOptions {
  store: Store;
  auth: AuthConfig;
}

/**
 * Registers list/create/retrieve/update/delete routes for one named entity
 * collection (tags or ingredients).
 */
function registerNamedEntityRoutes(
  app: FastifyInstance,
  basePath: string,
  label: NamedEntityKind,
  repo: NamedEntityRepository,
): void {
  app.get(`${basePath}/`, async (req: FastifyRequest) => {
    const user = requireUser(req);
    const entities = await listNamed(repo, user.id);
    return entities.map(serializeNamedEntity);
  });

  app.post(`${basePath}/`, async (req: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(req);
    const entity = await createNamed(repo, user.id, req.body);
    req.log.info({ id: entity.id, name: displayName(entity) }, `${label} created`);
    return reply.code(201).send(serializeNamedEntity(entity));
  });

  app.get(`${basePath}/:id/`, async (req: FastifyRequest<{ Params: IdParams }>) => {
    const user = requireUser(req);
    return serializeNamedEntity(await getNamed(repo, user.id, parseId(req.params.id)));
  });

  app.put(`${basePath}/:id/`, async (req: FastifyRequest<{ Params: IdParams }>) => {
    const user = requireUser(req);
    const entity = await updateNamed(repo, user.id, parseId(req.params.id), req.body, { partial: false });
    return serializeNamedEntity(entity);
  });

  app.patch(`${basePath}/:id/`, async (req: FastifyRequest<{ Params: IdParams }>) => {
    const user = requireUser(req);
    const entity = await updateNamed(repo, user.id, parseId(req.params.id), req.body, { partial: true });
    return serializeNamedEntity(entity);
  });

  app.delete(`${basePath}/:id/`, async (req: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) => {
    const user = requireUser(req);
    const id = parseId(req.params.id);
    await deleteNamed(repo, user.id, id);
    req.log.info({ id }, `${label} deleted`);
    return reply.code(204).send();
  });
}

/**
 * Fastify plugin that registers all recipe-related routes.
 *
 * Usage:
 * ```ts
 * app.register(recipeRoutesPlugin, { store, auth: config.auth });
 * ```
 */
export async function recipeRoutesPlugin(app: FastifyInstance, opts: RecipeRoutesOptions): Promise<void> {
  const { store } = opts;
  app.addHook('preHandler', createAuthenticate({ users: store.users, auth: opts.auth }));

  // ============================================================
  // Tags and ingredients
  // ============================================================

  registerNamedEntityRoutes(app, '/recipe/tags', 'tag', store.tags);
  registerNamedEntityRoutes(app, '/recipe/ingredients', 'ingredient', store.ingredients);

  // ============================================================
  // Recipes
  // ============================================================

  // GET /recipe/recipes/: caller's recipes, newest first, associations as ids
  app.get('/recipe/recipes/', async (req: FastifyRequest) => {
    const user = requireUser(req);
    const recipes = await listRecipes(store.recipes, user.id);
    return recipes.map(serializeRecipe);
  });

  app.post('/recipe/recipes/', async (req: FastifyRequest, reply: FastifyReply) => {
    const user = requireUser(req);
    const recipe = await createRecipe(store, user.id, req.body);
    req.log.info({ id: recipe.id, title: displayName(recipe) }, 'recipe created');
    return reply.code(201).send(serializeRecipe(recipe));
  });

  // GET /recipe/recipes/:id/: detail view, associations expanded
  app.get('/recipe/recipes/:id/', async (req: FastifyRequest<{ Params: IdParams }>) => {
    const user = requireUser(req);
    return serializeRecipeDetail(await getRecipeDetail(store.recipes, user.id, parseId(req.params.id)));
  });

  app.put('/recipe/recipes/:id/', async (req: FastifyRequest<{ Params: IdParams }>) => {
    const user = requireUser(req);
    const recipe = await updateRecipe(store, user.id, parseId(req.params.id), req.body, { partial: false });
    return serializeRecipe(recipe);
  });

  app.patch('/recipe/recipes/:id/', async (req: FastifyRequest<{ Params: IdParams }>) => {
    const user = requireUser(req);
    const recipe = await updateRecipe(store, user.id, parseId(req.params.id), req.body, { partial: true });
    return serializeRecipe(recipe);
  });

  app.delete('/recipe/recipes/:id/', async (req: FastifyRequest<{ Params: IdParams }>, reply: FastifyReply) => {
    const user = requireUser(req);
    const id = parseId(req.params.id);
    await deleteRecipe(store.recipes, user.id, id);
    req.log.info({ id }, 'recipe deleted');
    return reply.code(204).send();
  });
}
