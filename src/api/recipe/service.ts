/**
 * Tag, ingredient and recipe operations, scoped to one owner.
 *
 * Every function takes the owner's id from the authenticated request, never
 * from the payload. An id the owner does not own behaves exactly like an id
 * that does not exist.
 */

import { NotFoundError, ValidationError, parsePayload } from '../errors.ts';
import type { NamedEntityRepository, RecipeRepository } from '../store/types.ts';
import {
  NamedEntityInputSchema,
  NamedEntityPatchSchema,
  RecipeInputSchema,
  RecipePatchSchema,
} from './schemas.ts';
import type { NamedEntity, Recipe, RecipeDetail, RecipeFields, UpdateOptions } from './types.ts';

// ---------- tags and ingredients ----------

export function listNamed(repo: NamedEntityRepository, ownerId: number): Promise<NamedEntity[]> {
  return repo.list(ownerId);
}

export async function getNamed(repo: NamedEntityRepository, ownerId: number, id: number): Promise<NamedEntity> {
  const entity = await repo.get(ownerId, id);
  if (!entity) throw new NotFoundError();
  return entity;
}

export async function createNamed(repo: NamedEntityRepository, ownerId: number, body: unknown): Promise<NamedEntity> {
  const { name } = parsePayload(NamedEntityInputSchema, body);
  return repo.create(ownerId, name);
}

/**
 * Renames a tag or ingredient. With `partial` an empty payload is a no-op
 * that returns the current entity. An unknown id is reported before the
 * payload is validated.
 */
export async function updateNamed(
  repo: NamedEntityRepository,
  ownerId: number,
  id: number,
  body: unknown,
  options: UpdateOptions,
): Promise<NamedEntity> {
  const current = await repo.get(ownerId, id);
  if (!current) throw new NotFoundError();

  const { name } = options.partial
    ? parsePayload(NamedEntityPatchSchema, body)
    : parsePayload(NamedEntityInputSchema, body);
  if (name === undefined) return current;

  const updated = await repo.update(ownerId, id, name);
  if (!updated) throw new NotFoundError();
  return updated;
}

export async function deleteNamed(repo: NamedEntityRepository, ownerId: number, id: number): Promise<void> {
  if (!(await repo.delete(ownerId, id))) throw new NotFoundError();
}

// ---------- recipes ----------

/** Repositories a recipe write touches. */
export interface RecipeRepositories {
  recipes: RecipeRepository;
  tags: NamedEntityRepository;
  ingredients: NamedEntityRepository;
}

/**
 * Rejects association ids that do not exist or belong to another user.
 * Reports the first offending id per field.
 */
async function assertOwnedAssociations(
  repos: RecipeRepositories,
  ownerId: number,
  fields: Partial<Pick<RecipeFields, 'tags' | 'ingredients'>>,
): Promise<void> {
  const errors: Record<string, string[]> = {};

  for (const key of ['tags', 'ingredients'] as const) {
    const ids = fields[key];
    if (!ids || ids.length === 0) continue;

    const owned = new Set(await repos[key].findOwnedIds(ownerId, ids));
    const missing = ids.find((id) => !owned.has(id));
    if (missing !== undefined) {
      errors[key] = [`Invalid pk "${missing}" - object does not exist.`];
    }
  }

  if (Object.keys(errors).length > 0) {
    throw new ValidationError(errors);
  }
}

export function listRecipes(recipes: RecipeRepository, ownerId: number): Promise<Recipe[]> {
  return recipes.list(ownerId);
}

export async function getRecipeDetail(recipes: RecipeRepository, ownerId: number, id: number): Promise<RecipeDetail> {
  const recipe = await recipes.getDetail(ownerId, id);
  if (!recipe) throw new NotFoundError();
  return recipe;
}

export async function createRecipe(repos: RecipeRepositories, ownerId: number, body: unknown): Promise<Recipe> {
  const fields = parsePayload(RecipeInputSchema, body);
  await assertOwnedAssociations(repos, ownerId, fields);
  return repos.recipes.create(ownerId, fields);
}

/**
 * Updates a recipe. PUT (`partial: false`) requires every scalar field and
 * resets omitted associations to empty; PATCH only touches supplied keys.
 * An unknown id is reported before the payload is validated.
 */
export async function updateRecipe(
  repos: RecipeRepositories,
  ownerId: number,
  id: number,
  body: unknown,
  options: UpdateOptions,
): Promise<Recipe> {
  if (!(await repos.recipes.get(ownerId, id))) throw new NotFoundError();

  const fields: Partial<RecipeFields> = options.partial
    ? parsePayload(RecipePatchSchema, body)
    : parsePayload(RecipeInputSchema, body);
  await assertOwnedAssociations(repos, ownerId, fields);

  const updated = await repos.recipes.update(ownerId, id, fields);
  if (!updated) throw new NotFoundError();
  return updated;
}

export async function deleteRecipe(recipes: RecipeRepository, ownerId: number, id: number): Promise<void> {
  if (!(await recipes.delete(ownerId, id))) throw new NotFoundError();
}
