/**
 * In-process storage driver.
 *
 * Mirrors the PostgreSQL driver's observable behaviour: serial ids per table,
 * the same orderings, owner scoping, cascades from users and from tags or
 * ingredients into recipe associations. Used by the test suite and by
 * `STORE_DRIVER=memory` for local experiments; data lives only as long as the
 * process.
 */

import { DUPLICATE_EMAIL_MESSAGE, type NewUser, type User, type UserPatch } from '../accounts/types.ts';
import { ValidationError } from '../errors.ts';
import type { NamedEntity, Recipe, RecipeDetail, RecipeFields } from '../recipe/types.ts';
import type { NamedEntityRepository, RecipeRepository, Store, UserRepository } from './types.ts';

/** Auto-incrementing id source, like a SERIAL column. */
class Sequence {
  private last = 0;

  next(): number {
    this.last += 1;
    return this.last;
  }
}

interface RecipeRecord {
  id: number;
  user_id: number;
  title: string;
  time_minutes: number;
  cost: string;
}

/** Join row between a recipe and a tag or ingredient. */
interface Association {
  recipe_id: number;
  ref_id: number;
  position: number;
}

class MemoryUserRepository implements UserRepository {
  private readonly ids = new Sequence();

  constructor(private readonly rows: Map<number, User>) {}

  private emailTaken(email: string, exceptId?: number): boolean {
    const wanted = email.toLowerCase();
    for (const user of this.rows.values()) {
      if (user.id !== exceptId && user.email.toLowerCase() === wanted) return true;
    }
    return false;
  }

  async create(input: NewUser): Promise<User> {
    if (this.emailTaken(input.email)) {
      throw ValidationError.forField('email', DUPLICATE_EMAIL_MESSAGE);
    }
    const user: User = { id: this.ids.next(), is_active: true, ...input };
    this.rows.set(user.id, user);
    return { ...user };
  }

  async findById(id: number): Promise<User | null> {
    const user = this.rows.get(id);
    return user ? { ...user } : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const wanted = email.toLowerCase();
    for (const user of this.rows.values()) {
      if (user.email.toLowerCase() === wanted) return { ...user };
    }
    return null;
  }

  async update(id: number, patch: UserPatch): Promise<User | null> {
    const user = this.rows.get(id);
    if (!user) return null;
    if (patch.email !== undefined && this.emailTaken(patch.email, id)) {
      throw ValidationError.forField('email', DUPLICATE_EMAIL_MESSAGE);
    }

    const updated: User = { ...user };
    if (patch.email !== undefined) updated.email = patch.email;
    if (patch.name !== undefined) updated.name = patch.name;
    if (patch.password_hash !== undefined) updated.password_hash = patch.password_hash;
    if (patch.is_active !== undefined) updated.is_active = patch.is_active;

    this.rows.set(id, updated);
    return { ...updated };
  }
}

/** Descending by name in code-unit order, then descending by id, matching the SQL ORDER BY. */
function compareNamedDesc(a: NamedEntity, b: NamedEntity): number {
  if (a.name !== b.name) return a.name < b.name ? 1 : -1;
  return b.id - a.id;
}

class MemoryNamedEntityRepository implements NamedEntityRepository {
  private readonly ids = new Sequence();

  constructor(
    private readonly rows: Map<number, NamedEntity>,
    private readonly onDelete: (id: number) => void,
  ) {}

  private owned(ownerId: number, id: number): NamedEntity | undefined {
    const row = this.rows.get(id);
    return row && row.user_id === ownerId ? row : undefined;
  }

  async list(ownerId: number): Promise<NamedEntity[]> {
    return [...this.rows.values()]
      .filter((row) => row.user_id === ownerId)
      .sort(compareNamedDesc)
      .map((row) => ({ ...row }));
  }

  async get(ownerId: number, id: number): Promise<NamedEntity | null> {
    const row = this.owned(ownerId, id);
    return row ? { ...row } : null;
  }

  async create(ownerId: number, name: string): Promise<NamedEntity> {
    const row: NamedEntity = { id: this.ids.next(), user_id: ownerId, name };
    this.rows.set(row.id, row);
    return { ...row };
  }

  async update(ownerId: number, id: number, name: string): Promise<NamedEntity | null> {
    const row = this.owned(ownerId, id);
    if (!row) return null;
    const updated = { ...row, name };
    this.rows.set(id, updated);
    return { ...updated };
  }

  async delete(ownerId: number, id: number): Promise<boolean> {
    if (!this.owned(ownerId, id)) return false;
    this.rows.delete(id);
    this.onDelete(id);
    return true;
  }

  async findOwnedIds(ownerId: number, ids: number[]): Promise<number[]> {
    return ids.filter((id) => this.owned(ownerId, id) !== undefined);
  }

  /** Drops every row owned by `ownerId`, returning the removed ids. */
  removeOwner(ownerId: number): number[] {
    const removed: number[] = [];
    for (const row of this.rows.values()) {
      if (row.user_id === ownerId) removed.push(row.id);
    }
    for (const id of removed) this.rows.delete(id);
    return removed;
  }
}

class MemoryRecipeRepository implements RecipeRepository {
  private readonly ids = new Sequence();
  private readonly rows = new Map<number, RecipeRecord>();
  readonly tagLinks: Association[] = [];
  readonly ingredientLinks: Association[] = [];

  constructor(
    private readonly tags: Map<number, NamedEntity>,
    private readonly ingredients: Map<number, NamedEntity>,
  ) {}

  private owned(ownerId: number, id: number): RecipeRecord | undefined {
    const row = this.rows.get(id);
    return row && row.user_id === ownerId ? row : undefined;
  }

  private linkedIds(links: Association[], recipeId: number): number[] {
    return links
      .filter((link) => link.recipe_id === recipeId)
      .sort((a, b) => a.position - b.position)
      .map((link) => link.ref_id);
  }

  private hydrate(row: RecipeRecord): Recipe {
    return {
      ...row,
      tags: this.linkedIds(this.tagLinks, row.id),
      ingredients: this.linkedIds(this.ingredientLinks, row.id),
    };
  }

  private replaceLinks(links: Association[], recipeId: number, refIds: number[]): void {
    removeWhere(links, (link) => link.recipe_id === recipeId);
    refIds.forEach((ref_id, position) => links.push({ recipe_id: recipeId, ref_id, position }));
  }

  async list(ownerId: number): Promise<Recipe[]> {
    return [...this.rows.values()]
      .filter((row) => row.user_id === ownerId)
      .sort((a, b) => b.id - a.id)
      .map((row) => this.hydrate(row));
  }

  async get(ownerId: number, id: number): Promise<Recipe | null> {
    const row = this.owned(ownerId, id);
    return row ? this.hydrate(row) : null;
  }

  async getDetail(ownerId: number, id: number): Promise<RecipeDetail | null> {
    const recipe = await this.get(ownerId, id);
    if (!recipe) return null;

    const expand = (ids: number[], source: Map<number, NamedEntity>): NamedEntity[] =>
      ids.flatMap((refId) => {
        const entity = source.get(refId);
        return entity ? [{ ...entity }] : [];
      });

    return {
      ...recipe,
      tags: expand(recipe.tags, this.tags),
      ingredients: expand(recipe.ingredients, this.ingredients),
    };
  }

  async create(ownerId: number, fields: RecipeFields): Promise<Recipe> {
    const row: RecipeRecord = {
      id: this.ids.next(),
      user_id: ownerId,
      title: fields.title,
      time_minutes: fields.time_minutes,
      cost: fields.cost,
    };
    this.rows.set(row.id, row);
    this.replaceLinks(this.tagLinks, row.id, fields.tags);
    this.replaceLinks(this.ingredientLinks, row.id, fields.ingredients);
    return this.hydrate(row);
  }

  async update(ownerId: number, id: number, fields: Partial<RecipeFields>): Promise<Recipe | null> {
    const row = this.owned(ownerId, id);
    if (!row) return null;

    const updated: RecipeRecord = { ...row };
    if (fields.title !== undefined) updated.title = fields.title;
    if (fields.time_minutes !== undefined) updated.time_minutes = fields.time_minutes;
    if (fields.cost !== undefined) updated.cost = fields.cost;
    this.rows.set(id, updated);

    if (fields.tags !== undefined) this.replaceLinks(this.tagLinks, id, fields.tags);
    if (fields.ingredients !== undefined) this.replaceLinks(this.ingredientLinks, id, fields.ingredients);

    return this.hydrate(updated);
  }

  async delete(ownerId: number, id: number): Promise<boolean> {
    if (!this.owned(ownerId, id)) return false;
    this.rows.delete(id);
    removeWhere(this.tagLinks, (link) => link.recipe_id === id);
    removeWhere(this.ingredientLinks, (link) => link.recipe_id === id);
    return true;
  }

  /** Drops every recipe owned by `ownerId` together with its join rows. */
  removeOwner(ownerId: number): void {
    for (const row of [...this.rows.values()]) {
      if (row.user_id === ownerId) {
        this.rows.delete(row.id);
        removeWhere(this.tagLinks, (link) => link.recipe_id === row.id);
        removeWhere(this.ingredientLinks, (link) => link.recipe_id === row.id);
      }
    }
  }
}

/** In-place filter: removes every element matching `predicate`. */
function removeWhere<T>(items: T[], predicate: (item: T) => boolean): void {
  for (let i = items.length - 1; i >= 0; i--) {
    if (predicate(items[i])) items.splice(i, 1);
  }
}

export class MemoryStore implements Store {
  readonly driver = 'memory';
  readonly users: UserRepository;
  readonly tags: MemoryNamedEntityRepository;
  readonly ingredients: MemoryNamedEntityRepository;
  readonly recipes: MemoryRecipeRepository;

  private readonly userRows = new Map<number, User>();

  constructor() {
    const tagRows = new Map<number, NamedEntity>();
    const ingredientRows = new Map<number, NamedEntity>();

    this.users = new MemoryUserRepository(this.userRows);
    this.recipes = new MemoryRecipeRepository(tagRows, ingredientRows);
    this.tags = new MemoryNamedEntityRepository(tagRows, (id) =>
      removeWhere(this.recipes.tagLinks, (link) => link.ref_id === id),
    );
    this.ingredients = new MemoryNamedEntityRepository(ingredientRows, (id) =>
      removeWhere(this.recipes.ingredientLinks, (link) => link.ref_id === id),
    );
  }

  /**
   * Removes a user and everything they own, like the ON DELETE CASCADE
   * foreign keys in the SQL schema.
   */
  deleteUser(id: number): boolean {
    if (!this.userRows.delete(id)) return false;
    this.recipes.removeOwner(id);
    for (const tagId of this.tags.removeOwner(id)) {
      removeWhere(this.recipes.tagLinks, (link) => link.ref_id === tagId);
    }
    for (const ingredientId of this.ingredients.removeOwner(id)) {
      removeWhere(this.recipes.ingredientLinks, (link) => link.ref_id === ingredientId);
    }
    return true;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}
}
