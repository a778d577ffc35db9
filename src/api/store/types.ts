/**
 * Storage contracts.
 *
 * Route handlers and services only see these interfaces. The PostgreSQL
 * driver backs them in production; the memory driver backs them in tests.
 * Every owned-entity operation takes the owner's id and only ever touches
 * that owner's rows.
 */

import type { NewUser, User, UserPatch } from '../accounts/types.ts';
import type { NamedEntity, Recipe, RecipeDetail, RecipeFields } from '../recipe/types.ts';

export interface UserRepository {
  create(input: NewUser): Promise<User>;
  findById(id: number): Promise<User | null>;
  /** Matches case-insensitively. */
  findByEmail(email: string): Promise<User | null>;
  update(id: number, patch: UserPatch): Promise<User | null>;
}

export interface NamedEntityRepository {
  /** Owner's entities, name descending then id descending. */
  list(ownerId: number): Promise<NamedEntity[]>;
  get(ownerId: number, id: number): Promise<NamedEntity | null>;
  create(ownerId: number, name: string): Promise<NamedEntity>;
  update(ownerId: number, id: number, name: string): Promise<NamedEntity | null>;
  delete(ownerId: number, id: number): Promise<boolean>;
  /** The subset of `ids` that exist and belong to the owner. */
  findOwnedIds(ownerId: number, ids: number[]): Promise<number[]>;
}

export interface RecipeRepository {
  /** Owner's recipes, id descending. */
  list(ownerId: number): Promise<Recipe[]>;
  get(ownerId: number, id: number): Promise<Recipe | null>;
  getDetail(ownerId: number, id: number): Promise<RecipeDetail | null>;
  /** Inserts the recipe and its association rows atomically. */
  create(ownerId: number, fields: RecipeFields): Promise<Recipe>;
  /**
   * Applies the supplied fields atomically. A supplied association list
   * replaces the whole set; an absent key leaves the column untouched.
   */
  update(ownerId: number, id: number, fields: Partial<RecipeFields>): Promise<Recipe | null>;
  delete(ownerId: number, id: number): Promise<boolean>;
}

export interface Store {
  /** Driver name, reported by the health check. */
  readonly driver: string;
  readonly users: UserRepository;
  readonly tags: NamedEntityRepository;
  readonly ingredients: NamedEntityRepository;
  readonly recipes: RecipeRepository;
  /** Resolves when the backing storage answers. */
  ping(): Promise<void>;
  close(): Promise<void>;
}
