/**
 * Domain types for tags, ingredients and recipes.
 *
 * Every entity carries its owner's id. Recipes reference tags and
 * ingredients by id through explicit join rows; the order of the id arrays
 * is the order the client supplied.
 */

/** Which named-entity table a repository serves. */
export type NamedEntityKind = 'tag' | 'ingredient';

/** Shared shape of Tag and Ingredient. Its string form is its name. */
export interface NamedEntity {
  id: number;
  user_id: number;
  name: string;
}

export type Tag = NamedEntity;
export type Ingredient = NamedEntity;

/** A recipe with associations as id lists (list/write representation). */
export interface Recipe {
  id: number;
  user_id: number;
  title: string;
  time_minutes: number;
  /** Decimal with two places, e.g. "5.50". */
  cost: string;
  tags: number[];
  ingredients: number[];
}

/** A recipe with associations expanded to full objects (detail representation). */
export interface RecipeDetail extends Omit<Recipe, 'tags' | 'ingredients'> {
  tags: Tag[];
  ingredients: Ingredient[];
}

/** Every updatable recipe field. */
export interface RecipeFields {
  title: string;
  time_minutes: number;
  cost: string;
  tags: number[];
  ingredients: number[];
}

/** Options shared by update operations. */
export interface UpdateOptions {
  /** PATCH semantics when true, PUT semantics when false. */
  partial: boolean;
}
