/**
 * PostgreSQL storage driver.
 *
 * Schema lives in migrations/. Owner scoping is part of every WHERE clause;
 * no query reads or writes a row by id alone.
 */

import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';

import { DUPLICATE_EMAIL_MESSAGE, type NewUser, type User, type UserPatch } from '../accounts/types.ts';
import { ValidationError } from '../errors.ts';
import type { NamedEntity, NamedEntityKind, Recipe, RecipeDetail, RecipeFields } from '../recipe/types.ts';
import type { NamedEntityRepository, RecipeRepository, Store, UserRepository } from './types.ts';

/** SQLSTATE for unique_violation. */
const PG_UNIQUE_VIOLATION = '23505';
/** SQLSTATE for foreign_key_violation. */
const PG_FOREIGN_KEY_VIOLATION = '23503';

/** The part of Pool and PoolClient the shared helpers need. */
interface Queryable {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === PG_UNIQUE_VIOLATION;
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client, rolling back on any
 * error.
 */
async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

// ============================================================
// Users
// ============================================================

const USER_COLUMNS = 'id, email, name, password_hash, is_active, is_staff, is_superuser';

export class PgUserRepository implements UserRepository {
  constructor(private pool: Pool) {}

  async create(input: NewUser): Promise<User> {
    try {
      const result = await this.pool.query<User>(
        `INSERT INTO app_user (email, name, password_hash, is_staff, is_superuser)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${USER_COLUMNS}`,
        [input.email, input.name, input.password_hash, input.is_staff, input.is_superuser],
      );
      return result.rows[0];
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw ValidationError.forField('email', DUPLICATE_EMAIL_MESSAGE);
      }
      throw err;
    }
  }

  async findById(id: number): Promise<User | null> {
    const result = await this.pool.query<User>(`SELECT ${USER_COLUMNS} FROM app_user WHERE id = $1`, [id]);
    return result.rows[0] ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.pool.query<User>(
      `SELECT ${USER_COLUMNS} FROM app_user WHERE lower(email) = lower($1)`,
      [email],
    );
    return result.rows[0] ?? null;
  }

  async update(id: number, patch: UserPatch): Promise<User | null> {
    const updates: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    for (const column of ['email', 'name', 'password_hash', 'is_active'] as const) {
      if (patch[column] !== undefined) {
        updates.push(`${column} = $${paramIndex}`);
        params.push(patch[column]);
        paramIndex++;
      }
    }

    if (updates.length === 0) {
      return this.findById(id);
    }

    updates.push('updated_at = now()');
    params.push(id);
    try {
      const result = await this.pool.query<User>(
        `UPDATE app_user SET ${updates.join(', ')}
         WHERE id = $${paramIndex}
         RETURNING ${USER_COLUMNS}`,
        params,
      );
      return result.rows[0] ?? null;
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw ValidationError.forField('email', DUPLICATE_EMAIL_MESSAGE);
      }
      throw err;
    }
  }
}

// ============================================================
// Tags and ingredients
// ============================================================

/**
 * Repository for one of the named-entity tables. `kind` is a closed union,
 * so interpolating it as the table name is safe.
 */
export class PgNamedEntityRepository implements NamedEntityRepository {
  constructor(
    private pool: Pool,
    private kind: NamedEntityKind,
  ) {}

  async list(ownerId: number): Promise<NamedEntity[]> {
    const result = await this.pool.query<NamedEntity>(
      `SELECT id, user_id, name FROM ${this.kind}
       WHERE user_id = $1
       ORDER BY name COLLATE "C" DESC, id DESC`,
      [ownerId],
    );
    return result.rows;
  }

  async get(ownerId: number, id: number): Promise<NamedEntity | null> {
    const result = await this.pool.query<NamedEntity>(
      `SELECT id, user_id, name FROM ${this.kind} WHERE id = $1 AND user_id = $2`,
      [id, ownerId],
    );
    return result.rows[0] ?? null;
  }

  async create(ownerId: number, name: string): Promise<NamedEntity> {
    const result = await this.pool.query<NamedEntity>(
      `INSERT INTO ${this.kind} (user_id, name) VALUES ($1, $2)
       RETURNING id, user_id, name`,
      [ownerId, name],
    );
    return result.rows[0];
  }

  async update(ownerId: number, id: number, name: string): Promise<NamedEntity | null> {
    const result = await this.pool.query<NamedEntity>(
      `UPDATE ${this.kind} SET name = $1
       WHERE id = $2 AND user_id = $3
       RETURNING id, user_id, name`,
      [name, id, ownerId],
    );
    return result.rows[0] ?? null;
  }

  async delete(ownerId: number, id: number): Promise<boolean> {
    const result = await this.pool.query(`DELETE FROM ${this.kind} WHERE id = $1 AND user_id = $2 RETURNING id`, [
      id,
      ownerId,
    ]);
    return result.rows.length > 0;
  }

  async findOwnedIds(ownerId: number, ids: number[]): Promise<number[]> {
    if (ids.length === 0) return [];
    const result = await this.pool.query<{ id: number }>(
      `SELECT id FROM ${this.kind} WHERE user_id = $1 AND id = ANY($2::int[])`,
      [ownerId, ids],
    );
    return result.rows.map((r) => r.id);
  }
}

// ============================================================
// Recipes
// ============================================================

interface RecipeRow {
  id: number;
  user_id: number;
  title: string;
  time_minutes: number;
  cost: string;
  tags: number[];
  ingredients: number[];
}

/** Recipe columns with association ids aggregated in position order. */
const SELECT_RECIPE = `
  SELECT
    r.id,
    r.user_id,
    r.title,
    r.time_minutes,
    r.cost::text AS cost,
    COALESCE(
      (SELECT array_agg(rt.tag_id ORDER BY rt.position) FROM recipe_tag rt WHERE rt.recipe_id = r.id),
      '{}'::int[]
    ) AS tags,
    COALESCE(
      (SELECT array_agg(ri.ingredient_id ORDER BY ri.position) FROM recipe_ingredient ri WHERE ri.recipe_id = r.id),
      '{}'::int[]
    ) AS ingredients
  FROM recipe r
`;

/** Association tables and their foreign-key column, keyed by recipe field. */
const ASSOCIATIONS = {
  tags: { table: 'recipe_tag', column: 'tag_id' },
  ingredients: { table: 'recipe_ingredient', column: 'ingredient_id' },
} as const;

async function selectRecipe(db: Queryable, ownerId: number, id: number): Promise<Recipe | null> {
  const result = await db.query<RecipeRow>(`${SELECT_RECIPE} WHERE r.id = $1 AND r.user_id = $2`, [id, ownerId]);
  return result.rows[0] ?? null;
}

/** Recipe field for each association table. */
const FIELD_BY_TABLE: Record<string, keyof typeof ASSOCIATIONS> = {
  recipe_tag: 'tags',
  recipe_ingredient: 'ingredients',
};

/**
 * Maps a foreign-key violation on an association table to the field error an
 * unknown id gets. A tag or ingredient deleted between the ownership check
 * and the insert ends up here. Returns null for any other error.
 */
function associationError(err: unknown): ValidationError | null {
  if (!(err instanceof Error) || !('code' in err) || err.code !== PG_FOREIGN_KEY_VIOLATION) return null;
  const table = 'table' in err && typeof err.table === 'string' ? err.table : '';
  const field = FIELD_BY_TABLE[table];
  if (!field) return null;

  // detail: Key (tag_id)=(5) is not present in table "tag".
  const detail = 'detail' in err && typeof err.detail === 'string' ? err.detail : '';
  const id = /\)=\((\d+)\)/.exec(detail)?.[1];
  return ValidationError.forField(
    field,
    id ? `Invalid pk "${id}" - object does not exist.` : 'Invalid pk - object does not exist.',
  );
}

/** Replaces a recipe's association rows, keeping the supplied order. */
async function replaceAssociations(
  client: PoolClient,
  recipeId: number,
  field: keyof typeof ASSOCIATIONS,
  ids: number[],
): Promise<void> {
  const { table, column } = ASSOCIATIONS[field];
  await client.query(`DELETE FROM ${table} WHERE recipe_id = $1`, [recipeId]);
  if (ids.length === 0) return;
  await client.query(
    `INSERT INTO ${table} (recipe_id, ${column}, position)
     SELECT $1, t.ref_id, t.ord - 1
     FROM unnest($2::int[]) WITH ORDINALITY AS t(ref_id, ord)`,
    [recipeId, ids],
  );
}

export class PgRecipeRepository implements RecipeRepository {
  constructor(private pool: Pool) {}

  async list(ownerId: number): Promise<Recipe[]> {
    const result = await this.pool.query<RecipeRow>(`${SELECT_RECIPE} WHERE r.user_id = $1 ORDER BY r.id DESC`, [
      ownerId,
    ]);
    return result.rows;
  }

  async get(ownerId: number, id: number): Promise<Recipe | null> {
    return selectRecipe(this.pool, ownerId, id);
  }

  async getDetail(ownerId: number, id: number): Promise<RecipeDetail | null> {
    const recipe = await selectRecipe(this.pool, ownerId, id);
    if (!recipe) return null;

    const [tags, ingredients] = await Promise.all([
      this.pool.query<NamedEntity>(
        `SELECT t.id, t.user_id, t.name
         FROM recipe_tag rt JOIN tag t ON t.id = rt.tag_id
         WHERE rt.recipe_id = $1
         ORDER BY rt.position`,
        [id],
      ),
      this.pool.query<NamedEntity>(
        `SELECT i.id, i.user_id, i.name
         FROM recipe_ingredient ri JOIN ingredient i ON i.id = ri.ingredient_id
         WHERE ri.recipe_id = $1
         ORDER BY ri.position`,
        [id],
      ),
    ]);

    return { ...recipe, tags: tags.rows, ingredients: ingredients.rows };
  }

  async create(ownerId: number, fields: RecipeFields): Promise<Recipe> {
    try {
      return await this.insert(ownerId, fields);
    } catch (err) {
      throw associationError(err) ?? err;
    }
  }

  async update(ownerId: number, id: number, fields: Partial<RecipeFields>): Promise<Recipe | null> {
    try {
      return await this.apply(ownerId, id, fields);
    } catch (err) {
      throw associationError(err) ?? err;
    }
  }

  private insert(ownerId: number, fields: RecipeFields): Promise<Recipe> {
    return withTransaction(this.pool, async (client) => {
      const inserted = await client.query<{ id: number }>(
        `INSERT INTO recipe (user_id, title, time_minutes, cost)
         VALUES ($1, $2, $3, $4)
         RETURNING id`,
        [ownerId, fields.title, fields.time_minutes, fields.cost],
      );
      const recipeId = inserted.rows[0].id;

      await replaceAssociations(client, recipeId, 'tags', fields.tags);
      await replaceAssociations(client, recipeId, 'ingredients', fields.ingredients);

      const recipe = await selectRecipe(client, ownerId, recipeId);
      if (!recipe) {
        throw new Error(`[Recipe] Inserted recipe ${recipeId} not readable`);
      }
      return recipe;
    });
  }

  private apply(ownerId: number, id: number, fields: Partial<RecipeFields>): Promise<Recipe | null> {
    return withTransaction(this.pool, async (client) => {
      const updates: string[] = [];
      const params: unknown[] = [];
      let paramIndex = 1;

      for (const column of ['title', 'time_minutes', 'cost'] as const) {
        if (fields[column] !== undefined) {
          updates.push(`${column} = $${paramIndex}`);
          params.push(fields[column]);
          paramIndex++;
        }
      }
      updates.push('updated_at = now()');
      params.push(id, ownerId);

      const updated = await client.query(
        `UPDATE recipe SET ${updates.join(', ')}
         WHERE id = $${paramIndex} AND user_id = $${paramIndex + 1}
         RETURNING id`,
        params,
      );
      if (updated.rows.length === 0) return null;

      if (fields.tags !== undefined) {
        await replaceAssociations(client, id, 'tags', fields.tags);
      }
      if (fields.ingredients !== undefined) {
        await replaceAssociations(client, id, 'ingredients', fields.ingredients);
      }

      return selectRecipe(client, ownerId, id);
    });
  }

  async delete(ownerId: number, id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM recipe WHERE id = $1 AND user_id = $2 RETURNING id', [
      id,
      ownerId,
    ]);
    return result.rows.length > 0;
  }
}

// ============================================================
// Store
// ============================================================

export class PostgresStore implements Store {
  readonly driver = 'postgres';
  readonly users: UserRepository;
  readonly tags: NamedEntityRepository;
  readonly ingredients: NamedEntityRepository;
  readonly recipes: RecipeRepository;

  constructor(private pool: Pool) {
    this.users = new PgUserRepository(pool);
    this.tags = new PgNamedEntityRepository(pool, 'tag');
    this.ingredients = new PgNamedEntityRepository(pool, 'ingredient');
    this.recipes = new PgRecipeRepository(pool);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
