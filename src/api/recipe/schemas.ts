/**
 * Wire schemas for tags, ingredients and recipes.
 *
 * Input: one zod schema per entity and per write mode (create/full update vs
 * partial update). Unknown keys, including any owner field, are stripped.
 *
 * Output: one serializer per entity and per view mode. Recipes render their
 * associations as id lists in list/write responses and as nested objects in
 * the detail response.
 */

import { z } from 'zod';

import { MAX_ID } from '../ids.ts';
import type { NamedEntity, Recipe, RecipeDetail } from './types.ts';

export const MAX_NAME_LENGTH = 255;

const REQUIRED = 'This field is required.';
const BLANK = 'This field may not be blank.';
const NOT_A_STRING = 'Not a valid string.';
const NOT_AN_INTEGER = 'A valid integer is required.';
const NOT_A_NUMBER = 'A valid number is required.';
const NOT_NEGATIVE = 'Ensure this value is greater than or equal to 0.';
const NOT_A_PK = 'Incorrect type. Expected pk value.';
const NOT_A_DICT = 'Invalid data. Expected a dictionary.';

/** Cost column is NUMERIC(5,2). */
const COST_WHOLE_DIGITS = 3;
const COST_DECIMAL_PLACES = 2;

// ---------- field schemas ----------

function nameField() {
  return z
    .string({ required_error: REQUIRED, invalid_type_error: NOT_A_STRING })
    .trim()
    .min(1, BLANK)
    .max(MAX_NAME_LENGTH, `Ensure this field has no more than ${MAX_NAME_LENGTH} characters.`);
}

/** Accepts integers and integer strings ("15"). */
function coerceInteger(value: unknown): unknown {
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return value;
}

const timeMinutesField = z.preprocess(
  coerceInteger,
  z
    .number({ required_error: REQUIRED, invalid_type_error: NOT_AN_INTEGER })
    .int(NOT_AN_INTEGER)
    .min(0, NOT_NEGATIVE)
    .max(MAX_ID, `Ensure this value is less than or equal to ${MAX_ID}.`),
);

/**
 * Accepts numbers and numeric strings, normalized to a two-place decimal
 * string ("5.5" and 5.5 both become "5.50").
 */
const costField = z.preprocess(
  (value) => (typeof value === 'number' && Number.isFinite(value) ? String(value) : value),
  z
    .string({ required_error: REQUIRED, invalid_type_error: NOT_A_NUMBER })
    .trim()
    .transform((value, ctx) => {
      const match = /^(-?)(\d+)(?:\.(\d+))?$/.exec(value);
      if (!match) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: NOT_A_NUMBER });
        return z.NEVER;
      }

      const [, sign, rawWhole, fraction = ''] = match;
      const whole = rawWhole.replace(/^0+(?=\d)/, '');
      if (sign && /[1-9]/.test(`${whole}${fraction}`)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: NOT_NEGATIVE });
        return z.NEVER;
      }
      if (fraction.length > COST_DECIMAL_PLACES) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Ensure that there are no more than ${COST_DECIMAL_PLACES} decimal places.`,
        });
        return z.NEVER;
      }
      if (whole.length > COST_WHOLE_DIGITS) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Ensure that there are no more than ${COST_WHOLE_DIGITS} digits before the decimal point.`,
        });
        return z.NEVER;
      }

      return `${whole}.${fraction.padEnd(COST_DECIMAL_PLACES, '0')}`;
    }),
);

/** List of primary keys; duplicates collapse to their first occurrence. */
const idListField = z
  .array(
    z.preprocess(
      coerceInteger,
      z
        .number({ invalid_type_error: NOT_A_PK })
        .int(NOT_A_PK)
        .positive(NOT_A_PK)
        // Beyond the id column's range, so no such row
        .refine((id) => id <= MAX_ID, (id) => ({ message: `Invalid pk "${id}" - object does not exist.` })),
    ),
    { invalid_type_error: 'Expected a list of items.' },
  )
  .transform((ids) => [...new Set(ids)]);

// ---------- input schemas ----------

export const NamedEntityInputSchema = z.object({ name: nameField() }, { invalid_type_error: NOT_A_DICT });

export const NamedEntityPatchSchema = z.object({ name: nameField().optional() }, { invalid_type_error: NOT_A_DICT });

/** Create and full update (PUT): omitted associations mean "none". */
export const RecipeInputSchema = z.object(
  {
    title: nameField(),
    time_minutes: timeMinutesField,
    cost: costField,
    tags: idListField.default([]),
    ingredients: idListField.default([]),
  },
  { invalid_type_error: NOT_A_DICT },
);

/** Partial update (PATCH): omitted keys are left untouched. */
export const RecipePatchSchema = z.object(
  {
    title: nameField().optional(),
    time_minutes: timeMinutesField.optional(),
    cost: costField.optional(),
    tags: idListField.optional(),
    ingredients: idListField.optional(),
  },
  { invalid_type_error: NOT_A_DICT },
);

export type NamedEntityInput = z.infer<typeof NamedEntityInputSchema>;
export type NamedEntityPatch = z.infer<typeof NamedEntityPatchSchema>;
export type RecipeInput = z.infer<typeof RecipeInputSchema>;
export type RecipePatch = z.infer<typeof RecipePatchSchema>;

// ---------- serializers ----------

export interface NamedEntityWire {
  id: number;
  name: string;
}

export interface RecipeWire {
  id: number;
  title: string;
  time_minutes: number;
  cost: string;
  tags: number[];
  ingredients: number[];
}

export interface RecipeDetailWire extends Omit<RecipeWire, 'tags' | 'ingredients'> {
  tags: NamedEntityWire[];
  ingredients: NamedEntityWire[];
}

export function serializeNamedEntity(entity: NamedEntity): NamedEntityWire {
  return { id: entity.id, name: entity.name };
}

export function serializeRecipe(recipe: Recipe): RecipeWire {
  return {
    id: recipe.id,
    title: recipe.title,
    time_minutes: recipe.time_minutes,
    cost: recipe.cost,
    tags: [...recipe.tags],
    ingredients: [...recipe.ingredients],
  };
}

export function serializeRecipeDetail(recipe: RecipeDetail): RecipeDetailWire {
  return {
    id: recipe.id,
    title: recipe.title,
    time_minutes: recipe.time_minutes,
    cost: recipe.cost,
    tags: recipe.tags.map(serializeNamedEntity),
    ingredients: recipe.ingredients.map(serializeNamedEntity),
  };
}

/** String form of an entity: a tag or ingredient's name, a recipe's title. */
export function displayName(entity: NamedEntity | Pick<Recipe, 'title'>): string {
  return 'name' in entity ? entity.name : entity.title;
}
