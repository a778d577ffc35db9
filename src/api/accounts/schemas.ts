import { z } from 'zod';

import type { UserProfile } from './types.ts';

const REQUIRED = 'This field is required.';
const BLANK = 'This field may not be blank.';
const NOT_A_STRING = 'Not a valid string.';
const NOT_A_DICT = 'Invalid data. Expected a dictionary.';

export const MIN_PASSWORD_LENGTH = 5;
const MAX_FIELD_LENGTH = 255;
const TOO_LONG = `Ensure this field has no more than ${MAX_FIELD_LENGTH} characters.`;

const emailField = z
  .string({ required_error: REQUIRED, invalid_type_error: NOT_A_STRING })
  .trim()
  .min(1, BLANK)
  .pipe(z.string().max(MAX_FIELD_LENGTH, TOO_LONG).email('Enter a valid email address.'));

// Passwords are taken verbatim: no trimming.
const passwordField = z
  .string({ required_error: REQUIRED, invalid_type_error: NOT_A_STRING })
  .min(1, BLANK)
  .pipe(
    z
      .string()
      .min(MIN_PASSWORD_LENGTH, `Ensure this field has at least ${MIN_PASSWORD_LENGTH} characters.`)
      .max(128, 'Ensure this field has no more than 128 characters.'),
  );

const nameField = z.string({ invalid_type_error: NOT_A_STRING }).trim().max(MAX_FIELD_LENGTH, TOO_LONG);

/** POST /user/create/ and PUT /user/me/. */
export const UserInputSchema = z.object(
  {
    email: emailField,
    password: passwordField,
    name: nameField.default(''),
  },
  { invalid_type_error: NOT_A_DICT },
);

/** PATCH /user/me/. */
export const UserPatchSchema = z.object(
  {
    email: emailField.optional(),
    password: passwordField.optional(),
    name: nameField.optional(),
  },
  { invalid_type_error: NOT_A_DICT },
);

/** POST /user/token/. */
export const TokenRequestSchema = z.object(
  {
    email: z.string({ required_error: REQUIRED, invalid_type_error: NOT_A_STRING }).trim().min(1, BLANK),
    password: z.string({ required_error: REQUIRED, invalid_type_error: NOT_A_STRING }).min(1, BLANK),
  },
  { invalid_type_error: NOT_A_DICT },
);

export interface TokenResponse {
  token: string;
}

export function serializeProfile(profile: UserProfile): UserProfile {
  return { email: profile.email, name: profile.name };
}
