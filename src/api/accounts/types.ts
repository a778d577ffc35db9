/**
 * Types for the user account store.
 *
 * Property names use snake_case to match the column and wire naming.
 */

export const MISSING_EMAIL_MESSAGE = 'Users must have an email address.';
export const DUPLICATE_EMAIL_MESSAGE = 'user with this email already exists.';

/** A user account as stored. Never serialized directly. */
export interface User {
  id: number;
  /** Lowercased, unique. */
  email: string;
  name: string;
  /** scrypt hash; null when the account has no usable password. */
  password_hash: string | null;
  is_active: boolean;
  is_staff: boolean;
  is_superuser: boolean;
}

/** Row shape handed to UserRepository.create. */
export interface NewUser {
  email: string;
  name: string;
  password_hash: string | null;
  is_staff: boolean;
  is_superuser: boolean;
}

/** Columns UserRepository.update may change. */
export type UserPatch = Partial<Pick<User, 'email' | 'name' | 'password_hash' | 'is_active'>>;

/** Input for createUser / createSuperuser. */
export interface CreateUserInput {
  email: string | null | undefined;
  password?: string | null;
  name?: string;
}

/** Input for updateProfile. Only supplied keys change. */
export interface UpdateProfileInput {
  email?: string;
  name?: string;
  password?: string;
}

/** Public projection of a user, as returned by /user/ endpoints. */
export interface UserProfile {
  email: string;
  name: string;
}
