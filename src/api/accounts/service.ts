/**
 * User account store: creation, authentication and profile changes.
 *
 * Emails are normalized to lowercase before they are stored or looked up.
 * Passwords only ever reach the repository as scrypt hashes.
 */

import { hashPassword, verifyPassword } from '../auth/password.ts';
import { NotFoundError, ValidationError } from '../errors.ts';
import type { UserRepository } from '../store/types.ts';
import {
  DUPLICATE_EMAIL_MESSAGE,
  MISSING_EMAIL_MESSAGE,
  type CreateUserInput,
  type UpdateProfileInput,
  type User,
  type UserPatch,
  type UserProfile,
} from './types.ts';

/**
 * Hash checked when the email is unknown, so a failed login costs the same
 * whether or not the account exists.
 */
let dummyHash: Promise<string> | null = null;

function getDummyHash(): Promise<string> {
  dummyHash ??= hashPassword('unused-placeholder-password');
  return dummyHash;
}

/** Trims and lowercases an email address. */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/** Projects a user onto the fields the API exposes. */
export function toProfile(user: User): UserProfile {
  return { email: user.email, name: user.name };
}

async function insertUser(
  users: UserRepository,
  input: CreateUserInput,
  flags: { is_staff: boolean; is_superuser: boolean },
): Promise<User> {
  const email = input.email ? normalizeEmail(input.email) : '';
  if (!email) {
    throw ValidationError.forField('email', MISSING_EMAIL_MESSAGE);
  }

  if (await users.findByEmail(email)) {
    throw ValidationError.forField('email', DUPLICATE_EMAIL_MESSAGE);
  }

  const password_hash = input.password ? await hashPassword(input.password) : null;

  return users.create({
    email,
    name: input.name ?? '',
    password_hash,
    ...flags,
  });
}

/**
 * Creates a regular user.
 *
 * @throws {ValidationError} when the email is empty or already registered.
 */
export function createUser(users: UserRepository, input: CreateUserInput): Promise<User> {
  return insertUser(users, input, { is_staff: false, is_superuser: false });
}

/**
 * Creates a user with `is_staff` and `is_superuser` set.
 *
 * @throws {ValidationError} when the email is empty or already registered.
 */
export function createSuperuser(users: UserRepository, input: CreateUserInput): Promise<User> {
  return insertUser(users, input, { is_staff: true, is_superuser: true });
}

/**
 * Checks credentials. Returns null for an unknown email, a wrong password,
 * an account without a usable password, or an inactive account.
 */
export async function authenticate(users: UserRepository, email: string, password: string): Promise<User | null> {
  const user = await users.findByEmail(normalizeEmail(email));
  if (!user) {
    await verifyPassword(password, await getDummyHash());
    return null;
  }

  const valid = await verifyPassword(password, user.password_hash);
  if (!valid || !user.is_active) return null;
  return user;
}

/** Replaces a user's password hash. */
export async function changePassword(users: UserRepository, userId: number, password: string): Promise<User> {
  const updated = await users.update(userId, { password_hash: await hashPassword(password) });
  if (!updated) throw new NotFoundError();
  return updated;
}

/**
 * Applies a profile change. Only supplied keys change; a new email is
 * normalized and must not belong to another account.
 */
export async function updateProfile(users: UserRepository, userId: number, input: UpdateProfileInput): Promise<User> {
  const patch: UserPatch = {};

  if (input.email !== undefined) {
    const email = normalizeEmail(input.email);
    if (!email) {
      throw ValidationError.forField('email', MISSING_EMAIL_MESSAGE);
    }
    const existing = await users.findByEmail(email);
    if (existing && existing.id !== userId) {
      throw ValidationError.forField('email', DUPLICATE_EMAIL_MESSAGE);
    }
    patch.email = email;
  }
  if (input.name !== undefined) patch.name = input.name;
  if (input.password !== undefined) patch.password_hash = await hashPassword(input.password);

  const updated = await users.update(userId, patch);
  if (!updated) throw new NotFoundError();
  return updated;
}
