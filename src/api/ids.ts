/** Upper bound of a PostgreSQL `integer` column, and so of every id. */
export const MAX_ID = 2_147_483_647;

const ID_REGEX = /^[1-9]\d{0,9}$/;

/** Parses a decimal id string. Returns null for anything that cannot be a row id. */
export function parseIdString(raw: string): number | null {
  if (!ID_REGEX.test(raw)) return null;
  const id = Number.parseInt(raw, 10);
  return id <= MAX_ID ? id : null;
}
