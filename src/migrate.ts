import { readFileSync, readdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool, PoolClient } from 'pg';

export const MIGRATIONS_DIR = resolve(dirname(fileURLToPath(import.meta.url)), '..', 'migrations');

/** Arbitrary constant lock key for this repo. */
const MIGRATION_LOCK_KEY = 74210421;

const NO_TRANSACTION_MARKER = '-- no-transaction';

export type MigrationDirection = 'up' | 'down';

export interface Migration {
  version: number;
  upPath: string;
  downPath: string;
}

export interface MigrateOptions {
  /** Down migrations only: how many to roll back. All when omitted. */
  steps?: number;
  dir?: string;
}

function parseVersion(filename: string): number {
  const m = filename.match(/^(\d+)_/);
  if (!m) throw new Error(`Invalid migration filename (missing numeric prefix): ${filename}`);
  return Number.parseInt(m[1], 10);
}

/** Reads `NNN_name.up.sql` / `NNN_name.down.sql` pairs, ascending by version. */
export function listMigrations(dir: string = MIGRATIONS_DIR): Migration[] {
  const files = readdirSync(dir).sort((a, b) => a.localeCompare(b));
  const byVersion = new Map<number, { upPath?: string; downPath?: string }>();

  for (const f of files) {
    if (!f.endsWith('.sql')) continue;
    const version = parseVersion(f);
    const entry = byVersion.get(version) ?? {};

    const full = resolve(dir, f);
    if (f.endsWith('.up.sql')) entry.upPath = full;
    if (f.endsWith('.down.sql')) entry.downPath = full;
    byVersion.set(version, entry);
  }

  return [...byVersion.entries()]
    .map(([version, { upPath, downPath }]) => {
      if (!upPath || !downPath) {
        throw new Error(`Migration ${version} missing up/down pair`);
      }
      return { version, upPath, downPath };
    })
    .sort((a, b) => a.version - b.version);
}

/**
 * Split a SQL string into individual top-level statements.
 *
 * This is intentionally simple: split on semicolons and skip fragments that
 * are only comments or whitespace. It does NOT handle semicolons inside
 * string literals or dollar-quoted blocks.
 */
export function splitStatements(sql: string): string[] {
  return sql
    .split(';')
    .map((s) => s.trim())
    .filter((s) => s.replace(/--[^\n]*/g, '').trim().length > 0);
}

async function ensureMigrationsTable(client: PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version bigint PRIMARY KEY,
      dirty boolean NOT NULL DEFAULT false,
      applied_at timestamptz NOT NULL DEFAULT now()
    )
  `);
}

/**
 * Runs one migration file plus its bookkeeping statement. Files starting with
 * `-- no-transaction` run statement by statement outside a transaction.
 */
async function applyFile(client: PoolClient, file: string, bookkeeping: [string, unknown[]]): Promise<void> {
  const sql = readFileSync(file, 'utf-8');
  const [recordSql, recordParams] = bookkeeping;

  if (sql.trimStart().startsWith(NO_TRANSACTION_MARKER)) {
    for (const stmt of splitStatements(sql)) {
      await client.query(stmt);
    }
    await client.query(recordSql, recordParams);
    return;
  }

  await client.query('BEGIN');
  try {
    await client.query(sql);
    await client.query(recordSql, recordParams);
    await client.query('COMMIT');
  } catch (e) {
    await client.query('ROLLBACK');
    throw e;
  }
}

/**
 * Applies pending migrations (`up`) or rolls back applied ones (`down`).
 *
 * Uses `schema_migrations` as the source of truth and a session advisory
 * lock, so every statement goes through one checked-out client.
 */
export async function runMigrate(
  pool: Pool,
  direction: MigrationDirection,
  options: MigrateOptions = {},
): Promise<string> {
  const migrations = listMigrations(options.dir);
  const client = await pool.connect();

  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_KEY]);
    try {
      await ensureMigrationsTable(client);

      if (direction === 'up') {
        const applied = await client.query<{ version: number }>(
          'SELECT version::int AS version FROM schema_migrations',
        );
        const appliedSet = new Set(applied.rows.map((r) => r.version));

        let count = 0;
        for (const m of migrations) {
          if (appliedSet.has(m.version)) continue;
          await applyFile(client, m.upPath, [
            'INSERT INTO schema_migrations(version, dirty) VALUES ($1, false) ON CONFLICT (version) DO NOTHING',
            [m.version],
          ]);
          count += 1;
        }
        return `applied ${count} up migrations`;
      }

      const rows = await client.query<{ version: number }>(
        'SELECT version::int AS version FROM schema_migrations ORDER BY version DESC',
      );
      const toRollback = options.steps ? rows.rows.slice(0, options.steps) : rows.rows;

      let count = 0;
      for (const r of toRollback) {
        const m = migrations.find((x) => x.version === r.version);
        if (!m) {
          // Orphan version (file removed during development): forget it.
          await client.query('DELETE FROM schema_migrations WHERE version = $1', [r.version]);
          continue;
        }
        await applyFile(client, m.downPath, ['DELETE FROM schema_migrations WHERE version = $1', [r.version]]);
        count += 1;
      }
      return `applied ${count} down migrations`;
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_KEY]);
    }
  } finally {
    client.release();
  }
}
