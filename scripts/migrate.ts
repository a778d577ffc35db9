/**
 * Apply or roll back database migrations.
 * Usage: tsx scripts/migrate.ts [up|down] [steps]
 */
import { createPool } from '../src/db.ts';
import { runMigrate, type MigrationDirection } from '../src/migrate.ts';

function parseDirection(raw: string | undefined): MigrationDirection {
  if (raw === undefined || raw === 'up') return 'up';
  if (raw === 'down') return 'down';
  throw new Error(`Unknown direction "${raw}" (expected "up" or "down")`);
}

async function main() {
  const direction = parseDirection(process.argv[2]);
  const steps = process.argv[3] ? Number.parseInt(process.argv[3], 10) : undefined;
  if (steps !== undefined && (!Number.isInteger(steps) || steps < 1)) {
    throw new Error(`steps must be a positive integer, got "${process.argv[3]}"`);
  }

  const pool = createPool(process.env.DATABASE_URL || undefined, { max: 1 });
  try {
    console.log(await runMigrate(pool, direction, { steps }));
  } finally {
    await pool.end();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
