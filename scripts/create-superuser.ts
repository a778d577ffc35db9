/**
 * Create an administrator account.
 * Usage: tsx scripts/create-superuser.ts <email> <password> [name]
 */
import { createSuperuser } from '../src/api/accounts/service.ts';
import { ValidationError } from '../src/api/errors.ts';
import { PostgresStore } from '../src/api/store/index.ts';
import { createPool } from '../src/db.ts';

async function main() {
  const [email, password, name] = process.argv.slice(2);
  if (!email || !password) {
    console.error('Usage: tsx scripts/create-superuser.ts <email> <password> [name]');
    process.exit(2);
  }

  const store = new PostgresStore(createPool(process.env.DATABASE_URL || undefined, { max: 1 }));
  try {
    const user = await createSuperuser(store.users, { email, password, name });
    console.log(`Created superuser ${user.email} (id ${user.id})`);
  } catch (e) {
    if (e instanceof ValidationError) {
      for (const [field, messages] of Object.entries(e.fields)) {
        console.error(`${field}: ${messages.join(' ')}`);
      }
      process.exitCode = 1;
      return;
    }
    throw e;
  } finally {
    await store.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
