// Runs pending migrations, and the default seed with --seed.
//   npm run db:migrate
//   npm run db:seed

import { getDb, migrateLatest, closeDb } from './connection';
import { seed } from './seeds/001_default_data';
import { moduleLogger } from '../lib/logger';

const log = moduleLogger('migrate');

async function main(): Promise<void> {
  const applied = await migrateLatest();
  log.info({ count: applied.length }, 'Schema is up to date');

  if (process.argv.includes('--seed')) {
    await seed(getDb());
    log.info('Default data seeded');
  }
}

main()
  .catch((err: unknown) => {
    log.error({ err }, 'Migration failed');
    process.exitCode = 1;
  })
  .finally(() => closeDb());
