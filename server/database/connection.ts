import knex, { Knex } from 'knex';
import pg from 'pg';
import { buildKnexConfig } from './knexfile';
import { moduleLogger } from '../lib/logger';
import { toIsoTimestamp } from '../lib/ids';

// pg hands NUMERIC and BIGINT back as strings and timestamps as Date;
// the services expect numbers, ISO-8601 timestamps and YYYY-MM-DD dates
// on every client.
const PG_NUMERIC = 1700;
const PG_INT8 = 20;
const PG_DATE = 1082;
const PG_TIMESTAMP = 1114;
const PG_TIMESTAMPTZ = 1184;

pg.types.setTypeParser(PG_NUMERIC, (value: string) => parseFloat(value));
pg.types.setTypeParser(PG_INT8, (value: string) => parseInt(value, 10));
pg.types.setTypeParser(PG_DATE, (value: string) => value);
pg.types.setTypeParser(PG_TIMESTAMP, toIsoTimestamp);
pg.types.setTypeParser(PG_TIMESTAMPTZ, toIsoTimestamp);

const log = moduleLogger('db');

let db: Knex | null = null;

export function getDb(): Knex {
  if (!db) {
    db = knex(buildKnexConfig());
  }
  return db;
}

export async function initializeDb(): Promise<void> {
  const database = getDb();
  try {
    await database.raw('SELECT 1');
    log.info({ client: database.client.config.client }, 'Database connected');
  } catch (error) {
    log.error({ err: error }, 'Failed to connect to database');
    throw error;
  }
}

export async function migrateLatest(): Promise<string[]> {
  const [, applied] = await getDb().migrate.latest();
  if (applied.length > 0) {
    log.info({ applied }, 'Migrations applied');
  }
  return applied;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    log.info('Connection closed');
  }
}
