import type { Knex } from 'knex';
import { getConfig } from '../config';
import { moduleLogger } from '../lib/logger';
import { migrationSource } from './migrations';

export function buildKnexConfig(): Knex.Config {
  const cfg = getConfig();
  const log = moduleLogger('knex');

  const common: Knex.Config = {
    migrations: {
      migrationSource,
      tableName: 'knex_migrations',
    },
    log: {
      warn: (message: unknown) => log.warn({ detail: message }, 'knex warning'),
      error: (message: unknown) => log.error({ detail: message }, 'knex error'),
      deprecate: (method: string, alternative: string) => log.warn({ method, alternative }, 'knex deprecation'),
      debug: (message: unknown) => log.debug({ detail: message }, 'knex debug'),
    },
  };

  if (cfg.DB_CLIENT === 'better-sqlite3') {
    return {
      ...common,
      client: 'better-sqlite3',
      connection: { filename: cfg.DB_FILENAME },
      useNullAsDefault: true,
      pool: { min: 1, max: 1 },
    };
  }

  return {
    ...common,
    client: 'pg',
    connection: {
      host: cfg.DB_HOST,
      port: cfg.DB_PORT,
      database: cfg.DB_NAME,
      user: cfg.DB_USER,
      password: cfg.DB_PASSWORD,
    },
    pool: {
      min: 2,
      max: 10,
    },
  };
}

export default buildKnexConfig;
