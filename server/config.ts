// =============================================================
// File: server/config.ts
// Description: Environment configuration. Loads .env once and
//              validates it; every other module reads settings
//              through getConfig().
// =============================================================

import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_API_PORT, DEFAULT_DB_PORT } from '../shared/constants';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.coerce.number().int().positive().default(DEFAULT_API_PORT),

  DB_CLIENT: z.enum(['pg', 'better-sqlite3']).default('pg'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(DEFAULT_DB_PORT),
  DB_NAME: z.string().default('inventory_ledger'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_FILENAME: z.string().default(':memory:'),

  JWT_SECRET: z.string().min(1).default('dev-secret-change-in-production'),
  JWT_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(86400),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type AppConfig = z.infer<typeof envSchema>;

let config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!config) {
    dotenv.config({ path: path.resolve(__dirname, '../.env') });
    const parsed = envSchema.safeParse(process.env);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(`Invalid environment configuration: ${issues}`);
    }
    config = parsed.data;
  }
  return config;
}
