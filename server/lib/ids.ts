import { randomInt } from 'crypto';
import type { Knex } from 'knex';
import { ID_FORMATS, ID_GENERATION_ATTEMPTS } from '../../shared/constants';
import { IntegrityError } from './errors';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

export type IdKind = keyof typeof ID_FORMATS;

export function randomCode(prefix: string, length: number): string {
  let suffix = '';
  for (let i = 0; i < length; i++) {
    suffix += ALPHABET[randomInt(ALPHABET.length)];
  }
  return `${prefix}-${suffix}`;
}

/**
 * Generate a prefixed code (e.g. `PINV-QWERTYUI`) and verify it is
 * not already used in `table.column`. Gives up after a fixed number
 * of collisions.
 */
export async function generateUniqueId(db: Knex, kind: IdKind, table: string, column = 'id'): Promise<string> {
  const { prefix, length } = ID_FORMATS[kind];
  for (let attempt = 0; attempt < ID_GENERATION_ATTEMPTS; attempt++) {
    const candidate = randomCode(prefix, length);
    const existing = await db(table).where(column, candidate).first(column);
    if (!existing) return candidate;
  }
  throw new IntegrityError(`Could not generate a unique ${prefix} identifier for ${table}`);
}

export function nowIso(): string {
  return new Date().toISOString();
}

/** Today's calendar date as YYYY-MM-DD (UTC). */
export function today(): string {
  return nowIso().slice(0, 10);
}

const PG_TIMESTAMP_TEXT = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2})(\.\d+)?(Z|[+-]\d{2}(?::?\d{2})?)?$/;

/**
 * Normalises a database timestamp (`2026-10-19 08:39:00.123+00`) to
 * ISO-8601 UTC. A value without an offset is read as UTC; text that
 * is not a timestamp (`infinity`) comes back unchanged.
 */
export function toIsoTimestamp(value: string): string {
  const match = PG_TIMESTAMP_TEXT.exec(value);
  if (!match) return value;

  const [, date, time, fraction = '', offset = 'Z'] = match;
  const millis = (fraction || '.').padEnd(4, '0').slice(0, 4);
  let zone = offset;
  if (/^[+-]\d{2}$/.test(offset)) zone = `${offset}:00`;
  else if (/^[+-]\d{4}$/.test(offset)) zone = `${offset.slice(0, 3)}:${offset.slice(3)}`;

  const parsed = new Date(`${date}T${time}${millis}${zone}`);
  return Number.isNaN(parsed.getTime()) ? value : parsed.toISOString();
}
