import { Knex } from 'knex';
import bcrypt from 'bcryptjs';
import { generateUniqueId, nowIso } from '../../lib/ids';

/**
 * Creates the first owner login and a Cash account when the
 * database is empty. Safe to run more than once.
 *
 * Usage: npm run db:seed
 */
export async function seed(knex: Knex): Promise<void> {
  const owner = await knex('users').where({ role: 'owner' }).first('id');
  if (!owner) {
    const now = nowIso();
    await knex('users').insert({
      id: await generateUniqueId(knex, 'owner', 'users'),
      name: 'Owner',
      email: process.env.SEED_OWNER_EMAIL || 'owner@example.com',
      password_hash: await bcrypt.hash(process.env.SEED_OWNER_PASSWORD || 'change-me', 12),
      role: 'owner',
      created_at: now,
      updated_at: now,
    });
  }

  const cash = await knex('payment_accounts').where({ name: 'Cash' }).first('id');
  if (!cash) {
    await knex('payment_accounts').insert({
      id: await generateUniqueId(knex, 'account', 'payment_accounts'),
      name: 'Cash',
      type: 'cash',
      created_at: nowIso(),
    });
  }
}
