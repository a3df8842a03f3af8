import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import type { AccountType, PaymentAccount, User, UserRole } from '../../shared/types';
import { NotFoundError, ValidationError } from '../lib/errors';
import { generateUniqueId, IdKind, nowIso } from '../lib/ids';

export type PublicUser = Omit<User, 'password_hash'>;

export function toPublicUser(user: User): PublicUser {
  const { password_hash: _hash, ...rest } = user;
  return rest;
}

const ROLE_ID_KIND: Record<UserRole, IdKind> = {
  owner: 'owner',
  supplier: 'supplier',
  customer: 'customer',
};

// ============================================================
// Counterparty Service (suppliers and customers)
// ============================================================

export interface CreateCounterpartyInput {
  name: string;
  role: Exclude<UserRole, 'owner'>;
  email?: string | null;
}

export interface CounterpartyFilters extends ListOptions {
  role?: UserRole;
}

class CounterpartyService extends BaseService<User> {
  constructor() {
    super('users');
  }

  async createCounterparty(input: CreateCounterpartyInput): Promise<PublicUser> {
    const name = input.name.trim();
    if (!name) throw new ValidationError('Name is required');

    return this.db.transaction(async (trx) => {
      if (input.email) {
        const taken = await trx('users').where({ email: input.email }).first('id');
        if (taken) throw new ValidationError(`Email ${input.email} is already registered`);
      }
      const now = nowIso();
      const user: User = {
        id: await generateUniqueId(trx, ROLE_ID_KIND[input.role], 'users'),
        name,
        email: input.email ?? null,
        password_hash: null,
        role: input.role,
        created_at: now,
        updated_at: now,
      };
      await trx('users').insert(user);
      return toPublicUser(user);
    });
  }

  async getCounterparty(id: string): Promise<PublicUser> {
    const user = await this.getById(id);
    if (!user) throw new NotFoundError('User', id);
    return toPublicUser(user);
  }

  async listCounterparties(filters: CounterpartyFilters = {}) {
    const query = this.db('users').select('id', 'name', 'email', 'role', 'created_at', 'updated_at');
    if (filters.role) query.where('role', filters.role);
    if (filters.search) query.whereRaw('lower(name) like ?', [`%${filters.search.toLowerCase()}%`]);
    return this.paginate<PublicUser>(query, filters, [{ column: 'name', order: 'asc' }, { column: 'id', order: 'asc' }]);
  }

  /** Existing user holding `role`; anything else is a ValidationError. */
  async requireRole(db: Knex, id: string, role: UserRole): Promise<User> {
    const user: User | undefined = await db('users').where({ id }).first();
    if (!user) throw new ValidationError(`${capitalize(role)} ${id} does not exist`);
    if (user.role !== role) {
      throw new ValidationError(`User ${id} is a ${user.role}, not a ${role}`);
    }
    return user;
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

// ============================================================
// Payment Account Service
// ============================================================

class PaymentAccountService extends BaseService<PaymentAccount> {
  constructor() {
    super('payment_accounts');
  }

  async createPaymentAccount(input: { name: string; type: AccountType }): Promise<PaymentAccount> {
    const name = input.name.trim();
    if (!name) throw new ValidationError('Account name is required');

    return this.db.transaction(async (trx) => {
      const existing = await trx('payment_accounts').whereRaw('lower(name) = ?', [name.toLowerCase()]).first('id');
      if (existing) throw new ValidationError(`Payment account ${name} already exists`);

      const account: PaymentAccount = {
        id: await generateUniqueId(trx, 'account', 'payment_accounts'),
        name,
        type: input.type,
        created_at: nowIso(),
      };
      await trx('payment_accounts').insert(account);
      return account;
    });
  }

  async getPaymentAccount(id: string): Promise<PaymentAccount> {
    const account = await this.getById(id);
    if (!account) throw new NotFoundError('Payment account', id);
    return account;
  }

  async listPaymentAccounts(): Promise<PaymentAccount[]> {
    const rows: PaymentAccount[] = await this.db('payment_accounts').orderBy('name');
    return rows;
  }

  async requireAccount(db: Knex, id: string): Promise<PaymentAccount> {
    const account: PaymentAccount | undefined = await db('payment_accounts').where({ id }).first();
    if (!account) throw new ValidationError(`Payment account ${id} does not exist`);
    return account;
  }
}

export const counterpartyService = new CounterpartyService();
export const paymentAccountService = new PaymentAccountService();
