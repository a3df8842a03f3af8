// =============================================================
// File: server/services/financial-ledger.service.ts
// Description: Append-only debit/credit log per counterparty.
//              A purchase debits the supplier ("we owe them"),
//              a payment credits them. Balance = Σdebit − Σcredit.
// =============================================================

import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import type { FinancialLedgerEntry, FinancialRefType, Paginated } from '../../shared/types';
import { nextDay } from './stock-ledger.service';
import { ValidationError } from '../lib/errors';
import { generateUniqueId, nowIso } from '../lib/ids';
import { parseNum, round2, toCents } from '../lib/money';

export interface LedgerEntryInput {
  user_id: string;
  ref_type: FinancialRefType;
  ref_id: string;
  debit?: number;
  credit?: number;
}

export interface FinancialLedgerFilters extends ListOptions {
  user_id?: string;
  ref_type?: FinancialRefType;
  ref_id?: string;
  from_date?: string;
  to_date?: string;
}

export interface LedgerBalance {
  user_id: string;
  total_debit: number;
  total_credit: number;
  balance: number;
}

export interface FinancialLedgerPage extends Paginated<FinancialLedgerEntry> {
  totals: { total_debit: number; total_credit: number; balance: number };
}

class FinancialLedgerService extends BaseService<FinancialLedgerEntry> {
  constructor() {
    super('financial_ledger');
  }

  async record(trx: Knex.Transaction, input: LedgerEntryInput): Promise<FinancialLedgerEntry> {
    const debit = round2(input.debit ?? 0);
    const credit = round2(input.credit ?? 0);
    if (debit < 0 || credit < 0) {
      throw new ValidationError('Ledger amounts cannot be negative');
    }
    if ((toCents(debit) > 0) === (toCents(credit) > 0)) {
      throw new ValidationError('Exactly one of debit and credit must be positive');
    }

    const entry: FinancialLedgerEntry = {
      id: await generateUniqueId(trx, 'ledgerEntry', 'financial_ledger'),
      user_id: input.user_id,
      ref_type: input.ref_type,
      ref_id: input.ref_id,
      debit,
      credit,
      created_at: nowIso(),
    };
    await trx('financial_ledger').insert(entry);
    return entry;
  }

  async getBalance(userId: string, db: Knex = this.db): Promise<LedgerBalance> {
    const sums = await db('financial_ledger')
      .where({ user_id: userId })
      .sum({ total_debit: 'debit', total_credit: 'credit' })
      .first();
    const totalDebit = round2(parseNum(sums?.total_debit));
    const totalCredit = round2(parseNum(sums?.total_credit));
    return {
      user_id: userId,
      total_debit: totalDebit,
      total_credit: totalCredit,
      balance: round2(totalDebit - totalCredit),
    };
  }

  async listEntries(filters: FinancialLedgerFilters = {}): Promise<FinancialLedgerPage> {
    const query = this.db('financial_ledger').select('*');
    if (filters.user_id) query.where('user_id', filters.user_id);
    if (filters.ref_type) query.where('ref_type', filters.ref_type);
    if (filters.ref_id) query.where('ref_id', filters.ref_id);
    if (filters.from_date) query.where('created_at', '>=', filters.from_date);
    if (filters.to_date) query.where('created_at', '<', nextDay(filters.to_date));

    const sums = await query.clone().clearSelect().sum({ total_debit: 'debit', total_credit: 'credit' }).first();
    const page = await this.paginate<FinancialLedgerEntry>(query, filters, [
      { column: 'created_at', order: 'desc' },
      { column: 'id', order: 'desc' },
    ]);

    const totalDebit = round2(parseNum(sums?.total_debit));
    const totalCredit = round2(parseNum(sums?.total_credit));
    return {
      ...page,
      totals: { total_debit: totalDebit, total_credit: totalCredit, balance: round2(totalDebit - totalCredit) },
    };
  }

  async deleteByReference(trx: Knex.Transaction, refType: FinancialRefType, refId: string): Promise<number> {
    return trx('financial_ledger').where({ ref_type: refType, ref_id: refId }).delete();
  }
}

export const financialLedgerService = new FinancialLedgerService();
