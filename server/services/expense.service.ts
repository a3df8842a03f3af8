// =============================================================
// File: server/services/expense.service.ts
// Description: Business expenses, optionally categorised. Each
//              expense is paid from a payment account and books
//              one EXPENSE debit against the user it was paid to
//              or for.
// =============================================================

import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import { financialLedgerService } from './financial-ledger.service';
import { paymentAccountService } from './masters.service';
import { expenseCategoryService } from './expense-category.service';
import type { Expense, Paginated } from '../../shared/types';
import { NotFoundError, ValidationError } from '../lib/errors';
import { generateUniqueId, nowIso, today } from '../lib/ids';
import { hasAtMostDecimals, parseNum, round2, toCents } from '../lib/money';
import { moduleLogger } from '../lib/logger';

const log = moduleLogger('expenses');

export interface CreateExpenseInput {
  name: string;
  amount: number;
  account_id: string;
  user_id: string;
  expense_category_id?: string | null;
  expense_date?: string;
  description?: string | null;
}

export interface BulkExpenseInput {
  expense_date?: string;
  items: Array<Omit<CreateExpenseInput, 'expense_date'>>;
}

export interface ExpenseFilters extends ListOptions {
  from_date?: string;
  to_date?: string;
  expense_date?: string;
  account_id?: string;
  user_id?: string;
  expense_category_id?: string;
}

export interface ExpenseRow extends Expense {
  category_name: string | null;
}

export interface ExpensePage extends Paginated<ExpenseRow> {
  /** Sum over every row matching the filters, not just this page. */
  total_amount: number;
}

export interface DailyExpenseTotal {
  date: string;
  total_amount: number;
  count: number;
}

function checkExpense(input: Pick<CreateExpenseInput, 'name' | 'amount'>, label: string): string {
  const name = input.name.trim();
  if (!name) throw new ValidationError(`${label} name is required`);
  if (!Number.isFinite(input.amount) || toCents(input.amount) <= 0) {
    throw new ValidationError(`${label} amount must be greater than zero`);
  }
  if (!hasAtMostDecimals(input.amount, 2)) {
    throw new ValidationError(`${label} amount has more than 2 decimal places`);
  }
  return name;
}

class ExpenseService extends BaseService<Expense> {
  constructor() {
    super('expenses');
  }

  private async insertExpense(trx: Knex.Transaction, input: CreateExpenseInput, name: string): Promise<Expense> {
    await paymentAccountService.requireAccount(trx, input.account_id);
    const user = await trx('users').where({ id: input.user_id }).first('id');
    if (!user) throw new ValidationError(`User ${input.user_id} does not exist`);
    if (input.expense_category_id) {
      await expenseCategoryService.requireCategory(trx, input.expense_category_id);
    }

    const row: Expense = {
      id: await generateUniqueId(trx, 'expense', 'expenses'),
      name,
      amount: round2(input.amount),
      account_id: input.account_id,
      user_id: input.user_id,
      expense_category_id: input.expense_category_id ?? null,
      expense_date: input.expense_date ?? today(),
      description: input.description ?? null,
      created_at: nowIso(),
    };
    await trx('expenses').insert(row);
    await financialLedgerService.record(trx, {
      user_id: row.user_id,
      ref_type: 'EXPENSE',
      ref_id: row.id,
      debit: row.amount,
    });
    return row;
  }

  async createExpense(input: CreateExpenseInput): Promise<Expense> {
    const name = checkExpense(input, 'Expense');
    const expense = await this.db.transaction((trx) => this.insertExpense(trx, input, name));

    log.info({ expense_id: expense.id, amount: expense.amount }, 'Expense recorded');
    return expense;
  }

  /** Records several expenses for one day; all of them or none. */
  async createExpensesBulk(input: BulkExpenseInput): Promise<Expense[]> {
    if (input.items.length === 0) {
      throw new ValidationError('At least one expense is required');
    }
    const names = input.items.map((item, i) => checkExpense(item, `Expense ${i + 1}`));
    const expenseDate = input.expense_date ?? today();

    const created = await this.db.transaction(async (trx) => {
      const rows: Expense[] = [];
      for (const [i, item] of input.items.entries()) {
        rows.push(await this.insertExpense(trx, { ...item, expense_date: expenseDate }, names[i]));
      }
      return rows;
    });

    log.info(
      { count: created.length, expense_date: expenseDate, amount: round2(created.reduce((sum, e) => sum + e.amount, 0)) },
      'Expenses recorded',
    );
    return created;
  }

  async deleteExpense(expenseId: string): Promise<{ id: string }> {
    await this.db.transaction(async (trx) => {
      const expense = await trx('expenses').where({ id: expenseId }).forUpdate().first('id');
      if (!expense) throw new NotFoundError('Expense', expenseId);

      await financialLedgerService.deleteByReference(trx, 'EXPENSE', expenseId);
      await trx('expenses').where({ id: expenseId }).delete();
    });

    log.info({ expense_id: expenseId }, 'Expense deleted');
    return { id: expenseId };
  }

  async listExpenses(filters: ExpenseFilters = {}): Promise<ExpensePage> {
    const query = this.db('expenses as e')
      .leftJoin('expense_categories as c', 'c.id', 'e.expense_category_id')
      .select('e.*', 'c.name as category_name');
    if (filters.account_id) query.where('e.account_id', filters.account_id);
    if (filters.user_id) query.where('e.user_id', filters.user_id);
    if (filters.expense_category_id) query.where('e.expense_category_id', filters.expense_category_id);
    if (filters.expense_date) query.where('e.expense_date', filters.expense_date);
    if (filters.from_date) query.where('e.expense_date', '>=', filters.from_date);
    if (filters.to_date) query.where('e.expense_date', '<=', filters.to_date);
    if (filters.search) {
      const term = `%${filters.search.toLowerCase()}%`;
      query.where((qb) => {
        qb.whereRaw('lower(e.name) like ?', [term])
          .orWhereRaw('lower(e.description) like ?', [term])
          .orWhereRaw('lower(c.name) like ?', [term]);
      });
    }

    const sums = await query.clone().clearSelect().sum({ total_amount: 'e.amount' }).first();
    const page = await this.paginate<ExpenseRow>(query, filters, [
      { column: 'e.expense_date', order: 'desc' },
      { column: 'e.created_at', order: 'desc' },
    ]);
    return { ...page, total_amount: round2(parseNum(sums?.total_amount)) };
  }

  async getTodayTotal(userId?: string): Promise<DailyExpenseTotal> {
    const date = today();
    const query = this.db('expenses').where({ expense_date: date });
    if (userId) query.where('user_id', userId);
    const sums = await query.sum({ total_amount: 'amount' }).count({ count: '*' }).first();

    return {
      date,
      total_amount: round2(parseNum(sums?.total_amount)),
      count: parseNum(sums?.count),
    };
  }
}

export const expenseService = new ExpenseService();
