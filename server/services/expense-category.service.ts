import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import type { ExpenseCategory, Paginated } from '../../shared/types';
import { NotFoundError, StateViolationError, ValidationError } from '../lib/errors';
import { generateUniqueId, nowIso } from '../lib/ids';
import { moduleLogger } from '../lib/logger';

const log = moduleLogger('expense-categories');

class ExpenseCategoryService extends BaseService<ExpenseCategory> {
  constructor() {
    super('expense_categories');
  }

  private async assertNameFree(db: Knex, name: string, excludeId?: string): Promise<void> {
    const query = db('expense_categories').whereRaw('lower(name) = ?', [name.toLowerCase()]);
    if (excludeId) query.whereNot('id', excludeId);
    const existing = await query.first('id');
    if (existing) throw new ValidationError(`Expense category ${name} already exists`);
  }

  async createCategory(input: { name: string }): Promise<ExpenseCategory> {
    const name = input.name.trim();
    if (!name) throw new ValidationError('Category name is required');

    const category = await this.db.transaction(async (trx) => {
      await this.assertNameFree(trx, name);
      const now = nowIso();
      const row: ExpenseCategory = {
        id: await generateUniqueId(trx, 'expenseCategory', 'expense_categories'),
        name,
        created_at: now,
        updated_at: now,
      };
      await trx('expense_categories').insert(row);
      return row;
    });

    log.info({ category_id: category.id, name }, 'Expense category created');
    return category;
  }

  async renameCategory(id: string, input: { name: string }): Promise<ExpenseCategory> {
    const name = input.name.trim();
    if (!name) throw new ValidationError('Category name is required');

    return this.db.transaction(async (trx) => {
      const category: ExpenseCategory | undefined = await trx('expense_categories').where({ id }).forUpdate().first();
      if (!category) throw new NotFoundError('Expense category', id);
      await this.assertNameFree(trx, name, id);

      const updated: ExpenseCategory = { ...category, name, updated_at: nowIso() };
      await trx('expense_categories').where({ id }).update({ name, updated_at: updated.updated_at });
      return updated;
    });
  }

  async deleteCategory(id: string): Promise<{ id: string }> {
    await this.db.transaction(async (trx) => {
      const category = await trx('expense_categories').where({ id }).forUpdate().first('id');
      if (!category) throw new NotFoundError('Expense category', id);

      const used = await trx('expenses').where({ expense_category_id: id }).first('id');
      if (used) {
        throw new StateViolationError(`Expense category ${id} still has expenses; reassign or delete them first`);
      }
      await trx('expense_categories').where({ id }).delete();
    });

    log.info({ category_id: id }, 'Expense category deleted');
    return { id };
  }

  async getCategory(id: string): Promise<ExpenseCategory> {
    const category = await this.getById(id);
    if (!category) throw new NotFoundError('Expense category', id);
    return category;
  }

  async requireCategory(db: Knex, id: string): Promise<ExpenseCategory> {
    const category: ExpenseCategory | undefined = await db('expense_categories').where({ id }).first();
    if (!category) throw new ValidationError(`Expense category ${id} does not exist`);
    return category;
  }

  async listCategories(filters: ListOptions = {}): Promise<Paginated<ExpenseCategory>> {
    const query = this.db('expense_categories').select('*');
    if (filters.search) {
      const term = `%${filters.search.toLowerCase()}%`;
      query.where((qb) => {
        qb.whereRaw('lower(name) like ?', [term]).orWhereRaw('lower(id) like ?', [term]);
      });
    }
    return this.paginate<ExpenseCategory>(query, filters, [{ column: 'name', order: 'asc' }]);
  }
}

export const expenseCategoryService = new ExpenseCategoryService();
