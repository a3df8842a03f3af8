import { Knex } from 'knex';
import { getDb } from '../database/connection';
import { PAGINATION } from '../../shared/constants';
import type { Paginated } from '../../shared/types';
import { parseNum } from '../lib/money';

export interface ListOptions {
  page?: number;
  limit?: number;
  search?: string;
}

export interface OrderBy {
  column: string;
  order: 'asc' | 'desc';
}

export class BaseService<TRow> {
  protected tableName: string;

  constructor(tableName: string) {
    this.tableName = tableName;
  }

  protected get db(): Knex {
    return getDb();
  }

  /**
   * Run `work` inside the caller's transaction when one is passed,
   * otherwise inside a new one.
   */
  protected inTransaction<T>(
    trx: Knex.Transaction | undefined,
    work: (trx: Knex.Transaction) => Promise<T>,
  ): Promise<T> {
    if (trx) return work(trx);
    return this.db.transaction((t) => work(t));
  }

  async getById(id: string, trx?: Knex): Promise<TRow | undefined> {
    const row: TRow | undefined = await (trx ?? this.db)(this.tableName).where({ id }).first();
    return row;
  }

  protected pageParams(options: ListOptions): { page: number; limit: number; offset: number } {
    const page = Math.max(1, Math.floor(options.page ?? PAGINATION.DEFAULT_PAGE));
    const limit = Math.min(PAGINATION.MAX_LIMIT, Math.max(1, Math.floor(options.limit ?? PAGINATION.DEFAULT_LIMIT)));
    return { page, limit, offset: (page - 1) * limit };
  }

  protected async paginate<T>(query: Knex.QueryBuilder, options: ListOptions, orderBy: OrderBy[]): Promise<Paginated<T>> {
    const { page, limit, offset } = this.pageParams(options);

    const countResult = await query.clone().clearSelect().clearOrder().count({ total: '*' }).first();
    const total = parseNum(countResult?.total);

    const data: T[] = await query.orderBy(orderBy).limit(limit).offset(offset);

    return {
      data,
      total,
      page,
      limit,
      totalPages: Math.ceil(total / limit),
    };
  }
}
