// =============================================================
// File: server/services/stock-ledger.service.ts
// Description: Append-only stock movement log.
//   - recordMovement()       → one row per movement; does not
//                              touch item aggregates (callers
//                              drive itemService alongside)
//   - listEntries()          → filtered, paginated, with qty
//                              totals over the whole filter
//   - getItemStockSummary()  → on-hand position of one item
//   - deleteByReference()    → compensating delete, used only
//                              when an invoice is reversed
// =============================================================

import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import { itemService } from './item.service';
import type { Paginated, StockLedgerEntry, StockRefType } from '../../shared/types';
import { ValidationError } from '../lib/errors';
import { generateUniqueId, nowIso } from '../lib/ids';
import { parseNum, round2 } from '../lib/money';

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface StockMovementInput {
  item_id: string;
  ref_type: StockRefType;
  ref_id: string;
  qty_in?: number;
  qty_out?: number;
  unit_price: number;
}

export interface StockLedgerFilters extends ListOptions {
  item_id?: string;
  ref_type?: StockRefType;
  ref_id?: string;
  from_date?: string;
  to_date?: string;
}

export interface StockLedgerRow extends StockLedgerEntry {
  item_name: string;
}

export interface StockLedgerPage extends Paginated<StockLedgerRow> {
  totals: {
    total_qty_in: number;
    total_qty_out: number;
  };
}

export interface ItemStockSummary {
  item_id: string;
  item_name: string;
  current_quantity: number;
  avg_price: number;
  stock_value: number;
  total_qty_in: number;
  total_qty_out: number;
}

/** Next calendar day of a YYYY-MM-DD string, for exclusive upper bounds. */
export function nextDay(date: string): string {
  const d = new Date(`${date}T00:00:00.000Z`);
  if (Number.isNaN(d.getTime())) throw new ValidationError(`Invalid date: ${date}`);
  d.setUTCDate(d.getUTCDate() + 1);
  return d.toISOString().slice(0, 10);
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class StockLedgerService extends BaseService<StockLedgerEntry> {
  constructor() {
    super('stock_ledger');
  }

  async recordMovement(trx: Knex.Transaction, input: StockMovementInput): Promise<StockLedgerEntry> {
    const qtyIn = input.qty_in ?? 0;
    const qtyOut = input.qty_out ?? 0;

    if (!Number.isInteger(qtyIn) || !Number.isInteger(qtyOut) || qtyIn < 0 || qtyOut < 0) {
      throw new ValidationError('Movement quantities must be non-negative integers');
    }
    if ((qtyIn > 0) === (qtyOut > 0)) {
      throw new ValidationError('Exactly one of qty_in and qty_out must be positive');
    }

    const entry: StockLedgerEntry = {
      id: await generateUniqueId(trx, 'stockEntry', 'stock_ledger'),
      item_id: input.item_id,
      ref_type: input.ref_type,
      ref_id: input.ref_id,
      qty_in: qtyIn,
      qty_out: qtyOut,
      unit_price: round2(input.unit_price),
      created_at: nowIso(),
    };
    await trx('stock_ledger').insert(entry);
    return entry;
  }

  async listEntries(filters: StockLedgerFilters = {}): Promise<StockLedgerPage> {
    const query = this.db('stock_ledger as sl')
      .join('items as i', 'i.id', 'sl.item_id')
      .select('sl.*', 'i.name as item_name');

    if (filters.item_id) query.where('sl.item_id', filters.item_id);
    if (filters.ref_type) query.where('sl.ref_type', filters.ref_type);
    if (filters.ref_id) query.where('sl.ref_id', filters.ref_id);
    if (filters.from_date) query.where('sl.created_at', '>=', filters.from_date);
    if (filters.to_date) query.where('sl.created_at', '<', nextDay(filters.to_date));
    if (filters.search) {
      const term = `%${filters.search.toLowerCase()}%`;
      query.where((qb) => {
        qb.whereRaw('lower(i.name) like ?', [term]).orWhereRaw('lower(sl.ref_id) like ?', [term]);
      });
    }

    const sums = await query
      .clone()
      .clearSelect()
      .sum({ total_qty_in: 'sl.qty_in', total_qty_out: 'sl.qty_out' })
      .first();

    const page = await this.paginate<StockLedgerRow>(query, filters, [
      { column: 'sl.created_at', order: 'desc' },
      { column: 'sl.id', order: 'desc' },
    ]);

    return {
      ...page,
      totals: {
        total_qty_in: parseNum(sums?.total_qty_in),
        total_qty_out: parseNum(sums?.total_qty_out),
      },
    };
  }

  async getItemStockSummary(itemId: string): Promise<ItemStockSummary> {
    const item = await itemService.getItem(itemId);
    const sums = await this.db('stock_ledger')
      .where({ item_id: itemId })
      .sum({ total_qty_in: 'qty_in', total_qty_out: 'qty_out' })
      .first();

    return {
      item_id: item.id,
      item_name: item.name,
      current_quantity: item.total_quantity,
      avg_price: item.avg_price,
      stock_value: round2(item.stock_value),
      total_qty_in: parseNum(sums?.total_qty_in),
      total_qty_out: parseNum(sums?.total_qty_out),
    };
  }

  async listByReference(db: Knex, refType: StockRefType, refId: string): Promise<StockLedgerEntry[]> {
    const rows: StockLedgerEntry[] = await db('stock_ledger')
      .where({ ref_type: refType, ref_id: refId })
      .orderBy([{ column: 'created_at' }, { column: 'id' }]);
    return rows;
  }

  async deleteByReference(
    trx: Knex.Transaction,
    refType: StockRefType,
    refId: string,
    itemId?: string,
  ): Promise<number> {
    const query = trx('stock_ledger').where({ ref_type: refType, ref_id: refId });
    if (itemId) query.where({ item_id: itemId });
    return query.delete();
  }
}

export const stockLedgerService = new StockLedgerService();
