// =============================================================
// File: server/services/stock-adjustment.service.ts
// Description: Manual stock corrections (opening stock, counts,
//              damage). Each adjustment moves one item through
//              the item repository and writes one ADJUSTMENT row
//              to the stock ledger.
//   in  → valued at the given unit price (re-averages the item)
//   out → taken at the current average; average unchanged
// =============================================================

import { BaseService, ListOptions } from './base.service';
import { itemService } from './item.service';
import { stockLedgerService } from './stock-ledger.service';
import type { AdjustmentDirection, Paginated, StockAdjustment } from '../../shared/types';
import { ValidationError } from '../lib/errors';
import { generateUniqueId, nowIso } from '../lib/ids';
import { hasAtMostDecimals, round2 } from '../lib/money';
import { moduleLogger } from '../lib/logger';

const log = moduleLogger('stock-adjustments');

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface CreateStockAdjustmentInput {
  item_id: string;
  direction: AdjustmentDirection;
  quantity: number;
  unit_price?: number;
  reason: string;
}

export interface StockAdjustmentFilters extends ListOptions {
  item_id?: string;
  direction?: AdjustmentDirection;
}

export interface StockAdjustmentRow extends StockAdjustment {
  item_name: string;
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class StockAdjustmentService extends BaseService<StockAdjustment> {
  constructor() {
    super('stock_adjustments');
  }

  async adjustStock(input: CreateStockAdjustmentInput): Promise<StockAdjustment> {
    if (!Number.isInteger(input.quantity) || input.quantity <= 0) {
      throw new ValidationError('Adjustment quantity must be a positive whole number');
    }
    const reason = input.reason.trim();
    if (!reason) throw new ValidationError('A reason is required');
    if (input.direction === 'in') {
      const price = input.unit_price ?? 0;
      if (price <= 0) throw new ValidationError('unit_price is required for incoming adjustments');
      if (!hasAtMostDecimals(price, 2)) throw new ValidationError('unit_price has more than 2 decimal places');
    }

    const adjustment = await this.db.transaction(async (trx) => {
      const id = await generateUniqueId(trx, 'adjustment', 'stock_adjustments');

      const costing =
        input.direction === 'in'
          ? await itemService.applyIncoming(trx, input.item_id, input.quantity, input.unit_price ?? 0)
          : await itemService.applyOutgoing(trx, input.item_id, input.quantity);
      const unitPrice = input.direction === 'in' ? round2(input.unit_price ?? 0) : costing.avg_price;

      const row: StockAdjustment = {
        id,
        item_id: input.item_id,
        direction: input.direction,
        quantity: input.quantity,
        unit_price: unitPrice,
        reason,
        created_at: nowIso(),
      };
      await trx('stock_adjustments').insert(row);

      await stockLedgerService.recordMovement(trx, {
        item_id: input.item_id,
        ref_type: 'ADJUSTMENT',
        ref_id: id,
        qty_in: input.direction === 'in' ? input.quantity : 0,
        qty_out: input.direction === 'out' ? input.quantity : 0,
        unit_price: unitPrice,
      });
      return row;
    });

    log.info(
      { adjustment_id: adjustment.id, item_id: adjustment.item_id, direction: adjustment.direction, quantity: adjustment.quantity },
      'Stock adjusted',
    );
    return adjustment;
  }

  async listAdjustments(filters: StockAdjustmentFilters = {}): Promise<Paginated<StockAdjustmentRow>> {
    const query = this.db('stock_adjustments as sa')
      .join('items as i', 'i.id', 'sa.item_id')
      .select('sa.*', 'i.name as item_name');
    if (filters.item_id) query.where('sa.item_id', filters.item_id);
    if (filters.direction) query.where('sa.direction', filters.direction);
    if (filters.search) query.whereRaw('lower(sa.reason) like ?', [`%${filters.search.toLowerCase()}%`]);

    return this.paginate<StockAdjustmentRow>(query, filters, [
      { column: 'sa.created_at', order: 'desc' },
      { column: 'sa.id', order: 'desc' },
    ]);
  }
}

export const stockAdjustmentService = new StockAdjustmentService();
