// =============================================================
// File: server/services/production.service.ts
// Description: Production batches, DRAFT → IN_PROCESS → DONE.
//   - createDraft()    → serials + copy of the master recipe;
//                        no stock moves
//   - updateDraft()    → quantity, serials and snapshot lines
//   - executeDraft()   → raw materials out, all or nothing,
//                        checked against current stock under lock
//   - completeBatch()  → finished units in
//   - deleteDraft()    → drafts only
//   - preview() / feasibility() → read-only planning
// Raw deduction happens once, at execute; the finished-goods
// credit happens once, at complete.
// =============================================================

import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import { itemService } from './item.service';
import { stockLedgerService } from './stock-ledger.service';
import { RecipeItemInput, validateRecipeItems } from './recipe.service';
import type {
  Item,
  Paginated,
  ProductionBatch,
  ProductionBatchRecipeItem,
  ProductionSerial,
  ProductionStage,
  RecipeItem,
  StockLedgerEntry,
} from '../../shared/types';
import { assertEditable, assertTransition } from '../domain/production-stage';
import {
  aggregateByRawItem,
  consumedQuantity,
  isSufficient,
  maxProducible,
  RecipeLine,
  requiredQuantity,
  shortfallOf,
} from '../domain/requirements';
import { normalizeSerials, serialKey } from '../domain/serials';
import { InsufficientStockError, NotFoundError, StockShortfall, ValidationError } from '../lib/errors';
import { generateUniqueId, nowIso } from '../lib/ids';
import { round2, round4 } from '../lib/money';
import { moduleLogger } from '../lib/logger';

const log = moduleLogger('production');

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface CreateDraftInput {
  final_product_id: string;
  quantity: number;
  serial_numbers: string[];
}

export interface UpdateDraftInput {
  quantity?: number;
  serial_numbers?: string[];
  recipe_items?: RecipeItemInput[];
}

export interface BatchFilters extends ListOptions {
  final_product_id?: string;
  stage?: ProductionStage;
}

export interface RequirementLine {
  raw_item_id: string;
  raw_item_name: string;
  quantity_per_unit: number;
  required: number;
  consumed: number;
  available: number;
  avg_price: number;
  line_cost: number;
  sufficient: boolean;
}

export interface ProductionPreview {
  final_product_id: string;
  final_product_name: string;
  quantity: number;
  items: RequirementLine[];
  all_sufficient: boolean;
  total_estimated_cost: number;
  cost_per_unit: number;
}

export interface ProductionFeasibility {
  final_product_id: string;
  requested_quantity: number;
  feasible: boolean;
  max_producible_quantity: number;
  insufficient_items: StockShortfall[];
  message: string;
}

export interface BatchDetail extends ProductionBatch {
  final_product_name: string;
  serial_numbers: string[];
  recipe_items: RequirementLine[];
  total_estimated_cost: number;
  cost_per_unit: number;
}

export interface BatchListRow extends ProductionBatch {
  final_product_name: string;
}

export interface ExecutionResult {
  batch: BatchDetail;
  consumed: StockLedgerEntry[];
}

export interface CompletionResult {
  batch: BatchDetail;
  produced: StockLedgerEntry;
}

function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new ValidationError(`Quantity must be a whole number of at least 1, got ${quantity}`);
  }
}

function shortfallMessage(shortfalls: StockShortfall[]): string {
  const parts = shortfalls.map(
    (s) => `${s.item_name ?? s.item_id} (required ${s.required}, available ${s.available})`,
  );
  return `Insufficient raw material stock: ${parts.join('; ')}`;
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class ProductionService extends BaseService<ProductionBatch> {
  constructor() {
    super('production_batches');
  }

  private async lockBatch(trx: Knex.Transaction, batchId: string): Promise<ProductionBatch> {
    const batch: ProductionBatch | undefined = await trx('production_batches')
      .where({ id: batchId })
      .forUpdate()
      .first();
    if (!batch) throw new NotFoundError('Production batch', batchId);
    return batch;
  }

  /** Per raw item: quantities, stock and cost for `quantity` finished units. */
  private async requirements(db: Knex, lines: RecipeLine[], quantity: number): Promise<RequirementLine[]> {
    const perUnit = aggregateByRawItem(lines);
    const rows: Item[] = await db('items').whereIn('id', [...perUnit.keys()]);
    const byId = new Map(rows.map((row) => [row.id, row]));

    return [...perUnit.entries()].map(([rawItemId, qpu]) => {
      const item = byId.get(rawItemId);
      const required = requiredQuantity(qpu, quantity);
      const available = item?.total_quantity ?? 0;
      const avgPrice = item?.avg_price ?? 0;
      return {
        raw_item_id: rawItemId,
        raw_item_name: item?.name ?? rawItemId,
        quantity_per_unit: qpu,
        required,
        consumed: consumedQuantity(required),
        available,
        avg_price: avgPrice,
        line_cost: round2(required * avgPrice),
        sufficient: isSufficient(available, required),
      };
    });
  }

  private async masterRecipeLines(db: Knex, finalProductId: string): Promise<RecipeItem[]> {
    const recipe = await db('recipes').where({ final_product_id: finalProductId }).first('id');
    if (!recipe) {
      throw new ValidationError(`Product ${finalProductId} has no recipe`);
    }
    const lines: RecipeItem[] = await db('recipe_items').where({ recipe_id: recipe.id }).orderBy('id');
    if (lines.length === 0) {
      throw new ValidationError(`Recipe for product ${finalProductId} has no raw materials`);
    }
    return lines;
  }

  /** Serials already used by any batch other than `excludeBatchId`. */
  private async assertSerialsAvailable(db: Knex, serials: string[], excludeBatchId?: string): Promise<void> {
    const keys = serials.map(serialKey);
    const query = db('production_serials')
      .whereRaw(`lower(serial_number) in (${keys.map(() => '?').join(', ')})`, keys)
      .select('serial_number', 'production_batch_id');
    if (excludeBatchId) query.whereNot('production_batch_id', excludeBatchId);

    const taken: Array<Pick<ProductionSerial, 'serial_number' | 'production_batch_id'>> = await query;
    if (taken.length > 0) {
      throw new ValidationError(`Serial numbers already in use: ${taken.map((s) => s.serial_number).join(', ')}`, {
        duplicates: taken,
      });
    }
  }

  private async writeSerials(
    trx: Knex.Transaction,
    batch: Pick<ProductionBatch, 'id' | 'final_product_id'>,
    serials: string[],
  ): Promise<void> {
    await trx('production_serials').where({ production_batch_id: batch.id }).delete();
    for (const serial of serials) {
      const row: ProductionSerial = {
        id: await generateUniqueId(trx, 'serial', 'production_serials'),
        production_batch_id: batch.id,
        final_product_id: batch.final_product_id,
        serial_number: serial,
      };
      await trx('production_serials').insert(row);
    }
  }

  private async writeSnapshot(trx: Knex.Transaction, batchId: string, lines: RecipeLine[]): Promise<void> {
    await trx('production_batch_recipe_items').where({ production_batch_id: batchId }).delete();
    for (const line of lines) {
      const row: ProductionBatchRecipeItem = {
        id: await generateUniqueId(trx, 'batchRecipeItem', 'production_batch_recipe_items'),
        production_batch_id: batchId,
        raw_item_id: line.raw_item_id,
        quantity_per_unit: round4(line.quantity_per_unit),
      };
      await trx('production_batch_recipe_items').insert(row);
    }
  }

  private async snapshotLines(db: Knex, batchId: string): Promise<ProductionBatchRecipeItem[]> {
    const rows: ProductionBatchRecipeItem[] = await db('production_batch_recipe_items')
      .where({ production_batch_id: batchId })
      .orderBy('id');
    return rows;
  }

  private async serialNumbers(db: Knex, batchId: string): Promise<string[]> {
    const rows: Array<Pick<ProductionSerial, 'serial_number'>> = await db('production_serials')
      .where({ production_batch_id: batchId })
      .select('serial_number')
      .orderBy('serial_number');
    return rows.map((row) => row.serial_number);
  }

  // ──────────────────────────────────────────────────────────
  // Planning (read-only)
  // ──────────────────────────────────────────────────────────

  async preview(finalProductId: string, quantity: number): Promise<ProductionPreview> {
    assertQuantity(quantity);
    const product = await itemService.requireKind(this.db, finalProductId, 'FINAL_PRODUCT', 'Final product');
    const lines = await this.masterRecipeLines(this.db, finalProductId);
    const items = await this.requirements(this.db, lines, quantity);
    const total = round2(items.reduce((sum, line) => sum + line.required * line.avg_price, 0));

    return {
      final_product_id: product.id,
      final_product_name: product.name,
      quantity,
      items,
      all_sufficient: items.every((line) => line.sufficient),
      total_estimated_cost: total,
      cost_per_unit: round2(total / quantity),
    };
  }

  async feasibility(finalProductId: string, quantity: number): Promise<ProductionFeasibility> {
    assertQuantity(quantity);
    await itemService.requireKind(this.db, finalProductId, 'FINAL_PRODUCT', 'Final product');
    const lines = await this.masterRecipeLines(this.db, finalProductId);
    const items = await this.requirements(this.db, lines, quantity);

    const maxQuantity = maxProducible(items);
    const insufficient: StockShortfall[] = items
      .filter((line) => !line.sufficient)
      .map((line) => ({
        item_id: line.raw_item_id,
        item_name: line.raw_item_name,
        required: line.required,
        available: line.available,
        shortfall: shortfallOf(line.available, line.required),
      }));
    const feasible = insufficient.length === 0 && quantity <= maxQuantity;

    return {
      final_product_id: finalProductId,
      requested_quantity: quantity,
      feasible,
      max_producible_quantity: maxQuantity,
      insufficient_items: insufficient,
      message: feasible
        ? `Can produce ${quantity} units`
        : `Only ${maxQuantity} of ${quantity} units can be produced with current stock`,
    };
  }

  // ──────────────────────────────────────────────────────────
  // DRAFT
  // ──────────────────────────────────────────────────────────

  async createDraft(input: CreateDraftInput): Promise<BatchDetail> {
    assertQuantity(input.quantity);
    const serials = normalizeSerials(input.serial_numbers);
    if (serials.length !== input.quantity) {
      throw new ValidationError(`Expected ${input.quantity} serial numbers, got ${serials.length}`);
    }

    const detail = await this.db.transaction(async (trx) => {
      await itemService.requireKind(trx, input.final_product_id, 'FINAL_PRODUCT', 'Final product');
      const lines = await this.masterRecipeLines(trx, input.final_product_id);
      await this.assertSerialsAvailable(trx, serials);

      const now = nowIso();
      const batch: ProductionBatch = {
        id: await generateUniqueId(trx, 'batch', 'production_batches'),
        final_product_id: input.final_product_id,
        quantity_produced: input.quantity,
        stage: 'DRAFT',
        created_at: now,
        updated_at: now,
      };
      await trx('production_batches').insert(batch);
      await this.writeSerials(trx, batch, serials);
      await this.writeSnapshot(trx, batch.id, lines);

      return this.getBatchDetail(batch.id, trx);
    });

    log.info({ batch_id: detail.id, final_product_id: detail.final_product_id, quantity: detail.quantity_produced }, 'Draft batch created');
    return detail;
  }

  async updateDraft(batchId: string, input: UpdateDraftInput): Promise<BatchDetail> {
    if (input.quantity !== undefined) assertQuantity(input.quantity);

    const detail = await this.db.transaction(async (trx) => {
      const batch = await this.lockBatch(trx, batchId);
      assertEditable(batchId, batch.stage, 'edit');

      const quantity = input.quantity ?? batch.quantity_produced;

      if (input.serial_numbers) {
        const serials = normalizeSerials(input.serial_numbers);
        if (serials.length !== quantity) {
          throw new ValidationError(`Expected ${quantity} serial numbers, got ${serials.length}`);
        }
        await this.assertSerialsAvailable(trx, serials, batchId);
        await this.writeSerials(trx, batch, serials);
      } else if (input.quantity !== undefined) {
        const current = await this.serialNumbers(trx, batchId);
        if (current.length !== quantity) {
          throw new ValidationError(
            `Changing quantity to ${quantity} needs ${quantity} serial numbers; the batch has ${current.length}`,
          );
        }
      }

      if (input.recipe_items) {
        await validateRecipeItems(trx, batch.final_product_id, input.recipe_items);
        await this.writeSnapshot(trx, batchId, input.recipe_items);
      }

      await trx('production_batches')
        .where({ id: batchId })
        .update({ quantity_produced: quantity, updated_at: nowIso() });

      return this.getBatchDetail(batchId, trx);
    });

    log.info({ batch_id: batchId, quantity: detail.quantity_produced }, 'Draft batch updated');
    return detail;
  }

  async deleteDraft(batchId: string): Promise<{ id: string }> {
    await this.db.transaction(async (trx) => {
      const batch = await this.lockBatch(trx, batchId);
      assertEditable(batchId, batch.stage, 'delete');

      await trx('production_serials').where({ production_batch_id: batchId }).delete();
      await trx('production_batch_recipe_items').where({ production_batch_id: batchId }).delete();
      await trx('production_batches').where({ id: batchId }).delete();
    });

    log.info({ batch_id: batchId }, 'Draft batch deleted');
    return { id: batchId };
  }

  // ──────────────────────────────────────────────────────────
  // DRAFT → IN_PROCESS: consume raw materials
  // ──────────────────────────────────────────────────────────

  async executeDraft(batchId: string): Promise<ExecutionResult> {
    const result = await this.db.transaction(async (trx) => {
      const batch = await this.lockBatch(trx, batchId);
      assertTransition(batchId, batch.stage, 'IN_PROCESS');

      const serials = await this.serialNumbers(trx, batchId);
      if (serials.length !== batch.quantity_produced) {
        throw new ValidationError(
          `Batch ${batchId} has ${serials.length} serial numbers for ${batch.quantity_produced} units`,
        );
      }
      const lines = await this.snapshotLines(trx, batchId);
      if (lines.length === 0) {
        throw new ValidationError(`Batch ${batchId} has no recipe items`);
      }

      const perUnit = aggregateByRawItem(lines);
      const locked = await itemService.lockItems(trx, [...perUnit.keys()]);

      const plan = [...perUnit.entries()].map(([rawItemId, qpu]) => {
        const required = requiredQuantity(qpu, batch.quantity_produced);
        return { item: locked.get(rawItemId), rawItemId, required, consumed: consumedQuantity(required) };
      });
      const shortfalls: StockShortfall[] = [];
      for (const step of plan) {
        const available = step.item?.total_quantity ?? 0;
        if (!isSufficient(available, step.required)) {
          shortfalls.push({
            item_id: step.rawItemId,
            item_name: step.item?.name,
            required: step.required,
            available,
            shortfall: shortfallOf(available, step.required),
          });
        }
      }
      if (shortfalls.length > 0) {
        throw new InsufficientStockError(shortfallMessage(shortfalls), shortfalls);
      }

      const consumed: StockLedgerEntry[] = [];
      for (const step of plan) {
        if (step.consumed === 0) continue;
        const costing = await itemService.applyOutgoing(trx, step.rawItemId, step.consumed);
        consumed.push(
          await stockLedgerService.recordMovement(trx, {
            item_id: step.rawItemId,
            ref_type: 'PRODUCTION',
            ref_id: batchId,
            qty_out: step.consumed,
            unit_price: costing.avg_price,
          }),
        );
      }

      await trx('production_batches').where({ id: batchId }).update({ stage: 'IN_PROCESS', updated_at: nowIso() });
      return { batch: await this.getBatchDetail(batchId, trx), consumed };
    });

    log.info({ batch_id: batchId, raw_items: result.consumed.length }, 'Batch executed');
    return result;
  }

  // ──────────────────────────────────────────────────────────
  // IN_PROCESS → DONE: receive finished units
  // ──────────────────────────────────────────────────────────

  async completeBatch(batchId: string): Promise<CompletionResult> {
    const result = await this.db.transaction(async (trx) => {
      const batch = await this.lockBatch(trx, batchId);
      assertTransition(batchId, batch.stage, 'DONE');

      const product = await itemService.lockItem(trx, batch.final_product_id);
      // No new cost information arrives here: value the units at the
      // product's running average, or its standard cost if it has none.
      const unitCost = product.total_quantity > 0 ? product.avg_cost : product.standard_cost;

      await itemService.applyIncoming(trx, product.id, batch.quantity_produced, unitCost);
      const produced = await stockLedgerService.recordMovement(trx, {
        item_id: product.id,
        ref_type: 'PRODUCTION',
        ref_id: batchId,
        qty_in: batch.quantity_produced,
        unit_price: unitCost,
      });

      await trx('production_batches').where({ id: batchId }).update({ stage: 'DONE', updated_at: nowIso() });
      return { batch: await this.getBatchDetail(batchId, trx), produced };
    });

    log.info({ batch_id: batchId, quantity: result.batch.quantity_produced }, 'Batch completed');
    return result;
  }

  // ──────────────────────────────────────────────────────────
  // Queries
  // ──────────────────────────────────────────────────────────

  async getBatchDetail(batchId: string, db: Knex = this.db): Promise<BatchDetail> {
    const batch: BatchListRow | undefined = await db('production_batches as b')
      .join('items as p', 'p.id', 'b.final_product_id')
      .where('b.id', batchId)
      .select('b.*', 'p.name as final_product_name')
      .first();
    if (!batch) throw new NotFoundError('Production batch', batchId);

    const lines = await this.snapshotLines(db, batchId);
    const items = lines.length > 0 ? await this.requirements(db, lines, batch.quantity_produced) : [];
    const total = round2(items.reduce((sum, line) => sum + line.required * line.avg_price, 0));

    return {
      ...batch,
      serial_numbers: await this.serialNumbers(db, batchId),
      recipe_items: items,
      total_estimated_cost: total,
      cost_per_unit: round2(total / batch.quantity_produced),
    };
  }

  async listBatches(filters: BatchFilters = {}): Promise<Paginated<BatchListRow>> {
    const query = this.db('production_batches as b')
      .join('items as p', 'p.id', 'b.final_product_id')
      .select('b.*', 'p.name as final_product_name');
    if (filters.final_product_id) query.where('b.final_product_id', filters.final_product_id);
    if (filters.stage) query.where('b.stage', filters.stage);
    if (filters.search) {
      const term = `%${filters.search.toLowerCase()}%`;
      query.where((qb) => {
        qb.whereRaw('lower(b.id) like ?', [term]).orWhereRaw('lower(p.name) like ?', [term]);
      });
    }
    return this.paginate<BatchListRow>(query, filters, [
      { column: 'b.created_at', order: 'desc' },
      { column: 'b.id', order: 'desc' },
    ]);
  }
}

export const productionService = new ProductionService();
