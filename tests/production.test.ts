/**
 * Recipes, planning and the batch lifecycle DRAFT → IN_PROCESS → DONE.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { getTestDb, cleanAllData } from './setup';
import { createFinalProduct, createRawMaterial, resetCounters, stockUp } from './helpers/factory';
import { assertStockMatchesLedger } from './helpers/assertions';

import { recipeService } from '../server/services/recipe.service';
import { productionService } from '../server/services/production.service';
import { itemService } from '../server/services/item.service';
import { InsufficientStockError, StateViolationError, ValidationError } from '../server/lib/errors';
import type { Item } from '../shared/types';

let frame: Item;
let motor: Item;
let scooter: Item;

beforeEach(async () => {
  await cleanAllData();
  resetCounters();
  frame = await createRawMaterial('Frame');
  motor = await createRawMaterial('Motor');
  scooter = await createFinalProduct('Scooter');

  await stockUp(frame.id, 10, 30);
  await stockUp(motor.id, 2, 60);
});

async function withRecipe() {
  return recipeService.createRecipe({
    final_product_id: scooter.id,
    items: [
      { raw_item_id: frame.id, quantity_per_unit: 2 },
      { raw_item_id: motor.id, quantity_per_unit: 1 },
    ],
  });
}

describe('Recipes', () => {
  it('creates a recipe and sets the product standard cost', async () => {
    const recipe = await withRecipe();

    expect(recipe.name).toBe('Scooter recipe');
    expect(recipe.final_product_name).toBe('Scooter');
    expect(recipe.standard_cost).toBe(120);
    const frameLine = recipe.items.find((line) => line.raw_item_id === frame.id);
    expect(frameLine).toMatchObject({ raw_item_name: 'Frame', quantity_per_unit: 2, avg_price: 30, line_cost: 60 });

    const product = await itemService.getItem(scooter.id);
    expect(product.standard_cost).toBe(120);
    expect(product.avg_cost).toBe(0);
  });

  it('rejects invalid lines', async () => {
    const other = await createFinalProduct('Bicycle');
    const cases: Array<[Array<{ raw_item_id: string; quantity_per_unit: number }>, string]> = [
      [[], 'A recipe needs at least one raw material'],
      [[{ raw_item_id: frame.id, quantity_per_unit: 0 }], 'Line 1: quantity_per_unit must be greater than zero'],
      [[{ raw_item_id: frame.id, quantity_per_unit: 0.12345 }], 'Line 1: quantity_per_unit has more than 4 decimal places'],
      [[{ raw_item_id: scooter.id, quantity_per_unit: 1 }], 'Line 1: a product cannot be a raw material of itself'],
      [
        [
          { raw_item_id: frame.id, quantity_per_unit: 1 },
          { raw_item_id: frame.id, quantity_per_unit: 2 },
        ],
        `Raw item ${frame.id} appears more than once; combine the quantities`,
      ],
      [
        [{ raw_item_id: other.id, quantity_per_unit: 1 }],
        `Raw item ${other.id} (Bicycle) must be a RAW_MATERIAL, not a FINAL_PRODUCT`,
      ],
    ];

    for (const [items, message] of cases) {
      await expect(recipeService.createRecipe({ final_product_id: scooter.id, items })).rejects.toThrow(message);
    }
  });

  it('allows one recipe per product', async () => {
    const recipe = await withRecipe();
    await expect(withRecipe()).rejects.toThrow(`Product ${scooter.id} already has a recipe (${recipe.id})`);
  });

  it('updates lines and recomputes the standard cost', async () => {
    const recipe = await withRecipe();
    const updated = await recipeService.updateRecipe(recipe.id, {
      name: 'Scooter v2',
      items: [{ raw_item_id: frame.id, quantity_per_unit: 1.5 }],
    });

    expect(updated.name).toBe('Scooter v2');
    expect(updated.items).toHaveLength(1);
    expect(updated.standard_cost).toBe(45);
    expect((await recipeService.getRecipeByProduct(scooter.id)).id).toBe(recipe.id);
  });
});

describe('Production planning', () => {
  it('previews requirements and cost', async () => {
    await withRecipe();
    const preview = await productionService.preview(scooter.id, 3);

    expect(preview.total_estimated_cost).toBe(360);
    expect(preview.cost_per_unit).toBe(120);
    expect(preview.all_sufficient).toBe(false);
    const motorLine = preview.items.find((line) => line.raw_item_id === motor.id);
    expect(motorLine).toEqual({
      raw_item_id: motor.id,
      raw_item_name: 'Motor',
      quantity_per_unit: 1,
      required: 3,
      consumed: 3,
      available: 2,
      avg_price: 60,
      line_cost: 180,
      sufficient: false,
    });
  });

  it('reports the feasible quantity and shortfalls', async () => {
    await withRecipe();

    const infeasible = await productionService.feasibility(scooter.id, 4);
    expect(infeasible.feasible).toBe(false);
    expect(infeasible.max_producible_quantity).toBe(2);
    expect(infeasible.insufficient_items).toEqual([
      { item_id: motor.id, item_name: 'Motor', required: 4, available: 2, shortfall: 2 },
    ]);
    expect(infeasible.message).toBe('Only 2 of 4 units can be produced with current stock');

    const feasible = await productionService.feasibility(scooter.id, 2);
    expect(feasible.feasible).toBe(true);
    expect(feasible.message).toBe('Can produce 2 units');
  });

  it('compares stock with the exact requirement of fractional recipes', async () => {
    const bolt = await createRawMaterial('Bolt');
    const lamp = await createFinalProduct('Lamp');
    await stockUp(bolt.id, 1, 5);
    await recipeService.createRecipe({
      final_product_id: lamp.id,
      items: [{ raw_item_id: bolt.id, quantity_per_unit: 0.4 }],
    });

    const short = await productionService.feasibility(lamp.id, 3);
    expect(short.feasible).toBe(false);
    expect(short.max_producible_quantity).toBe(2);
    expect(short.insufficient_items).toEqual([
      { item_id: bolt.id, item_name: 'Bolt', required: 1.2, available: 1, shortfall: 0.2 },
    ]);
    expect(short.message).toBe('Only 2 of 3 units can be produced with current stock');

    const draft = await productionService.createDraft({
      final_product_id: lamp.id,
      quantity: 3,
      serial_numbers: ['L1', 'L2', 'L3'],
    });
    await expect(productionService.executeDraft(draft.id)).rejects.toThrow(
      'Insufficient raw material stock: Bolt (required 1.2, available 1)',
    );
    expect((await itemService.getItem(bolt.id)).total_quantity).toBe(1);

    await productionService.updateDraft(draft.id, { quantity: 2, serial_numbers: ['L1', 'L2'] });
    const { consumed } = await productionService.executeDraft(draft.id);
    expect(consumed).toHaveLength(1);
    expect(consumed[0]).toMatchObject({ item_id: bolt.id, qty_out: 1 });
    expect((await itemService.getItem(bolt.id)).total_quantity).toBe(0);
    await assertStockMatchesLedger(bolt.id);
  });

  it('needs a recipe', async () => {
    await expect(productionService.preview(scooter.id, 1)).rejects.toThrow(`Product ${scooter.id} has no recipe`);
  });
});

describe('Production batches', () => {
  it('runs a batch from draft to done', async () => {
    await withRecipe();

    const draft = await productionService.createDraft({
      final_product_id: scooter.id,
      quantity: 2,
      serial_numbers: ['SC-002', 'SC-001'],
    });
    expect(draft.id).toMatch(/^PROD-[A-Z]{5}$/);
    expect(draft.stage).toBe('DRAFT');
    expect(draft.serial_numbers).toEqual(['LEH-SC-001', 'LEH-SC-002']);
    expect(draft.total_estimated_cost).toBe(240);
    expect((await itemService.getItem(frame.id)).total_quantity).toBe(10);

    const executed = await productionService.executeDraft(draft.id);
    expect(executed.batch.stage).toBe('IN_PROCESS');
    const frameOut = executed.consumed.find((row) => row.item_id === frame.id);
    const motorOut = executed.consumed.find((row) => row.item_id === motor.id);
    expect(frameOut).toMatchObject({ ref_type: 'PRODUCTION', ref_id: draft.id, qty_in: 0, qty_out: 4, unit_price: 30 });
    expect(motorOut).toMatchObject({ qty_out: 2, unit_price: 60 });
    expect((await itemService.getItem(frame.id)).total_quantity).toBe(6);
    expect((await itemService.getItem(motor.id)).total_quantity).toBe(0);

    await expect(productionService.executeDraft(draft.id)).rejects.toThrow(StateViolationError);

    const completed = await productionService.completeBatch(draft.id);
    expect(completed.batch.stage).toBe('DONE');
    expect(completed.produced).toMatchObject({ item_id: scooter.id, qty_in: 2, qty_out: 0, unit_price: 120 });
    const product = await itemService.getItem(scooter.id);
    expect(product.total_quantity).toBe(2);
    expect(product.avg_cost).toBe(120);

    await expect(productionService.completeBatch(draft.id)).rejects.toThrow(
      `Batch ${draft.id} cannot move from DONE to DONE`,
    );
    await expect(productionService.deleteDraft(draft.id)).rejects.toThrow(StateViolationError);

    for (const item of [frame, motor, scooter]) {
      await assertStockMatchesLedger(item.id);
    }
  });

  it('locks the recipe once a batch is done', async () => {
    const recipe = await withRecipe();
    const draft = await productionService.createDraft({
      final_product_id: scooter.id,
      quantity: 1,
      serial_numbers: ['X1'],
    });
    await productionService.executeDraft(draft.id);
    await productionService.completeBatch(draft.id);

    await expect(recipeService.updateRecipe(recipe.id, { name: 'renamed' })).rejects.toThrow(StateViolationError);
    await expect(recipeService.deleteRecipe(recipe.id)).rejects.toThrow(StateViolationError);
  });

  it('consumes nothing when any raw material is short', async () => {
    await withRecipe();
    const draft = await productionService.createDraft({
      final_product_id: scooter.id,
      quantity: 4,
      serial_numbers: ['A', 'B', 'C', 'D'],
    });

    try {
      await productionService.executeDraft(draft.id);
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientStockError);
      if (err instanceof InsufficientStockError) {
        expect(err.message).toBe('Insufficient raw material stock: Motor (required 4, available 2)');
        expect(err.shortfalls).toEqual([
          { item_id: motor.id, item_name: 'Motor', required: 4, available: 2, shortfall: 2 },
        ]);
      }
    }

    expect((await itemService.getItem(frame.id)).total_quantity).toBe(10);
    expect((await productionService.getBatchDetail(draft.id)).stage).toBe('DRAFT');
    expect(await getTestDb()('stock_ledger').where({ ref_id: draft.id })).toHaveLength(0);
  });

  it('keeps serial numbers unique across batches', async () => {
    await withRecipe();
    await productionService.createDraft({ final_product_id: scooter.id, quantity: 1, serial_numbers: ['A1'] });

    await expect(
      productionService.createDraft({ final_product_id: scooter.id, quantity: 1, serial_numbers: ['leh-a1'] }),
    ).rejects.toThrow('Serial numbers already in use: LEH-A1');
    await expect(
      productionService.createDraft({ final_product_id: scooter.id, quantity: 2, serial_numbers: ['B1'] }),
    ).rejects.toThrow('Expected 2 serial numbers, got 1');
  });

  it('edits a draft batch and its recipe snapshot', async () => {
    const recipe = await withRecipe();
    const draft = await productionService.createDraft({
      final_product_id: scooter.id,
      quantity: 1,
      serial_numbers: ['E1'],
    });

    const updated = await productionService.updateDraft(draft.id, {
      quantity: 2,
      serial_numbers: ['E1', 'E2'],
      recipe_items: [{ raw_item_id: frame.id, quantity_per_unit: 3 }],
    });
    expect(updated.quantity_produced).toBe(2);
    expect(updated.serial_numbers).toEqual(['LEH-E1', 'LEH-E2']);
    expect(updated.recipe_items).toHaveLength(1);
    expect(updated.recipe_items[0]).toMatchObject({ raw_item_id: frame.id, required: 6 });
    expect(updated.total_estimated_cost).toBe(180);

    // master recipe unchanged
    expect((await recipeService.getRecipe(recipe.id)).items).toHaveLength(2);

    await expect(productionService.updateDraft(draft.id, { quantity: 3 })).rejects.toThrow(ValidationError);

    await productionService.deleteDraft(draft.id);
    await expect(productionService.getBatchDetail(draft.id)).rejects.toThrow(`Production batch not found: ${draft.id}`);
    expect(await getTestDb()('production_serials').where({ production_batch_id: draft.id })).toHaveLength(0);
  });

  it('lists batches by stage', async () => {
    await withRecipe();
    const first = await productionService.createDraft({ final_product_id: scooter.id, quantity: 1, serial_numbers: ['L1'] });
    await productionService.createDraft({ final_product_id: scooter.id, quantity: 1, serial_numbers: ['L2'] });
    await productionService.executeDraft(first.id);

    const drafts = await productionService.listBatches({ stage: 'DRAFT' });
    expect(drafts.total).toBe(1);
    const inProcess = await productionService.listBatches({ stage: 'IN_PROCESS' });
    expect(inProcess.data.map((b) => [b.id, b.final_product_name])).toEqual([[first.id, 'Scooter']]);
  });
});
