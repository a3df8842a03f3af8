// =============================================================
// File: server/services/recipe.service.ts
// Description: Master recipes (bill of materials), one per final
//              product. Saving a recipe recomputes the product's
//              standard cost; the purchased average is separate
//              and is never written here. Recipes are frozen
//              while the product has a DONE batch.
// =============================================================

import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import { itemService } from './item.service';
import type { Item, Paginated, Recipe, RecipeItem } from '../../shared/types';
import { NotFoundError, StateViolationError, ValidationError } from '../lib/errors';
import { generateUniqueId, nowIso } from '../lib/ids';
import { hasAtMostDecimals, round2, round4 } from '../lib/money';
import { moduleLogger } from '../lib/logger';

const log = moduleLogger('recipes');

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface RecipeItemInput {
  raw_item_id: string;
  quantity_per_unit: number;
}

export interface CreateRecipeInput {
  final_product_id: string;
  name?: string;
  items: RecipeItemInput[];
}

export interface UpdateRecipeInput {
  name?: string;
  items?: RecipeItemInput[];
}

export interface RecipeLineDetail extends RecipeItem {
  raw_item_name: string;
  unit_type: string;
  avg_price: number;
  line_cost: number;
}

export interface RecipeDetail extends Recipe {
  final_product_name: string;
  standard_cost: number;
  items: RecipeLineDetail[];
}

export interface RecipeListRow extends Recipe {
  final_product_name: string;
  standard_cost: number;
}

// ────────────────────────────────────────────────────────────
// Shared validation (also used for batch snapshots)
// ────────────────────────────────────────────────────────────

/**
 * Recipe lines must name distinct raw materials, none of them the
 * product itself, each with a positive quantity per unit.
 */
export async function validateRecipeItems(
  db: Knex,
  finalProductId: string,
  items: RecipeItemInput[],
): Promise<Map<string, Item>> {
  if (items.length === 0) {
    throw new ValidationError('A recipe needs at least one raw material');
  }

  const seen = new Set<string>();
  items.forEach((line, i) => {
    if (!Number.isFinite(line.quantity_per_unit) || line.quantity_per_unit <= 0) {
      throw new ValidationError(`Line ${i + 1}: quantity_per_unit must be greater than zero`);
    }
    if (!hasAtMostDecimals(line.quantity_per_unit, 4)) {
      throw new ValidationError(`Line ${i + 1}: quantity_per_unit has more than 4 decimal places`);
    }
    if (line.raw_item_id === finalProductId) {
      throw new ValidationError(`Line ${i + 1}: a product cannot be a raw material of itself`);
    }
    if (seen.has(line.raw_item_id)) {
      throw new ValidationError(`Raw item ${line.raw_item_id} appears more than once; combine the quantities`);
    }
    seen.add(line.raw_item_id);
  });

  const rawItems = new Map<string, Item>();
  for (const line of items) {
    rawItems.set(line.raw_item_id, await itemService.requireKind(db, line.raw_item_id, 'RAW_MATERIAL', 'Raw item'));
  }
  return rawItems;
}

export function standardCostOf(items: RecipeItemInput[], rawItems: Map<string, Item>): number {
  const total = items.reduce(
    (sum, line) => sum + line.quantity_per_unit * (rawItems.get(line.raw_item_id)?.avg_cost ?? 0),
    0,
  );
  return round2(total);
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class RecipeService extends BaseService<Recipe> {
  constructor() {
    super('recipes');
  }

  async assertNoDoneBatch(db: Knex, finalProductId: string): Promise<void> {
    const done = await db('production_batches')
      .where({ final_product_id: finalProductId, stage: 'DONE' })
      .first('id');
    if (done) {
      throw new StateViolationError(
        `Recipe for product ${finalProductId} is locked: completed batches exist (e.g. ${done.id})`,
        { final_product_id: finalProductId },
      );
    }
  }

  private async replaceItems(trx: Knex.Transaction, recipe: Recipe, items: RecipeItemInput[]): Promise<number> {
    const rawItems = await validateRecipeItems(trx, recipe.final_product_id, items);

    await trx('recipe_items').where({ recipe_id: recipe.id }).delete();
    for (const line of items) {
      const row: RecipeItem = {
        id: await generateUniqueId(trx, 'recipeItem', 'recipe_items'),
        recipe_id: recipe.id,
        raw_item_id: line.raw_item_id,
        quantity_per_unit: round4(line.quantity_per_unit),
      };
      await trx('recipe_items').insert(row);
    }

    return itemService.setStandardCost(trx, recipe.final_product_id, standardCostOf(items, rawItems));
  }

  async createRecipe(input: CreateRecipeInput): Promise<RecipeDetail> {
    const detail = await this.db.transaction(async (trx) => {
      const product = await itemService.requireKind(trx, input.final_product_id, 'FINAL_PRODUCT', 'Final product');
      const existing = await trx('recipes').where({ final_product_id: product.id }).first('id');
      if (existing) {
        throw new ValidationError(`Product ${product.id} already has a recipe (${existing.id})`);
      }
      await this.assertNoDoneBatch(trx, product.id);

      const now = nowIso();
      const recipe: Recipe = {
        id: await generateUniqueId(trx, 'recipe', 'recipes'),
        final_product_id: product.id,
        name: input.name?.trim() || `${product.name} recipe`,
        created_at: now,
        updated_at: now,
      };
      await trx('recipes').insert(recipe);
      await this.replaceItems(trx, recipe, input.items);

      return this.getRecipe(recipe.id, trx);
    });

    log.info({ recipe_id: detail.id, final_product_id: detail.final_product_id, standard_cost: detail.standard_cost }, 'Recipe created');
    return detail;
  }

  async updateRecipe(recipeId: string, input: UpdateRecipeInput): Promise<RecipeDetail> {
    const detail = await this.db.transaction(async (trx) => {
      const recipe: Recipe | undefined = await trx('recipes').where({ id: recipeId }).forUpdate().first();
      if (!recipe) throw new NotFoundError('Recipe', recipeId);
      await this.assertNoDoneBatch(trx, recipe.final_product_id);

      const name = input.name?.trim();
      await trx('recipes')
        .where({ id: recipeId })
        .update({ name: name || recipe.name, updated_at: nowIso() });
      if (input.items) {
        await this.replaceItems(trx, recipe, input.items);
      }

      return this.getRecipe(recipeId, trx);
    });

    log.info({ recipe_id: recipeId, standard_cost: detail.standard_cost }, 'Recipe updated');
    return detail;
  }

  async deleteRecipe(recipeId: string): Promise<{ id: string }> {
    await this.db.transaction(async (trx) => {
      const recipe: Recipe | undefined = await trx('recipes').where({ id: recipeId }).forUpdate().first();
      if (!recipe) throw new NotFoundError('Recipe', recipeId);
      await this.assertNoDoneBatch(trx, recipe.final_product_id);

      await trx('recipe_items').where({ recipe_id: recipeId }).delete();
      await trx('recipes').where({ id: recipeId }).delete();
    });

    log.info({ recipe_id: recipeId }, 'Recipe deleted');
    return { id: recipeId };
  }

  // ──────────────────────────────────────────────────────────
  // Queries
  // ──────────────────────────────────────────────────────────

  async getRecipe(recipeId: string, db: Knex = this.db): Promise<RecipeDetail> {
    const recipe: RecipeListRow | undefined = await db('recipes as r')
      .join('items as p', 'p.id', 'r.final_product_id')
      .where('r.id', recipeId)
      .select('r.*', 'p.name as final_product_name', 'p.standard_cost')
      .first();
    if (!recipe) throw new NotFoundError('Recipe', recipeId);

    const rows: Array<RecipeItem & { raw_item_name: string; unit_type: string; avg_price: number }> = await db(
      'recipe_items as ri',
    )
      .join('items as i', 'i.id', 'ri.raw_item_id')
      .where('ri.recipe_id', recipeId)
      .select('ri.*', 'i.name as raw_item_name', 'i.unit_type', 'i.avg_price')
      .orderBy('i.name');

    return {
      ...recipe,
      items: rows.map((row) => ({ ...row, line_cost: round2(row.quantity_per_unit * row.avg_price) })),
    };
  }

  async getRecipeByProduct(finalProductId: string, db: Knex = this.db): Promise<RecipeDetail> {
    const recipe = await db('recipes').where({ final_product_id: finalProductId }).first('id');
    if (!recipe) throw new NotFoundError('Recipe for product', finalProductId);
    return this.getRecipe(recipe.id, db);
  }

  async listRecipes(filters: ListOptions = {}): Promise<Paginated<RecipeListRow>> {
    const query = this.db('recipes as r')
      .join('items as p', 'p.id', 'r.final_product_id')
      .select('r.*', 'p.name as final_product_name', 'p.standard_cost');
    if (filters.search) {
      const term = `%${filters.search.toLowerCase()}%`;
      query.where((qb) => {
        qb.whereRaw('lower(r.name) like ?', [term]).orWhereRaw('lower(p.name) like ?', [term]);
      });
    }
    return this.paginate<RecipeListRow>(query, filters, [
      { column: 'p.name', order: 'asc' },
      { column: 'r.id', order: 'asc' },
    ]);
  }
}

export const recipeService = new RecipeService();
