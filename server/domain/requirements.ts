// Raw-material arithmetic shared by preview, feasibility and execution.
//
// Stock is held in whole units while recipes allow fractional
// quantities per unit, so a requirement has two forms: the exact
// amount the recipe calls for, which decides sufficiency, and the
// whole units actually taken out of stock.

import { roundHalfUp, round4 } from '../lib/money';

export interface RecipeLine {
  raw_item_id: string;
  quantity_per_unit: number;
}

export interface StockedLine extends RecipeLine {
  available: number;
}

const EPSILON = 1e-9;

/** Sum quantity_per_unit per raw item, keeping first-seen order. */
export function aggregateByRawItem(lines: RecipeLine[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const line of lines) {
    totals.set(line.raw_item_id, round4((totals.get(line.raw_item_id) ?? 0) + line.quantity_per_unit));
  }
  return totals;
}

/** Exact raw quantity the recipe calls for over `units` finished units. */
export function requiredQuantity(quantityPerUnit: number, units: number): number {
  return round4(quantityPerUnit * units);
}

/** Whole units deducted from stock for an exact requirement. */
export function consumedQuantity(required: number): number {
  return roundHalfUp(required);
}

export function isSufficient(available: number, required: number): boolean {
  return available + EPSILON >= required;
}

export function shortfallOf(available: number, required: number): number {
  return isSufficient(available, required) ? 0 : round4(required - available);
}

export function maxProducible(lines: StockedLine[]): number {
  if (lines.length === 0) return 0;
  return Math.min(...lines.map((line) => Math.floor(line.available / line.quantity_per_unit + EPSILON)));
}
