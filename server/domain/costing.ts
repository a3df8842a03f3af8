// =============================================================
// File: server/domain/costing.ts
// Description: Weighted-average costing arithmetic.
//
//   incoming:  value' = value + q_in·price,      avg' = value' / q'
//   outgoing:  value' = value · q' / q,          avg unchanged
//   reversal:  value' = value − q_rm·price_rm,   avg' = value' / q'
//
// Positions carry their total value; the average is derived from
// it. Reversing an incoming movement subtracts its exact value.
//
// Pure functions over a StockPosition. Persisting the result is
// the item repository's job (item.service.ts).
// =============================================================

import { InsufficientStockError, ValidationError } from '../lib/errors';
import { round6 } from '../lib/money';

export interface StockPosition {
  quantity: number;
  /** Total value of the units on hand, at 6 decimal places. */
  value: number;
  avgCost: number;
}

export const EMPTY_POSITION: Readonly<StockPosition> = { quantity: 0, value: 0, avgCost: 0 };

function assertQuantity(qty: number, label: string): void {
  if (!Number.isInteger(qty) || qty < 0) {
    throw new ValidationError(`${label} must be a non-negative integer, got ${qty}`);
  }
}

function positionFrom(quantity: number, value: number): StockPosition {
  if (quantity === 0) return { ...EMPTY_POSITION };
  const carried = Math.max(0, round6(value));
  return { quantity, value: carried, avgCost: round6(carried / quantity) };
}

export function applyIncoming(position: StockPosition, qty: number, unitPrice: number): StockPosition {
  assertQuantity(qty, 'Incoming quantity');
  if (unitPrice < 0) {
    throw new ValidationError(`Unit price cannot be negative, got ${unitPrice}`);
  }
  return positionFrom(position.quantity + qty, position.value + qty * unitPrice);
}

export function applyOutgoing(position: StockPosition, qty: number, itemId = 'unknown'): StockPosition {
  assertQuantity(qty, 'Outgoing quantity');
  if (qty > position.quantity) {
    throw new InsufficientStockError(`Insufficient stock for item ${itemId}`, [
      { item_id: itemId, required: qty, available: position.quantity, shortfall: qty - position.quantity },
    ]);
  }

  const quantity = position.quantity - qty;
  if (quantity === 0) return { ...EMPTY_POSITION };
  return {
    quantity,
    value: round6((position.value * quantity) / position.quantity),
    avgCost: position.avgCost,
  };
}

/**
 * Undo an earlier incoming movement. Exact only when nothing else
 * moved the item in between; a negative value clamps to zero.
 */
export function reverseIncoming(
  position: StockPosition,
  removedQty: number,
  removedPrice: number,
  itemId = 'unknown',
): StockPosition {
  assertQuantity(removedQty, 'Reversed quantity');
  if (removedQty > position.quantity) {
    throw new InsufficientStockError(`Cannot reverse ${removedQty} units of item ${itemId}: stock already consumed`, [
      {
        item_id: itemId,
        required: removedQty,
        available: position.quantity,
        shortfall: removedQty - position.quantity,
      },
    ]);
  }
  return positionFrom(position.quantity - removedQty, position.value - removedQty * removedPrice);
}
