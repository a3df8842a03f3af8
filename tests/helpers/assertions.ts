/**
 * Ledger assertions. Money is compared in cents, with zero tolerance.
 */

import { expect } from 'vitest';
import { getTestDb } from '../setup';
import { financialLedgerService } from '../../server/services/financial-ledger.service';
import { itemService } from '../../server/services/item.service';
import { toCents } from '../../server/lib/money';
import type { PurchaseInvoice, StockLedgerEntry } from '../../shared/types';

/**
 * A supplier's ledger balance (Σdebit − Σcredit) equals the sum of
 * balance_due over their invoices.
 */
export async function assertSupplierLedgerMatchesInvoices(supplierId: string) {
  const db = getTestDb();
  const balance = await financialLedgerService.getBalance(supplierId);
  const invoices: PurchaseInvoice[] = await db('purchase_invoices').where({ supplier_id: supplierId });
  const due = invoices.reduce((sum, inv) => sum + toCents(inv.balance_due), 0);

  expect(
    toCents(balance.balance),
    `Supplier ${supplierId}: ledger balance ${balance.balance} != open balance ${due / 100}`,
  ).toBe(due);
  return balance;
}

/** paid + balance = total, and the status agrees with the amounts. */
export function assertInvoiceConsistent(invoice: PurchaseInvoice) {
  expect(toCents(invoice.paid_amount) + toCents(invoice.balance_due)).toBe(toCents(invoice.total_amount));
  const expected =
    toCents(invoice.balance_due) === 0 ? 'PAID' : toCents(invoice.paid_amount) === 0 ? 'UNPAID' : 'PARTIAL';
  expect(invoice.payment_status).toBe(expected);
}

/** items.total_quantity equals Σqty_in − Σqty_out of the item's stock rows. */
export async function assertStockMatchesLedger(itemId: string) {
  const db = getTestDb();
  const item = await itemService.getItem(itemId);
  const rows: StockLedgerEntry[] = await db('stock_ledger').where({ item_id: itemId });
  const net = rows.reduce((sum, row) => sum + row.qty_in - row.qty_out, 0);

  expect(item.total_quantity, `Item ${itemId}: quantity ${item.total_quantity} != ledger ${net}`).toBe(net);
  return item;
}
