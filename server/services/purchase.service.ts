// =============================================================
// File: server/services/purchase.service.ts
// Description: Purchase Invoice Engine. Each operation is one
//              transaction that drives the item repository, the
//              stock ledger and the financial ledger together:
//   - createPurchase()  → lines in at cost, supplier debited,
//                         optional initial payment
//   - updatePurchase()  → reverse old lines, book the total delta,
//                         apply new lines
//   - deletePurchase()  → payments, stock, ledger rows, invoice
// =============================================================

import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import { itemService } from './item.service';
import { stockLedgerService } from './stock-ledger.service';
import { financialLedgerService } from './financial-ledger.service';
import { counterpartyService } from './masters.service';
import { paymentService } from './payment.service';
import type { Paginated, Payment, PaymentStatus, PurchaseInvoice, PurchaseItem } from '../../shared/types';
import { settle } from '../domain/payment-status';
import { NotFoundError, StateViolationError, ValidationError } from '../lib/errors';
import { generateUniqueId, nowIso, today } from '../lib/ids';
import { fromCents, hasAtMostDecimals, round2, toCents } from '../lib/money';
import { moduleLogger } from '../lib/logger';

const log = moduleLogger('purchases');

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface PurchaseLineInput {
  item_id: string;
  quantity: number;
  unit_price: number;
}

export interface CreatePurchaseInput {
  supplier_id: string;
  items: PurchaseLineInput[];
  payment_amount?: number;
  payment_account_id?: string;
  invoice_date?: string;
  notes?: string | null;
}

export interface UpdatePurchaseInput {
  items?: PurchaseLineInput[];
  notes?: string | null;
}

export interface PurchaseFilters extends ListOptions {
  supplier_id?: string;
  payment_status?: PaymentStatus;
  from_date?: string;
  to_date?: string;
}

export interface PurchaseLine extends PurchaseItem {
  item_name: string;
}

export interface PurchaseDetail extends PurchaseInvoice {
  supplier_name: string;
  items: PurchaseLine[];
  payments: Payment[];
}

export interface PurchaseListRow extends PurchaseInvoice {
  supplier_name: string;
}

export interface SupplierPurchaseSummary {
  supplier_id: string;
  supplier_name: string;
  invoice_count: number;
  unpaid_count: number;
  partial_count: number;
  paid_count: number;
  total_purchased: number;
  total_paid: number;
  total_outstanding: number;
}

// ────────────────────────────────────────────────────────────
// Helpers
// ────────────────────────────────────────────────────────────

function validateLines(lines: PurchaseLineInput[]): void {
  if (lines.length === 0) {
    throw new ValidationError('A purchase needs at least one line item');
  }
  lines.forEach((line, i) => {
    if (!Number.isInteger(line.quantity) || line.quantity <= 0) {
      throw new ValidationError(`Line ${i + 1}: quantity must be a positive whole number`);
    }
    if (!Number.isFinite(line.unit_price) || line.unit_price <= 0) {
      throw new ValidationError(`Line ${i + 1}: unit price must be greater than zero`);
    }
    if (!hasAtMostDecimals(line.unit_price, 2)) {
      throw new ValidationError(`Line ${i + 1}: unit price has more than 2 decimal places`);
    }
  });
}

function lineTotal(line: PurchaseLineInput): number {
  return round2(line.quantity * line.unit_price);
}

export function purchaseTotal(lines: PurchaseLineInput[]): number {
  return fromCents(lines.reduce((sum, line) => sum + toCents(lineTotal(line)), 0));
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class PurchaseService extends BaseService<PurchaseInvoice> {
  constructor() {
    super('purchase_invoices');
  }

  /** Bring each line into stock at its price and store it against the invoice. */
  private async applyLines(trx: Knex.Transaction, invoiceId: string, lines: PurchaseLineInput[]): Promise<void> {
    await itemService.lockItems(
      trx,
      lines.map((l) => l.item_id),
    );
    for (const [index, line] of lines.entries()) {
      await itemService.applyIncoming(trx, line.item_id, line.quantity, line.unit_price);
      await stockLedgerService.recordMovement(trx, {
        item_id: line.item_id,
        ref_type: 'PURCHASE',
        ref_id: invoiceId,
        qty_in: line.quantity,
        unit_price: line.unit_price,
      });
      const row: PurchaseItem = {
        id: await generateUniqueId(trx, 'purchaseItem', 'purchase_items'),
        purchase_invoice_id: invoiceId,
        line_number: index + 1,
        item_id: line.item_id,
        quantity: line.quantity,
        unit_price: round2(line.unit_price),
        line_total: lineTotal(line),
      };
      await trx('purchase_items').insert(row);
    }
  }

  /** Undo every stored line, newest first, and drop their stock rows. */
  private async reverseLines(trx: Knex.Transaction, invoiceId: string): Promise<void> {
    const lines: PurchaseItem[] = await trx('purchase_items')
      .where({ purchase_invoice_id: invoiceId })
      .orderBy('line_number', 'desc');
    for (const line of lines) {
      await itemService.reverseIncoming(trx, line.item_id, line.quantity, line.unit_price);
    }
    await stockLedgerService.deleteByReference(trx, 'PURCHASE', invoiceId);
    await trx('purchase_items').where({ purchase_invoice_id: invoiceId }).delete();
  }

  // ──────────────────────────────────────────────────────────
  // CREATE
  // ──────────────────────────────────────────────────────────

  async createPurchase(input: CreatePurchaseInput): Promise<PurchaseDetail> {
    validateLines(input.items);
    const paymentAmount = input.payment_amount ?? 0;
    if (paymentAmount < 0) {
      throw new ValidationError('Payment amount cannot be negative');
    }
    if (toCents(paymentAmount) > 0 && !input.payment_account_id) {
      throw new ValidationError('payment_account_id is required when a payment amount is given');
    }
    const invoiceDate = input.invoice_date ?? today();
    if (!DATE_PATTERN.test(invoiceDate)) {
      throw new ValidationError(`invoice_date must be YYYY-MM-DD, got ${invoiceDate}`);
    }

    const detail = await this.db.transaction(async (trx) => {
      await counterpartyService.requireRole(trx, input.supplier_id, 'supplier');
      const total = purchaseTotal(input.items);
      const now = nowIso();

      const invoice: PurchaseInvoice = {
        id: await generateUniqueId(trx, 'purchaseInvoice', 'purchase_invoices'),
        supplier_id: input.supplier_id,
        invoice_date: invoiceDate,
        ...settle(total, 0, 0),
        notes: input.notes ?? null,
        created_at: now,
        updated_at: now,
      };
      await trx('purchase_invoices').insert(invoice);

      await this.applyLines(trx, invoice.id, input.items);

      await financialLedgerService.record(trx, {
        user_id: input.supplier_id,
        ref_type: 'PURCHASE',
        ref_id: invoice.id,
        debit: total,
      });

      if (toCents(paymentAmount) > 0 && input.payment_account_id) {
        await paymentService.addPayment(
          invoice.id,
          { amount: paymentAmount, account_id: input.payment_account_id },
          trx,
        );
      }

      return this.getPurchase(invoice.id, trx);
    });

    log.info(
      { invoice_id: detail.id, supplier_id: detail.supplier_id, total: detail.total_amount, status: detail.payment_status },
      'Purchase created',
    );
    return detail;
  }

  // ──────────────────────────────────────────────────────────
  // UPDATE
  // ──────────────────────────────────────────────────────────

  async updatePurchase(invoiceId: string, input: UpdatePurchaseInput): Promise<PurchaseDetail> {
    if (input.items) validateLines(input.items);

    const detail = await this.db.transaction(async (trx) => {
      const invoice = await paymentService.lockInvoice(trx, invoiceId);
      if (invoice.payment_status === 'PAID') {
        throw new StateViolationError(`Invoice ${invoiceId} is fully paid; delete its payments before editing it`);
      }

      const notes = input.notes === undefined ? invoice.notes : input.notes;
      if (!input.items) {
        if (notes !== invoice.notes) {
          await trx('purchase_invoices').where({ id: invoiceId }).update({ notes, updated_at: nowIso() });
        }
        return this.getPurchase(invoiceId, trx);
      }

      const newTotal = purchaseTotal(input.items);
      if (toCents(newTotal) < toCents(invoice.paid_amount)) {
        throw new ValidationError(
          `New total ${newTotal.toFixed(2)} is below the amount already paid ${invoice.paid_amount.toFixed(2)}`,
          { new_total: newTotal, paid_amount: invoice.paid_amount },
        );
      }

      await this.reverseLines(trx, invoiceId);

      const deltaCents = toCents(newTotal) - toCents(invoice.total_amount);
      if (deltaCents !== 0) {
        await financialLedgerService.record(trx, {
          user_id: invoice.supplier_id,
          ref_type: 'PURCHASE_UPDATE',
          ref_id: invoiceId,
          debit: deltaCents > 0 ? fromCents(deltaCents) : 0,
          credit: deltaCents < 0 ? fromCents(-deltaCents) : 0,
        });
      }

      await this.applyLines(trx, invoiceId, input.items);

      await trx('purchase_invoices')
        .where({ id: invoiceId })
        .update({ ...settle(newTotal, invoice.paid_amount, 0), notes, updated_at: nowIso() });

      return this.getPurchase(invoiceId, trx);
    });

    log.info({ invoice_id: invoiceId, total: detail.total_amount, status: detail.payment_status }, 'Purchase updated');
    return detail;
  }

  // ──────────────────────────────────────────────────────────
  // DELETE
  // ──────────────────────────────────────────────────────────

  async deletePurchase(invoiceId: string): Promise<{ id: string; payments_reversed: number }> {
    const reversed = await this.db.transaction(async (trx) => {
      await paymentService.lockInvoice(trx, invoiceId);

      const payments = await paymentService.listInvoicePayments(invoiceId, trx);
      for (const payment of payments) {
        await paymentService.deletePayment(payment.id, trx);
      }

      await this.reverseLines(trx, invoiceId);
      await financialLedgerService.deleteByReference(trx, 'PURCHASE', invoiceId);
      await financialLedgerService.deleteByReference(trx, 'PURCHASE_UPDATE', invoiceId);
      await trx('purchase_invoices').where({ id: invoiceId }).delete();
      return payments.length;
    });

    log.info({ invoice_id: invoiceId, payments_reversed: reversed }, 'Purchase deleted');
    return { id: invoiceId, payments_reversed: reversed };
  }

  // ──────────────────────────────────────────────────────────
  // Queries
  // ──────────────────────────────────────────────────────────

  async getPurchase(invoiceId: string, db: Knex = this.db): Promise<PurchaseDetail> {
    const invoice: PurchaseListRow | undefined = await db('purchase_invoices as pi')
      .join('users as u', 'u.id', 'pi.supplier_id')
      .where('pi.id', invoiceId)
      .select('pi.*', 'u.name as supplier_name')
      .first();
    if (!invoice) throw new NotFoundError('Purchase invoice', invoiceId);

    const items: PurchaseLine[] = await db('purchase_items as pit')
      .join('items as i', 'i.id', 'pit.item_id')
      .where('pit.purchase_invoice_id', invoiceId)
      .select('pit.*', 'i.name as item_name')
      .orderBy('pit.line_number');
    const payments = await paymentService.listInvoicePayments(invoiceId, db);

    return { ...invoice, items, payments };
  }

  async listPurchases(filters: PurchaseFilters = {}): Promise<Paginated<PurchaseListRow>> {
    const query = this.db('purchase_invoices as pi')
      .join('users as u', 'u.id', 'pi.supplier_id')
      .select('pi.*', 'u.name as supplier_name');

    if (filters.supplier_id) query.where('pi.supplier_id', filters.supplier_id);
    if (filters.payment_status) query.where('pi.payment_status', filters.payment_status);
    if (filters.from_date) query.where('pi.invoice_date', '>=', filters.from_date);
    if (filters.to_date) query.where('pi.invoice_date', '<=', filters.to_date);
    if (filters.search) {
      const term = `%${filters.search.toLowerCase()}%`;
      query.where((qb) => {
        qb.whereRaw('lower(pi.id) like ?', [term]).orWhereRaw('lower(u.name) like ?', [term]);
      });
    }

    return this.paginate<PurchaseListRow>(query, filters, [
      { column: 'pi.invoice_date', order: 'desc' },
      { column: 'pi.created_at', order: 'desc' },
      { column: 'pi.id', order: 'desc' },
    ]);
  }

  async getSupplierPurchaseSummary(): Promise<SupplierPurchaseSummary[]> {
    const rows: PurchaseListRow[] = await this.db('purchase_invoices as pi')
      .join('users as u', 'u.id', 'pi.supplier_id')
      .select('pi.*', 'u.name as supplier_name');

    const bySupplier = new Map<string, SupplierPurchaseSummary>();
    for (const row of rows) {
      const entry = bySupplier.get(row.supplier_id) ?? {
        supplier_id: row.supplier_id,
        supplier_name: row.supplier_name,
        invoice_count: 0,
        unpaid_count: 0,
        partial_count: 0,
        paid_count: 0,
        total_purchased: 0,
        total_paid: 0,
        total_outstanding: 0,
      };
      entry.invoice_count += 1;
      if (row.payment_status === 'UNPAID') entry.unpaid_count += 1;
      if (row.payment_status === 'PARTIAL') entry.partial_count += 1;
      if (row.payment_status === 'PAID') entry.paid_count += 1;
      entry.total_purchased = fromCents(toCents(entry.total_purchased) + toCents(row.total_amount));
      entry.total_paid = fromCents(toCents(entry.total_paid) + toCents(row.paid_amount));
      entry.total_outstanding = fromCents(toCents(entry.total_outstanding) + toCents(row.balance_due));
      bySupplier.set(row.supplier_id, entry);
    }

    return [...bySupplier.values()].sort((a, b) => a.supplier_name.localeCompare(b.supplier_name));
  }
}

export const purchaseService = new PurchaseService();
