// =============================================================
// File: server/services/payment.service.ts
// Description: Payment Allocation Engine.
//   - addPayment()      → settle part or all of one invoice
//   - deletePayment()   → reverse one settlement
//   - paySupplier()     → one payment spread over every open
//                         invoice of a supplier (FIFO / LIFO /
//                         PROPORTIONAL), one aggregate ledger row
//   - simulatePayment() → same arithmetic, nothing persisted
//
// Invoice rows are locked before their balances are read, so two
// payments against one invoice serialize.
// =============================================================

import { Knex } from 'knex';
import { BaseService } from './base.service';
import { counterpartyService, paymentAccountService } from './masters.service';
import { financialLedgerService } from './financial-ledger.service';
import type {
  AllocationMethod,
  FinancialLedgerEntry,
  Payment,
  PaymentStatus,
  PurchaseInvoice,
} from '../../shared/types';
import { Allocation, allocatePayment, outstandingTotal } from '../domain/allocation';
import { derivePaymentStatus, derivePaymentType, settle } from '../domain/payment-status';
import { NotFoundError, ValidationError } from '../lib/errors';
import { generateUniqueId, nowIso } from '../lib/ids';
import { fromCents, hasAtMostDecimals, round2, toCents } from '../lib/money';
import { moduleLogger } from '../lib/logger';

const log = moduleLogger('payments');

const DAY_MS = 24 * 60 * 60 * 1000;

// ────────────────────────────────────────────────────────────
// Interfaces
// ────────────────────────────────────────────────────────────

export interface AddPaymentInput {
  amount: number;
  account_id: string;
}

export interface PaymentResult {
  payment: Payment;
  invoice: PurchaseInvoice;
  ledger_entry: FinancialLedgerEntry;
}

export interface SupplierPaymentInput {
  supplier_id: string;
  amount: number;
  account_id: string;
  method?: AllocationMethod;
}

export interface AppliedAllocation extends Allocation {
  payment_id: string;
  payment_status: PaymentStatus;
}

export interface DirectPaymentResult {
  direct_payment_id: string;
  supplier_id: string;
  amount: number;
  method: AllocationMethod;
  outstanding_before: number;
  outstanding_after: number;
  ledger_entry: FinancialLedgerEntry;
  allocations: AppliedAllocation[];
}

export interface SimulatedAllocation extends Allocation {
  invoice_date: string;
  resulting_status: PaymentStatus;
}

export interface PaymentSimulation {
  supplier_id: string;
  amount: number;
  method: AllocationMethod;
  outstanding_before: number;
  outstanding_after: number;
  allocations: SimulatedAllocation[];
}

export interface OutstandingInvoice {
  id: string;
  invoice_date: string;
  total_amount: number;
  paid_amount: number;
  balance_due: number;
  payment_status: PaymentStatus;
  days_outstanding: number;
}

export interface SupplierOutstanding {
  supplier_id: string;
  supplier_name: string;
  total_debit: number;
  total_credit: number;
  ledger_balance: number;
  outstanding_balance: number;
  open_invoices: OutstandingInvoice[];
}

function assertAmount(amount: number): void {
  if (!Number.isFinite(amount) || toCents(amount) <= 0) {
    throw new ValidationError('Payment amount must be greater than zero');
  }
  if (!hasAtMostDecimals(amount, 2)) {
    throw new ValidationError(`Payment amount ${amount} has more than 2 decimal places`);
  }
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class PaymentService extends BaseService<Payment> {
  constructor() {
    super('payments');
  }

  async lockInvoice(trx: Knex.Transaction, invoiceId: string): Promise<PurchaseInvoice> {
    const invoice: PurchaseInvoice | undefined = await trx('purchase_invoices')
      .where({ id: invoiceId })
      .forUpdate()
      .first();
    if (!invoice) throw new NotFoundError('Purchase invoice', invoiceId);
    return invoice;
  }

  /**
   * Settle `amount` against an already locked invoice: writes the
   * Payment row and moves the invoice balances. Ledger rows are the
   * caller's, since single and batch payments book them differently.
   */
  private async settleInvoice(
    trx: Knex.Transaction,
    invoice: PurchaseInvoice,
    amount: number,
    accountId: string,
    directPaymentId: string | null,
  ): Promise<{ payment: Payment; invoice: PurchaseInvoice }> {
    assertAmount(amount);
    if (toCents(amount) > toCents(invoice.balance_due)) {
      throw new ValidationError(
        `Payment ${amount.toFixed(2)} exceeds balance due ${invoice.balance_due.toFixed(2)} on invoice ${invoice.id}`,
        { invoice_id: invoice.id, amount, balance_due: invoice.balance_due },
      );
    }

    const amounts = settle(invoice.total_amount, invoice.paid_amount, amount);
    const now = nowIso();
    const payment: Payment = {
      id: await generateUniqueId(trx, 'payment', 'payments'),
      user_id: invoice.supplier_id,
      purchase_invoice_id: invoice.id,
      amount: round2(amount),
      account_id: accountId,
      payment_type: derivePaymentType(amount, invoice.balance_due),
      direct_payment_id: directPaymentId,
      created_at: now,
    };
    await trx('payments').insert(payment);
    await trx('purchase_invoices').where({ id: invoice.id }).update({ ...amounts, updated_at: now });

    return { payment, invoice: { ...invoice, ...amounts, updated_at: now } };
  }

  // ──────────────────────────────────────────────────────────
  // Single invoice
  // ──────────────────────────────────────────────────────────

  async addPayment(invoiceId: string, input: AddPaymentInput, trx?: Knex.Transaction): Promise<PaymentResult> {
    const result = await this.inTransaction(trx, async (t) => {
      const invoice = await this.lockInvoice(t, invoiceId);
      await paymentAccountService.requireAccount(t, input.account_id);

      const settled = await this.settleInvoice(t, invoice, input.amount, input.account_id, null);
      const ledgerEntry = await financialLedgerService.record(t, {
        user_id: invoice.supplier_id,
        ref_type: 'PAYMENT',
        ref_id: settled.payment.id,
        credit: settled.payment.amount,
      });
      return { ...settled, ledger_entry: ledgerEntry };
    });

    log.info(
      { invoice_id: invoiceId, payment_id: result.payment.id, amount: result.payment.amount },
      'Payment recorded',
    );
    return result;
  }

  /**
   * Reverse one payment. A single-invoice payment takes its ledger
   * credit with it; a payment from a supplier batch shares one
   * aggregate credit, so an offsetting debit is written instead.
   */
  async deletePayment(paymentId: string, trx?: Knex.Transaction): Promise<PurchaseInvoice> {
    const invoice = await this.inTransaction(trx, async (t) => {
      const payment: Payment | undefined = await t('payments').where({ id: paymentId }).first();
      if (!payment) throw new NotFoundError('Payment', paymentId);

      const locked = await this.lockInvoice(t, payment.purchase_invoice_id);
      const amounts = settle(locked.total_amount, locked.paid_amount, -payment.amount);
      const now = nowIso();

      await t('purchase_invoices').where({ id: locked.id }).update({ ...amounts, updated_at: now });
      await t('payments').where({ id: payment.id }).delete();

      if (payment.direct_payment_id) {
        await financialLedgerService.record(t, {
          user_id: payment.user_id,
          ref_type: 'PAYMENT_REVERSAL',
          ref_id: payment.id,
          debit: payment.amount,
        });
      } else {
        await financialLedgerService.deleteByReference(t, 'PAYMENT', payment.id);
      }
      return { ...locked, ...amounts, updated_at: now };
    });

    log.info({ payment_id: paymentId, invoice_id: invoice.id }, 'Payment reversed');
    return invoice;
  }

  async listInvoicePayments(invoiceId: string, db: Knex = this.db): Promise<Payment[]> {
    const rows: Payment[] = await db('payments')
      .where({ purchase_invoice_id: invoiceId })
      .orderBy([{ column: 'created_at' }, { column: 'id' }]);
    return rows;
  }

  // ──────────────────────────────────────────────────────────
  // Supplier (multi-invoice) payments
  // ──────────────────────────────────────────────────────────

  private async openInvoices(db: Knex, supplierId: string, lock: boolean): Promise<PurchaseInvoice[]> {
    const query = db('purchase_invoices')
      .where({ supplier_id: supplierId })
      .where('balance_due', '>', 0)
      .orderBy([{ column: 'invoice_date' }, { column: 'created_at' }, { column: 'id' }]);
    if (lock) query.forUpdate();
    const rows: PurchaseInvoice[] = await query;
    return rows;
  }

  async paySupplier(input: SupplierPaymentInput): Promise<DirectPaymentResult> {
    const method = input.method ?? 'FIFO';
    assertAmount(input.amount);

    const result = await this.db.transaction(async (trx) => {
      await counterpartyService.requireRole(trx, input.supplier_id, 'supplier');
      await paymentAccountService.requireAccount(trx, input.account_id);

      const invoices = await this.openInvoices(trx, input.supplier_id, true);
      const outstandingBefore = outstandingTotal(invoices);
      const plan = allocatePayment(invoices, input.amount, method);
      const byId = new Map(invoices.map((inv) => [inv.id, inv]));

      const directPaymentId = await generateUniqueId(trx, 'directPayment', 'financial_ledger', 'ref_id');
      const allocations: AppliedAllocation[] = [];

      for (const part of plan) {
        const invoice = byId.get(part.invoice_id);
        if (!invoice || toCents(part.allocated) === 0) continue;
        const settled = await this.settleInvoice(trx, invoice, part.allocated, input.account_id, directPaymentId);
        allocations.push({
          ...part,
          payment_id: settled.payment.id,
          payment_status: settled.invoice.payment_status,
        });
      }

      const ledgerEntry = await financialLedgerService.record(trx, {
        user_id: input.supplier_id,
        ref_type: 'DIRECT_PAYMENT',
        ref_id: directPaymentId,
        credit: input.amount,
      });

      return {
        direct_payment_id: directPaymentId,
        supplier_id: input.supplier_id,
        amount: round2(input.amount),
        method,
        outstanding_before: outstandingBefore,
        outstanding_after: fromCents(toCents(outstandingBefore) - toCents(input.amount)),
        ledger_entry: ledgerEntry,
        allocations,
      };
    });

    log.info(
      {
        supplier_id: input.supplier_id,
        direct_payment_id: result.direct_payment_id,
        amount: result.amount,
        method,
        invoices: result.allocations.length,
      },
      'Supplier payment allocated',
    );
    return result;
  }

  async simulatePayment(input: Omit<SupplierPaymentInput, 'account_id'>): Promise<PaymentSimulation> {
    const method = input.method ?? 'FIFO';
    assertAmount(input.amount);
    await counterpartyService.requireRole(this.db, input.supplier_id, 'supplier');

    const invoices = await this.openInvoices(this.db, input.supplier_id, false);
    const outstandingBefore = outstandingTotal(invoices);
    const plan = allocatePayment(invoices, input.amount, method);
    const byId = new Map(invoices.map((inv) => [inv.id, inv]));

    const allocations = plan.map((part): SimulatedAllocation => {
      const invoice = byId.get(part.invoice_id);
      const total = invoice?.total_amount ?? 0;
      const paid = invoice?.paid_amount ?? 0;
      return {
        ...part,
        invoice_date: invoice?.invoice_date ?? '',
        resulting_status: derivePaymentStatus(total, fromCents(toCents(paid) + toCents(part.allocated))),
      };
    });

    return {
      supplier_id: input.supplier_id,
      amount: round2(input.amount),
      method,
      outstanding_before: outstandingBefore,
      outstanding_after: fromCents(toCents(outstandingBefore) - toCents(input.amount)),
      allocations,
    };
  }

  async getSupplierOutstanding(supplierId: string): Promise<SupplierOutstanding> {
    const supplier = await counterpartyService.getCounterparty(supplierId);
    if (supplier.role !== 'supplier') {
      throw new ValidationError(`User ${supplierId} is a ${supplier.role}, not a supplier`);
    }

    const ledger = await financialLedgerService.getBalance(supplierId);
    const invoices = await this.openInvoices(this.db, supplierId, false);
    const now = Date.now();

    return {
      supplier_id: supplier.id,
      supplier_name: supplier.name,
      total_debit: ledger.total_debit,
      total_credit: ledger.total_credit,
      ledger_balance: ledger.balance,
      outstanding_balance: outstandingTotal(invoices),
      open_invoices: invoices.map((inv) => ({
        id: inv.id,
        invoice_date: inv.invoice_date,
        total_amount: inv.total_amount,
        paid_amount: inv.paid_amount,
        balance_due: inv.balance_due,
        payment_status: inv.payment_status,
        days_outstanding: Math.max(0, Math.floor((now - Date.parse(`${inv.invoice_date}T00:00:00Z`)) / DAY_MS)),
      })),
    };
  }
}

export const paymentService = new PaymentService();
