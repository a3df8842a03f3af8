/**
 * Supplier payment allocation across open invoices.
 */

import { describe, it, expect } from 'vitest';
import { allocatePayment, OpenInvoice, orderInvoices, outstandingTotal } from '../server/domain/allocation';
import { derivePaymentStatus, derivePaymentType, settle } from '../server/domain/payment-status';
import { ValidationError } from '../server/lib/errors';

const CREATED = '2026-01-01T00:00:00.000Z';

const invoices: OpenInvoice[] = [
  { id: 'PINV-CCCCCCCC', invoice_date: '2026-03-01', created_at: CREATED, balance_due: 300 },
  { id: 'PINV-AAAAAAAA', invoice_date: '2026-01-01', created_at: CREATED, balance_due: 100 },
  { id: 'PINV-BBBBBBBB', invoice_date: '2026-02-01', created_at: CREATED, balance_due: 200 },
  { id: 'PINV-DDDDDDDD', invoice_date: '2025-12-01', created_at: CREATED, balance_due: 0 },
];

describe('Allocation: ordering', () => {
  it('orders by invoice date, then creation time, then id', () => {
    const sameDay: OpenInvoice[] = [
      { id: 'B', invoice_date: '2026-01-01', created_at: '2026-01-01T10:00:00.000Z', balance_due: 1 },
      { id: 'C', invoice_date: '2026-01-01', created_at: '2026-01-01T09:00:00.000Z', balance_due: 1 },
      { id: 'A', invoice_date: '2026-01-01', created_at: '2026-01-01T10:00:00.000Z', balance_due: 1 },
    ];
    expect(orderInvoices(sameDay, 'FIFO').map((i) => i.id)).toEqual(['C', 'A', 'B']);
    expect(orderInvoices(sameDay, 'LIFO').map((i) => i.id)).toEqual(['B', 'A', 'C']);
  });

  it('sums the outstanding balance', () => {
    expect(outstandingTotal(invoices)).toBe(600);
  });
});

describe('Allocation: methods', () => {
  it('FIFO pays the oldest invoices first', () => {
    expect(allocatePayment(invoices, 250, 'FIFO')).toEqual([
      { invoice_id: 'PINV-AAAAAAAA', balance_before: 100, allocated: 100, balance_after: 0 },
      { invoice_id: 'PINV-BBBBBBBB', balance_before: 200, allocated: 150, balance_after: 50 },
      { invoice_id: 'PINV-CCCCCCCC', balance_before: 300, allocated: 0, balance_after: 300 },
    ]);
  });

  it('LIFO pays the newest invoices first', () => {
    expect(allocatePayment(invoices, 250, 'LIFO')).toEqual([
      { invoice_id: 'PINV-CCCCCCCC', balance_before: 300, allocated: 250, balance_after: 50 },
      { invoice_id: 'PINV-BBBBBBBB', balance_before: 200, allocated: 0, balance_after: 200 },
      { invoice_id: 'PINV-AAAAAAAA', balance_before: 100, allocated: 0, balance_after: 100 },
    ]);
  });

  it('PROPORTIONAL splits by balance share', () => {
    const parts = allocatePayment(invoices, 300, 'PROPORTIONAL');
    expect(parts.map((p) => p.allocated)).toEqual([50, 100, 150]);
  });

  it('PROPORTIONAL hands leftover cents to the largest remainders', () => {
    const equal: OpenInvoice[] = ['A', 'B', 'C'].map((id) => ({
      id,
      invoice_date: '2026-01-01',
      created_at: CREATED,
      balance_due: 100,
    }));
    const parts = allocatePayment(equal, 100, 'PROPORTIONAL');
    expect(parts.map((p) => p.allocated)).toEqual([33.34, 33.33, 33.33]);
  });

  it('settles everything when paying the exact outstanding amount', () => {
    const parts = allocatePayment(invoices, 600, 'FIFO');
    expect(parts.every((p) => p.balance_after === 0)).toBe(true);
  });

  it('rejects overpayment and non-positive amounts', () => {
    expect(() => allocatePayment(invoices, 600.01, 'FIFO')).toThrow(
      'Payment 600.01 exceeds outstanding balance 600.00',
    );
    expect(() => allocatePayment(invoices, 0, 'FIFO')).toThrow(ValidationError);
    expect(() => allocatePayment([], 10, 'FIFO')).toThrow(ValidationError);
  });
});

describe('Payment status', () => {
  it('derives status from paid against total', () => {
    expect(derivePaymentStatus(100, 0)).toBe('UNPAID');
    expect(derivePaymentStatus(100, 40)).toBe('PARTIAL');
    expect(derivePaymentStatus(100, 100)).toBe('PAID');
  });

  it('derives payment type from the balance it settles', () => {
    expect(derivePaymentType(50, 100)).toBe('PARTIAL');
    expect(derivePaymentType(100, 100)).toBe('FULL');
    expect(derivePaymentType(0, 100)).toBe('UN_PAID');
  });

  it('moves paid and balance together', () => {
    expect(settle(100, 40, 60)).toEqual({ total_amount: 100, paid_amount: 100, balance_due: 0, payment_status: 'PAID' });
    expect(settle(100, 100, -100)).toEqual({
      total_amount: 100,
      paid_amount: 0,
      balance_due: 100,
      payment_status: 'UNPAID',
    });
    expect(settle(0.3, 0.1, 0.1)).toEqual({
      total_amount: 0.3,
      paid_amount: 0.2,
      balance_due: 0.1,
      payment_status: 'PARTIAL',
    });
  });
});
