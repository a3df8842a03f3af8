// =============================================================
// File: server/domain/allocation.ts
// Description: Splits one supplier payment over open invoices.
//   FIFO          oldest invoice first, min(remaining, balance)
//   LIFO          newest invoice first, min(remaining, balance)
//   PROPORTIONAL  amount · balance / Σbalance, in cents, with the
//                 leftover cents going to the largest remainders
// All arithmetic is in integer cents; the parts always sum to
// the payment and never exceed an invoice's balance.
// =============================================================

import type { AllocationMethod } from '../../shared/types';
import { ValidationError } from '../lib/errors';
import { fromCents, toCents } from '../lib/money';

export interface OpenInvoice {
  id: string;
  invoice_date: string;
  created_at: string;
  balance_due: number;
}

export interface Allocation {
  invoice_id: string;
  balance_before: number;
  allocated: number;
  balance_after: number;
}

function compareOldestFirst(a: OpenInvoice, b: OpenInvoice): number {
  if (a.invoice_date !== b.invoice_date) return a.invoice_date < b.invoice_date ? -1 : 1;
  if (a.created_at !== b.created_at) return a.created_at < b.created_at ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export function orderInvoices<T extends OpenInvoice>(invoices: T[], method: AllocationMethod): T[] {
  const sorted = [...invoices].sort(compareOldestFirst);
  return method === 'LIFO' ? sorted.reverse() : sorted;
}

export function outstandingTotal(invoices: OpenInvoice[]): number {
  return fromCents(invoices.reduce((sum, inv) => sum + toCents(inv.balance_due), 0));
}

function sequential(balances: number[], amount: number): number[] {
  let remaining = amount;
  return balances.map((balance) => {
    const part = Math.min(remaining, balance);
    remaining -= part;
    return part;
  });
}

function proportional(balances: number[], amount: number): number[] {
  const total = BigInt(balances.reduce((s, b) => s + b, 0));
  const pay = BigInt(amount);

  const shares = balances.map((balance, index) => {
    const exact = pay * BigInt(balance);
    return { index, base: exact / total, remainder: exact % total };
  });

  let leftover = pay - shares.reduce((s, share) => s + share.base, 0n);
  const byRemainder = [...shares].sort((a, b) => {
    if (a.remainder === b.remainder) return a.index - b.index;
    return a.remainder > b.remainder ? -1 : 1;
  });
  for (const share of byRemainder) {
    if (leftover === 0n) break;
    share.base += 1n;
    leftover -= 1n;
  }

  return shares.map((share, index) => Math.min(Number(share.base), balances[index]));
}

/**
 * Allocate `amount` over the open invoices. Returns one entry per
 * open invoice in allocation order, including zero allocations.
 */
export function allocatePayment(
  invoices: OpenInvoice[],
  amount: number,
  method: AllocationMethod,
): Allocation[] {
  const open = orderInvoices(
    invoices.filter((inv) => toCents(inv.balance_due) > 0),
    method,
  );
  const amountCents = toCents(amount);
  if (amountCents <= 0) {
    throw new ValidationError('Payment amount must be greater than zero');
  }

  const balances = open.map((inv) => toCents(inv.balance_due));
  const outstanding = balances.reduce((s, b) => s + b, 0);
  if (amountCents > outstanding) {
    throw new ValidationError(
      `Payment ${fromCents(amountCents).toFixed(2)} exceeds outstanding balance ${fromCents(outstanding).toFixed(2)}`,
      { amount: fromCents(amountCents), outstanding: fromCents(outstanding) },
    );
  }

  const parts = method === 'PROPORTIONAL' ? proportional(balances, amountCents) : sequential(balances, amountCents);

  return open.map((inv, i) => ({
    invoice_id: inv.id,
    balance_before: fromCents(balances[i]),
    allocated: fromCents(parts[i]),
    balance_after: fromCents(balances[i] - parts[i]),
  }));
}
