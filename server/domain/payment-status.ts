import type { PaymentStatus, PaymentType } from '../../shared/types';
import { fromCents, toCents } from '../lib/money';

export interface InvoiceAmounts {
  total_amount: number;
  paid_amount: number;
  balance_due: number;
  payment_status: PaymentStatus;
}

export function derivePaymentStatus(totalAmount: number, paidAmount: number): PaymentStatus {
  const total = toCents(totalAmount);
  const paid = toCents(paidAmount);
  if (paid >= total) return 'PAID';
  if (paid > 0) return 'PARTIAL';
  return 'UNPAID';
}

/** Payment type from the amount and the balance it settles. */
export function derivePaymentType(amount: number, balanceBefore: number): PaymentType {
  const cents = toCents(amount);
  if (cents <= 0) return 'UN_PAID';
  return cents >= toCents(balanceBefore) ? 'FULL' : 'PARTIAL';
}

/** Invoice amounts after `paidDelta` is added to (or, negative, removed from) the paid amount. */
export function settle(totalAmount: number, paidAmount: number, paidDelta: number): InvoiceAmounts {
  const total = toCents(totalAmount);
  const paid = toCents(paidAmount) + toCents(paidDelta);
  return {
    total_amount: fromCents(total),
    paid_amount: fromCents(paid),
    balance_due: fromCents(total - paid),
    payment_status: derivePaymentStatus(fromCents(total), fromCents(paid)),
  };
}
