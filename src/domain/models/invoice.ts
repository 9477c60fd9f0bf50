/**
 * Invoice Models
 * Line items derived from an invoice export, and the aged statement lines built from them
 */

import { AgingStatus } from '../services/aging-calculator';

/**
 * Columns every invoice export must carry
 */
export const REQUIRED_INVOICE_COLUMNS = [
  'Customer Name',
  'Order ID',
  'Order Total',
  'Shipping Date',
] as const;

export const OPTIONAL_INVOICE_COLUMNS = ['Paid Amount', 'Location'] as const;

/**
 * One row of the invoice export (not persisted)
 */
export interface InvoiceLineItem {
  customer_name: string;
  order_id: string;
  ship_date: Date;
  total: number;
  paid: number;
  location?: string;
}

/**
 * Amounts at or below this are treated as zero
 */
export const AMOUNT_EPSILON = 0.01;

export interface PaymentClassification {
  outstanding: number;
  paid_amount: number;
  fully_paid: boolean;
  short_paid: boolean;
  unpaid: boolean;
}

export function classifyPayment(item: Pick<InvoiceLineItem, 'total' | 'paid'>): PaymentClassification {
  const outstanding = item.total - item.paid;
  const paid_amount = Math.max(0, item.total - Math.max(outstanding, 0));
  return {
    outstanding,
    paid_amount,
    fully_paid: outstanding <= AMOUNT_EPSILON,
    short_paid: paid_amount > AMOUNT_EPSILON && outstanding > AMOUNT_EPSILON,
    unpaid: paid_amount <= AMOUNT_EPSILON && outstanding > AMOUNT_EPSILON,
  };
}

/**
 * Order ids exported as numbers come through as "1001.0"; keep the integer form
 */
export function normalizeOrderId(value: unknown): string {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(Math.trunc(value));
  }
  const text = String(value ?? '').trim();
  if (/^-?\d+(\.0+)?$/.test(text)) {
    return String(Math.trunc(Number(text)));
  }
  return text;
}

/**
 * Open invoice line on a statement
 */
export interface StatementLine {
  order_id: string;
  customer_name: string;
  location: string;
  ship_date: Date;
  due_date: Date;
  total: number;
  paid_amount: number;
  outstanding: number;
  status: AgingStatus;
}
