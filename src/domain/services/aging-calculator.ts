/**
 * Aging Calculator
 * Due dates per payment terms, and the aging status of an open invoice
 */

import { TermsCode, TERM_DAYS } from '../models/terms';
import { addDays, diffInDays, startOfNextMonth, startOfWeek } from '../../utils/date-helpers';

export enum AgingStatus {
  OVERDUE = 'Overdue',
  DUE_THIS_WEEK = 'Due This Week',
  UNPAID = 'Unpaid',
}

/**
 * Days after the last bill-to-bill invoice before it falls due
 */
export const BILL_TO_BILL_GRACE_DAYS = 15;

const FALLBACK_TERM_DAYS = 30;
const DUE_SOON_DAYS = 7;

/**
 * Due date of an invoice shipped on `shipDate`
 *
 * Bill-to-bill invoices are due when the next invoice at the same location
 * ships, so they need the ship dates of their siblings. The earliest sibling
 * shipped strictly later is used; without one the invoice is the latest and
 * gets the grace period. Use assignBillToBillDueDates when invoices with equal
 * ship dates must be ordered.
 */
export function computeDueDate(
  shipDate: Date,
  termsCode: TermsCode,
  siblingShipDates: readonly Date[] = []
): Date {
  const fixedDays = TERM_DAYS[termsCode];
  if (fixedDays !== undefined) {
    return addDays(shipDate, fixedDays);
  }

  switch (termsCode) {
    case TermsCode.BILL_TO_BILL: {
      let next: Date | null = null;
      for (const sibling of siblingShipDates) {
        if (sibling.getTime() > shipDate.getTime() && (!next || sibling.getTime() < next.getTime())) {
          next = sibling;
        }
      }
      return next ?? addDays(shipDate, BILL_TO_BILL_GRACE_DAYS);
    }

    case TermsCode.WEEK_TO_WEEK:
      // Friday of the ship week
      return addDays(startOfWeek(shipDate), 4);

    case TermsCode.MONTH_TO_MONTH:
      return startOfNextMonth(shipDate);

    default:
      return addDays(shipDate, FALLBACK_TERM_DAYS);
  }
}

export interface BillToBillInvoice {
  order_id: string;
  ship_date: Date;
}

const orderIdCollator = new Intl.Collator('en', { numeric: true });

/**
 * Order invoices by ship date, then order id
 */
export function compareByShipDate(a: BillToBillInvoice, b: BillToBillInvoice): number {
  const byDate = a.ship_date.getTime() - b.ship_date.getTime();
  return byDate !== 0 ? byDate : orderIdCollator.compare(a.order_id, b.order_id);
}

/**
 * Bill-to-bill due dates for all invoices at one location
 *
 * Each invoice is due on the ship date of the next invoice in
 * (ship date, order id) order; the last one gets the grace period.
 *
 * @returns invoices in that order, paired with their due dates
 */
export function assignBillToBillDueDates<T extends BillToBillInvoice>(
  invoices: readonly T[]
): Array<{ invoice: T; due_date: Date }> {
  const sorted = [...invoices].sort(compareByShipDate);

  return sorted.map((invoice, idx) => ({
    invoice,
    due_date:
      idx < sorted.length - 1
        ? sorted[idx + 1].ship_date
        : addDays(invoice.ship_date, BILL_TO_BILL_GRACE_DAYS),
  }));
}

export function computeAgingStatus(today: Date, dueDate: Date): AgingStatus {
  if (today.getTime() > dueDate.getTime()) {
    return AgingStatus.OVERDUE;
  }
  const daysLeft = diffInDays(dueDate, today);
  if (daysLeft >= 0 && daysLeft <= DUE_SOON_DAYS) {
    return AgingStatus.DUE_THIS_WEEK;
  }
  return AgingStatus.UNPAID;
}
