/**
 * Invoice Aggregator
 * Turns invoice rows into per-recipient overdue / skipped / short-paid summaries
 */

import {
  InvoiceLineItem,
  PaymentClassification,
  classifyPayment,
} from '../models/invoice';
import { Recipient, RecipientDirectory } from '../models/recipient';
import { TermsCode } from '../models/terms';
import { AgingSummary, ShortPaidInvoice, SkippedInvoice } from '../models/aging-report';
import { RecipientResolver } from './recipient-resolver';
import { assignBillToBillDueDates, computeDueDate } from './aging-calculator';
import { diffInDays } from '../../utils/date-helpers';

interface ClassifiedInvoice extends PaymentClassification {
  order_id: string;
  ship_date: Date;
  location: string;
}

interface RecipientBucket {
  recipient: Recipient;
  locations: Map<string, ClassifiedInvoice[]>;
}

export interface AggregationResult {
  summaries: AgingSummary[];
  unresolved_count: number;
  unresolved_names: string[];
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Location of a resolved row: the member's own name inside a group,
 * otherwise the row's Location column, falling back to the customer name
 */
export function rowLocation(row: InvoiceLineItem, viaGroup: boolean): string {
  const customer = row.customer_name.trim();
  if (viaGroup) return customer;
  const location = row.location?.trim();
  return location ? location : customer;
}

/**
 * Due date for every invoice at one location
 */
function dueDatesFor(
  invoices: ClassifiedInvoice[],
  termsCode: TermsCode
): Array<{ invoice: ClassifiedInvoice; due_date: Date }> {
  if (termsCode === TermsCode.BILL_TO_BILL) {
    return assignBillToBillDueDates(invoices);
  }
  return invoices.map((invoice) => ({
    invoice,
    due_date: computeDueDate(invoice.ship_date, termsCode),
  }));
}

function summarize(bucket: RecipientBucket, today: Date): AgingSummary {
  const { recipient } = bucket;

  let overdueCount = 0;
  let overdueAmount = 0;
  let oldestDue: Date | null = null;
  const skipped: SkippedInvoice[] = [];
  const shortPaid: ShortPaidInvoice[] = [];

  for (const [location, invoices] of bucket.locations) {
    for (const { invoice, due_date } of dueDatesFor(invoices, recipient.terms_code)) {
      if (invoice.fully_paid || today.getTime() <= due_date.getTime()) continue;
      overdueCount++;
      overdueAmount += invoice.outstanding;
      if (!oldestDue || due_date.getTime() < oldestDue.getTime()) {
        oldestDue = due_date;
      }
    }

    for (const invoice of invoices) {
      if (invoice.short_paid) {
        shortPaid.push({
          order_id: invoice.order_id,
          ship_date: invoice.ship_date,
          location,
          amount: roundCents(invoice.outstanding),
        });
      }
    }

    // A payment applied to a later shipment while an earlier one is still open
    const latestPaid = invoices.reduce(
      (latest, i) => (i.fully_paid ? Math.max(latest, i.ship_date.getTime()) : latest),
      Number.NEGATIVE_INFINITY
    );
    if (latestPaid === Number.NEGATIVE_INFINITY) continue;
    for (const invoice of invoices) {
      if (invoice.unpaid && invoice.ship_date.getTime() < latestPaid) {
        skipped.push({ order_id: invoice.order_id, ship_date: invoice.ship_date, location });
      }
    }
  }

  return {
    recipient_id: recipient.recipient_id,
    recipient_name: recipient.name,
    terms_code: recipient.terms_code,
    overdue_count: overdueCount,
    overdue_amount: roundCents(overdueAmount),
    days_overdue: oldestDue ? diffInDays(today, oldestDue) : 0,
    skipped_count: skipped.length,
    skipped_invoices: skipped,
    short_paid_count: shortPaid.length,
    short_paid_amount: roundCents(shortPaid.reduce((sum, i) => sum + i.amount, 0)),
    short_paid_invoices: shortPaid,
  };
}

/**
 * Aggregate invoice rows per recipient
 *
 * Rows whose customer name resolves to no recipient are dropped and counted.
 * Recipients with nothing overdue, skipped or short-paid are left out.
 * Sorted by overdue amount, largest first.
 */
export function aggregateInvoices(
  rows: InvoiceLineItem[],
  directory: RecipientDirectory,
  today: Date
): AggregationResult {
  const resolver = new RecipientResolver(directory);
  const buckets = new Map<string, RecipientBucket>();

  for (const row of rows) {
    if (!row.customer_name.trim()) continue;

    const resolution = resolver.resolve(row.customer_name);
    if (!resolution) continue;
    if (row.total <= 0) continue;

    const { recipient } = resolution;
    let bucket = buckets.get(recipient.recipient_id);
    if (!bucket) {
      bucket = { recipient, locations: new Map() };
      buckets.set(recipient.recipient_id, bucket);
    }

    const location = rowLocation(row, resolution.via_group);
    const invoices = bucket.locations.get(location) ?? [];
    invoices.push({
      order_id: row.order_id,
      ship_date: row.ship_date,
      location,
      ...classifyPayment(row),
    });
    bucket.locations.set(location, invoices);
  }

  const summaries = [...buckets.values()]
    .map((bucket) => summarize(bucket, today))
    .filter((s) => s.overdue_count > 0 || s.skipped_count > 0 || s.short_paid_count > 0)
    .sort(
      (a, b) =>
        b.overdue_amount - a.overdue_amount || a.recipient_name.localeCompare(b.recipient_name)
    );

  return {
    summaries,
    unresolved_count: resolver.unresolvedCount(),
    unresolved_names: resolver.unresolvedNames(),
  };
}
