/**
 * Aging Report Domain Model
 * Persisted snapshot of an on-demand aggregation pass
 */

import { TermsCode } from './terms';

export enum AgingReportStatus {
  SUCCESS = 'success',
  ERROR = 'error',
}

export interface SkippedInvoice {
  order_id: string;
  ship_date: Date;
  location: string;
}

export interface ShortPaidInvoice {
  order_id: string;
  ship_date: Date;
  location: string;
  amount: number; // Outstanding balance
}

/**
 * Per-recipient aggregate row
 */
export interface AgingSummary {
  recipient_id: string;
  recipient_name: string;
  terms_code: TermsCode;
  overdue_count: number;
  overdue_amount: number;
  days_overdue: number;
  skipped_count: number;
  skipped_invoices: SkippedInvoice[];
  short_paid_count: number;
  short_paid_amount: number;
  short_paid_invoices: ShortPaidInvoice[];
}

export interface AgingReportItem extends AgingSummary {
  run_id: string;
}

export interface AgingReportRun {
  run_id: string;
  invoice_ref?: string;
  status: AgingReportStatus;
  created_at: Date;
  error?: string;
  unresolved_count: number;  // Invoice rows whose customer matched no recipient
  unresolved_names: string[];
}

export interface AgingReport extends AgingReportRun {
  items: AgingReportItem[];
}
