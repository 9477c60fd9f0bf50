/**
 * Notice Domain Model
 * Follow-up emails sent from an aging report, and the log that records them
 */

import { SkippedInvoice } from './aging-report';

export enum NoticeType {
  OVERDUE = 'overdue',
  SKIPPED = 'skipped',
  SHORT_PAID = 'short_paid',
}

/**
 * Invoice named in a notice; `amount` is the balance left on a short payment
 */
export interface NoticeInvoice extends SkippedInvoice {
  amount?: number;
}

/**
 * One notice per invoice snapshot, recipient and type; a repeat replaces it
 */
export interface NoticeSend {
  notice_id: string;
  run_id: string;        // Aging report the notice was sent from
  invoice_ref: string;
  recipient_id: string;
  notice_type: NoticeType;
  invoice_ids: string[]; // Empty for overdue notices
  sent_at: Date;
  artifact_ref?: string; // SES message id
}

export function isNoticeType(value: unknown): value is NoticeType {
  return Object.values<unknown>(NoticeType).includes(value);
}
