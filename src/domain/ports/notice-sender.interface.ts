/**
 * Notice Sender Port
 * Renders and delivers an overdue, skipped-invoice or short-payment notice
 */

import { Recipient } from '../models/recipient';
import { StatementLine } from '../models/invoice';
import { AgingSummary } from '../models/aging-report';
import { NoticeInvoice, NoticeType } from '../models/notice';
import { DispatchOutcome } from '../models/dispatch-outcome';

export interface NoticeRequest {
  recipient: Recipient;
  emails: string[];
  notice_type: NoticeType;
  notice_date: Date;
  summary: AgingSummary;
  invoices: NoticeInvoice[];
  lines: StatementLine[]; // Current statement, appended below the notice
}

export interface INoticeSender {
  /**
   * Failures are returned, not thrown
   */
  send(request: NoticeRequest, signal: AbortSignal): Promise<DispatchOutcome>;
}
