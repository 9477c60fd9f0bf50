/**
 * Email Notice Sender
 * Plain-text follow-up notices mailed through SES, with the current
 * statement appended
 */

import { INoticeSender, NoticeRequest } from '../../domain/ports/notice-sender.interface';
import { DispatchOutcome } from '../../domain/models/dispatch-outcome';
import { NoticeInvoice, NoticeType } from '../../domain/models/notice';
import { formatDisplayDate } from '../../utils/date-helpers';
import { SesMailClient } from './ses-mail-client';
import {
  EmailSenderOptions,
  RenderedStatement,
  deliver,
  formatAmount,
  renderStatement,
} from './email-statement-builder';

export const NOTICE_TITLES: Record<NoticeType, string> = {
  [NoticeType.OVERDUE]: 'Overdue Notice',
  [NoticeType.SKIPPED]: 'Skipped Invoice Notification',
  [NoticeType.SHORT_PAID]: 'Partial Payment Notification',
};

function invoiceLine(invoice: NoticeInvoice): string {
  const line = `  Invoice #${invoice.order_id}  shipped ${formatDisplayDate(invoice.ship_date)}  ${invoice.location}`;
  return invoice.amount === undefined ? line : `${line}  balance ${formatAmount(invoice.amount)}`;
}

function noticeBody(request: NoticeRequest): string[] {
  const { summary, invoices } = request;

  switch (request.notice_type) {
    case NoticeType.OVERDUE:
      return [
        `Our records show ${summary.overdue_count} overdue invoice(s) totalling ` +
          `${formatAmount(summary.overdue_amount)}. The oldest is ${summary.days_overdue} day(s) past due.`,
        'Please arrange payment at your earliest convenience.',
      ];
    case NoticeType.SKIPPED:
      return [
        'The invoices below are still open although later invoices at the same location have been paid:',
        ...invoices.map(invoiceLine),
        'Please check whether they were missed.',
      ];
    case NoticeType.SHORT_PAID:
      return [
        'The invoices below were paid in part and still carry a balance:',
        ...invoices.map(invoiceLine),
      ];
  }
}

export function renderNotice(request: NoticeRequest): RenderedStatement {
  const title = NOTICE_TITLES[request.notice_type];
  const dateLabel = formatDisplayDate(request.notice_date);

  const out = [`${title} - ${request.recipient.name}`, `Date: ${dateLabel}`, '', ...noticeBody(request)];
  if (request.lines.length > 0) {
    const statement = renderStatement({
      recipient: request.recipient,
      lines: request.lines,
      statement_date: request.notice_date,
    });
    out.push('', statement.text);
  }

  return { subject: `${title} ${dateLabel}`, text: out.join('\n') };
}

export class EmailNoticeSender implements INoticeSender {
  constructor(
    private client: SesMailClient,
    private options: EmailSenderOptions
  ) {}

  send(request: NoticeRequest, signal: AbortSignal): Promise<DispatchOutcome> {
    return deliver(this.client, this.options, request.emails, renderNotice(request), signal);
  }
}
