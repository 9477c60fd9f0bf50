/**
 * Email Statement Builder
 * Renders a plain-text statement of account and mails it through SES
 */

import { IStatementBuilder, StatementRequest } from '../../domain/ports/statement-builder.interface';
import {
  DispatchErrorKind,
  DispatchOutcome,
  failed,
  sent,
} from '../../domain/models/dispatch-outcome';
import { StatementLine } from '../../domain/models/invoice';
import { TERM_LABELS } from '../../domain/models/terms';
import { AgingStatus } from '../../domain/services/aging-calculator';
import { formatDisplayDate } from '../../utils/date-helpers';
import { errorMessage } from '../../domain/errors';
import { MailDeliveryError, SesMailClient } from './ses-mail-client';
import { splitEmails } from '../../domain/models/recipient';

export interface RenderedStatement {
  subject: string;
  text: string;
}

const money = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

export function formatAmount(amount: number): string {
  return money.format(amount);
}

function formatLine(line: StatementLine): string {
  return [
    line.order_id.padEnd(12),
    formatDisplayDate(line.ship_date).padEnd(12),
    formatDisplayDate(line.due_date).padEnd(12),
    money.format(line.total).padStart(12),
    money.format(line.paid_amount).padStart(12),
    `  ${line.status}`,
  ].join('');
}

/**
 * Plain-text statement: one section per location, with totals
 */
export function renderStatement(
  request: Pick<StatementRequest, 'recipient' | 'lines' | 'statement_date'>
): RenderedStatement {
  const { recipient, lines, statement_date } = request;
  const dateLabel = formatDisplayDate(statement_date);

  const out: string[] = [
    `Statement of Account - ${recipient.name}`,
    `Terms: ${TERM_LABELS[recipient.terms_code]}`,
    `Statement Date: ${dateLabel}`,
    '',
  ];

  let totalDue = 0;
  let dueNow = 0;
  const locations = [...new Set(lines.map((l) => l.location))];

  for (const location of locations) {
    const locationLines = lines.filter((l) => l.location === location);
    let locationDue = 0;

    out.push(`Location: ${location}`);
    out.push('Invoice #   Ship Date   Due Date           Total Paid Amount  Status');
    for (const line of locationLines) {
      out.push(formatLine(line));
      locationDue += line.outstanding;
      if (line.status === AgingStatus.OVERDUE || line.status === AgingStatus.DUE_THIS_WEEK) {
        dueNow += line.outstanding;
      }
    }
    out.push(`Location balance: ${money.format(locationDue)}`);
    out.push('');
    totalDue += locationDue;
  }

  out.push(`Total balance: ${money.format(totalDue)}`);
  out.push(`Overdue or due this week: ${money.format(dueNow)}`);

  return {
    subject: `Statement of Account - ${recipient.name} - ${dateLabel}`,
    text: out.join('\n'),
  };
}

export interface EmailSenderOptions {
  from: string;
  cc: string; // Free-form list, may be empty
}

/**
 * Mail a rendered message; delivery errors become failed outcomes
 */
export async function deliver(
  client: SesMailClient,
  options: EmailSenderOptions,
  to: string[],
  { subject, text }: RenderedStatement,
  signal: AbortSignal
): Promise<DispatchOutcome> {
  try {
    const messageId = await client.sendMail(
      { from: options.from, to, cc: splitEmails(options.cc), subject, text },
      signal
    );
    return sent(messageId || undefined);
  } catch (error) {
    if (error instanceof MailDeliveryError) {
      return failed(error.kind, error.message, error.code);
    }
    return failed(DispatchErrorKind.UNCLASSIFIED, errorMessage(error));
  }
}

export class EmailStatementBuilder implements IStatementBuilder {
  constructor(
    private client: SesMailClient,
    private options: EmailSenderOptions
  ) {}

  send(request: StatementRequest, signal: AbortSignal): Promise<DispatchOutcome> {
    return deliver(this.client, this.options, request.emails, renderStatement(request), signal);
  }
}
