/**
 * Statement Dispatcher
 * One recipient's send step, shared by the dispatch worker and manual sends
 */

import { v4 as uuidv4 } from 'uuid';
import { IRecipientRepository } from '../repositories/recipient-repository.interface';
import { IStatementRunRepository } from '../repositories/statement-run-repository.interface';
import { IStatementBuilder, StatementRequest } from '../ports/statement-builder.interface';
import {
  Recipient,
  RecipientDirectory,
  RecipientKind,
  effectiveMemberships,
  nameKey,
  usableEmails,
} from '../models/recipient';
import { InvoiceLineItem, StatementLine, classifyPayment } from '../models/invoice';
import { RunKind, StatementRun, StatementRunStatus } from '../models/statement-run';
import {
  DispatchErrorKind,
  DispatchOutcome,
  SkipReason,
  failed,
  skipped,
} from '../models/dispatch-outcome';
import { TermsCode } from '../models/terms';
import { errorMessage } from '../errors';
import { rowLocation } from './invoice-aggregator';
import {
  assignBillToBillDueDates,
  compareByShipDate,
  computeAgingStatus,
  computeDueDate,
} from './aging-calculator';
import { today } from '../../utils/date-helpers';

export interface StatementDispatcherOptions {
  sendTimeoutMs: number;
  clock?: () => Date;
}

/**
 * Name keys whose invoice rows belong on a recipient's statement
 *
 * @returns null for a group without members
 */
export function statementNameKeys(
  recipient: Recipient,
  directory: RecipientDirectory
): Set<string> | null {
  const aliasKeys = (recipient_id: string): string[] =>
    directory.aliases.filter((a) => a.recipient_id === recipient_id).map((a) => nameKey(a.alias));

  if (recipient.kind === RecipientKind.SINGLE) {
    return new Set([nameKey(recipient.name), ...aliasKeys(recipient.recipient_id)]);
  }

  const byId = new Map(directory.recipients.map((r) => [r.recipient_id, r]));
  const keys = new Set<string>();
  for (const [member_id, group_id] of effectiveMemberships(directory.memberships)) {
    if (group_id !== recipient.recipient_id) continue;
    const member = byId.get(member_id);
    if (!member) continue;
    keys.add(nameKey(member.name));
    for (const key of aliasKeys(member_id)) keys.add(key);
  }
  return keys.size > 0 ? keys : null;
}

/**
 * Open invoice lines for a statement, grouped by location and ordered by
 * ship date. Due dates use every invoice at the location, paid ones included.
 */
export function buildStatementLines(
  rows: InvoiceLineItem[],
  recipient: Recipient,
  asOf: Date
): StatementLine[] {
  const viaGroup = recipient.kind === RecipientKind.GROUP;
  const byLocation = new Map<string, InvoiceLineItem[]>();
  for (const row of rows) {
    if (row.total <= 0) continue;
    const location = rowLocation(row, viaGroup);
    byLocation.set(location, [...(byLocation.get(location) ?? []), row]);
  }

  const lines: StatementLine[] = [];
  const locations = [...byLocation.keys()].sort((a, b) => a.localeCompare(b));

  for (const location of locations) {
    const invoices = byLocation.get(location) ?? [];
    const dated =
      recipient.terms_code === TermsCode.BILL_TO_BILL
        ? assignBillToBillDueDates(invoices)
        : [...invoices]
            .sort(compareByShipDate)
            .map((invoice) => ({
              invoice,
              due_date: computeDueDate(invoice.ship_date, recipient.terms_code),
            }));

    for (const { invoice, due_date } of dated) {
      const payment = classifyPayment(invoice);
      if (payment.fully_paid) continue;
      lines.push({
        order_id: invoice.order_id,
        customer_name: invoice.customer_name.trim(),
        location,
        ship_date: invoice.ship_date,
        due_date,
        total: invoice.total,
        paid_amount: payment.paid_amount,
        outstanding: payment.outstanding,
        status: computeAgingStatus(asOf, due_date),
      });
    }
  }

  return lines;
}

export class StatementDispatcher {
  private clock: () => Date;

  constructor(
    private recipientRepository: IRecipientRepository,
    private statementRunRepository: IStatementRunRepository,
    private statementBuilder: IStatementBuilder,
    private options: StatementDispatcherOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Build and send one recipient's statement from an invoice snapshot
   *
   * Never throws for per-recipient problems: they come back as skipped or
   * failed outcomes. Repository errors propagate.
   */
  async dispatch(
    recipient: Recipient,
    invoice_ref: string,
    rows: InvoiceLineItem[],
    run_kind: RunKind
  ): Promise<DispatchOutcome> {
    const run: StatementRun = {
      run_id: uuidv4(),
      recipient_id: recipient.recipient_id,
      invoice_ref,
      run_kind,
      status: StatementRunStatus.STARTED,
      created_at: this.clock(),
    };
    await this.statementRunRepository.save(run);

    let outcome: DispatchOutcome;
    try {
      outcome = await this.prepareAndSend(recipient, rows, run_kind);
    } catch (error) {
      await this.statementRunRepository.save({
        ...run,
        status: StatementRunStatus.ERROR,
        error: errorMessage(error),
      });
      throw error;
    }

    switch (outcome.status) {
      case 'sent': {
        const sentAt = this.clock();
        await this.statementRunRepository.save({
          ...run,
          status: StatementRunStatus.SENT,
          sent_at: sentAt,
          artifact_ref: outcome.artifact_ref,
        });
        await this.recipientRepository.updateLastSent(recipient.recipient_id, today(sentAt));
        break;
      }
      case 'skipped':
        await this.statementRunRepository.save({
          ...run,
          status: StatementRunStatus.SKIPPED,
          error: outcome.message,
        });
        break;
      case 'failed':
        await this.statementRunRepository.save({
          ...run,
          status: StatementRunStatus.ERROR,
          error: outcome.error.message,
        });
        break;
    }

    return outcome;
  }

  private async prepareAndSend(
    recipient: Recipient,
    rows: InvoiceLineItem[],
    run_kind: RunKind
  ): Promise<DispatchOutcome> {
    const directory = await this.recipientRepository.loadDirectory();
    const keys = statementNameKeys(recipient, directory);
    if (!keys) {
      return skipped(SkipReason.NO_MEMBERS);
    }

    const matching = rows.filter((row) => keys.has(nameKey(row.customer_name)));
    if (matching.length === 0) {
      return skipped(SkipReason.NO_MATCHING_ROWS);
    }

    const statementDate = today(this.clock());
    const lines = buildStatementLines(matching, recipient, statementDate);
    if (lines.length === 0) {
      return skipped(SkipReason.NOTHING_TO_SEND);
    }

    const emails = usableEmails(recipient);
    if (emails.length === 0) {
      return skipped(SkipReason.MISSING_EMAIL);
    }

    return this.sendWithTimeout({
      recipient,
      emails,
      lines,
      run_kind,
      statement_date: statementDate,
    });
  }

  /**
   * Call the builder; past `sendTimeoutMs` the call is aborted and reported
   * as a timeout
   */
  private async sendWithTimeout(request: StatementRequest): Promise<DispatchOutcome> {
    const controller = new AbortController();
    const timeoutMs = this.options.sendTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<DispatchOutcome>((resolve) => {
      timer = setTimeout(() => {
        resolve(failed(DispatchErrorKind.TIMEOUT, `Statement send timed out after ${timeoutMs}ms`));
        controller.abort();
      }, timeoutMs);
    });

    const send = this.statementBuilder
      .send(request, controller.signal)
      .catch((error: unknown) => failed(DispatchErrorKind.UNCLASSIFIED, errorMessage(error)));

    try {
      return await Promise.race([send, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
