/**
 * Send Notice Command
 * Mails an overdue, skipped-invoice or short-payment notice to one
 * recipient of the latest aging report and logs it
 */

import { v4 as uuidv4 } from 'uuid';
import { IRecipientRepository } from '../../domain/repositories/recipient-repository.interface';
import { IAgingReportRepository } from '../../domain/repositories/aging-report-repository.interface';
import { INoticeSendRepository } from '../../domain/repositories/notice-send-repository.interface';
import { IInvoiceSource } from '../../domain/ports/invoice-source.interface';
import { INoticeSender } from '../../domain/ports/notice-sender.interface';
import { AgingReportItem, AgingReportStatus } from '../../domain/models/aging-report';
import { NoticeInvoice, NoticeSend, NoticeType, isNoticeType } from '../../domain/models/notice';
import { nameKey, usableEmails } from '../../domain/models/recipient';
import { SKIP_MESSAGES, SkipReason } from '../../domain/models/dispatch-outcome';
import { buildStatementLines, statementNameKeys } from '../../domain/services/statement-dispatcher';
import {
  NotFoundError,
  RecipientError,
  TransportError,
  ValidationError,
} from '../../domain/errors';
import { today } from '../../utils/date-helpers';

export interface SendNoticeDTO {
  recipient_id: string;
  notice_type: string;
  invoice_ids?: unknown; // Required for skipped and short_paid notices
}

export interface SendNoticeOptions {
  sendTimeoutMs: number;
  clock?: () => Date;
}

function requestedIds(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return [...new Set(value.map((id) => String(id).trim()).filter((id) => id.length > 0))];
}

export class SendNoticeCommand {
  private clock: () => Date;

  constructor(
    private recipientRepository: IRecipientRepository,
    private agingReportRepository: IAgingReportRepository,
    private noticeSendRepository: INoticeSendRepository,
    private invoiceSource: IInvoiceSource,
    private noticeSender: INoticeSender,
    private options: SendNoticeOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Execute command
   *
   * @returns the logged notice
   * @throws ValidationError for an unknown type or invoices not listed in the report
   * @throws NotFoundError if there is no successful report or no such recipient
   * @throws RecipientError if the recipient has nothing to notify about or no email
   * @throws TransportError if delivery failed
   */
  async execute(dto: SendNoticeDTO): Promise<NoticeSend> {
    const notice_type = dto.notice_type;
    if (!isNoticeType(notice_type)) {
      throw new ValidationError(`notice_type must be one of: ${Object.values(NoticeType).join(', ')}`);
    }

    const report = await this.agingReportRepository.findLatest();
    if (!report || report.status !== AgingReportStatus.SUCCESS || !report.invoice_ref) {
      throw new NotFoundError('No successful aging report to send notices from');
    }
    const invoice_ref = report.invoice_ref;

    const recipient = await this.recipientRepository.findById(dto.recipient_id);
    if (!recipient) {
      throw new NotFoundError(`Recipient ${dto.recipient_id} not found`);
    }

    const item = report.items.find((i) => i.recipient_id === recipient.recipient_id);
    if (!item) {
      throw new RecipientError(`${recipient.name} is not in the latest aging report`);
    }

    const invoices = this.selectInvoices(item, notice_type, requestedIds(dto.invoice_ids));

    const emails = usableEmails(recipient);
    if (emails.length === 0) {
      throw new RecipientError(`${recipient.name}: ${SKIP_MESSAGES[SkipReason.MISSING_EMAIL]}`);
    }

    const noticeDate = today(this.clock());
    const rows = await this.invoiceSource.load(invoice_ref);
    const keys = statementNameKeys(recipient, await this.recipientRepository.loadDirectory());
    const lines = keys
      ? buildStatementLines(
          rows.filter((row) => keys.has(nameKey(row.customer_name))),
          recipient,
          noticeDate
        )
      : [];

    const outcome = await this.noticeSender.send(
      {
        recipient,
        emails,
        notice_type,
        notice_date: noticeDate,
        summary: item,
        invoices,
        lines,
      },
      AbortSignal.timeout(this.options.sendTimeoutMs)
    );

    if (outcome.status === 'failed') {
      throw new TransportError(`${recipient.name}: ${outcome.error.message}`);
    }
    if (outcome.status === 'skipped') {
      throw new RecipientError(`${recipient.name}: ${outcome.message}`);
    }

    const notice: NoticeSend = {
      notice_id: uuidv4(),
      run_id: report.run_id,
      invoice_ref,
      recipient_id: recipient.recipient_id,
      notice_type,
      invoice_ids: invoices.map((i) => i.order_id),
      sent_at: this.clock(),
      artifact_ref: outcome.artifact_ref,
    };
    await this.noticeSendRepository.record(notice);

    console.log(`[Notices] Sent ${notice_type} notice to ${recipient.name}`);
    return notice;
  }

  /**
   * Invoices the notice names, checked against the report item
   */
  private selectInvoices(item: AgingReportItem, type: NoticeType, ids: string[]): NoticeInvoice[] {
    if (type === NoticeType.OVERDUE) {
      if (item.overdue_count === 0) {
        throw new RecipientError(`${item.recipient_name} has no overdue invoices`);
      }
      return [];
    }

    if (ids.length === 0) {
      throw new ValidationError(`invoice_ids is required for ${type} notices`);
    }

    const listed: NoticeInvoice[] =
      type === NoticeType.SKIPPED ? item.skipped_invoices : item.short_paid_invoices;
    const byId = new Map(listed.map((invoice) => [invoice.order_id, invoice]));

    const unknown = ids.filter((id) => !byId.has(id));
    if (unknown.length > 0) {
      throw new ValidationError(
        `Not listed as ${type} for ${item.recipient_name}: ${unknown.join(', ')}`
      );
    }
    return ids.flatMap((id) => byId.get(id) ?? []);
  }
}
