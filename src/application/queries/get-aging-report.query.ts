/**
 * Get Aging Report Query
 */

import { IAgingReportRepository } from '../../domain/repositories/aging-report-repository.interface';
import { INoticeSendRepository } from '../../domain/repositories/notice-send-repository.interface';
import { AgingReport, AgingReportItem } from '../../domain/models/aging-report';
import { NoticeType } from '../../domain/models/notice';

export interface AgingReportItemView extends AgingReportItem {
  notices_sent: NoticeType[]; // Notices already sent for this invoice snapshot
}

export interface AgingReportView extends AgingReport {
  items: AgingReportItemView[];
}

export class GetAgingReportQuery {
  constructor(
    private agingReportRepository: IAgingReportRepository,
    private noticeSendRepository: INoticeSendRepository
  ) {}

  /**
   * @returns the latest report run with its items, or null if none was run yet
   */
  async latest(): Promise<AgingReportView | null> {
    const report = await this.agingReportRepository.findLatest();
    if (!report) return null;

    const notices = report.invoice_ref
      ? await this.noticeSendRepository.findByInvoiceRef(report.invoice_ref)
      : [];
    const sentTo = new Map<string, NoticeType[]>();
    for (const notice of notices) {
      sentTo.set(notice.recipient_id, [...(sentTo.get(notice.recipient_id) ?? []), notice.notice_type]);
    }

    return {
      ...report,
      items: report.items.map((item) => ({
        ...item,
        notices_sent: sentTo.get(item.recipient_id) ?? [],
      })),
    };
  }
}
