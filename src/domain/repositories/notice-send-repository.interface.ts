/**
 * Notice Send Repository Interface (Repository Port)
 */

import { NoticeSend } from '../models/notice';

export interface INoticeSendRepository {
  /**
   * Record a sent notice, replacing an earlier one for the same
   * invoice snapshot, recipient and type
   */
  record(notice: NoticeSend): Promise<void>;

  /**
   * Notices sent against an invoice snapshot, oldest first
   */
  findByInvoiceRef(invoice_ref: string): Promise<NoticeSend[]>;
}
