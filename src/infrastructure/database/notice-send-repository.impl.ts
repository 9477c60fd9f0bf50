/**
 * MongoDB Notice Send Repository Implementation
 */

import { Collection, Db, WithId } from 'mongodb';
import { INoticeSendRepository } from '../../domain/repositories/notice-send-repository.interface';
import { NoticeSend } from '../../domain/models/notice';

export class MongoNoticeSendRepository implements INoticeSendRepository {
  private collection: Collection<NoticeSend>;

  constructor(db: Db) {
    this.collection = db.collection<NoticeSend>('notice_sends');
  }

  async record(notice: NoticeSend): Promise<void> {
    await this.collection.replaceOne(
      {
        invoice_ref: notice.invoice_ref,
        recipient_id: notice.recipient_id,
        notice_type: notice.notice_type,
      },
      { ...notice },
      { upsert: true }
    );
  }

  async findByInvoiceRef(invoice_ref: string): Promise<NoticeSend[]> {
    const docs = await this.collection.find({ invoice_ref }).sort({ sent_at: 1 }).toArray();
    return docs.map((doc) => this.mapDocumentToNotice(doc));
  }

  private mapDocumentToNotice(doc: WithId<NoticeSend>): NoticeSend {
    return {
      notice_id: doc.notice_id,
      run_id: doc.run_id,
      invoice_ref: doc.invoice_ref,
      recipient_id: doc.recipient_id,
      notice_type: doc.notice_type,
      invoice_ids: doc.invoice_ids ?? [],
      sent_at: doc.sent_at,
      artifact_ref: doc.artifact_ref ?? undefined,
    };
  }
}
