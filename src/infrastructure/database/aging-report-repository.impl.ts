/**
 * MongoDB Aging Report Repository Implementation
 * Report runs and their per-recipient items
 */

import { Collection, Db, WithId } from 'mongodb';
import { IAgingReportRepository } from '../../domain/repositories/aging-report-repository.interface';
import {
  AgingReport,
  AgingReportItem,
  AgingReportRun,
} from '../../domain/models/aging-report';

export class MongoAgingReportRepository implements IAgingReportRepository {
  private runs: Collection<AgingReportRun>;
  private items: Collection<AgingReportItem>;

  constructor(db: Db) {
    this.runs = db.collection<AgingReportRun>('aging_report_runs');
    this.items = db.collection<AgingReportItem>('aging_report_items');
  }

  /**
   * Items are written before the run so a reader never sees a run
   * whose items are still missing
   */
  async saveRun(run: AgingReportRun, items: AgingReportItem[]): Promise<void> {
    if (items.length > 0) {
      await this.items.insertMany(items.map((item) => ({ ...item })));
    }
    await this.runs.insertOne({ ...run });
  }

  async findLatest(): Promise<AgingReport | null> {
    const run = await this.runs.findOne({}, { sort: { created_at: -1 } });
    if (!run) return null;

    const items = await this.items
      .find({ run_id: run.run_id })
      .sort({ overdue_amount: -1, recipient_name: 1 })
      .toArray();

    return {
      ...this.mapDocumentToRun(run),
      items: items.map((doc) => this.mapDocumentToItem(doc)),
    };
  }

  private mapDocumentToRun(doc: WithId<AgingReportRun>): AgingReportRun {
    return {
      run_id: doc.run_id,
      invoice_ref: doc.invoice_ref ?? undefined,
      status: doc.status,
      created_at: doc.created_at,
      error: doc.error ?? undefined,
      unresolved_count: doc.unresolved_count ?? 0,
      unresolved_names: doc.unresolved_names ?? [],
    };
  }

  private mapDocumentToItem(doc: WithId<AgingReportItem>): AgingReportItem {
    return {
      run_id: doc.run_id,
      recipient_id: doc.recipient_id,
      recipient_name: doc.recipient_name,
      terms_code: doc.terms_code,
      overdue_count: doc.overdue_count,
      overdue_amount: doc.overdue_amount,
      days_overdue: doc.days_overdue,
      skipped_count: doc.skipped_count,
      skipped_invoices: doc.skipped_invoices ?? [],
      short_paid_count: doc.short_paid_count,
      short_paid_amount: doc.short_paid_amount,
      short_paid_invoices: doc.short_paid_invoices ?? [],
    };
  }
}
