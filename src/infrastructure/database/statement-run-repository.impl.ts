/**
 * MongoDB Statement Run Repository Implementation
 */

import { Collection, Db, WithId } from 'mongodb';
import { IStatementRunRepository } from '../../domain/repositories/statement-run-repository.interface';
import { StatementRun, StatementRunStatus } from '../../domain/models/statement-run';

export class MongoStatementRunRepository implements IStatementRunRepository {
  private collection: Collection<StatementRun>;

  constructor(db: Db) {
    this.collection = db.collection<StatementRun>('statement_runs');
  }

  async save(run: StatementRun): Promise<void> {
    await this.collection.updateOne({ run_id: run.run_id }, { $set: { ...run } }, { upsert: true });
  }

  async findSentSince(
    recipient_id: string,
    invoice_ref: string,
    since: Date
  ): Promise<StatementRun | null> {
    const doc = await this.collection.findOne(
      {
        recipient_id,
        invoice_ref,
        status: StatementRunStatus.SENT,
        created_at: { $gte: since },
      },
      { sort: { created_at: -1 } }
    );
    return doc ? this.mapDocumentToRun(doc) : null;
  }

  private mapDocumentToRun(doc: WithId<StatementRun>): StatementRun {
    return {
      run_id: doc.run_id,
      recipient_id: doc.recipient_id,
      invoice_ref: doc.invoice_ref,
      run_kind: doc.run_kind,
      status: doc.status,
      created_at: doc.created_at,
      sent_at: doc.sent_at ?? undefined,
      error: doc.error ?? undefined,
      artifact_ref: doc.artifact_ref ?? undefined,
    };
  }
}
