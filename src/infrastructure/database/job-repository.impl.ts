/**
 * MongoDB Job Repository Implementation
 * Dispatch jobs and items; enqueue runs in a transaction and claim is a
 * conditional findOneAndUpdate
 */

import { Collection, Db, MongoClient, MongoServerError, WithId } from 'mongodb';
import {
  CreateJobResult,
  IJobRepository,
} from '../../domain/repositories/job-repository.interface';
import {
  DISPATCH_SLOT,
  JobStatus,
  ScheduledJob,
  ScheduledJobItem,
} from '../../domain/models/job';

const DUPLICATE_KEY = 11000;

/**
 * MongoDB Job Repository Implementation
 */
export class MongoJobRepository implements IJobRepository {
  private jobs: Collection<ScheduledJob>;
  private items: Collection<ScheduledJobItem>;

  constructor(private client: MongoClient, db: Db) {
    this.jobs = db.collection<ScheduledJob>('scheduled_jobs');
    this.items = db.collection<ScheduledJobItem>('scheduled_job_items');
  }

  async findActive(): Promise<ScheduledJob | null> {
    const doc = await this.jobs.findOne({
      status: { $in: [JobStatus.QUEUED, JobStatus.RUNNING] },
    });
    return doc ? this.mapDocumentToJob(doc) : null;
  }

  /**
   * Insert job + items in one transaction. The active check inside the
   * transaction covers the common case; the unique index on active_slot
   * rejects the loser of a concurrent race.
   */
  async createIfNoneActive(
    job: ScheduledJob,
    items: ScheduledJobItem[]
  ): Promise<CreateJobResult> {
    const session = this.client.startSession();
    try {
      const found: { active: ScheduledJob | null } = { active: null };

      await session.withTransaction(async () => {
        const existing = await this.jobs.findOne(
          { status: { $in: [JobStatus.QUEUED, JobStatus.RUNNING] } },
          { session }
        );
        if (existing) {
          found.active = this.mapDocumentToJob(existing);
          return;
        }

        await this.jobs.insertOne({ ...job, active_slot: DISPATCH_SLOT }, { session });
        if (items.length > 0) {
          // Copies: the driver writes _id back onto inserted documents
          await this.items.insertMany(
            items.map((item) => ({ ...item })),
            { session }
          );
        }
      });

      if (found.active) {
        return { created: false, active: found.active };
      }
      return { created: true, job: { ...job, active_slot: DISPATCH_SLOT } };
    } catch (error) {
      if (error instanceof MongoServerError && error.code === DUPLICATE_KEY) {
        return { created: false, active: await this.findActive() };
      }
      throw error;
    } finally {
      await session.endSession();
    }
  }

  async reclaimStale(staleBefore: Date): Promise<number> {
    const result = await this.jobs.updateMany(
      {
        status: JobStatus.RUNNING,
        $or: [{ heartbeat_at: { $lt: staleBefore } }, { heartbeat_at: { $exists: false } }],
      },
      {
        $set: { status: JobStatus.QUEUED },
        $unset: { started_at: '' },
      }
    );
    return result.modifiedCount;
  }

  async claimNextQueued(now: Date): Promise<ScheduledJob | null> {
    const doc = await this.jobs.findOneAndUpdate(
      { status: JobStatus.QUEUED },
      { $set: { status: JobStatus.RUNNING, started_at: now, heartbeat_at: now } },
      { sort: { created_at: 1 }, returnDocument: 'after' }
    );
    return doc ? this.mapDocumentToJob(doc) : null;
  }

  async findById(job_id: string): Promise<ScheduledJob | null> {
    const doc = await this.jobs.findOne({ job_id });
    return doc ? this.mapDocumentToJob(doc) : null;
  }

  async findRecent(limit: number): Promise<ScheduledJob[]> {
    const docs = await this.jobs.find().sort({ created_at: -1 }).limit(limit).toArray();
    return docs.map((doc) => this.mapDocumentToJob(doc));
  }

  /**
   * Save job state. A job leaving queued/running gives up the active slot.
   */
  async save(job: ScheduledJob): Promise<void> {
    const { active_slot: _slot, ...fields } = job;
    const active = job.status === JobStatus.QUEUED || job.status === JobStatus.RUNNING;

    await this.jobs.updateOne(
      { job_id: job.job_id },
      active
        ? { $set: { ...fields, active_slot: DISPATCH_SLOT } }
        : { $set: fields, $unset: { active_slot: '' } },
      { upsert: true }
    );
  }

  async touchHeartbeat(job_id: string, at: Date): Promise<void> {
    await this.jobs.updateOne({ job_id }, { $set: { heartbeat_at: at } });
  }

  async addMissingEmail(job_id: string, recipient_name: string): Promise<void> {
    await this.jobs.updateOne({ job_id }, { $addToSet: { missing_email: recipient_name } });
  }

  async findItems(job_id: string): Promise<ScheduledJobItem[]> {
    const docs = await this.items.find({ job_id }).sort({ seq: 1 }).toArray();
    return docs.map((doc) => this.mapDocumentToItem(doc));
  }

  async saveItem(item: ScheduledJobItem): Promise<void> {
    await this.items.updateOne({ item_id: item.item_id }, { $set: item }, { upsert: true });
  }

  private mapDocumentToJob(doc: WithId<ScheduledJob>): ScheduledJob {
    return {
      job_id: doc.job_id,
      status: doc.status,
      active_slot: doc.active_slot ?? undefined,
      created_at: doc.created_at,
      started_at: doc.started_at ?? undefined,
      finished_at: doc.finished_at ?? undefined,
      heartbeat_at: doc.heartbeat_at ?? undefined,
      invoice_ref: doc.invoice_ref,
      missing_email: doc.missing_email ?? [],
      error: doc.error ?? undefined,
      total_items: doc.total_items ?? 0,
      processed_items: doc.processed_items ?? 0,
      sent_items: doc.sent_items ?? 0,
      skipped_items: doc.skipped_items ?? 0,
      failed_items: doc.failed_items ?? 0,
    };
  }

  private mapDocumentToItem(doc: WithId<ScheduledJobItem>): ScheduledJobItem {
    return {
      item_id: doc.item_id,
      job_id: doc.job_id,
      seq: doc.seq,
      recipient_id: doc.recipient_id,
      recipient_name: doc.recipient_name,
      status: doc.status,
      attempts: doc.attempts ?? 0,
      error: doc.error ?? undefined,
      started_at: doc.started_at ?? undefined,
      finished_at: doc.finished_at ?? undefined,
      updated_at: doc.updated_at,
    };
  }
}
