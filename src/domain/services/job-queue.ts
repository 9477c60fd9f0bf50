/**
 * Job Queue
 * Persistent dispatch queue with at most one queued/running job
 */

import { v4 as uuidv4 } from 'uuid';
import { IJobRepository } from '../repositories/job-repository.interface';
import { IRecipientRepository } from '../repositories/recipient-repository.interface';
import { IInvoiceSource } from '../ports/invoice-source.interface';
import {
  JobItemStatus,
  JobStatus,
  ScheduledJob,
  ScheduledJobItem,
} from '../models/job';
import {
  Recipient,
  RecipientDirectory,
  RecipientKind,
  groupedMemberIds,
  isDue,
  nameKey,
} from '../models/recipient';
import { formatDate } from '../../utils/date-helpers';

export type EnqueueResult =
  | { status: 'enqueued'; job: ScheduledJob }
  | { status: 'already_active'; job: ScheduledJob | null }
  | { status: 'nothing_due' };

export interface JobQueueOptions {
  maxJobRecipients: number; // 0 = no limit
  heartbeatStaleMs: number;
}

/**
 * Recipients due on `today`, by name. Singles that belong to a group are
 * reached through the group and never dispatched on their own.
 */
export function selectDueRecipients(
  directory: RecipientDirectory,
  today: Date,
  maxRecipients: number = 0
): Recipient[] {
  const grouped = groupedMemberIds(directory.memberships);

  const due = directory.recipients
    .filter((r) => !(r.kind === RecipientKind.SINGLE && grouped.has(r.recipient_id)))
    .filter((r) => isDue(r, today))
    .sort((a, b) => nameKey(a.name).localeCompare(nameKey(b.name)));

  return maxRecipients > 0 ? due.slice(0, maxRecipients) : due;
}

export class JobQueue {
  constructor(
    private jobRepository: IJobRepository,
    private recipientRepository: IRecipientRepository,
    private invoiceSource: IInvoiceSource,
    private options: JobQueueOptions
  ) {}

  /**
   * Enqueue one job for every recipient due on `today`
   *
   * @throws SystemError if no invoice snapshot is available
   */
  async enqueue(today: Date, now: Date = new Date()): Promise<EnqueueResult> {
    const active = await this.jobRepository.findActive();
    if (active) {
      console.log(`[Job Queue] Job ${active.job_id} is still ${active.status}, not enqueuing`);
      return { status: 'already_active', job: active };
    }

    const directory = await this.recipientRepository.loadDirectory();
    const due = selectDueRecipients(directory, today, this.options.maxJobRecipients);
    if (due.length === 0) {
      console.log(`[Job Queue] No recipients due on ${formatDate(today)}`);
      return { status: 'nothing_due' };
    }

    const invoice_ref = await this.invoiceSource.currentReference();

    const job_id = uuidv4();
    const job: ScheduledJob = {
      job_id,
      status: JobStatus.QUEUED,
      created_at: now,
      invoice_ref,
      missing_email: [],
      total_items: due.length,
      processed_items: 0,
      sent_items: 0,
      skipped_items: 0,
      failed_items: 0,
    };

    const items: ScheduledJobItem[] = due.map((recipient, seq) => ({
      item_id: uuidv4(),
      job_id,
      seq,
      recipient_id: recipient.recipient_id,
      recipient_name: recipient.name,
      status: JobItemStatus.PENDING,
      attempts: 0,
      updated_at: now,
    }));

    const result = await this.jobRepository.createIfNoneActive(job, items);
    if (!result.created) {
      console.log('[Job Queue] Another job became active concurrently, not enqueuing');
      return { status: 'already_active', job: result.active };
    }

    console.log(`[Job Queue] Enqueued job ${job_id} with ${items.length} recipients (${invoice_ref})`);
    return { status: 'enqueued', job: result.job };
  }

  /**
   * Reclaim stale running jobs, then claim the oldest queued one
   *
   * @returns the claimed job, or null when nothing is claimable
   */
  async claim(now: Date = new Date()): Promise<ScheduledJob | null> {
    const staleBefore = new Date(now.getTime() - this.options.heartbeatStaleMs);
    const reclaimed = await this.jobRepository.reclaimStale(staleBefore);
    if (reclaimed > 0) {
      console.warn(`[Job Queue] Reclaimed ${reclaimed} stale running job(s)`);
    }

    const job = await this.jobRepository.claimNextQueued(now);
    if (job) {
      console.log(`[Job Queue] Claimed job ${job.job_id}`);
    }
    return job;
  }

  async getActiveJob(): Promise<ScheduledJob | null> {
    return this.jobRepository.findActive();
  }
}
