/**
 * Scheduled Job Domain Model
 * Persistent dispatch jobs and their per-recipient items
 */

/**
 * Job Status - lifecycle of a dispatch job
 */
export enum JobStatus {
  QUEUED = 'queued',       // Waiting for a worker
  RUNNING = 'running',     // Claimed by a worker
  COMPLETED = 'completed', // Every item reached a terminal status
  FAILED = 'failed',       // Invoice snapshot could not be loaded
}

/**
 * Job Item Status - pending -> running -> sent | skipped | failed
 */
export enum JobItemStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  SENT = 'sent',
  SKIPPED = 'skipped',
  FAILED = 'failed',
}

/**
 * Value of `active_slot` on the one queued/running job.
 * A unique partial index on the field enforces the single active job.
 */
export const DISPATCH_SLOT = 'dispatch';

export interface JobCounters {
  total_items: number;
  processed_items: number;
  sent_items: number;
  skipped_items: number;
  failed_items: number;
}

/**
 * Scheduled Job - one dispatch run over a snapshot of due recipients
 */
export interface ScheduledJob extends JobCounters {
  job_id: string;
  status: JobStatus;
  active_slot?: typeof DISPATCH_SLOT;

  created_at: Date;
  started_at?: Date;
  finished_at?: Date;
  heartbeat_at?: Date;

  invoice_ref: string;    // Invoice snapshot the job dispatches from
  missing_email: string[]; // Recipient names skipped for lack of an address
  error?: string;
}

/**
 * Scheduled Job Item - one recipient's unit of work
 */
export interface ScheduledJobItem {
  item_id: string;
  job_id: string;
  seq: number;            // Position within the job (recipients ordered by name)
  recipient_id: string;
  recipient_name: string; // Snapshot at enqueue time
  status: JobItemStatus;
  attempts: number;
  error?: string;
  started_at?: Date;
  finished_at?: Date;
  updated_at: Date;
}

export const TERMINAL_ITEM_STATUSES: ReadonlySet<JobItemStatus> = new Set([
  JobItemStatus.SENT,
  JobItemStatus.SKIPPED,
  JobItemStatus.FAILED,
]);

export function isActiveJob(job: ScheduledJob): boolean {
  return job.status === JobStatus.QUEUED || job.status === JobStatus.RUNNING;
}

export function isTerminalItem(item: ScheduledJobItem): boolean {
  return TERMINAL_ITEM_STATUSES.has(item.status);
}

/**
 * Roll item statuses up into job counters
 */
export function countItems(items: ScheduledJobItem[]): JobCounters {
  const counters: JobCounters = {
    total_items: items.length,
    processed_items: 0,
    sent_items: 0,
    skipped_items: 0,
    failed_items: 0,
  };

  for (const item of items) {
    if (!isTerminalItem(item)) continue;
    counters.processed_items++;
    if (item.status === JobItemStatus.SENT) counters.sent_items++;
    if (item.status === JobItemStatus.SKIPPED) counters.skipped_items++;
    if (item.status === JobItemStatus.FAILED) counters.failed_items++;
  }

  return counters;
}

/**
 * Short failure summary stored on a completed job
 */
export function summarizeFailures(items: ScheduledJobItem[], sampleSize: number = 3): string | undefined {
  const failures = items.filter((i) => i.status === JobItemStatus.FAILED);
  if (failures.length === 0) return undefined;

  const sample = failures
    .slice(0, sampleSize)
    .map((i) => `${i.recipient_name}: ${i.error ?? 'unknown error'}`);
  const more = failures.length > sampleSize ? ` (+${failures.length - sampleSize} more)` : '';
  return `${failures.length} failed - ${sample.join('; ')}${more}`;
}
