/**
 * Job Repository Interface (Repository Port)
 * Persistence of dispatch jobs and their items
 */

import { ScheduledJob, ScheduledJobItem } from '../models/job';

export type CreateJobResult =
  | { created: true; job: ScheduledJob }
  | { created: false; active: ScheduledJob | null };

export interface IJobRepository {
  /**
   * The queued or running job, if any
   */
  findActive(): Promise<ScheduledJob | null>;

  /**
   * Atomically insert a queued job and its items unless another job is
   * queued or running. Concurrent callers cannot both succeed.
   */
  createIfNoneActive(job: ScheduledJob, items: ScheduledJobItem[]): Promise<CreateJobResult>;

  /**
   * Return running jobs whose heartbeat is older than `staleBefore` to queued
   *
   * @returns number of jobs reclaimed
   */
  reclaimStale(staleBefore: Date): Promise<number>;

  /**
   * Move the oldest queued job to running with a conditional update that only
   * matches while the job is still queued
   *
   * @returns the claimed job, or null if nothing was queued or the race was lost
   */
  claimNextQueued(now: Date): Promise<ScheduledJob | null>;

  findById(job_id: string): Promise<ScheduledJob | null>;

  /**
   * Most recent jobs first
   */
  findRecent(limit: number): Promise<ScheduledJob[]>;

  /**
   * Save job state (status, counters, timestamps)
   */
  save(job: ScheduledJob): Promise<void>;

  touchHeartbeat(job_id: string, at: Date): Promise<void>;

  /**
   * Add a recipient name to the job's missing-email list (no duplicates)
   */
  addMissingEmail(job_id: string, recipient_name: string): Promise<void>;

  /**
   * Items in enqueue order
   */
  findItems(job_id: string): Promise<ScheduledJobItem[]>;

  saveItem(item: ScheduledJobItem): Promise<void>;
}
