/**
 * Get Dispatch Jobs Query
 * Read side of the dispatch queue: active job, recent jobs, job items
 */

import { IJobRepository } from '../../domain/repositories/job-repository.interface';
import { ScheduledJob, ScheduledJobItem } from '../../domain/models/job';
import { NotFoundError } from '../../domain/errors';

export const DEFAULT_JOB_LIST_LIMIT = 20;
export const MAX_JOB_LIST_LIMIT = 200;

/**
 * Get Dispatch Jobs Query Handler
 */
export class GetDispatchJobsQuery {
  constructor(private jobRepository: IJobRepository) {}

  /**
   * The queued or running job
   *
   * @returns the job, or null when the queue is idle
   */
  async active(): Promise<ScheduledJob | null> {
    return await this.jobRepository.findActive();
  }

  /**
   * Most recent jobs first; limit is clamped to 1..200
   */
  async recent(limit: number = DEFAULT_JOB_LIST_LIMIT): Promise<ScheduledJob[]> {
    const safeLimit = Number.isFinite(limit)
      ? Math.min(Math.max(Math.trunc(limit), 1), MAX_JOB_LIST_LIMIT)
      : DEFAULT_JOB_LIST_LIMIT;
    return await this.jobRepository.findRecent(safeLimit);
  }

  /**
   * Items of one job in dispatch order
   *
   * @throws NotFoundError if the job does not exist
   */
  async items(job_id: string): Promise<ScheduledJobItem[]> {
    const job = await this.jobRepository.findById(job_id);
    if (!job) {
      throw new NotFoundError(`Job ${job_id} not found`);
    }
    return await this.jobRepository.findItems(job_id);
  }
}
