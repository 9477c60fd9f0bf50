/**
 * Enqueue Dispatch Command
 * Snapshot the recipients due today into a dispatch job
 */

import { EnqueueResult, JobQueue } from '../../domain/services/job-queue';
import { today } from '../../utils/date-helpers';

export class EnqueueDispatchCommand {
  constructor(
    private jobQueue: JobQueue,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Execute command
   *
   * @returns enqueued job, the job that is already active, or nothing_due
   * @throws SystemError if no invoice snapshot is available
   */
  async execute(): Promise<EnqueueResult> {
    const now = this.clock();
    return this.jobQueue.enqueue(today(now), now);
  }
}
