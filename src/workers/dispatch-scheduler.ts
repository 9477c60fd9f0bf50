/**
 * Dispatch Scheduler
 * Cron tick that enqueues a dispatch job for the recipients due today
 */

import * as cron from 'node-cron';
import { EnqueueDispatchCommand } from '../application/commands/enqueue-dispatch.command';
import { EnqueueResult } from '../domain/services/job-queue';

/**
 * Dispatch Scheduler
 * Runs on a cron schedule; the dispatch worker picks up what it enqueues
 */
export class DispatchScheduler {
  private cronJob: cron.ScheduledTask | null = null;

  constructor(private enqueueDispatch: EnqueueDispatchCommand) {}

  /**
   * Start the scheduler
   * Default: daily at 8:00 AM
   */
  start(cronSchedule: string = '0 8 * * *'): void {
    if (this.cronJob) {
      console.log('[Dispatch Scheduler] Already running');
      return;
    }

    if (!cron.validate(cronSchedule)) {
      throw new Error(`Invalid cron expression: ${cronSchedule}`);
    }

    this.cronJob = cron.schedule(cronSchedule, () => {
      this.run().catch((error) => {
        console.error('[Dispatch Scheduler] Scheduled run failed:', error);
      });
    });

    console.log(`[Dispatch Scheduler] Started (cron: ${cronSchedule})`);
  }

  stop(): void {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
      console.log('[Dispatch Scheduler] Stopped');
    }
  }

  /**
   * One tick: enqueue if anything is due
   */
  async run(): Promise<EnqueueResult> {
    console.log(`[Dispatch Scheduler] Tick at ${new Date().toISOString()}`);
    const result = await this.enqueueDispatch.execute();

    switch (result.status) {
      case 'enqueued':
        console.log(`[Dispatch Scheduler] Job ${result.job.job_id} enqueued (${result.job.total_items} recipients)`);
        break;
      case 'already_active':
        console.log('[Dispatch Scheduler] A job is already active, skipping this tick');
        break;
      case 'nothing_due':
        console.log('[Dispatch Scheduler] Nothing due');
        break;
    }
    return result;
  }
}
