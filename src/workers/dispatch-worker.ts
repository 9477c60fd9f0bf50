/**
 * Dispatch Worker
 * Background worker that claims dispatch jobs and sends each item's statement
 */

import { JobQueue } from '../domain/services/job-queue';
import { StatementDispatcher } from '../domain/services/statement-dispatcher';
import { isRetryable, retryDelayMs } from '../domain/services/retry-policy';
import { IJobRepository } from '../domain/repositories/job-repository.interface';
import { IRecipientRepository } from '../domain/repositories/recipient-repository.interface';
import { IStatementRunRepository } from '../domain/repositories/statement-run-repository.interface';
import { IInvoiceSource } from '../domain/ports/invoice-source.interface';
import {
  JobItemStatus,
  JobStatus,
  ScheduledJob,
  ScheduledJobItem,
  countItems,
  isTerminalItem,
  summarizeFailures,
} from '../domain/models/job';
import { InvoiceLineItem } from '../domain/models/invoice';
import { RunKind } from '../domain/models/statement-run';
import {
  DispatchError,
  DispatchErrorKind,
  SkipReason,
} from '../domain/models/dispatch-outcome';
import { errorMessage } from '../domain/errors';

export interface DispatchWorkerOptions {
  idleMs: number;
  errorDelayMs: number;
  retries: number;
  retryBackoffMs: number;
  interItemDelayMs: number;
  clock?: () => Date;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts
 */
export function abortableDelay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Dispatch Worker
 * Polls the job queue; one job at a time, items in order
 */
export class DispatchWorker {
  private isRunning: boolean = false;
  private stopRequested: boolean = false;
  private loop: Promise<void> | null = null;
  private stopController = new AbortController();
  private clock: () => Date;
  private sleep: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(
    private jobQueue: JobQueue,
    private jobRepository: IJobRepository,
    private recipientRepository: IRecipientRepository,
    private statementRunRepository: IStatementRunRepository,
    private invoiceSource: IInvoiceSource,
    private dispatcher: StatementDispatcher,
    private options: DispatchWorkerOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? abortableDelay;
  }

  /**
   * Start the polling loop in the background
   */
  start(): void {
    if (this.isRunning) {
      console.log('[Dispatch Worker] Already running');
      return;
    }

    this.isRunning = true;
    this.stopRequested = false;
    this.stopController = new AbortController();
    console.log(`[Dispatch Worker] Started (idle poll every ${this.options.idleMs / 1000}s)`);
    this.loop = this.run();
  }

  /**
   * Stop the worker. Waits are cut short and the current item finishes its
   * attempt; a job with items left goes back to the queue.
   */
  async stop(): Promise<void> {
    if (!this.isRunning) return;

    console.log('[Dispatch Worker] Stopping...');
    this.isRunning = false;
    this.stopRequested = true;
    this.stopController.abort();
    await this.loop;
    this.loop = null;
  }

  /**
   * One iteration: claim a job and process it to the end
   *
   * @returns true if a job was processed
   */
  async runOnce(): Promise<boolean> {
    const job = await this.jobQueue.claim(this.clock());
    if (!job) return false;

    await this.processJob(job);
    return true;
  }

  private async run(): Promise<void> {
    while (this.isRunning) {
      try {
        const worked = await this.runOnce();
        if (!worked && this.isRunning) {
          await this.sleep(this.options.idleMs, this.stopController.signal);
        }
      } catch (error) {
        console.error('[Dispatch Worker] Error in worker loop:', error);
        if (this.isRunning) {
          await this.sleep(this.options.errorDelayMs, this.stopController.signal);
        }
      }
    }

    console.log('[Dispatch Worker] Stopped');
  }

  /**
   * Process every non-terminal item of a claimed job
   */
  async processJob(claimed: ScheduledJob): Promise<ScheduledJob> {
    let job: ScheduledJob = { ...claimed, missing_email: [...claimed.missing_email] };
    console.log(`[Dispatch Worker] Processing job ${job.job_id} (${job.invoice_ref})`);

    let rows: InvoiceLineItem[];
    try {
      rows = await this.invoiceSource.load(job.invoice_ref);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[Dispatch Worker] Job ${job.job_id} failed: ${message}`);
      job = {
        ...job,
        status: JobStatus.FAILED,
        error: `Invoice snapshot unavailable: ${message}`,
        finished_at: this.clock(),
      };
      await this.jobRepository.save(job);
      return job;
    }

    const items = await this.jobRepository.findItems(job.job_id);
    const pending = items.filter((item) => !isTerminalItem(item));
    if (pending.length < items.length) {
      console.log(
        `[Dispatch Worker] Resuming job ${job.job_id}: ${items.length - pending.length} of ${items.length} items already done`
      );
    }

    for (let idx = 0; idx < items.length; idx++) {
      if (isTerminalItem(items[idx])) continue;
      if (this.stopRequested) {
        return this.requeue(job, items);
      }

      items[idx] = await this.processItem(job, items[idx], rows);
      job = { ...job, ...countItems(items) };
      await this.jobRepository.save(job);

      if (!isTerminalItem(items[idx])) {
        // Interrupted during a retry wait
        return this.requeue(job, items);
      }

      const hasMore = items.slice(idx + 1).some((item) => !isTerminalItem(item));
      if (hasMore && this.options.interItemDelayMs > 0) {
        await this.pause(job, this.options.interItemDelayMs);
      }
    }

    job = {
      ...job,
      ...countItems(items),
      status: JobStatus.COMPLETED,
      finished_at: this.clock(),
      error: summarizeFailures(items),
    };
    await this.jobRepository.save(job);

    console.log(
      `[Dispatch Worker] Job ${job.job_id} completed: ${job.sent_items} sent, ${job.skipped_items} skipped, ${job.failed_items} failed`
    );
    return job;
  }

  /**
   * Drive one item to a terminal status
   */
  private async processItem(
    job: ScheduledJob,
    initial: ScheduledJobItem,
    rows: InvoiceLineItem[]
  ): Promise<ScheduledJobItem> {
    const maxAttempts = this.options.retries + 1;
    let item = initial;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const now = this.clock();
      item = {
        ...item,
        status: JobItemStatus.RUNNING,
        attempts: item.attempts + 1,
        started_at: item.started_at ?? now,
        updated_at: now,
      };
      await this.jobRepository.saveItem(item);
      await this.heartbeat(job, now);

      const recipient = await this.recipientRepository.findById(item.recipient_id);
      if (!recipient) {
        return this.finishItem(item, JobItemStatus.FAILED, 'recipient not found');
      }

      const alreadySent = await this.statementRunRepository.findSentSince(
        recipient.recipient_id,
        job.invoice_ref,
        job.created_at
      );
      if (alreadySent) {
        console.log(`[Dispatch Worker] ${item.recipient_name}: already sent for this job`);
        return this.finishItem(item, JobItemStatus.SENT);
      }

      let failure: DispatchError;
      try {
        const outcome = await this.dispatcher.dispatch(
          recipient,
          job.invoice_ref,
          rows,
          RunKind.SCHEDULED
        );

        if (outcome.status === 'sent') {
          console.log(`[Dispatch Worker] ${item.recipient_name}: sent`);
          return this.finishItem(item, JobItemStatus.SENT);
        }

        if (outcome.status === 'skipped') {
          if (outcome.reason === SkipReason.MISSING_EMAIL) {
            await this.recordMissingEmail(job, item.recipient_name);
          }
          console.log(`[Dispatch Worker] ${item.recipient_name}: skipped (${outcome.reason})`);
          return this.finishItem(item, JobItemStatus.SKIPPED, outcome.message);
        }

        failure = outcome.error;
      } catch (error) {
        failure = { kind: DispatchErrorKind.UNCLASSIFIED, message: errorMessage(error) };
      }

      if (!isRetryable(failure) || attempt >= maxAttempts) {
        console.error(`[Dispatch Worker] ${item.recipient_name}: failed - ${failure.message}`);
        return this.finishItem(item, JobItemStatus.FAILED, failure.message);
      }

      const delay = retryDelayMs(this.options.retryBackoffMs, attempt);
      console.warn(
        `[Dispatch Worker] ${item.recipient_name}: attempt ${attempt}/${maxAttempts} failed (${failure.message}), retrying in ${delay}ms`
      );
      item = { ...item, error: failure.message, updated_at: this.clock() };
      await this.jobRepository.saveItem(item);
      await this.pause(job, delay);

      if (this.stopRequested) {
        item = { ...item, status: JobItemStatus.PENDING, updated_at: this.clock() };
        await this.jobRepository.saveItem(item);
        return item;
      }
    }

    // Unreachable with maxAttempts >= 1
    return this.finishItem(item, JobItemStatus.FAILED, item.error ?? 'no attempts made');
  }

  private async finishItem(
    item: ScheduledJobItem,
    status: JobItemStatus,
    error?: string
  ): Promise<ScheduledJobItem> {
    const now = this.clock();
    const finished: ScheduledJobItem = {
      ...item,
      status,
      error,
      finished_at: now,
      updated_at: now,
    };
    await this.jobRepository.saveItem(finished);
    return finished;
  }

  /**
   * Hand an unfinished job back to the queue; the next claim resumes it
   */
  private async requeue(job: ScheduledJob, items: ScheduledJobItem[]): Promise<ScheduledJob> {
    const requeued: ScheduledJob = {
      ...job,
      ...countItems(items),
      status: JobStatus.QUEUED,
      started_at: undefined,
    };
    await this.jobRepository.save(requeued);

    const left = items.filter((item) => !isTerminalItem(item)).length;
    console.log(`[Dispatch Worker] Job ${job.job_id} returned to the queue with ${left} item(s) left`);
    return requeued;
  }

  /**
   * Heartbeat, then wait; the heartbeat keeps a long wait from looking stale
   */
  private async pause(job: ScheduledJob, ms: number): Promise<void> {
    await this.heartbeat(job, this.clock());
    await this.sleep(ms, this.stopController.signal);
  }

  private async heartbeat(job: ScheduledJob, at: Date): Promise<void> {
    job.heartbeat_at = at;
    await this.jobRepository.touchHeartbeat(job.job_id, at);
  }

  private async recordMissingEmail(job: ScheduledJob, recipientName: string): Promise<void> {
    if (!job.missing_email.includes(recipientName)) {
      job.missing_email.push(recipientName);
    }
    await this.jobRepository.addMissingEmail(job.job_id, recipientName);
  }
}
