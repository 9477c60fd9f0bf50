import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DispatchWorker, DispatchWorkerOptions } from './dispatch-worker';
import { JobQueue } from '../domain/services/job-queue';
import { StatementDispatcher } from '../domain/services/statement-dispatcher';
import {
  InMemoryJobRepository,
  InMemoryRecipientRepository,
  InMemoryStatementRunRepository,
} from '../testing/in-memory-repositories';
import { FakeInvoiceSource } from '../testing/fake-invoice-source';
import { ScriptedStatementBuilder, ScriptedStep } from '../testing/scripted-statement-builder';
import { makeRecipient, makeRow } from '../testing/fixtures';
import { DispatchErrorKind, failed, sent } from '../domain/models/dispatch-outcome';
import { DISPATCH_SLOT, JobItemStatus, JobStatus, ScheduledJob } from '../domain/models/job';
import { RunKind, StatementRunStatus } from '../domain/models/statement-run';
import { calendarDate } from '../utils/date-helpers';

// Monday
const TODAY = calendarDate(2024, 1, 1);
const NOW = new Date('2024-01-01T08:00:00Z');

describe('DispatchWorker', () => {
  let jobs: InMemoryJobRepository;
  let recipients: InMemoryRecipientRepository;
  let runs: InMemoryStatementRunRepository;
  let source: FakeInvoiceSource;
  let queue: JobQueue;

  beforeEach(async () => {
    jobs = new InMemoryJobRepository();
    recipients = new InMemoryRecipientRepository();
    runs = new InMemoryStatementRunRepository();
    source = new FakeInvoiceSource(
      new Map([
        [
          'invoices.xlsx',
          [
            makeRow({ customer_name: 'Acme Foods', order_id: '1' }),
            makeRow({ customer_name: 'Beta Co', order_id: '2' }),
            makeRow({ customer_name: 'Cora Ltd', order_id: '3' }),
          ],
        ],
      ])
    );
    queue = new JobQueue(jobs, recipients, source, { maxJobRecipients: 0, heartbeatStaleMs: 60_000 });

    await recipients.save(makeRecipient({ recipient_id: 's1', name: 'Acme Foods' }));
    await recipients.save(makeRecipient({ recipient_id: 's3', name: 'Beta Co' }));
    await recipients.save(makeRecipient({ recipient_id: 's4', name: 'Cora Ltd' }));
  });

  function createWorker(
    script: Map<string, ScriptedStep[]> = new Map(),
    overrides: Partial<DispatchWorkerOptions> = {}
  ) {
    const builder = new ScriptedStatementBuilder(script);
    const dispatcher = new StatementDispatcher(recipients, runs, builder, {
      sendTimeoutMs: 1000,
      clock: () => NOW,
    });
    const worker = new DispatchWorker(queue, jobs, recipients, runs, source, dispatcher, {
      idleMs: 0,
      errorDelayMs: 0,
      retries: 2,
      retryBackoffMs: 0,
      interItemDelayMs: 0,
      clock: () => NOW,
      ...overrides,
    });
    return { builder, worker };
  }

  async function enqueuedJob(): Promise<ScheduledJob> {
    const result = await queue.enqueue(TODAY, NOW);
    if (result.status !== 'enqueued') throw new Error(`expected a job, got ${result.status}`);
    return result.job;
  }

  async function itemStatus(job_id: string) {
    const items = await jobs.findItems(job_id);
    return items.map((i) => [i.recipient_name, i.status, i.attempts]);
  }

  it('claims a job and sends every item in order', async () => {
    const { builder, worker } = createWorker();
    const job = await enqueuedJob();

    expect(await worker.runOnce()).toBe(true);

    expect(builder.requests.map((r) => r.recipient.name)).toEqual(['Acme Foods', 'Beta Co', 'Cora Ltd']);
    expect(await itemStatus(job.job_id)).toEqual([
      ['Acme Foods', JobItemStatus.SENT, 1],
      ['Beta Co', JobItemStatus.SENT, 1],
      ['Cora Ltd', JobItemStatus.SENT, 1],
    ]);

    const done = await jobs.findById(job.job_id);
    expect(done).toMatchObject({
      status: JobStatus.COMPLETED,
      finished_at: NOW,
      total_items: 3,
      processed_items: 3,
      sent_items: 3,
      skipped_items: 0,
      failed_items: 0,
    });
    expect(done?.error).toBeUndefined();
    expect(done?.active_slot).toBeUndefined();

    expect(await worker.runOnce()).toBe(false);
  });

  it('gives a retryable failure at most retries + 1 attempts', async () => {
    const down = failed(DispatchErrorKind.TRANSPORT, 'SES Throttling: Maximum sending rate exceeded.');
    const { builder, worker } = createWorker(new Map([['s3', [down, down, down, down]]]));
    const job = await enqueuedJob();

    await worker.runOnce();

    expect(builder.callsFor('s3')).toBe(3);
    expect(await itemStatus(job.job_id)).toEqual([
      ['Acme Foods', JobItemStatus.SENT, 1],
      ['Beta Co', JobItemStatus.FAILED, 3],
      ['Cora Ltd', JobItemStatus.SENT, 1],
    ]);

    const done = await jobs.findById(job.job_id);
    expect(done?.status).toBe(JobStatus.COMPLETED);
    expect(done?.failed_items).toBe(1);
    expect(done?.error).toBe('1 failed - Beta Co: SES Throttling: Maximum sending rate exceeded.');
  });

  it('waits backoff times attempts before each retry, with a heartbeat first', async () => {
    const events: string[] = [];
    vi.spyOn(jobs, 'touchHeartbeat').mockImplementation(async () => {
      events.push('heartbeat');
    });
    const down = failed(DispatchErrorKind.TRANSPORT, 'SES Throttling: Maximum sending rate exceeded.');
    const { builder, worker } = createWorker(new Map([['s3', [down, down, sent('third-time')]]]), {
      retryBackoffMs: 100,
      sleep: async (ms) => {
        events.push(`sleep ${ms}`);
      },
    });
    await enqueuedJob();

    await worker.runOnce();

    expect(builder.callsFor('s3')).toBe(3);
    expect(events).toEqual([
      'heartbeat', // Acme
      'heartbeat', // Beta, attempt 1
      'heartbeat',
      'sleep 100',
      'heartbeat', // attempt 2
      'heartbeat',
      'sleep 200',
      'heartbeat', // attempt 3
      'heartbeat', // Cora
    ]);
  });

  it('spaces items by the inter-item delay', async () => {
    const sleeps: number[] = [];
    const { builder, worker } = createWorker(new Map(), {
      interItemDelayMs: 40,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
    await enqueuedJob();

    await worker.runOnce();

    expect(builder.requests).toHaveLength(3);
    expect(sleeps).toEqual([40, 40]);
  });

  it('sends once a retried failure recovers', async () => {
    const { builder, worker } = createWorker(
      new Map([['s3', [new Error('connect ECONNREFUSED 127.0.0.1:25'), sent('late-ok')]]])
    );
    const job = await enqueuedJob();

    await worker.runOnce();

    expect(builder.callsFor('s3')).toBe(2);
    const beta = (await jobs.findItems(job.job_id))[1];
    expect(beta.status).toBe(JobItemStatus.SENT);
    expect(beta.attempts).toBe(2);
    expect(beta.error).toBeUndefined();
  });

  it('fails a rejected send without retrying', async () => {
    const { builder, worker } = createWorker(
      new Map([['s1', [failed(DispatchErrorKind.REJECTED, '550 Mailbox unavailable')]]])
    );
    const job = await enqueuedJob();

    await worker.runOnce();

    expect(builder.callsFor('s1')).toBe(1);
    const acme = (await jobs.findItems(job.job_id))[0];
    expect(acme.status).toBe(JobItemStatus.FAILED);
    expect(acme.attempts).toBe(1);
    expect(acme.error).toBe('550 Mailbox unavailable');
  });

  it('skips recipients without an address and lists them on the job', async () => {
    await recipients.save(makeRecipient({ recipient_id: 's4', name: 'Cora Ltd', emails: [] }));
    const { worker } = createWorker();
    const job = await enqueuedJob();

    await worker.runOnce();

    const done = await jobs.findById(job.job_id);
    expect(done?.missing_email).toEqual(['Cora Ltd']);
    expect(done?.skipped_items).toBe(1);
    expect(done?.sent_items).toBe(2);

    const cora = (await jobs.findItems(job.job_id))[2];
    expect(cora.status).toBe(JobItemStatus.SKIPPED);
    expect(cora.error).toBe('Recipient has no usable email address');
  });

  it('fails an item whose recipient was deleted', async () => {
    const { builder, worker } = createWorker();
    const job = await enqueuedJob();
    recipients.recipients.delete('s4');

    await worker.runOnce();

    expect(builder.callsFor('s4')).toBe(0);
    const cora = (await jobs.findItems(job.job_id))[2];
    expect(cora.status).toBe(JobItemStatus.FAILED);
    expect(cora.error).toBe('recipient not found');
  });

  it('resumes an interrupted job without resending', async () => {
    const { builder, worker } = createWorker();
    const job = await enqueuedJob();
    const claimed = await queue.claim(NOW);
    if (!claimed) throw new Error('expected a claim');

    // Acme finished before the crash; Beta was sent but its item never saved
    const [acme, beta] = await jobs.findItems(job.job_id);
    await jobs.saveItem({ ...acme, status: JobItemStatus.SENT, attempts: 1, finished_at: NOW });
    await jobs.saveItem({ ...beta, status: JobItemStatus.RUNNING, attempts: 1 });
    await runs.save({
      run_id: 'run-before-crash',
      recipient_id: 's3',
      invoice_ref: 'invoices.xlsx',
      run_kind: RunKind.SCHEDULED,
      status: StatementRunStatus.SENT,
      created_at: NOW,
      sent_at: NOW,
    });

    const done = await worker.processJob(claimed);

    expect(builder.requests.map((r) => r.recipient.recipient_id)).toEqual(['s4']);
    expect(done.sent_items).toBe(3);
    expect(await itemStatus(job.job_id)).toEqual([
      ['Acme Foods', JobItemStatus.SENT, 1],
      ['Beta Co', JobItemStatus.SENT, 2],
      ['Cora Ltd', JobItemStatus.SENT, 1],
    ]);
  });

  it('does not count a sent run from before the job as already sent', async () => {
    const { builder, worker } = createWorker();
    await enqueuedJob();
    const lastWeek = new Date(NOW.getTime() - 7 * 24 * 60 * 60 * 1000);
    await runs.save({
      run_id: 'last-week',
      recipient_id: 's3',
      invoice_ref: 'invoices.xlsx',
      run_kind: RunKind.SCHEDULED,
      status: StatementRunStatus.SENT,
      created_at: lastWeek,
      sent_at: lastWeek,
    });

    await worker.runOnce();

    expect(builder.requests.map((r) => r.recipient.recipient_id)).toEqual(['s1', 's3', 's4']);
  });

  it('fails the whole job when its invoice snapshot is gone', async () => {
    const { builder, worker } = createWorker();
    const job = await enqueuedJob();
    source.snapshots.clear();

    await worker.runOnce();

    expect(builder.requests).toHaveLength(0);
    const done = await jobs.findById(job.job_id);
    expect(done?.status).toBe(JobStatus.FAILED);
    expect(done?.error).toBe('Invoice snapshot unavailable: Invoice file not found: invoices.xlsx');
    expect(await jobs.findActive()).toBeNull();
  });

  it('stops while idle without waiting out the poll interval', async () => {
    const { worker } = createWorker(new Map(), { idleMs: 60_000 });

    worker.start();
    await worker.stop();

    expect(await worker.runOnce()).toBe(false);
  });

  it('keeps polling after a claim throws', async () => {
    const claim = vi
      .spyOn(jobs, 'claimNextQueued')
      .mockRejectedValueOnce(new Error('primary stepped down'));
    const sleeps: number[] = [];
    const { builder, worker } = createWorker(new Map(), {
      idleMs: 1000,
      errorDelayMs: 250,
      sleep: async (ms) => {
        sleeps.push(ms);
        await new Promise((resolve) => setImmediate(resolve));
      },
    });
    const job = await enqueuedJob();

    worker.start();
    await vi.waitFor(() => expect(builder.requests).toHaveLength(3));
    await worker.stop();

    expect(sleeps[0]).toBe(250);
    expect(claim.mock.calls.length).toBeGreaterThanOrEqual(2);
    expect((await jobs.findById(job.job_id))?.status).toBe(JobStatus.COMPLETED);
  });

  it('hands the job back to the queue when stopped during a retry wait', async () => {
    const down = failed(DispatchErrorKind.TRANSPORT, 'SES Throttling: Maximum sending rate exceeded.');
    const { builder, worker } = createWorker(new Map([['s1', [down]]]), {
      idleMs: 60_000,
      retries: 1,
      retryBackoffMs: 5000,
    });
    const job = await enqueuedJob();

    worker.start();
    await vi.waitFor(() => expect(builder.callsFor('s1')).toBe(1));
    const stoppedAt = Date.now();
    await worker.stop();

    expect(Date.now() - stoppedAt).toBeLessThan(1000);
    expect(builder.requests).toHaveLength(1);

    const paused = await jobs.findById(job.job_id);
    expect(paused?.status).toBe(JobStatus.QUEUED);
    expect(paused?.active_slot).toBe(DISPATCH_SLOT);
    expect(await itemStatus(job.job_id)).toEqual([
      ['Acme Foods', JobItemStatus.PENDING, 1],
      ['Beta Co', JobItemStatus.PENDING, 0],
      ['Cora Ltd', JobItemStatus.PENDING, 0],
    ]);

    // The next worker picks the job up where it stopped
    const next = createWorker();
    expect(await next.worker.runOnce()).toBe(true);
    expect(next.builder.requests.map((r) => r.recipient.recipient_id)).toEqual(['s1', 's3', 's4']);
    expect(await itemStatus(job.job_id)).toEqual([
      ['Acme Foods', JobItemStatus.SENT, 2],
      ['Beta Co', JobItemStatus.SENT, 1],
      ['Cora Ltd', JobItemStatus.SENT, 1],
    ]);
    expect((await jobs.findById(job.job_id))?.status).toBe(JobStatus.COMPLETED);
  });
});
