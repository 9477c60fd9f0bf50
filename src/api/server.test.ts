import { AddressInfo } from 'net';
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as XLSX from 'xlsx';
import { createServer } from './server';
import { EnqueueDispatchCommand } from '../application/commands/enqueue-dispatch.command';
import { RunAgingReportCommand } from '../application/commands/run-aging-report.command';
import { SendStatementCommand } from '../application/commands/send-statement.command';
import { CreateRecipientCommand } from '../application/commands/create-recipient.command';
import { AddRecipientAliasCommand } from '../application/commands/add-recipient-alias.command';
import { AddGroupMemberCommand } from '../application/commands/add-group-member.command';
import { SendNoticeCommand } from '../application/commands/send-notice.command';
import {
  ImportRecipientsCommand,
  RECIPIENT_IMPORT_COLUMNS,
} from '../application/commands/import-recipients.command';
import { ImportCustomerMappingsCommand } from '../application/commands/import-customer-mappings.command';
import { GetDispatchJobsQuery } from '../application/queries/get-dispatch-jobs.query';
import { GetAgingReportQuery } from '../application/queries/get-aging-report.query';
import { GetRecipientsQuery } from '../application/queries/get-recipients.query';
import { JobQueue } from '../domain/services/job-queue';
import { StatementDispatcher } from '../domain/services/statement-dispatcher';
import {
  InMemoryAgingReportRepository,
  InMemoryJobRepository,
  InMemoryNoticeSendRepository,
  InMemoryRecipientRepository,
  InMemoryStatementRunRepository,
} from '../testing/in-memory-repositories';
import { FakeInvoiceSource } from '../testing/fake-invoice-source';
import { ScriptedStatementBuilder } from '../testing/scripted-statement-builder';
import { RecordingNoticeSender } from '../testing/recording-notice-sender';
import { SPREADSHEET_CONTENT_TYPE, headerRow, firstSheet, writeWorkbook } from '../infrastructure/spreadsheets/workbook';
import { makeRecipient, makeRow } from '../testing/fixtures';
import { calendarDate } from '../utils/date-helpers';

const API_KEY = 'test-secret';
// Monday
const clock = () => new Date(2024, 0, 1, 9, 0);

interface Harness {
  recipients: InMemoryRecipientRepository;
  source: FakeInvoiceSource;
  healthy: boolean;
}

async function startTestServer(harness: Harness): Promise<{ server: Server; baseUrl: string }> {
  const jobs = new InMemoryJobRepository();
  const runs = new InMemoryStatementRunRepository();
  const agingReports = new InMemoryAgingReportRepository();
  const notices = new InMemoryNoticeSendRepository();
  const { recipients, source } = harness;

  const queue = new JobQueue(jobs, recipients, source, { maxJobRecipients: 0, heartbeatStaleMs: 60_000 });
  const dispatcher = new StatementDispatcher(recipients, runs, new ScriptedStatementBuilder(), {
    sendTimeoutMs: 1000,
    clock,
  });

  const app = createServer({
    apiKey: API_KEY,
    enqueueDispatchCommand: new EnqueueDispatchCommand(queue, clock),
    runAgingReportCommand: new RunAgingReportCommand(recipients, agingReports, source, clock),
    sendStatementCommand: new SendStatementCommand(recipients, source, dispatcher),
    createRecipientCommand: new CreateRecipientCommand(recipients, clock),
    addRecipientAliasCommand: new AddRecipientAliasCommand(recipients, clock),
    addGroupMemberCommand: new AddGroupMemberCommand(recipients, clock),
    sendNoticeCommand: new SendNoticeCommand(recipients, agingReports, notices, source, new RecordingNoticeSender(), {
      sendTimeoutMs: 1000,
      clock,
    }),
    importRecipientsCommand: new ImportRecipientsCommand(recipients, clock),
    importCustomerMappingsCommand: new ImportCustomerMappingsCommand(recipients, clock),
    getDispatchJobsQuery: new GetDispatchJobsQuery(jobs),
    getAgingReportQuery: new GetAgingReportQuery(agingReports, notices),
    getRecipientsQuery: new GetRecipientsQuery(recipients),
    healthCheck: async () => harness.healthy,
  });

  const server = app.listen(0);
  await new Promise<void>((resolve) => server.once('listening', resolve));

  const address: string | AddressInfo | null = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server did not bind a TCP port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

describe('control API', () => {
  let server: Server | null = null;
  let baseUrl = '';
  let harness: Harness;

  beforeEach(async () => {
    harness = {
      recipients: new InMemoryRecipientRepository(),
      source: new FakeInvoiceSource(
        new Map([
          [
            'invoices.xlsx',
            [
              makeRow({ customer_name: 'Acme Foods', order_id: '1', ship_date: calendarDate(2023, 11, 1) }),
              makeRow({ customer_name: 'Stranger', order_id: '2' }),
            ],
          ],
        ])
      ),
      healthy: true,
    };
    await harness.recipients.save(makeRecipient({ recipient_id: 's1', name: 'Acme Foods' }));
    await harness.recipients.save(makeRecipient({ recipient_id: 's2', name: 'Beta Co', emails: [] }));

    ({ server, baseUrl } = await startTestServer(harness));
  });

  afterEach(async () => {
    const running = server;
    if (running) {
      await new Promise<void>((resolve) => running.close(() => resolve()));
    }
    server = null;
  });

  function call(
    path: string,
    init: { method?: string; body?: string | Buffer; headers?: Record<string, string> } = {}
  ): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      ...init,
      headers: { 'Content-Type': 'application/json', 'X-API-Key': API_KEY, ...init.headers },
    });
  }

  function post(path: string, body: unknown = {}): Promise<Response> {
    return call(path, { method: 'POST', body: JSON.stringify(body) });
  }

  function upload(path: string, content: Buffer): Promise<Response> {
    return call(path, {
      method: 'POST',
      body: content,
      headers: { 'Content-Type': SPREADSHEET_CONTENT_TYPE, 'X-File-Name': 'upload.xlsx' },
    });
  }

  async function workbookOf(response: Response): Promise<XLSX.WorkBook> {
    return XLSX.read(Buffer.from(await response.arrayBuffer()), { type: 'buffer' });
  }

  describe('health', () => {
    it('reports healthy without an API key', async () => {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        status: 'healthy',
        database: 'up',
        service: 'statement-dispatch-engine',
      });
    });

    it('reports degraded when the database is down', async () => {
      harness.healthy = false;

      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(503);
      expect(await response.json()).toMatchObject({ status: 'degraded', database: 'down' });
    });
  });

  describe('authentication', () => {
    it('rejects requests without the API key', async () => {
      const response = await fetch(`${baseUrl}/api/recipients`);

      expect(response.status).toBe(401);
      expect(await response.json()).toEqual({ error: 'Unauthorized: Invalid API key' });
    });

    it('rejects a wrong API key', async () => {
      const response = await call('/api/recipients', { headers: { 'X-API-Key': 'wrong' } });

      expect(response.status).toBe(401);
    });
  });

  describe('dispatch jobs', () => {
    it('enqueues a job, then refuses a second while it is active', async () => {
      const first = await post('/api/dispatch/jobs');
      expect(first.status).toBe(201);
      const created = (await first.json()) as { status: string; job_id: string; job: { total_items: number } };
      expect(created.status).toBe('enqueued');
      expect(created.job.total_items).toBe(2);

      const second = await post('/api/dispatch/jobs');
      expect(second.status).toBe(409);
      expect(await second.json()).toEqual({
        status: 'already_active',
        job_id: created.job_id,
        message: 'A dispatch job is already queued or running',
      });

      const active = (await (await call('/api/dispatch/jobs/active')).json()) as { job: { job_id: string } };
      expect(active.job.job_id).toBe(created.job_id);

      const items = (await (await call(`/api/dispatch/jobs/${created.job_id}/items`)).json()) as {
        count: number;
        items: Array<{ recipient_name: string }>;
      };
      expect(items.count).toBe(2);
      expect(items.items.map((i) => i.recipient_name)).toEqual([
        'Acme Foods',
        'Beta Co',
      ]);

      const recent = (await (await call('/api/dispatch/jobs?limit=5')).json()) as { count: number };
      expect(recent.count).toBe(1);
    });

    it('answers nothing_due when no recipient is due', async () => {
      harness.recipients.recipients.clear();

      const response = await post('/api/dispatch/jobs');

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: 'nothing_due', message: 'No recipients are due today' });
    });

    it('maps a missing invoice file to 503', async () => {
      harness.source.current = null;

      const response = await post('/api/dispatch/jobs');

      expect(response.status).toBe(503);
      expect(await response.json()).toMatchObject({
        error: 'SystemError',
        message: 'No invoice file found',
        status: 503,
      });
    });

    it('rejects a malformed limit', async () => {
      const response = await call('/api/dispatch/jobs?limit=ten');

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: 'ValidationError',
        message: 'limit must be a positive integer',
      });
    });

    it('returns 404 for the items of an unknown job', async () => {
      const response = await call('/api/dispatch/jobs/nope/items');

      expect(response.status).toBe(404);
      expect(await response.json()).toMatchObject({ error: 'NotFoundError', message: 'Job nope not found' });
    });
  });

  describe('statements', () => {
    it('sends a statement now', async () => {
      const response = await post('/api/statements/s1/send');

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        status: 'sent',
        recipient_id: 's1',
        invoice_ref: 'invoices.xlsx',
        artifact_ref: 'msg-1',
      });
    });

    it('reports a recipient that cannot be sent to', async () => {
      await harness.recipients.save(makeRecipient({ recipient_id: 's1', name: 'Acme Foods', emails: [] }));

      const response = await post('/api/statements/s1/send');

      expect(response.status).toBe(422);
      expect(await response.json()).toMatchObject({
        error: 'RecipientError',
        message: 'Acme Foods: Recipient has no usable email address',
      });
    });

    it('returns 404 for an unknown recipient', async () => {
      const response = await post('/api/statements/zz/send');

      expect(response.status).toBe(404);
      expect(await response.json()).toMatchObject({ message: 'Recipient zz not found' });
    });
  });

  describe('aging reports', () => {
    it('has no latest report before the first run', async () => {
      const response = await call('/api/aging-reports/latest');

      expect(response.status).toBe(404);
      expect(await response.json()).toMatchObject({ message: 'No aging report has been run yet' });
    });

    it('runs a report and serves it as the latest', async () => {
      const run = await post('/api/aging-reports');
      expect(run.status).toBe(201);
      const report = (await run.json()) as {
        run_id: string;
        status: string;
        unresolved_count: number;
        items: Array<{ recipient_id: string }>;
      };
      expect(report.status).toBe('success');
      expect(report.unresolved_count).toBe(1);

      const acme = report.items.find((i) => i.recipient_id === 's1');
      expect(acme).toMatchObject({ overdue_count: 1, overdue_amount: 100, days_overdue: 31 });

      const latest = (await (await call('/api/aging-reports/latest')).json()) as { run_id: string };
      expect(latest.run_id).toBe(report.run_id);
    });

    it('exports the latest report as a spreadsheet', async () => {
      expect((await call('/api/aging-reports/latest/export')).status).toBe(404);
      await post('/api/aging-reports');

      const response = await call('/api/aging-reports/latest/export');

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe(SPREADSHEET_CONTENT_TYPE);
      expect(response.headers.get('content-disposition')).toBe('attachment; filename="aging_report_20240101.xlsx"');
      const book = await workbookOf(response);
      const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(firstSheet(book, 'export'));
      expect(rows.find((r) => r.Group === 'Acme Foods')).toMatchObject({
        Terms: 'Net 30',
        'Overdue Invoices': 1,
        'Oldest Overdue Days': 31,
        'Overdue Amount': 100,
      });
    });

    it('sends a notice and marks it on the latest report', async () => {
      await post('/api/aging-reports');

      const response = await post('/api/aging-reports/latest/notices', { recipient_id: 's1', notice_type: 'overdue' });

      expect(response.status).toBe(201);
      expect(await response.json()).toMatchObject({
        recipient_id: 's1',
        notice_type: 'overdue',
        invoice_ref: 'invoices.xlsx',
        artifact_ref: 'ses-1',
      });
      const latest = (await (await call('/api/aging-reports/latest')).json()) as {
        items: Array<{ recipient_id: string; notices_sent: string[] }>;
      };
      expect(latest.items.find((i) => i.recipient_id === 's1')?.notices_sent).toEqual(['overdue']);
    });

    it('requires a notice type', async () => {
      const response = await post('/api/aging-reports/latest/notices', { recipient_id: 's1' });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ message: 'Missing required fields: notice_type' });
    });
  });

  describe('recipients', () => {
    it('creates a recipient with parsed emails and terms', async () => {
      const response = await post('/api/recipients', {
        name: ' Corner Shop ',
        emails: 'a@corner.test; b@corner.test',
        terms_code: 'Net 15',
      });

      expect(response.status).toBe(201);
      expect(await response.json()).toMatchObject({
        name: 'Corner Shop',
        kind: 'single',
        emails: ['a@corner.test', 'b@corner.test'],
        terms_code: 'net_15',
        frequency: 'weekly',
        active: true,
      });
    });

    it('requires a name', async () => {
      const response = await post('/api/recipients', { emails: 'a@corner.test' });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: 'Validation Error',
        message: 'Missing required fields: name',
        status: 400,
      });
    });

    it('refuses a duplicate name', async () => {
      const response = await post('/api/recipients', { name: 'acme foods' });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ message: 'Recipient "acme foods" already exists' });
    });

    it('builds a group with members and aliases', async () => {
      const group = (await (await post('/api/recipients', { name: 'Metro Group', kind: 'group' })).json()) as {
        recipient_id: string;
      };

      expect((await post(`/api/recipients/${group.recipient_id}/members`, { member_id: 's1' })).status).toBe(201);
      expect((await post('/api/recipients/s1/aliases', { alias: 'ACME FOODS INC' })).status).toBe(201);

      const listing = (await (await call('/api/recipients')).json()) as {
        count: number;
        recipients: Array<{ recipient_id: string; aliases: string[]; group_id?: string; member_ids?: string[] }>;
      };
      expect(listing.count).toBe(3);

      const byId = new Map(listing.recipients.map((r) => [r.recipient_id, r]));
      expect(byId.get(group.recipient_id)?.member_ids).toEqual(['s1']);
      expect(byId.get('s1')?.group_id).toBe(group.recipient_id);
      expect(byId.get('s1')?.aliases).toEqual(['ACME FOODS INC']);
    });

    it('imports recipients from a spreadsheet', async () => {
      const content = writeWorkbook(
        'recipients',
        ['Group Name', 'Email To', 'Terms'],
        [
          ['Corner Shop', 'shop@corner.test', 'Net 15'],
          ['Acme Foods', 'ap@acme.test', null],
          ['Nobody', null, null],
        ]
      );

      const response = await upload('/api/recipients/import', content);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ added: 1, updated: 1, skipped: 1 });
      expect((await harness.recipients.findById('s1'))?.emails).toEqual(['ap@acme.test']);
    });

    it('imports customer mappings from a spreadsheet', async () => {
      const content = writeWorkbook(
        'mappings',
        ['customer_name', 'group_name'],
        [
          ['ACME FOODS INC', 'Acme Foods'],
          ['Harbor', 'Harbor Group'],
        ]
      );

      const response = await upload('/api/recipients/mappings/import', content);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ added: 1, updated: 0, skipped: 1, missing_groups: ['Harbor Group'] });
      expect(harness.recipients.aliases.get('acme foods inc')?.recipient_id).toBe('s1');
    });

    it('rejects an import without a file', async () => {
      const response = await post('/api/recipients/import', { group_name: 'Corner Shop' });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        message: 'Send the spreadsheet (.xlsx, .xls or .csv) as the request body',
      });
    });

    it('serves an empty import template', async () => {
      const response = await call('/api/recipients/import/template');

      expect(response.status).toBe(200);
      expect(response.headers.get('content-disposition')).toBe('attachment; filename="recipients_template.xlsx"');
      expect(headerRow(firstSheet(await workbookOf(response), 'template'))).toEqual(RECIPIENT_IMPORT_COLUMNS);
    });

    it('refuses to add a member to a single recipient', async () => {
      const response = await post('/api/recipients/s2/members', { member_id: 's1' });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ message: 'Beta Co is not a group' });
    });
  });

  it('answers unknown routes with 404', async () => {
    const response = await call('/api/nope');

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({ message: 'Route GET /api/nope not found' });
  });

  it('answers malformed JSON with 400', async () => {
    const response = await call('/api/recipients', { method: 'POST', body: '{"name":' });

    expect(response.status).toBe(400);
  });
});
