import { beforeEach, describe, expect, it } from 'vitest';
import { ImportRecipientsCommand } from './import-recipients.command';
import { InMemoryRecipientRepository } from '../../testing/in-memory-repositories';
import { makeRecipient } from '../../testing/fixtures';
import { Frequency, RecipientKind } from '../../domain/models/recipient';
import { TermsCode } from '../../domain/models/terms';
import { calendarDate } from '../../utils/date-helpers';

describe('ImportRecipientsCommand', () => {
  const clock = () => new Date(Date.UTC(2024, 1, 1, 12));
  let recipients: InMemoryRecipientRepository;

  beforeEach(async () => {
    recipients = new InMemoryRecipientRepository();
    await recipients.save(
      makeRecipient({ recipient_id: 's1', name: 'Acme Foods', last_sent: calendarDate(2024, 1, 8) })
    );
  });

  it('adds new names, updates known ones and skips rows without a name or email', async () => {
    const summary = await new ImportRecipientsCommand(recipients, clock).execute([
      {
        group_name: 'acme foods',
        email_to: 'ap@acme.test; owner@acme.test',
        terms: 'Net 15',
        location: ' Dock 2 ',
        frequency: 'Monthly',
        day_of_week: null,
        day_of_month: 31,
        active: 'no',
      },
      { group_name: 'Metro Group', email: 'ar@metro.test', net_terms: 7, kind: 'group', frequency: 'fortnightly', weekday: '3' },
      { group_name: 'No Mail', email_to: 'n/a' },
      { group_name: null, email_to: 'orphan@example.test' },
      { group_name: 'Corner Shop', email_to: 'shop@corner.test', terms: 'whenever' },
    ]);

    expect(summary).toEqual({ added: 2, updated: 1, skipped: 2 });
    expect(recipients.recipients.size).toBe(3);

    expect(await recipients.findById('s1')).toEqual({
      recipient_id: 's1',
      name: 'acme foods',
      kind: RecipientKind.SINGLE,
      emails: ['ap@acme.test', 'owner@acme.test'],
      terms_code: TermsCode.NET_15,
      location: 'Dock 2',
      frequency: Frequency.MONTHLY,
      day_of_week: 0,
      day_of_month: 28,
      active: false,
      last_sent: calendarDate(2024, 1, 8),
      created_at: calendarDate(2024, 1, 1),
    });

    expect(await recipients.findByName('Metro Group')).toMatchObject({
      kind: RecipientKind.GROUP,
      emails: ['ar@metro.test'],
      terms_code: TermsCode.NET_7,
      frequency: Frequency.WEEKLY,
      day_of_week: 3,
      day_of_month: 1,
      active: true,
      location: undefined,
      created_at: clock(),
    });

    expect((await recipients.findByName('Corner Shop'))?.terms_code).toBe(TermsCode.NET_30);
  });

  it('updates a name repeated within the file', async () => {
    const summary = await new ImportRecipientsCommand(recipients, clock).execute([
      { group_name: 'Harbor', email_to: 'one@harbor.test' },
      { group_name: 'Harbor', email_to: 'two@harbor.test' },
    ]);

    expect(summary).toEqual({ added: 1, updated: 1, skipped: 0 });
    expect((await recipients.findByName('Harbor'))?.emails).toEqual(['two@harbor.test']);
  });
});
