import { describe, expect, it } from 'vitest';
import {
  Frequency,
  effectiveMemberships,
  isDue,
  splitEmails,
  usableEmails,
} from './recipient';
import { makeRecipient } from '../../testing/fixtures';
import { calendarDate } from '../../utils/date-helpers';

// 2024-01-01 is a Monday
const MONDAY = calendarDate(2024, 1, 1);

describe('isDue', () => {
  it('weekly: due on the matching weekday when never sent', () => {
    const r = makeRecipient({ recipient_id: 'r1', name: 'Acme', day_of_week: 0 });
    expect(isDue(r, MONDAY)).toBe(true);
    expect(isDue(r, calendarDate(2024, 1, 2))).toBe(false);
  });

  it('weekly: needs at least 7 days since the last send', () => {
    const r = makeRecipient({
      recipient_id: 'r1',
      name: 'Acme',
      day_of_week: 0,
      last_sent: calendarDate(2023, 12, 25),
    });
    expect(isDue(r, MONDAY)).toBe(true);
    expect(isDue({ ...r, last_sent: calendarDate(2023, 12, 28) }, MONDAY)).toBe(false);
  });

  it('biweekly: needs at least 14 days', () => {
    const r = makeRecipient({
      recipient_id: 'r1',
      name: 'Acme',
      frequency: Frequency.BIWEEKLY,
      day_of_week: 0,
      last_sent: calendarDate(2023, 12, 25),
    });
    expect(isDue(r, MONDAY)).toBe(false);
    expect(isDue(r, calendarDate(2024, 1, 8))).toBe(true);
  });

  it('monthly: matching day, not already sent this month', () => {
    const r = makeRecipient({
      recipient_id: 'r1',
      name: 'Acme',
      frequency: Frequency.MONTHLY,
      day_of_month: 15,
    });
    expect(isDue(r, calendarDate(2024, 3, 15))).toBe(true);
    expect(isDue(r, calendarDate(2024, 3, 14))).toBe(false);
    expect(isDue({ ...r, last_sent: calendarDate(2024, 3, 1) }, calendarDate(2024, 3, 15))).toBe(false);
    expect(isDue({ ...r, last_sent: calendarDate(2024, 2, 15) }, calendarDate(2024, 3, 15))).toBe(true);
  });

  it('never due for frequency none or inactive recipients', () => {
    const none = makeRecipient({ recipient_id: 'r1', name: 'Acme', frequency: Frequency.NONE });
    expect(isDue(none, MONDAY)).toBe(false);

    const inactive = makeRecipient({ recipient_id: 'r2', name: 'Beta', active: false });
    expect(isDue(inactive, MONDAY)).toBe(false);
  });
});

describe('email helpers', () => {
  it('splits free-form address lists', () => {
    expect(splitEmails('a@x.com; b@y.com, c@z.com')).toEqual(['a@x.com', 'b@y.com', 'c@z.com']);
    expect(splitEmails('')).toEqual([]);
  });

  it('keeps only addresses with an @', () => {
    const r = makeRecipient({ recipient_id: 'r1', name: 'Acme', emails: [' a@x.com ', 'nobody', ''] });
    expect(usableEmails(r)).toEqual(['a@x.com']);
  });
});

describe('effectiveMemberships', () => {
  it('uses the most recent assignment per member', () => {
    const result = effectiveMemberships([
      { group_id: 'g2', member_id: 'm1', created_at: calendarDate(2024, 2, 1) },
      { group_id: 'g1', member_id: 'm1', created_at: calendarDate(2024, 1, 1) },
      { group_id: 'g1', member_id: 'm2', created_at: calendarDate(2024, 1, 1) },
    ]);
    expect(result.get('m1')).toBe('g2');
    expect(result.get('m2')).toBe('g1');
  });
});
