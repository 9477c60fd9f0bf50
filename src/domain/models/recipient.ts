/**
 * Recipient Domain Model
 * Statement recipients (single customers or groups), aliases and group membership
 */

import { TermsCode } from './terms';
import { diffInDays, isSameMonth, weekdayIndex } from '../../utils/date-helpers';

export enum RecipientKind {
  SINGLE = 'single',
  GROUP = 'group',
}

export enum Frequency {
  WEEKLY = 'weekly',
  BIWEEKLY = 'biweekly',
  MONTHLY = 'monthly',
  NONE = 'none',
}

/**
 * Recipient - a statement dispatch target
 */
export interface Recipient {
  recipient_id: string;
  name: string;
  kind: RecipientKind;
  emails: string[];
  terms_code: TermsCode;
  location?: string;

  // Schedule
  frequency: Frequency;
  day_of_week: number;  // 0 = Monday ... 6 = Sunday
  day_of_month: number; // 1 - 28
  active: boolean;
  last_sent?: Date;     // calendar date of the last confirmed send

  created_at: Date;
}

/**
 * Alternate customer name bound to a recipient (created on merges)
 */
export interface RecipientAlias {
  alias: string;
  recipient_id: string;
  created_at: Date;
}

export interface GroupMembership {
  group_id: string;
  member_id: string;
  created_at: Date;
}

/**
 * Everything the resolver and the dispatcher need about the directory,
 * read in one pass
 */
export interface RecipientDirectory {
  recipients: Recipient[];
  aliases: RecipientAlias[];
  memberships: GroupMembership[];
}

/**
 * Name comparison key: trimmed and case-folded
 */
export function nameKey(name: string | null | undefined): string {
  return (name ?? '').trim().toLowerCase();
}

/**
 * Minimum days between sends for interval-based frequencies
 */
const MIN_INTERVAL_DAYS: Partial<Record<Frequency, number>> = {
  [Frequency.WEEKLY]: 7,
  [Frequency.BIWEEKLY]: 14,
};

/**
 * Whether a recipient's schedule calls for a statement on `today`
 */
export function isDue(recipient: Recipient, today: Date): boolean {
  if (!recipient.active) return false;

  switch (recipient.frequency) {
    case Frequency.WEEKLY:
    case Frequency.BIWEEKLY: {
      if (weekdayIndex(today) !== recipient.day_of_week) return false;
      if (!recipient.last_sent) return true;
      const minDays = MIN_INTERVAL_DAYS[recipient.frequency] ?? 7;
      return diffInDays(today, recipient.last_sent) >= minDays;
    }

    case Frequency.MONTHLY:
      if (today.getUTCDate() !== recipient.day_of_month) return false;
      if (!recipient.last_sent) return true;
      return !isSameMonth(recipient.last_sent, today);

    case Frequency.NONE:
    default:
      return false;
  }
}

/**
 * Usable email addresses (trimmed, must contain "@")
 */
export function usableEmails(recipient: Recipient): string[] {
  return recipient.emails.map((e) => e.trim()).filter((e) => e.includes('@'));
}

/**
 * Split a free-form address list ("a@x.com; b@y.com, c@z.com")
 */
export function splitEmails(value: string): string[] {
  return value
    .split(/[;,\s]+/)
    .map((e) => e.trim())
    .filter((e) => e.length > 0);
}

/**
 * Ids of singles that belong to any group (excluded from standalone dispatch)
 */
export function groupedMemberIds(memberships: GroupMembership[]): Set<string> {
  return new Set(memberships.map((m) => m.member_id));
}

/**
 * member id -> group id, one group per member; the latest assignment wins
 */
export function effectiveMemberships(memberships: GroupMembership[]): Map<string, string> {
  const ordered = [...memberships].sort(
    (a, b) => a.created_at.getTime() - b.created_at.getTime()
  );
  const result = new Map<string, string>();
  for (const membership of ordered) {
    result.set(membership.member_id, membership.group_id);
  }
  return result;
}
