/**
 * Test data builders
 */

import { Frequency, Recipient, RecipientKind } from '../domain/models/recipient';
import { InvoiceLineItem } from '../domain/models/invoice';
import { TermsCode } from '../domain/models/terms';
import { calendarDate } from '../utils/date-helpers';

export function makeRecipient(overrides: Partial<Recipient> & { recipient_id: string; name: string }): Recipient {
  return {
    kind: RecipientKind.SINGLE,
    emails: [`${overrides.recipient_id}@example.com`],
    terms_code: TermsCode.NET_30,
    frequency: Frequency.WEEKLY,
    day_of_week: 0,
    day_of_month: 1,
    active: true,
    created_at: calendarDate(2024, 1, 1),
    ...overrides,
  };
}

export function makeRow(
  overrides: Partial<InvoiceLineItem> & { customer_name: string; order_id: string }
): InvoiceLineItem {
  return {
    ship_date: calendarDate(2024, 1, 1),
    total: 100,
    paid: 0,
    ...overrides,
  };
}
