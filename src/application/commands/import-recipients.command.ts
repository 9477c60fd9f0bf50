/**
 * Import Recipients Command
 * Adds or updates recipients from spreadsheet rows, matched by name
 */

import { v4 as uuidv4 } from 'uuid';
import { IRecipientRepository } from '../../domain/repositories/recipient-repository.interface';
import { Frequency, Recipient, RecipientKind, splitEmails } from '../../domain/models/recipient';
import { DEFAULT_TERMS_CODE, normalizeTermsCode } from '../../domain/models/terms';
import { SheetRow, cellBool, cellInt, cellText, cellValue } from '../../utils/cell-values';

/**
 * Import columns, in template order
 */
export const RECIPIENT_IMPORT_COLUMNS = [
  'group_name',
  'email_to',
  'terms',
  'location',
  'frequency',
  'day_of_week',
  'day_of_month',
  'active',
  'kind',
];

export interface RecipientImportSummary {
  added: number;
  updated: number;
  skipped: number; // Rows without a name or a usable email
}

function frequencyOf(value: unknown): Frequency {
  const text = cellText(value).toLowerCase();
  return Object.values(Frequency).find((f) => f === text) ?? Frequency.WEEKLY;
}

function kindOf(value: unknown, fallback: RecipientKind): RecipientKind {
  const text = cellText(value).toLowerCase();
  return Object.values(RecipientKind).find((k) => k === text) ?? fallback;
}

export class ImportRecipientsCommand {
  constructor(
    private recipientRepository: IRecipientRepository,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Execute command
   *
   * Unreadable terms fall back to net_30, unknown frequencies to weekly,
   * and days are clamped into range. An existing recipient keeps its id,
   * send history and kind unless the row names a kind.
   */
  async execute(rows: SheetRow[]): Promise<RecipientImportSummary> {
    const summary: RecipientImportSummary = { added: 0, updated: 0, skipped: 0 };

    for (const row of rows) {
      const name = cellText(cellValue(row, ['group_name', 'group', 'customer_group', 'name']));
      const emails = splitEmails(
        cellText(cellValue(row, ['email_to', 'email', 'emails', 'email_address']))
      ).filter((e) => e.includes('@'));
      if (!name || emails.length === 0) {
        summary.skipped++;
        continue;
      }

      const terms_code =
        normalizeTermsCode(cellValue(row, ['terms', 'terms_code', 'payment_terms'])) ??
        normalizeTermsCode(cellValue(row, ['net_terms', 'terms_days', 'net_days'])) ??
        DEFAULT_TERMS_CODE;
      const location = cellText(cellValue(row, ['location']));

      const fields = {
        name,
        emails,
        terms_code,
        location: location || undefined,
        frequency: frequencyOf(cellValue(row, ['frequency'])),
        day_of_week: cellInt(cellValue(row, ['day_of_week', 'weekday']), 0, 0, 6),
        day_of_month: cellInt(cellValue(row, ['day_of_month']), 1, 1, 28),
        active: cellBool(cellValue(row, ['active', 'enabled']), true),
      };
      const kindCell = cellValue(row, ['kind']);

      const existing = await this.recipientRepository.findByName(name);
      if (existing) {
        const updated: Recipient = {
          ...existing,
          ...fields,
          kind: kindOf(kindCell, existing.kind),
        };
        await this.recipientRepository.save(updated);
        summary.updated++;
      } else {
        await this.recipientRepository.save({
          recipient_id: uuidv4(),
          kind: kindOf(kindCell, RecipientKind.SINGLE),
          ...fields,
          created_at: this.clock(),
        });
        summary.added++;
      }
    }

    console.log(
      `[Recipients] Import: ${summary.added} added, ${summary.updated} updated, ${summary.skipped} skipped`
    );
    return summary;
  }
}
