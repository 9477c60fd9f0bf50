/**
 * Import Customer Mappings Command
 * Binds invoice customer names to recipients from spreadsheet rows
 */

import { IRecipientRepository } from '../../domain/repositories/recipient-repository.interface';
import { Recipient, nameKey } from '../../domain/models/recipient';
import { SheetRow, cellText, cellValue } from '../../utils/cell-values';

export const MAPPING_IMPORT_COLUMNS = ['customer_name', 'group_name', 'recipient_id'];

export interface MappingImportSummary {
  added: number;
  updated: number;
  skipped: number;
  missing_groups: string[]; // Recipient names that matched nothing, sorted
}

export class ImportCustomerMappingsCommand {
  constructor(
    private recipientRepository: IRecipientRepository,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Execute command
   *
   * A row names its recipient by `recipient_id`, or by `group_name` when
   * the id is blank. The mapping becomes an alias; a customer name already
   * bound elsewhere moves. Rows whose customer name is the recipient's own
   * name need no alias and count as skipped.
   */
  async execute(rows: SheetRow[]): Promise<MappingImportSummary> {
    const directory = await this.recipientRepository.loadDirectory();
    const byId = new Map(directory.recipients.map((r) => [r.recipient_id, r]));
    const byName = new Map(directory.recipients.map((r) => [nameKey(r.name), r]));
    const bound = new Set(directory.aliases.map((a) => nameKey(a.alias)));

    const summary: MappingImportSummary = { added: 0, updated: 0, skipped: 0, missing_groups: [] };
    const missing = new Set<string>();

    for (const row of rows) {
      const customer = cellText(cellValue(row, ['customer_name', 'customer']));
      if (!customer) {
        summary.skipped++;
        continue;
      }

      let recipient: Recipient | undefined;
      const recipient_id = cellText(cellValue(row, ['recipient_id']));
      if (recipient_id) {
        recipient = byId.get(recipient_id);
      } else {
        const groupName = cellText(cellValue(row, ['group_name', 'group']));
        recipient = byName.get(nameKey(groupName));
        if (groupName && !recipient) missing.add(groupName);
      }

      if (!recipient || nameKey(customer) === nameKey(recipient.name)) {
        summary.skipped++;
        continue;
      }

      await this.recipientRepository.saveAlias({
        alias: customer,
        recipient_id: recipient.recipient_id,
        created_at: this.clock(),
      });
      if (bound.has(nameKey(customer))) {
        summary.updated++;
      } else {
        bound.add(nameKey(customer));
        summary.added++;
      }
    }

    summary.missing_groups = [...missing].sort((a, b) => a.localeCompare(b));
    console.log(
      `[Recipients] Mapping import: ${summary.added} added, ${summary.updated} updated, ${summary.skipped} skipped`
    );
    return summary;
  }
}
