/**
 * Get Recipients Query
 * Directory listing with aliases and group membership resolved per recipient
 */

import { IRecipientRepository } from '../../domain/repositories/recipient-repository.interface';
import { Recipient, RecipientKind, effectiveMemberships } from '../../domain/models/recipient';

export interface RecipientView extends Recipient {
  aliases: string[];
  group_id?: string;     // Effective group of a single
  member_ids?: string[]; // Members of a group
}

export class GetRecipientsQuery {
  constructor(private recipientRepository: IRecipientRepository) {}

  async execute(): Promise<RecipientView[]> {
    const directory = await this.recipientRepository.loadDirectory();
    const groupOf = effectiveMemberships(directory.memberships);

    const membersOf = new Map<string, string[]>();
    for (const [member_id, group_id] of groupOf) {
      membersOf.set(group_id, [...(membersOf.get(group_id) ?? []), member_id]);
    }

    return directory.recipients.map((recipient) => ({
      ...recipient,
      aliases: directory.aliases
        .filter((a) => a.recipient_id === recipient.recipient_id)
        .map((a) => a.alias)
        .sort((a, b) => a.localeCompare(b)),
      group_id: groupOf.get(recipient.recipient_id),
      member_ids:
        recipient.kind === RecipientKind.GROUP ? membersOf.get(recipient.recipient_id) ?? [] : undefined,
    }));
  }
}
