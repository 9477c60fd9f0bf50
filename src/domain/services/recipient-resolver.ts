/**
 * Recipient Resolver
 * Maps raw customer names from an invoice export to dispatch recipients
 */

import {
  Recipient,
  RecipientDirectory,
  RecipientKind,
  effectiveMemberships,
  nameKey,
} from '../models/recipient';

export interface Resolution {
  recipient: Recipient;
  /** True when the name reached the recipient through group membership */
  via_group: boolean;
}

/**
 * Resolution order for a customer name:
 * 1. the name (or its alias) is a member of an active group -> that group
 * 2. the name (or its alias) is an active single -> that single
 * 3. otherwise unresolved
 *
 * Unresolved names are remembered so callers can report them.
 */
export class RecipientResolver {
  private byId = new Map<string, Recipient>();
  private byKey = new Map<string, Recipient>();
  private groupOf: Map<string, string>;
  private unresolved = new Map<string, number>();

  constructor(directory: RecipientDirectory) {
    for (const recipient of directory.recipients) {
      this.byId.set(recipient.recipient_id, recipient);
      this.byKey.set(nameKey(recipient.name), recipient);
    }

    // Aliases are explicit bindings and take precedence over a same-named record
    for (const alias of directory.aliases) {
      const target = this.byId.get(alias.recipient_id);
      if (target) {
        this.byKey.set(nameKey(alias.alias), target);
      }
    }

    this.groupOf = effectiveMemberships(directory.memberships);
  }

  resolve(customerName: string): Resolution | null {
    const key = nameKey(customerName);
    if (!key) return null;

    const match = this.byKey.get(key);
    const resolution = match ? this.resolveRecipient(match) : null;

    if (!resolution) {
      const display = customerName.trim();
      this.unresolved.set(display, (this.unresolved.get(display) ?? 0) + 1);
    }
    return resolution;
  }

  unresolvedNames(): string[] {
    return [...this.unresolved.keys()].sort((a, b) => a.localeCompare(b));
  }

  unresolvedCount(): number {
    let total = 0;
    for (const count of this.unresolved.values()) total += count;
    return total;
  }

  private resolveRecipient(match: Recipient): Resolution | null {
    if (match.kind === RecipientKind.GROUP) {
      return match.active ? { recipient: match, via_group: false } : null;
    }

    const groupId = this.groupOf.get(match.recipient_id);
    const group = groupId ? this.byId.get(groupId) : undefined;
    if (group && group.active && group.kind === RecipientKind.GROUP) {
      return { recipient: group, via_group: true };
    }

    return match.active ? { recipient: match, via_group: false } : null;
  }
}
