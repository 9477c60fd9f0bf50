/**
 * MongoDB Recipient Repository Implementation
 * Recipients, aliases and group memberships
 */

import { Collection, Db, WithId } from 'mongodb';
import { IRecipientRepository } from '../../domain/repositories/recipient-repository.interface';
import {
  GroupMembership,
  Recipient,
  RecipientAlias,
  RecipientDirectory,
  nameKey,
} from '../../domain/models/recipient';

interface RecipientDocument extends Recipient {
  name_key: string;
}

interface AliasDocument extends RecipientAlias {
  alias_key: string;
}

/**
 * MongoDB Recipient Repository Implementation
 */
export class MongoRecipientRepository implements IRecipientRepository {
  private recipients: Collection<RecipientDocument>;
  private aliases: Collection<AliasDocument>;
  private members: Collection<GroupMembership>;

  constructor(db: Db) {
    this.recipients = db.collection<RecipientDocument>('recipients');
    this.aliases = db.collection<AliasDocument>('recipient_aliases');
    this.members = db.collection<GroupMembership>('group_members');
  }

  /**
   * Save or update recipient
   */
  async save(recipient: Recipient): Promise<void> {
    const { last_sent, location, ...fields } = recipient;
    const doc = { ...fields, name_key: nameKey(recipient.name) };

    const unset: Record<string, ''> = {};
    if (last_sent === undefined) unset.last_sent = '';
    if (location === undefined) unset.location = '';

    await this.recipients.updateOne(
      { recipient_id: recipient.recipient_id },
      {
        $set: {
          ...doc,
          ...(last_sent !== undefined ? { last_sent } : {}),
          ...(location !== undefined ? { location } : {}),
        },
        ...(Object.keys(unset).length > 0 ? { $unset: unset } : {}),
      },
      { upsert: true }
    );
  }

  async findById(recipient_id: string): Promise<Recipient | null> {
    const doc = await this.recipients.findOne({ recipient_id });
    return doc ? this.mapDocumentToRecipient(doc) : null;
  }

  async findByName(name: string): Promise<Recipient | null> {
    const doc = await this.recipients.findOne({ name_key: nameKey(name) });
    return doc ? this.mapDocumentToRecipient(doc) : null;
  }

  async findAll(): Promise<Recipient[]> {
    const docs = await this.recipients.find().sort({ name_key: 1 }).toArray();
    return docs.map((doc) => this.mapDocumentToRecipient(doc));
  }

  /**
   * Load the whole directory
   */
  async loadDirectory(): Promise<RecipientDirectory> {
    const [recipients, aliases, memberships] = await Promise.all([
      this.findAll(),
      this.aliases.find().toArray(),
      this.members.find().sort({ created_at: 1 }).toArray(),
    ]);

    return {
      recipients,
      aliases: aliases.map((doc) => ({
        alias: doc.alias,
        recipient_id: doc.recipient_id,
        created_at: doc.created_at,
      })),
      memberships: memberships.map((doc) => ({
        group_id: doc.group_id,
        member_id: doc.member_id,
        created_at: doc.created_at,
      })),
    };
  }

  /**
   * Upsert by normalized alias name
   */
  async saveAlias(alias: RecipientAlias): Promise<void> {
    await this.aliases.updateOne(
      { alias_key: nameKey(alias.alias) },
      { $set: { ...alias, alias_key: nameKey(alias.alias) } },
      { upsert: true }
    );
  }

  /**
   * Re-adding an existing membership refreshes its timestamp so it becomes
   * the member's effective group again
   */
  async addMembership(membership: GroupMembership): Promise<void> {
    await this.members.updateOne(
      { group_id: membership.group_id, member_id: membership.member_id },
      { $set: { created_at: membership.created_at } },
      { upsert: true }
    );
  }

  async updateLastSent(recipient_id: string, sent_on: Date): Promise<void> {
    await this.recipients.updateOne({ recipient_id }, { $set: { last_sent: sent_on } });
  }

  /**
   * Map MongoDB document to Recipient
   */
  private mapDocumentToRecipient(doc: WithId<RecipientDocument>): Recipient {
    return {
      recipient_id: doc.recipient_id,
      name: doc.name,
      kind: doc.kind,
      emails: doc.emails ?? [],
      terms_code: doc.terms_code,
      location: doc.location ?? undefined,
      frequency: doc.frequency,
      day_of_week: doc.day_of_week,
      day_of_month: doc.day_of_month,
      active: doc.active,
      last_sent: doc.last_sent ?? undefined,
      created_at: doc.created_at,
    };
  }
}
