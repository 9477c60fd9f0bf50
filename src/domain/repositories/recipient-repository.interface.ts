/**
 * Recipient Repository Interface (Repository Port)
 * Defines contract for the recipient directory
 */

import {
  GroupMembership,
  Recipient,
  RecipientAlias,
  RecipientDirectory,
} from '../models/recipient';

export interface IRecipientRepository {
  /**
   * Save or update recipient
   */
  save(recipient: Recipient): Promise<void>;

  /**
   * Find recipient by ID
   *
   * @returns Recipient or null if not found
   */
  findById(recipient_id: string): Promise<Recipient | null>;

  /**
   * Find recipient by exact name (case-insensitive)
   */
  findByName(name: string): Promise<Recipient | null>;

  /**
   * All recipients ordered by name
   */
  findAll(): Promise<Recipient[]>;

  /**
   * Recipients, aliases and group memberships in one read
   */
  loadDirectory(): Promise<RecipientDirectory>;

  /**
   * Bind an alias name to a recipient (rebinding an existing alias moves it)
   */
  saveAlias(alias: RecipientAlias): Promise<void>;

  /**
   * Record a group membership; the most recent one per member is effective
   */
  addMembership(membership: GroupMembership): Promise<void>;

  /**
   * Stamp the calendar date of a confirmed send
   */
  updateLastSent(recipient_id: string, sent_on: Date): Promise<void>;
}
