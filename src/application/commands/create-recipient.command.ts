/**
 * Create Recipient Command
 * Adds a single customer or a group to the recipient directory
 */

import { v4 as uuidv4 } from 'uuid';
import { IRecipientRepository } from '../../domain/repositories/recipient-repository.interface';
import { Frequency, Recipient, RecipientKind, splitEmails } from '../../domain/models/recipient';
import { DEFAULT_TERMS_CODE, parseTermsCode } from '../../domain/models/terms';
import { ValidationError } from '../../domain/errors';

/**
 * Create Recipient Data Transfer Object
 */
export interface CreateRecipientDTO {
  name: string;
  kind?: string;             // "single" (default) or "group"
  emails?: string | string[]; // Array or "a@x.com; b@y.com"
  terms_code?: string;
  location?: string;
  frequency?: string;        // Default: weekly
  day_of_week?: number;      // 0 = Monday (default)
  day_of_month?: number;     // Default: 1
  active?: boolean;
}

function isEnumValue<T extends string>(values: Record<string, T>, value: unknown): value is T {
  return Object.values<string>(values).includes(String(value));
}

/**
 * Create Recipient Command Handler
 */
export class CreateRecipientCommand {
  constructor(
    private recipientRepository: IRecipientRepository,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Execute command
   *
   * @returns the created recipient
   * @throws ValidationError for invalid input or a duplicate name
   */
  async execute(dto: CreateRecipientDTO): Promise<Recipient> {
    const recipient = this.buildRecipient(dto);

    const existing = await this.recipientRepository.findByName(recipient.name);
    if (existing) {
      throw new ValidationError(`Recipient "${recipient.name}" already exists`);
    }

    await this.recipientRepository.save(recipient);
    console.log(`[Recipients] Created ${recipient.kind} recipient ${recipient.name}`);
    return recipient;
  }

  private buildRecipient(dto: CreateRecipientDTO): Recipient {
    const name = typeof dto.name === 'string' ? dto.name.trim() : '';
    if (!name) {
      throw new ValidationError('name is required');
    }

    const kind = dto.kind ?? RecipientKind.SINGLE;
    if (!isEnumValue(RecipientKind, kind)) {
      throw new ValidationError(`kind must be one of: ${Object.values(RecipientKind).join(', ')}`);
    }

    const frequency = dto.frequency ?? Frequency.WEEKLY;
    if (!isEnumValue(Frequency, frequency)) {
      throw new ValidationError(`frequency must be one of: ${Object.values(Frequency).join(', ')}`);
    }

    const day_of_week = dto.day_of_week ?? 0;
    if (!Number.isInteger(day_of_week) || day_of_week < 0 || day_of_week > 6) {
      throw new ValidationError('day_of_week must be an integer from 0 (Monday) to 6 (Sunday)');
    }

    const day_of_month = dto.day_of_month ?? 1;
    if (!Number.isInteger(day_of_month) || day_of_month < 1 || day_of_month > 28) {
      throw new ValidationError('day_of_month must be an integer from 1 to 28');
    }

    const emails = Array.isArray(dto.emails)
      ? dto.emails.flatMap((e) => splitEmails(String(e)))
      : splitEmails(dto.emails ?? '');
    const invalid = emails.filter((e) => !e.includes('@'));
    if (invalid.length > 0) {
      throw new ValidationError(`Invalid email address: ${invalid.join(', ')}`);
    }

    const active = dto.active ?? true;
    if (typeof active !== 'boolean') {
      throw new ValidationError('active must be true or false');
    }

    const location = dto.location?.trim();

    return {
      recipient_id: uuidv4(),
      name,
      kind,
      emails,
      terms_code: dto.terms_code ? parseTermsCode(dto.terms_code) : DEFAULT_TERMS_CODE,
      location: location || undefined,
      frequency,
      day_of_week,
      day_of_month,
      active,
      created_at: this.clock(),
    };
  }
}
