/**
 * Add Recipient Alias Command
 * Binds an alternate customer name to a recipient
 */

import { IRecipientRepository } from '../../domain/repositories/recipient-repository.interface';
import { RecipientAlias, nameKey } from '../../domain/models/recipient';
import { NotFoundError, ValidationError } from '../../domain/errors';

export class AddRecipientAliasCommand {
  constructor(
    private recipientRepository: IRecipientRepository,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Execute command
   *
   * An alias already bound elsewhere is moved to this recipient.
   *
   * @throws NotFoundError if the recipient does not exist
   * @throws ValidationError if the alias is empty or is the recipient's own name
   */
  async execute(recipient_id: string, aliasName: string): Promise<RecipientAlias> {
    const alias = typeof aliasName === 'string' ? aliasName.trim() : '';
    if (!alias) {
      throw new ValidationError('alias is required');
    }

    const recipient = await this.recipientRepository.findById(recipient_id);
    if (!recipient) {
      throw new NotFoundError(`Recipient ${recipient_id} not found`);
    }
    if (nameKey(alias) === nameKey(recipient.name)) {
      throw new ValidationError('alias must differ from the recipient name');
    }

    const record: RecipientAlias = { alias, recipient_id, created_at: this.clock() };
    await this.recipientRepository.saveAlias(record);
    console.log(`[Recipients] Alias "${alias}" -> ${recipient.name}`);
    return record;
  }
}
