/**
 * Send Statement Command
 * Manual "send now" for one recipient, outside any dispatch job
 */

import { IRecipientRepository } from '../../domain/repositories/recipient-repository.interface';
import { IInvoiceSource } from '../../domain/ports/invoice-source.interface';
import { StatementDispatcher } from '../../domain/services/statement-dispatcher';
import { RunKind } from '../../domain/models/statement-run';
import { NotFoundError, RecipientError, TransportError } from '../../domain/errors';

export interface SendStatementResult {
  recipient_id: string;
  invoice_ref: string;
  artifact_ref?: string;
}

/**
 * Send Statement Command Handler
 */
export class SendStatementCommand {
  constructor(
    private recipientRepository: IRecipientRepository,
    private invoiceSource: IInvoiceSource,
    private dispatcher: StatementDispatcher
  ) {}

  /**
   * Execute command
   *
   * @throws NotFoundError if the recipient does not exist
   * @throws RecipientError if there is nothing to send or nowhere to send it
   * @throws TransportError if delivery failed
   */
  async execute(recipient_id: string): Promise<SendStatementResult> {
    const recipient = await this.recipientRepository.findById(recipient_id);
    if (!recipient) {
      throw new NotFoundError(`Recipient ${recipient_id} not found`);
    }

    const invoice_ref = await this.invoiceSource.currentReference();
    const rows = await this.invoiceSource.load(invoice_ref);

    const outcome = await this.dispatcher.dispatch(recipient, invoice_ref, rows, RunKind.MANUAL);

    switch (outcome.status) {
      case 'sent':
        console.log(`[Send Statement] Sent statement to ${recipient.name}`);
        return { recipient_id, invoice_ref, artifact_ref: outcome.artifact_ref };
      case 'skipped':
        throw new RecipientError(`${recipient.name}: ${outcome.message}`);
      case 'failed':
        throw new TransportError(`${recipient.name}: ${outcome.error.message}`);
    }
  }
}
