/**
 * Invoice Source Port
 * Where invoice snapshots come from
 */

import { InvoiceLineItem } from '../models/invoice';

export interface IInvoiceSource {
  /**
   * Reference of the invoice snapshot a new run should use
   *
   * @throws SystemError if no invoice file is available
   */
  currentReference(): Promise<string>;

  /**
   * Load and validate the rows of a snapshot
   *
   * @throws SystemError if the snapshot cannot be read
   * @throws ValidationError if required columns are missing
   */
  load(invoice_ref: string): Promise<InvoiceLineItem[]>;
}
