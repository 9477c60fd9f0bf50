/**
 * In-memory invoice source for tests
 */

import { IInvoiceSource } from '../domain/ports/invoice-source.interface';
import { InvoiceLineItem } from '../domain/models/invoice';
import { SystemError } from '../domain/errors';

export class FakeInvoiceSource implements IInvoiceSource {
  loads = 0;

  constructor(
    public snapshots: Map<string, InvoiceLineItem[]> = new Map(),
    public current: string | null = 'invoices.xlsx'
  ) {}

  async currentReference(): Promise<string> {
    if (!this.current) {
      throw new SystemError('No invoice file found');
    }
    return this.current;
  }

  async load(invoice_ref: string): Promise<InvoiceLineItem[]> {
    this.loads++;
    const rows = this.snapshots.get(invoice_ref);
    if (!rows) {
      throw new SystemError(`Invoice file not found: ${invoice_ref}`);
    }
    return rows;
  }
}
