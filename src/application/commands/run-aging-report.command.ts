/**
 * Run Aging Report Command
 * Aggregates the current invoice snapshot and stores the result
 */

import { v4 as uuidv4 } from 'uuid';
import { IRecipientRepository } from '../../domain/repositories/recipient-repository.interface';
import { IAgingReportRepository } from '../../domain/repositories/aging-report-repository.interface';
import { IInvoiceSource } from '../../domain/ports/invoice-source.interface';
import {
  AgingReport,
  AgingReportItem,
  AgingReportRun,
  AgingReportStatus,
} from '../../domain/models/aging-report';
import { aggregateInvoices } from '../../domain/services/invoice-aggregator';
import { errorMessage } from '../../domain/errors';
import { today } from '../../utils/date-helpers';

/**
 * Run Aging Report Command Handler
 */
export class RunAgingReportCommand {
  constructor(
    private recipientRepository: IRecipientRepository,
    private agingReportRepository: IAgingReportRepository,
    private invoiceSource: IInvoiceSource,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Execute command
   *
   * A failed run is still recorded, with status error, before the error is rethrown.
   *
   * @returns the stored report
   */
  async execute(): Promise<AgingReport> {
    const run_id = uuidv4();
    const now = this.clock();
    let invoice_ref: string | undefined;

    try {
      invoice_ref = await this.invoiceSource.currentReference();
      const rows = await this.invoiceSource.load(invoice_ref);
      const directory = await this.recipientRepository.loadDirectory();

      const result = aggregateInvoices(rows, directory, today(now));
      if (result.unresolved_count > 0) {
        console.warn(
          `[Aging Report] ${result.unresolved_count} row(s) matched no recipient: ${result.unresolved_names.join(', ')}`
        );
      }

      const run: AgingReportRun = {
        run_id,
        invoice_ref,
        status: AgingReportStatus.SUCCESS,
        created_at: now,
        unresolved_count: result.unresolved_count,
        unresolved_names: result.unresolved_names,
      };
      const items: AgingReportItem[] = result.summaries.map((summary) => ({ ...summary, run_id }));

      await this.agingReportRepository.saveRun(run, items);
      console.log(`[Aging Report] Run ${run_id}: ${items.length} recipient(s) with open items`);

      return { ...run, items };
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[Aging Report] Run ${run_id} failed: ${message}`);

      await this.agingReportRepository.saveRun(
        {
          run_id,
          invoice_ref,
          status: AgingReportStatus.ERROR,
          created_at: now,
          error: message,
          unresolved_count: 0,
          unresolved_names: [],
        },
        []
      );
      throw error;
    }
  }
}
