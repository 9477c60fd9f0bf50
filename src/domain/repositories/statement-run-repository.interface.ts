/**
 * Statement Run Repository Interface (Repository Port)
 */

import { StatementRun } from '../models/statement-run';

export interface IStatementRunRepository {
  save(run: StatementRun): Promise<void>;

  /**
   * A sent run for this recipient and invoice created at or after `since`
   * Used to resume a job without sending twice.
   */
  findSentSince(recipient_id: string, invoice_ref: string, since: Date): Promise<StatementRun | null>;
}
