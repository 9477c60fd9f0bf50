/**
 * Statement Builder Port
 * Renders a recipient's statement and delivers it
 */

import { Recipient } from '../models/recipient';
import { StatementLine } from '../models/invoice';
import { RunKind } from '../models/statement-run';
import { DispatchOutcome } from '../models/dispatch-outcome';

export interface StatementRequest {
  recipient: Recipient;
  emails: string[];
  lines: StatementLine[];
  run_kind: RunKind;
  statement_date: Date;
}

export interface IStatementBuilder {
  /**
   * Build and send one statement. Failures are returned, not thrown.
   *
   * @param signal - aborted when the caller's timeout expires
   */
  send(request: StatementRequest, signal: AbortSignal): Promise<DispatchOutcome>;
}
