/**
 * Statement Run Domain Model
 * Audit record of one statement send attempt; also the anchor for resume checks
 */

export enum RunKind {
  MANUAL = 'manual',
  SCHEDULED = 'scheduled',
}

export enum StatementRunStatus {
  STARTED = 'started',
  SENT = 'sent',
  SKIPPED = 'skipped',
  ERROR = 'error',
}

export interface StatementRun {
  run_id: string;
  recipient_id: string;
  invoice_ref: string;
  run_kind: RunKind;
  status: StatementRunStatus;
  created_at: Date;
  sent_at?: Date;
  error?: string;
  artifact_ref?: string; // SES message id
}
