/**
 * Dispatch Outcome
 * Result of sending one recipient's statement
 */

export enum SkipReason {
  NO_MEMBERS = 'no_members',
  NO_MATCHING_ROWS = 'no_matching_rows',
  NOTHING_TO_SEND = 'nothing_to_send',
  MISSING_EMAIL = 'missing_email',
}

export const SKIP_MESSAGES: Record<SkipReason, string> = {
  [SkipReason.NO_MEMBERS]: 'Group has no members',
  [SkipReason.NO_MATCHING_ROWS]: 'No invoice rows matched this recipient',
  [SkipReason.NOTHING_TO_SEND]: 'No outstanding invoices to include',
  [SkipReason.MISSING_EMAIL]: 'Recipient has no usable email address',
};

/**
 * What kind of failure occurred; transport and timeout are retryable,
 * unclassified failures fall back to message matching
 */
export enum DispatchErrorKind {
  TRANSPORT = 'transport',
  TIMEOUT = 'timeout',
  REJECTED = 'rejected',
  UNCLASSIFIED = 'unclassified',
}

export interface DispatchError {
  kind: DispatchErrorKind;
  message: string;
  code?: string;
}

export type DispatchOutcome =
  | { status: 'sent'; artifact_ref?: string }
  | { status: 'skipped'; reason: SkipReason; message: string }
  | { status: 'failed'; error: DispatchError };

export function sent(artifact_ref?: string): DispatchOutcome {
  return { status: 'sent', artifact_ref };
}

export function skipped(reason: SkipReason): DispatchOutcome {
  return { status: 'skipped', reason, message: SKIP_MESSAGES[reason] };
}

export function failed(kind: DispatchErrorKind, message: string, code?: string): DispatchOutcome {
  return { status: 'failed', error: { kind, message, code } };
}
