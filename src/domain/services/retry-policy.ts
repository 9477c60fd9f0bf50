/**
 * Retry Policy
 * Decides whether a failed dispatch is worth another attempt
 */

import { DispatchError, DispatchErrorKind } from '../models/dispatch-outcome';

/**
 * Message patterns of transient failures, used when a failure
 * carries no structured kind
 */
const RETRYABLE_PATTERNS: RegExp[] = [
  /timed? ?out/i,
  /timeout/i,
  /ECONNRESET|connection reset/i,
  /ECONNREFUSED|connection refused/i,
  /ETIMEDOUT|ESOCKETTIMEDOUT|EPIPE|EAI_AGAIN/i,
  /socket hang up/i,
  /temporar(y|ily)/i,
  /try again/i,
  // SMTP transient replies: 421 service unavailable, 450/451/452 mailbox or local errors
  /\b4(21|5[0-2])\b/,
];

export function isRetryableMessage(message: string): boolean {
  return RETRYABLE_PATTERNS.some((pattern) => pattern.test(message));
}

export function isRetryable(error: DispatchError): boolean {
  switch (error.kind) {
    case DispatchErrorKind.TRANSPORT:
    case DispatchErrorKind.TIMEOUT:
      return true;
    case DispatchErrorKind.REJECTED:
      return false;
    case DispatchErrorKind.UNCLASSIFIED:
    default:
      return isRetryableMessage(error.message);
  }
}

/**
 * Delay before the next attempt: backoff grows linearly with attempts made
 */
export function retryDelayMs(backoffMs: number, attempts: number): number {
  return backoffMs * Math.max(1, attempts);
}
