/**
 * SES Mail Client
 * Sends plain-text mail through Amazon SES and classifies its failures
 */

import {
  SESClient,
  SESServiceException,
  SendEmailCommand,
  SendEmailCommandInput,
  SendEmailCommandOutput,
} from '@aws-sdk/client-ses';
import { DispatchErrorKind } from '../../domain/models/dispatch-outcome';
import { errorMessage } from '../../domain/errors';

/**
 * Mail Message Parameters
 */
export interface MailMessage {
  from: string;
  to: string[];
  cc: string[];
  subject: string;
  text: string;
}

/**
 * Delivery failure with its classification
 */
export class MailDeliveryError extends Error {
  constructor(
    message: string,
    public readonly kind: DispatchErrorKind,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'MailDeliveryError';
  }
}

/**
 * One SendEmail call; swapped for a fake in tests
 */
export type SendEmail = (
  input: SendEmailCommandInput,
  signal: AbortSignal
) => Promise<SendEmailCommandOutput>;

export interface SesClientConfig {
  region: string;
  endpoint?: string; // Local SES stand-in
}

export function sesSendEmail(config: SesClientConfig): SendEmail {
  const client = new SESClient({
    region: config.region,
    ...(config.endpoint ? { endpoint: config.endpoint } : {}),
  });
  return (input, signal) => client.send(new SendEmailCommand(input), { abortSignal: signal });
}

const THROTTLING_ERRORS = new Set(['Throttling', 'ThrottlingException', 'TooManyRequestsException']);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'ECONNABORTED']);

const NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'EAI_AGAIN', 'ENOTFOUND']);

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Map an SES or network error onto a dispatch error kind
 *
 * Throttling and server faults are transport failures, other service
 * errors (validation, MessageRejected, unverified sender) are rejections.
 */
export function classifySesError(error: unknown): MailDeliveryError {
  if (error instanceof SESServiceException) {
    const status = error.$metadata.httpStatusCode ?? 0;
    const transient =
      THROTTLING_ERRORS.has(error.name) ||
      error.$retryable?.throttling === true ||
      error.$fault === 'server' ||
      status >= 500;
    return new MailDeliveryError(
      `SES ${error.name}: ${error.message}`,
      transient ? DispatchErrorKind.TRANSPORT : DispatchErrorKind.REJECTED,
      error.name
    );
  }

  if (!(error instanceof Error)) {
    return new MailDeliveryError(`SES send failed: ${String(error)}`, DispatchErrorKind.UNCLASSIFIED);
  }

  const code = errorCode(error);
  if (error.name === 'AbortError' || error.name === 'TimeoutError' || (code && TIMEOUT_CODES.has(code))) {
    return new MailDeliveryError(
      `SES send timed out: ${error.message}`,
      DispatchErrorKind.TIMEOUT,
      code ?? error.name
    );
  }

  if (code && NETWORK_CODES.has(code)) {
    return new MailDeliveryError(`SES send failed: ${error.message}`, DispatchErrorKind.TRANSPORT, code);
  }

  return new MailDeliveryError(`SES send failed: ${errorMessage(error)}`, DispatchErrorKind.UNCLASSIFIED);
}

/**
 * SES Mail Client
 */
export class SesMailClient {
  constructor(private sendEmail: SendEmail) {}

  /**
   * Send a message
   *
   * @returns SES message id
   * @throws MailDeliveryError if send fails
   */
  async sendMail(message: MailMessage, signal: AbortSignal): Promise<string> {
    if (!message.from) {
      throw new MailDeliveryError('Sender address (MAIL_FROM) is not configured', DispatchErrorKind.REJECTED);
    }

    const input: SendEmailCommandInput = {
      Source: message.from,
      Destination: {
        ToAddresses: message.to,
        ...(message.cc.length > 0 ? { CcAddresses: message.cc } : {}),
      },
      Message: {
        Subject: { Data: message.subject, Charset: 'UTF-8' },
        Body: { Text: { Data: message.text, Charset: 'UTF-8' } },
      },
    };

    try {
      const result = await this.sendEmail(input, signal);
      return result.MessageId ?? '';
    } catch (error) {
      throw classifySesError(error);
    }
  }
}
