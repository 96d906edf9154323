import { classifyError } from '../core/errors.js';
import { maskRecipient, type Logger } from '../core/logger.js';
import type { BulkSendResult, NotificationChannel, NotificationFailure, RecipientFailure } from './types.js';

export const toFailure = (channel: NotificationChannel, err: unknown): NotificationFailure => {
  const classified = classifyError(err);
  const result: NotificationFailure = {
    success: false,
    channel,
    error: classified.message,
    kind: classified.kind
  };
  if (classified.statusCode !== undefined) result.statusCode = classified.statusCode;
  return result;
};

export const summarizeBulk = (total: number, sentTo: string[], failed: RecipientFailure[]): BulkSendResult => {
  const outcome = sentTo.length === 0 ? 'failed' : failed.length === 0 ? 'complete' : 'partial';
  return { outcome, success: sentTo.length > 0, sentTo, failed, total };
};

export const failedBatch = (recipients: string[], err: unknown): BulkSendResult => {
  const { kind, message } = classifyError(err);
  return {
    outcome: 'failed',
    success: false,
    sentTo: [],
    failed: recipients.map((recipient) => ({ recipient, error: message, kind })),
    total: recipients.length,
    error: message
  };
};

/** Policy refusals are routine; only provider-side failures are logged as errors. */
export const logFailure = (logger: Logger, event: string, failure: NotificationFailure, recipient: string): void => {
  const context = {
    to: maskRecipient(recipient),
    kind: failure.kind,
    error: failure.error,
    statusCode: failure.statusCode
  };
  if (failure.kind === 'TRANSPORT' || failure.kind === 'TIMEOUT') {
    logger.error(event, context);
  } else {
    logger.warn(event, context);
  }
};
