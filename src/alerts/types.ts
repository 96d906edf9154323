/**
 * Notification types shared by every channel client.
 *
 * Results are values: a channel call never throws, it returns a
 * NotificationResult (single send) or a BulkSendResult (batch send).
 */

import type { NotificationErrorKind } from '../core/errors.js';

export type NotificationChannel = 'whatsapp' | 'email' | 'sms' | 'pushover';

/** One message for one recipient on one channel. */
export interface NotificationRequest {
  recipient: string;
  message: string;
  channel: NotificationChannel;
}

export interface NotificationSuccess {
  success: true;
  channel: NotificationChannel;
  /** Provider-assigned message identifier, when the provider returns one. */
  id?: string;
  /** Recipient after normalisation. */
  to: string;
}

export interface NotificationFailure {
  success: false;
  channel: NotificationChannel;
  error: string;
  kind: NotificationErrorKind;
  statusCode?: number;
}

export type NotificationResult = NotificationSuccess | NotificationFailure;

export interface RecipientFailure {
  recipient: string;
  error: string;
  kind: NotificationErrorKind;
}

export type BulkOutcome = 'complete' | 'partial' | 'failed';

/** Per-recipient outcome of a batch send; `partial` when some recipients failed. */
export interface BulkSendResult {
  outcome: BulkOutcome;
  success: boolean;
  sentTo: string[];
  failed: RecipientFailure[];
  total: number;
  /** Set when the whole batch failed before any recipient was attempted. */
  error?: string;
}

export interface ZoneAlertEntry {
  id?: string;
  name: string;
  offlineSeconds?: number;
}

export interface ZoneStatusSummary {
  offline: ZoneAlertEntry[];
  expired: ZoneAlertEntry[];
  unpaired: ZoneAlertEntry[];
}

export type ZoneAlertType = 'offline' | 'expired' | 'unpaired';
