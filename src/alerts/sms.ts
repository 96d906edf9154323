import type { AxiosInstance } from 'axios';
import type { SmsConfig } from '../config/types.js';
import { ConfigurationError, SuppressedError, TransportError } from '../core/errors.js';
import { basicAuth, createHttpClient, isSuccessStatus, postForm, DEFAULT_TIMEOUT_MS } from '../core/http.js';
import { maskRecipient, type Logger } from '../core/logger.js';
import { normalizePhoneNumber } from '../core/phone.js';
import { collapseWhitespace, truncateAtWordBoundary } from '../core/text.js';
import { alertTemplates } from './alertTemplates.js';
import type { ChannelClient } from './interface.js';
import { logFailure, summarizeBulk, toFailure } from './results.js';
import type {
  BulkSendResult,
  NotificationResult,
  RecipientFailure,
  ZoneAlertType,
  ZoneStatusSummary,
} from './types.js';

export const TWILIO_API_URL = 'https://api.twilio.com';
/** Twilio's maximum body length (concatenated segments). */
export const SMS_MAX_LENGTH = 1600;
export const SMS_SEGMENT_LENGTH = 160;

const ALERT_TYPE_ORDER: readonly ZoneAlertType[] = ['offline', 'expired', 'unpaired'];

interface TwilioMessageResponse {
  sid?: string;
  status?: string;
  to?: string;
  message?: string;
  code?: number;
}

export interface SendSmsOptions {
  /** Bypass quiet hours. */
  force?: boolean;
}

export interface SmsClientOptions {
  timeoutMs?: number;
  http?: AxiosInstance;
  now?: () => Date;
}

/**
 * Quiet hours are the local-time window [start, end). A start later than the
 * end wraps past midnight (22 → 7 covers 22:00–06:59); equal bounds disable it.
 */
export const isWithinQuietHours = (hour: number, start: number, end: number): boolean => {
  if (start === end) return false;
  if (start > end) return hour >= start || hour < end;
  return hour >= start && hour < end;
};

/** Twilio SMS through the REST API. */
export class SmsClient implements ChannelClient {
  readonly channel = 'sms' as const;
  readonly maxLength = SMS_MAX_LENGTH;
  private readonly http: AxiosInstance;
  private readonly now: () => Date;

  constructor(
    private readonly config: SmsConfig,
    private readonly logger: Logger,
    opts: SmsClientOptions = {}
  ) {
    this.http = opts.http ?? createHttpClient(TWILIO_API_URL, opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.now = opts.now ?? (() => new Date());
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  isQuietHours(): boolean {
    return isWithinQuietHours(this.now().getHours(), this.config.quietHoursStart, this.config.quietHoursEnd);
  }

  /** Whether an outage is long enough to page someone by SMS right now. */
  shouldSendCriticalSms(offlineSeconds: number): boolean {
    return this.enabled && offlineSeconds >= this.config.criticalThresholdSeconds && !this.isQuietHours();
  }

  async send(recipient: string, message: string, opts: SendSmsOptions = {}): Promise<NotificationResult> {
    try {
      const { accountSid, authToken, fromNumber } = this.config;
      if (!this.config.enabled || !accountSid || !authToken || !fromNumber) {
        throw new ConfigurationError('SMS service not enabled');
      }
      if (!opts.force && this.isQuietHours()) {
        throw new SuppressedError('Cannot send SMS during quiet hours');
      }
      const to = normalizePhoneNumber(recipient, { defaultCountryCode: this.config.defaultCountryCode });

      const res = await postForm<TwilioMessageResponse>(
        this.http,
        `/2010-04-01/Accounts/${encodeURIComponent(accountSid)}/Messages.json`,
        { To: to, From: fromNumber, Body: truncateAtWordBoundary(message, this.maxLength) },
        { Authorization: basicAuth(accountSid, authToken) }
      );

      if (!isSuccessStatus(res.status)) {
        throw new TransportError(res.data?.message ?? 'Unknown error', res.status, res.data);
      }

      this.logger.info('sms sent', { to: maskRecipient(to), sid: res.data?.sid, status: res.data?.status });
      return { success: true, channel: this.channel, id: res.data?.sid, to };
    } catch (err) {
      const failure = toFailure(this.channel, err);
      logFailure(this.logger, 'sms send failed', failure, recipient);
      return failure;
    }
  }

  /** Sends to each recipient in turn; blank entries are skipped. */
  async sendBulk(recipients: string[], message: string, opts: SendSmsOptions = {}): Promise<BulkSendResult> {
    const targets = recipients.map((r) => r.trim()).filter(Boolean);
    if (targets.length === 0) {
      return { ...summarizeBulk(0, [], []), error: 'No recipients provided' };
    }

    const sentTo: string[] = [];
    const failed: RecipientFailure[] = [];
    for (const recipient of targets) {
      const result = await this.send(recipient, message, opts);
      if (result.success) {
        sentTo.push(result.to);
      } else {
        failed.push({ recipient, error: result.error, kind: result.kind });
      }
    }
    return summarizeBulk(targets.length, sentTo, failed);
  }

  /** Without an explicit type, renders the first of offline, expired, unpaired that has zones. */
  formatAlert(entityName: string, status: ZoneStatusSummary, alertType?: ZoneAlertType): string {
    const type = alertType ?? ALERT_TYPE_ORDER.find((t) => status[t].length > 0) ?? 'offline';
    return truncateAtWordBoundary(alertTemplates.sms(entityName, status, type), this.maxLength);
  }

  /** Squeezes free text into a single segment where possible. */
  formatCustom(message: string, maxLength = SMS_SEGMENT_LENGTH): string {
    return truncateAtWordBoundary(collapseWhitespace(message), maxLength);
  }
}
