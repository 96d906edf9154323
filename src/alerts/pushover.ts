import type { AxiosInstance } from 'axios';
import type { PushoverConfig } from '../config/types.js';
import { ConfigurationError, RecipientError, TransportError } from '../core/errors.js';
import { createHttpClient, postForm, DEFAULT_TIMEOUT_MS } from '../core/http.js';
import { maskRecipient, type Logger } from '../core/logger.js';
import { truncateAtWordBoundary } from '../core/text.js';
import { alertTemplates } from './alertTemplates.js';
import type { ChannelClient } from './interface.js';
import { logFailure, toFailure } from './results.js';
import type { NotificationResult, ZoneStatusSummary } from './types.js';

export const PUSHOVER_API_URL = 'https://api.pushover.net';
export const PUSHOVER_MAX_LENGTH = 1024;

interface PushoverResponse {
  status?: number;
  request?: string;
  errors?: string[];
}

export interface PushoverClientOptions {
  timeoutMs?: number;
  dashboardUrl?: string;
  title?: string;
  http?: AxiosInstance;
  now?: () => Date;
}

/**
 * Pushover high-priority push. The recipient is a user key; an empty
 * recipient falls back to the configured one.
 */
export class PushoverClient implements ChannelClient {
  readonly channel = 'pushover' as const;
  readonly maxLength = PUSHOVER_MAX_LENGTH;
  private readonly http: AxiosInstance;
  private readonly dashboardUrl: string;
  private readonly title: string;
  private readonly now: () => Date;

  constructor(
    private readonly config: PushoverConfig,
    private readonly logger: Logger,
    opts: PushoverClientOptions = {}
  ) {
    this.http = opts.http ?? createHttpClient(PUSHOVER_API_URL, opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.dashboardUrl = opts.dashboardUrl ?? '';
    this.title = opts.title ?? 'Zone Offline Alert';
    this.now = opts.now ?? (() => new Date());
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  async send(recipient: string, message: string): Promise<NotificationResult> {
    try {
      if (!this.config.enabled || !this.config.token) {
        throw new ConfigurationError('Pushover service is not enabled');
      }
      const user = recipient.trim() || this.config.userKey;
      if (!user) throw new RecipientError('No Pushover user key');

      const res = await postForm<PushoverResponse>(this.http, '/1/messages.json', {
        token: this.config.token,
        user,
        title: this.title,
        message: truncateAtWordBoundary(message, this.maxLength),
        priority: '1',
        sound: 'alarm',
      });

      if (res.status !== 200 || res.data?.status !== 1) {
        const reason = res.data?.errors?.join('; ') || `Pushover HTTP ${res.status}`;
        throw new TransportError(reason, res.status, res.data);
      }

      this.logger.info('pushover notification sent', { user: maskRecipient(user), request: res.data.request });
      return { success: true, channel: this.channel, id: res.data.request, to: user };
    } catch (err) {
      const failure = toFailure(this.channel, err);
      logFailure(this.logger, 'pushover send failed', failure, recipient);
      return failure;
    }
  }

  /** A status holding exactly one offline zone and nothing else gets the single-zone text. */
  formatAlert(entityName: string, status: ZoneStatusSummary): string {
    const [only] = status.offline;
    if (only && status.offline.length === 1 && status.expired.length === 0 && status.unpaired.length === 0) {
      return this.formatOfflineZone(only.name, only.offlineSeconds ?? 0);
    }
    return truncateAtWordBoundary(alertTemplates.summary(entityName, status, this.dashboardUrl), this.maxLength);
  }

  formatOfflineZone(zoneName: string, offlineSeconds: number): string {
    return truncateAtWordBoundary(
      alertTemplates.zoneOffline(zoneName, offlineSeconds, this.dashboardUrl, this.now()),
      this.maxLength
    );
  }
}
