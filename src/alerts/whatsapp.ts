import type { AxiosInstance } from 'axios';
import type { WhatsAppConfig } from '../config/types.js';
import { ConfigurationError, TransportError } from '../core/errors.js';
import { createHttpClient, isSuccessStatus, postJson, DEFAULT_TIMEOUT_MS } from '../core/http.js';
import { maskRecipient, type Logger } from '../core/logger.js';
import { normalizePhoneNumber } from '../core/phone.js';
import { truncateAtWordBoundary } from '../core/text.js';
import { alertTemplates } from './alertTemplates.js';
import type { ChannelClient } from './interface.js';
import { logFailure, toFailure } from './results.js';
import type { NotificationResult, ZoneStatusSummary } from './types.js';

export const WHATSAPP_GRAPH_URL = 'https://graph.facebook.com';
export const WHATSAPP_MAX_LENGTH = 4096;

interface WhatsAppSendResponse {
  messages?: Array<{ id?: string }>;
  error?: { message?: string; code?: number };
}

export interface WhatsAppClientOptions {
  timeoutMs?: number;
  supportContact?: string;
  http?: AxiosInstance;
}

/** WhatsApp Business Cloud API, free-text messages. */
export class WhatsAppClient implements ChannelClient {
  readonly channel = 'whatsapp' as const;
  readonly maxLength = WHATSAPP_MAX_LENGTH;
  private readonly http: AxiosInstance;
  private readonly supportContact: string;

  constructor(
    private readonly config: WhatsAppConfig,
    private readonly logger: Logger,
    opts: WhatsAppClientOptions = {}
  ) {
    this.http = opts.http ?? createHttpClient(WHATSAPP_GRAPH_URL, opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.supportContact = opts.supportContact ?? 'your support team';
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  get messagesPath(): string {
    return `/${this.config.apiVersion}/${this.config.phoneNumberId ?? ''}/messages`;
  }

  async send(recipient: string, message: string): Promise<NotificationResult> {
    try {
      if (!this.config.enabled || !this.config.accessToken) {
        throw new ConfigurationError('WhatsApp service is not enabled');
      }
      const to = normalizePhoneNumber(recipient);
      const res = await postJson<unknown, WhatsAppSendResponse>(
        this.http,
        this.messagesPath,
        {
          messaging_product: 'whatsapp',
          to,
          type: 'text',
          text: { body: truncateAtWordBoundary(message, this.maxLength) },
        },
        { Authorization: `Bearer ${this.config.accessToken}` }
      );

      if (!isSuccessStatus(res.status)) {
        throw new TransportError(res.data?.error?.message ?? 'Unknown error', res.status, res.data);
      }

      const id = res.data?.messages?.[0]?.id;
      this.logger.info('whatsapp message sent', { to: maskRecipient(to), id });
      return { success: true, channel: this.channel, id, to };
    } catch (err) {
      const failure = toFailure(this.channel, err);
      logFailure(this.logger, 'whatsapp send failed', failure, recipient);
      return failure;
    }
  }

  formatAlert(entityName: string, status: ZoneStatusSummary): string {
    return truncateAtWordBoundary(alertTemplates.whatsapp(entityName, status, this.supportContact), this.maxLength);
  }
}
