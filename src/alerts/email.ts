import nodemailer, { type SentMessageInfo, type Transporter } from 'nodemailer';
import type { EmailConfig } from '../config/types.js';
import { ConfigurationError, RecipientError } from '../core/errors.js';
import { DEFAULT_TIMEOUT_MS } from '../core/http.js';
import { maskRecipient, type Logger } from '../core/logger.js';
import { truncateAtWordBoundary } from '../core/text.js';
import { alertTemplates, type EmailTemplate } from './alertTemplates.js';
import type { ChannelClient } from './interface.js';
import { failedBatch, logFailure, summarizeBulk, toFailure } from './results.js';
import type {
  BulkSendResult,
  NotificationFailure,
  NotificationResult,
  RecipientFailure,
  ZoneStatusSummary,
} from './types.js';

export const EMAIL_MAX_LENGTH = 20_000;

const EMAIL_ADDRESS = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

const isEmailAddress = (address: string): boolean => EMAIL_ADDRESS.test(address);

export interface SendEmailOptions {
  html?: boolean;
}

export interface EmailClientOptions {
  timeoutMs?: number;
  supportContact?: string;
}

/**
 * SMTP email. Each batch opens one connection (STARTTLS, or implicit TLS on
 * port 465), authenticates once, then sends one message per recipient so a
 * rejected address does not fail the others.
 */
export class EmailClient implements ChannelClient {
  readonly channel = 'email' as const;
  readonly maxLength = EMAIL_MAX_LENGTH;
  private readonly timeoutMs: number;
  private readonly supportContact: string;

  constructor(
    private readonly config: EmailConfig,
    private readonly logger: Logger,
    opts: EmailClientOptions = {}
  ) {
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.supportContact = opts.supportContact ?? 'your support team';
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  async send(recipient: string, message: string): Promise<NotificationResult> {
    const to = recipient.trim();
    if (this.config.enabled && !isEmailAddress(to)) return this.rejectAddress(to);
    const [result] = await this.deliver([to], this.config.subject, message, false);
    return result ?? toFailure(this.channel, new RecipientError('No recipients provided'));
  }

  async sendEmail(to: string[], subject: string, body: string, opts: SendEmailOptions = {}): Promise<BulkSendResult> {
    const recipients = to.map((r) => r.trim()).filter(Boolean);
    if (!this.config.enabled) {
      return failedBatch(recipients, new ConfigurationError('Email service is not enabled'));
    }
    if (recipients.length === 0) {
      return { ...summarizeBulk(0, [], []), error: 'No recipients provided' };
    }

    // Malformed addresses never reach the SMTP server; no connection is opened if none remain.
    const valid = recipients.filter(isEmailAddress);
    const delivered = valid.length > 0 ? await this.deliver(valid, subject, body, opts.html ?? false) : [];

    const sentTo: string[] = [];
    const failed: RecipientFailure[] = [];
    let next = 0;
    for (const recipient of recipients) {
      const result: NotificationResult | undefined = isEmailAddress(recipient)
        ? delivered[next++]
        : this.rejectAddress(recipient);
      if (result?.success) sentTo.push(recipient);
      else if (result) failed.push({ recipient, error: result.error, kind: result.kind });
    }

    const summary = summarizeBulk(recipients.length, sentTo, failed);
    this.logger.info('email batch finished', {
      outcome: summary.outcome,
      sent: sentTo.length,
      failed: failed.length,
    });
    return summary;
  }

  formatAlertEmail(entityName: string, status: ZoneStatusSummary): EmailTemplate {
    const template = alertTemplates.email(entityName, status, this.supportContact);
    return { subject: template.subject, body: truncateAtWordBoundary(template.body, this.maxLength) };
  }

  formatAlert(entityName: string, status: ZoneStatusSummary): string {
    return this.formatAlertEmail(entityName, status).body;
  }

  private rejectAddress(recipient: string): NotificationFailure {
    const failure = toFailure(this.channel, new RecipientError(`Invalid email address: ${recipient}`));
    logFailure(this.logger, 'email send failed', failure, recipient);
    return failure;
  }

  private openTransport(): Transporter<SentMessageInfo> {
    const implicitTls = this.config.port === 465;
    return nodemailer.createTransport({
      host: this.config.host,
      port: this.config.port,
      secure: implicitTls,
      requireTLS: !implicitTls,
      auth: { user: this.config.username, pass: this.config.password },
      connectionTimeout: this.timeoutMs,
      greetingTimeout: this.timeoutMs,
      socketTimeout: this.timeoutMs,
    });
  }

  /** One result per recipient, in order. */
  private async deliver(
    recipients: string[],
    subject: string,
    body: string,
    html: boolean
  ): Promise<NotificationResult[]> {
    if (!this.config.enabled) {
      const err = new ConfigurationError('Email service is not enabled');
      return recipients.map(() => toFailure(this.channel, err));
    }

    const transport = this.openTransport();
    try {
      try {
        await transport.verify();
      } catch (err) {
        const failure = toFailure(this.channel, err);
        this.logger.error('smtp connection failed', { host: this.config.host, error: failure.error });
        return recipients.map(() => failure);
      }

      const results: NotificationResult[] = [];
      for (const recipient of recipients) {
        results.push(await this.deliverOne(transport, recipient, subject, body, html));
      }
      return results;
    } finally {
      transport.close();
    }
  }

  private async deliverOne(
    transport: Transporter<SentMessageInfo>,
    recipient: string,
    subject: string,
    body: string,
    html: boolean
  ): Promise<NotificationResult> {
    try {
      const info = await transport.sendMail({
        from: this.config.from,
        to: recipient,
        subject,
        ...(html ? { html: body } : { text: body }),
      });
      const id = typeof info.messageId === 'string' ? info.messageId : undefined;
      this.logger.info('email sent', { to: maskRecipient(recipient), id });
      return { success: true, channel: this.channel, id, to: recipient };
    } catch (err) {
      const failure = toFailure(this.channel, err);
      logFailure(this.logger, 'email send failed', failure, recipient);
      return failure;
    }
  }
}
