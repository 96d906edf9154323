import { beforeEach, describe, expect, it, vi } from 'vitest';

const mockTransport = vi.hoisted(() => ({
  verify: vi.fn(),
  sendMail: vi.fn(),
  close: vi.fn(),
}));

vi.mock('nodemailer', () => ({
  default: { createTransport: vi.fn(() => mockTransport) },
}));

import nodemailer from 'nodemailer';
import { EmailClient } from '../../src/alerts/email.js';
import { createMockLogger, entriesAt, makeConfig, sampleStatus } from '../helpers.js';

const mockCreateTransport = vi.mocked(nodemailer.createTransport);

const emailConfig = () =>
  makeConfig({
    SMTP_HOST: 'smtp.example.test',
    SMTP_USERNAME: 'alerts@example.test',
    SMTP_PASSWORD: 'test-secret',
    EMAIL_FROM: 'alerts@example.test',
  }).email;

describe('EmailClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockTransport.verify.mockReset().mockResolvedValue(true);
    mockTransport.sendMail.mockReset().mockResolvedValue({ messageId: '<id@smtp>' });
  });

  it('fails every recipient when disabled, without connecting', async () => {
    const client = new EmailClient(makeConfig().email, createMockLogger());
    expect(await client.sendEmail(['a@example.test'], 'Subject', 'Body')).toEqual({
      outcome: 'failed',
      success: false,
      sentTo: [],
      failed: [{ recipient: 'a@example.test', error: 'Email service is not enabled', kind: 'CONFIGURATION' }],
      total: 1,
      error: 'Email service is not enabled',
    });
    expect(await client.send('a@example.test', 'Body')).toEqual({
      success: false,
      channel: 'email',
      error: 'Email service is not enabled',
      kind: 'CONFIGURATION',
    });
    expect(mockCreateTransport).not.toHaveBeenCalled();
  });

  it('opens a STARTTLS connection with the configured credentials', async () => {
    const client = new EmailClient(emailConfig(), createMockLogger(), { timeoutMs: 5000 });
    await client.sendEmail(['ops@example.test'], 'Subject', 'Body');
    expect(mockCreateTransport).toHaveBeenCalledWith(
      expect.objectContaining({
        host: 'smtp.example.test',
        port: 587,
        secure: false,
        requireTLS: true,
        auth: { user: 'alerts@example.test', pass: 'test-secret' },
        connectionTimeout: 5000,
      })
    );
  });

  it('uses implicit TLS on port 465', async () => {
    const config = { ...emailConfig(), port: 465 };
    await new EmailClient(config, createMockLogger()).sendEmail(['ops@example.test'], 'Subject', 'Body');
    expect(mockCreateTransport).toHaveBeenCalledWith(expect.objectContaining({ secure: true, requireTLS: false }));
  });

  it('sends each recipient separately over one connection', async () => {
    mockTransport.sendMail.mockImplementation(async (msg: { to: string }) => {
      if (msg.to === 'bounce@example.test') throw new Error('550 Mailbox unavailable');
      return { messageId: '<ok@smtp>' };
    });
    const client = new EmailClient(emailConfig(), createMockLogger());

    const result = await client.sendEmail(['ops@example.test', 'bounce@example.test'], 'Subject', 'Body');

    expect(result).toEqual({
      outcome: 'partial',
      success: true,
      sentTo: ['ops@example.test'],
      failed: [{ recipient: 'bounce@example.test', error: '550 Mailbox unavailable', kind: 'TRANSPORT' }],
      total: 2,
    });
    expect(mockCreateTransport).toHaveBeenCalledTimes(1);
    expect(mockTransport.verify).toHaveBeenCalledTimes(1);
    expect(mockTransport.sendMail).toHaveBeenCalledTimes(2);
    expect(mockTransport.close).toHaveBeenCalledTimes(1);
  });

  it('rejects malformed addresses without sending to them', async () => {
    const client = new EmailClient(emailConfig(), createMockLogger());
    const result = await client.sendEmail(['not-an-address', 'ops@example.test'], 'Subject', 'Body');
    expect(result.outcome).toBe('partial');
    expect(result.failed).toEqual([
      { recipient: 'not-an-address', error: 'Invalid email address: not-an-address', kind: 'INVALID_RECIPIENT' },
    ]);
    expect(mockTransport.sendMail).toHaveBeenCalledTimes(1);
  });

  it('rejects a malformed single address without connecting', async () => {
    const logger = createMockLogger();
    const client = new EmailClient(emailConfig(), logger);

    expect(await client.send('not-an-address', 'Zone offline')).toEqual({
      success: false,
      channel: 'email',
      error: 'Invalid email address: not-an-address',
      kind: 'INVALID_RECIPIENT',
    });
    expect(mockCreateTransport).not.toHaveBeenCalled();
    expect(mockTransport.verify).not.toHaveBeenCalled();
    expect(entriesAt(logger, 'warn').map((e) => e.message)).toEqual(['email send failed']);
  });

  it('opens no connection when every batch address is malformed', async () => {
    const client = new EmailClient(emailConfig(), createMockLogger());

    const result = await client.sendEmail(['ops-at-example', 'oncall@'], 'Subject', 'Body');

    expect(result).toEqual({
      outcome: 'failed',
      success: false,
      sentTo: [],
      failed: [
        { recipient: 'ops-at-example', error: 'Invalid email address: ops-at-example', kind: 'INVALID_RECIPIENT' },
        { recipient: 'oncall@', error: 'Invalid email address: oncall@', kind: 'INVALID_RECIPIENT' },
      ],
      total: 2,
    });
    expect(mockCreateTransport).not.toHaveBeenCalled();
    expect(mockTransport.verify).not.toHaveBeenCalled();
  });

  it('keeps recipient order when malformed and valid addresses are mixed', async () => {
    mockTransport.sendMail.mockImplementation(async (msg: { to: string }) => {
      if (msg.to === 'bounce@example.test') throw new Error('550 Mailbox unavailable');
      return { messageId: '<ok@smtp>' };
    });
    const client = new EmailClient(emailConfig(), createMockLogger());

    const result = await client.sendEmail(
      ['bounce@example.test', 'bad-address', 'ops@example.test'],
      'Subject',
      'Body'
    );

    expect(result.sentTo).toEqual(['ops@example.test']);
    expect(result.failed.map((f) => [f.recipient, f.kind])).toEqual([
      ['bounce@example.test', 'TRANSPORT'],
      ['bad-address', 'INVALID_RECIPIENT'],
    ]);
    expect(mockTransport.sendMail).toHaveBeenCalledTimes(2);
  });

  it('fails the whole batch when the server rejects the login', async () => {
    mockTransport.verify.mockRejectedValue(new Error('Invalid login: 535'));
    const logger = createMockLogger();
    const client = new EmailClient(emailConfig(), logger);

    const result = await client.sendEmail(['ops@example.test', 'oncall@example.test'], 'Subject', 'Body');

    expect(result).toEqual({
      outcome: 'failed',
      success: false,
      sentTo: [],
      failed: [
        { recipient: 'ops@example.test', error: 'Invalid login: 535', kind: 'TRANSPORT' },
        { recipient: 'oncall@example.test', error: 'Invalid login: 535', kind: 'TRANSPORT' },
      ],
      total: 2,
    });
    expect(mockTransport.sendMail).not.toHaveBeenCalled();
    expect(mockTransport.close).toHaveBeenCalledTimes(1);
    expect(entriesAt(logger, 'error').map((e) => e.message)).toEqual(['smtp connection failed']);
  });

  it('sends HTML bodies as html', async () => {
    const client = new EmailClient(emailConfig(), createMockLogger());
    await client.sendEmail(['ops@example.test'], 'Subject', '<p>Zone offline</p>', { html: true });
    expect(mockTransport.sendMail).toHaveBeenCalledWith({
      from: 'alerts@example.test',
      to: 'ops@example.test',
      subject: 'Subject',
      html: '<p>Zone offline</p>',
    });
  });

  it('sends a single message with the default subject', async () => {
    mockTransport.sendMail.mockResolvedValue({ messageId: '<abc@smtp>' });
    const client = new EmailClient(emailConfig(), createMockLogger());
    expect(await client.send('ops@example.test', 'Zone offline')).toEqual({
      success: true,
      channel: 'email',
      id: '<abc@smtp>',
      to: 'ops@example.test',
    });
    expect(mockTransport.sendMail).toHaveBeenCalledWith({
      from: 'alerts@example.test',
      to: 'ops@example.test',
      subject: 'Zone Alert',
      text: 'Zone offline',
    });
  });

  it('fails an empty recipient list', async () => {
    const client = new EmailClient(emailConfig(), createMockLogger());
    expect(await client.sendEmail([' '], 'Subject', 'Body')).toMatchObject({
      outcome: 'failed',
      total: 0,
      error: 'No recipients provided',
    });
    expect(mockCreateTransport).not.toHaveBeenCalled();
  });

  it('formats the alert email', () => {
    const client = new EmailClient(emailConfig(), createMockLogger(), { supportContact: 'support@example.test' });
    const email = client.formatAlertEmail('Hotel Central', sampleStatus());
    expect(email.subject).toBe('🚨 Zone Alert - Hotel Central');
    expect(email.body.endsWith('Need assistance? Contact support@example.test.')).toBe(true);
  });
});
