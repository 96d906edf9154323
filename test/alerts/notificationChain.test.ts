import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/core/http.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/core/http.js')>();
  return { ...actual, createHttpClient: vi.fn(() => ({})), postForm: vi.fn() };
});

import { NotificationChain } from '../../src/alerts/notificationChain.js';
import { SmsClient } from '../../src/alerts/sms.js';
import type { ZoneStatusSummary } from '../../src/alerts/types.js';
import { postForm } from '../../src/core/http.js';
import { createFakeChannel, createMockLogger, makeConfig, sampleStatus } from '../helpers.js';

const mockPostForm = vi.mocked(postForm);

const smsClient = () =>
  new SmsClient(
    makeConfig({
      SMS_ENABLED: 'true',
      TWILIO_ACCOUNT_SID: 'ACtest',
      TWILIO_AUTH_TOKEN: 'test-secret',
      TWILIO_PHONE_NUMBER: '+15550000000',
    }).sms,
    createMockLogger(),
    { now: () => new Date(2026, 5, 1, 12, 0, 0) }
  );

const MINUTE = 60_000;

describe('NotificationChain', () => {
  beforeEach(() => {
    mockPostForm.mockReset();
  });

  it('stops at the first channel that delivers', async () => {
    const pushover = createFakeChannel('pushover', true);
    const email = createFakeChannel('email', true);
    const chain = new NotificationChain(
      [
        { client: pushover, recipient: 'test-user' },
        { client: email, recipient: 'ops@example.test' },
      ],
      createMockLogger()
    );

    const result = await chain.sendAlert('z1', 'Hotel', sampleStatus());

    expect(result.delivered).toBe(true);
    expect(result.via).toBe('pushover');
    expect(result.attempts).toHaveLength(1);
    expect(email.sent).toEqual([]);
  });

  it('falls back to the next channel with its own formatting', async () => {
    const pushover = createFakeChannel('pushover', false);
    const whatsapp = createFakeChannel('whatsapp', true);
    const chain = new NotificationChain(
      [
        { client: pushover, recipient: 'test-user' },
        { client: whatsapp, recipient: '+15551234567' },
      ],
      createMockLogger()
    );

    const result = await chain.sendAlert('z1', 'Hotel', sampleStatus());

    expect(result).toMatchObject({ delivered: true, via: 'whatsapp' });
    expect(result.attempts.map((a) => a.success)).toEqual([false, true]);
    expect(whatsapp.sent).toEqual([{ recipient: '+15551234567', message: 'whatsapp:Hotel:2' }]);
  });

  it('skips disabled channels', async () => {
    const sms = createFakeChannel('sms', true, false);
    const email = createFakeChannel('email', true);
    const chain = new NotificationChain(
      [
        { client: sms, recipient: '+15551234567' },
        { client: email, recipient: 'ops@example.test' },
      ],
      createMockLogger()
    );

    expect(chain.activeChannels()).toEqual(['email']);
    const result = await chain.sendAlert('z1', 'Hotel', sampleStatus());
    expect(result.via).toBe('email');
    expect(sms.sent).toEqual([]);
  });

  it('reports failure when every channel fails', async () => {
    const logger = createMockLogger();
    const chain = new NotificationChain(
      [
        { client: createFakeChannel('pushover', false), recipient: 'test-user' },
        { client: createFakeChannel('email', false), recipient: 'ops@example.test' },
      ],
      logger
    );

    const result = await chain.sendAlert('z1', 'Hotel', sampleStatus());

    expect(result.delivered).toBe(false);
    expect(result.attempts).toHaveLength(2);
    expect(logger.entries.filter((e) => e.level === 'error').map((e) => e.message)).toEqual([
      'alert not delivered on any channel',
    ]);
  });

  it('holds repeat alerts for the same key during the cooldown', async () => {
    let clock = 0;
    const email = createFakeChannel('email', true);
    const chain = new NotificationChain(
      [{ client: email, recipient: 'ops@example.test' }],
      createMockLogger(),
      30 * MINUTE,
      () => clock
    );

    expect((await chain.sendAlert('z1', 'Hotel', sampleStatus())).delivered).toBe(true);

    clock = 10 * MINUTE;
    expect(await chain.sendAlert('z1', 'Hotel', sampleStatus())).toEqual({
      delivered: false,
      attempts: [],
      skipped: 'cooldown',
    });
    expect((await chain.sendAlert('z2', 'Hotel', sampleStatus())).delivered).toBe(true);

    clock = 31 * MINUTE;
    expect((await chain.sendAlert('z1', 'Hotel', sampleStatus())).delivered).toBe(true);
    expect(email.sent).toHaveLength(3);
  });

  it('does not start a cooldown after a failed delivery', async () => {
    const email = createFakeChannel('email', false);
    const chain = new NotificationChain([{ client: email, recipient: 'ops@example.test' }], createMockLogger());
    await chain.sendAlert('z1', 'Hotel', sampleStatus());
    const second = await chain.sendAlert('z1', 'Hotel', sampleStatus());
    expect(second.skipped).toBeUndefined();
    expect(email.sent).toHaveLength(2);
  });

  it('clears the cooldown on reset', async () => {
    const email = createFakeChannel('email', true);
    const chain = new NotificationChain([{ client: email, recipient: 'ops@example.test' }], createMockLogger());
    await chain.sendAlert('z1', 'Hotel', sampleStatus());
    chain.reset('z1');
    expect((await chain.sendAlert('z1', 'Hotel', sampleStatus())).delivered).toBe(true);
  });

  it('reports when no channel is usable', async () => {
    const chain = new NotificationChain([], createMockLogger());
    expect(await chain.sendAlert('z1', 'Hotel', sampleStatus())).toEqual({
      delivered: false,
      attempts: [],
      skipped: 'no-targets',
    });
  });

  it('sends the expired-subscription text by SMS when no zone is offline', async () => {
    mockPostForm.mockResolvedValueOnce({ status: 201, data: { sid: 'SM1', status: 'queued' } });
    const status: ZoneStatusSummary = { offline: [], expired: [{ name: 'Spa' }], unpaired: [] };
    const chain = new NotificationChain([{ client: smsClient(), recipient: '+15551234567' }], createMockLogger());

    const result = await chain.sendAlert('acct-1', 'Hotel Central', status);

    expect(result).toMatchObject({ delivered: true, via: 'sms' });
    expect(mockPostForm.mock.calls[0]?.[2]).toEqual({
      To: '+15551234567',
      From: '+15550000000',
      Body: '⚠️ Hotel Central\n1 subscription(s) expired.\nContact support to renew.',
    });
  });

  it('passes over a target with nothing to send', async () => {
    const email = createFakeChannel('email', true);
    const empty: ZoneStatusSummary = { offline: [], expired: [], unpaired: [] };
    const chain = new NotificationChain(
      [
        { client: smsClient(), recipient: '+15551234567' },
        { client: email, recipient: 'ops@example.test' },
      ],
      createMockLogger()
    );

    const result = await chain.sendAlert('acct-1', 'Hotel Central', empty);

    expect(mockPostForm).not.toHaveBeenCalled();
    expect(result).toMatchObject({ delivered: true, via: 'email' });
    expect(result.attempts).toHaveLength(1);
  });
});
