/**
 * Shared test helpers — mock factories and fixtures.
 */

import { configSchema } from '../src/config/schema.js';
import type { AppConfig } from '../src/config/types.js';
import type { Logger, LogLevel } from '../src/core/logger.js';
import type { ChannelClient } from '../src/alerts/interface.js';
import type { NotificationChannel, NotificationResult, ZoneStatusSummary } from '../src/alerts/types.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
}

export type MockLogger = Logger & { entries: LogEntry[] };

export const createMockLogger = (): MockLogger => {
  const entries: LogEntry[] = [];
  const make = (bindings: Record<string, unknown>): Logger => {
    const write = (level: LogLevel) => (message: string, context?: Record<string, unknown>) => {
      entries.push({ level, message, context: { ...bindings, ...context } });
    };
    return {
      debug: write('debug'),
      info: write('info'),
      warn: write('warn'),
      error: write('error'),
      child: (more) => make({ ...bindings, ...more }),
    };
  };
  return Object.assign(make({}), { entries });
};

export const entriesAt = (logger: MockLogger, level: LogLevel): LogEntry[] =>
  logger.entries.filter((e) => e.level === level);

// ── Config ──────────────────────────────────────────────────────────

export const makeConfig = (env: Record<string, string> = {}): AppConfig => configSchema.parse(env);

// ── Fixtures ────────────────────────────────────────────────────────

export const sampleStatus = (): ZoneStatusSummary => ({
  offline: [
    { id: 'z1', name: 'Lobby', offlineSeconds: 7200 },
    { id: 'z2', name: 'Rooftop Bar', offlineSeconds: 300 },
  ],
  expired: [{ id: 'z3', name: 'Spa' }],
  unpaired: [],
});

// ── Fake channel client ─────────────────────────────────────────────

export type FakeChannelClient = ChannelClient & { sent: Array<{ recipient: string; message: string }> };

export const createFakeChannel = (
  channel: NotificationChannel,
  succeed: boolean,
  enabled = true,
): FakeChannelClient => {
  const sent: Array<{ recipient: string; message: string }> = [];
  return {
    channel,
    enabled,
    maxLength: 1000,
    sent,
    async send(recipient: string, message: string): Promise<NotificationResult> {
      sent.push({ recipient, message });
      return succeed
        ? { success: true, channel, id: `${channel}-1`, to: recipient }
        : { success: false, channel, error: `${channel} down`, kind: 'TRANSPORT' };
    },
    formatAlert(entityName: string, status: ZoneStatusSummary): string {
      return `${channel}:${entityName}:${status.offline.length}`;
    },
  };
};
