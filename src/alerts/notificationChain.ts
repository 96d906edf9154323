/**
 * NotificationChain — ordered fallback delivery of one zone alert.
 *
 * Targets are tried in order; the first successful send ends the chain.
 * A failed channel is never retried, the next target is used instead.
 * A target whose rendering of the status is empty is passed over unsent.
 * A key (usually the zone or account id) that was alerted successfully
 * within the cooldown window is skipped entirely.
 */

import type { Logger } from '../core/logger.js';
import type { ChannelClient } from './interface.js';
import type { NotificationChannel, NotificationResult, ZoneStatusSummary } from './types.js';

export interface ChainTarget {
  client: ChannelClient;
  recipient: string;
}

export interface ChainResult {
  delivered: boolean;
  via?: NotificationChannel;
  attempts: NotificationResult[];
  skipped?: 'cooldown' | 'no-targets';
}

export const DEFAULT_ALERT_COOLDOWN_MS = 30 * 60_000;

export class NotificationChain {
  private readonly lastAlertAt = new Map<string, number>();

  constructor(
    private readonly targets: ChainTarget[],
    private readonly logger: Logger,
    private readonly cooldownMs = DEFAULT_ALERT_COOLDOWN_MS,
    private readonly now: () => number = Date.now,
  ) {}

  /** Channels that would be attempted, in order. */
  activeChannels(): NotificationChannel[] {
    return this.targets.filter((t) => t.client.enabled).map((t) => t.client.channel);
  }

  async sendAlert(key: string, entityName: string, status: ZoneStatusSummary): Promise<ChainResult> {
    const last = this.lastAlertAt.get(key);
    if (last !== undefined && this.now() - last < this.cooldownMs) {
      this.logger.debug('alert skipped, cooldown active', { key });
      return { delivered: false, attempts: [], skipped: 'cooldown' };
    }

    const active = this.targets.filter((t) => t.client.enabled);
    if (active.length === 0) {
      this.logger.warn('no notification channels configured', { key });
      return { delivered: false, attempts: [], skipped: 'no-targets' };
    }

    const attempts: NotificationResult[] = [];
    for (const { client, recipient } of active) {
      const message = client.formatAlert(entityName, status);
      if (message.trim() === '') {
        this.logger.debug('alert channel has nothing to send, skipped', { key, channel: client.channel });
        continue;
      }
      const result = await client.send(recipient, message);
      attempts.push(result);

      if (result.success) {
        this.lastAlertAt.set(key, this.now());
        this.logger.info('alert delivered', { key, channel: client.channel, attempts: attempts.length });
        return { delivered: true, via: client.channel, attempts };
      }
      this.logger.warn('alert channel failed, falling back', { key, channel: client.channel, kind: result.kind });
    }

    this.logger.error('alert not delivered on any channel', { key, attempts: attempts.length });
    return { delivered: false, attempts };
  }

  /** Forget the cooldown for a key, e.g. once the zone is back online. */
  reset(key: string): void {
    this.lastAlertAt.delete(key);
  }
}
