/**
 * ZoneMonitor — polls each watched zone's status and raises offline alerts.
 *
 * A zone is `unpaired` without a paired device, `expired` without an active
 * subscription, otherwise `online` or `offline`. Only paired zones with an
 * active subscription are timed as offline; once a zone has been offline for
 * the threshold it is handed to the alert sink on every check, which applies
 * its own cooldown. A zone coming back online clears that cooldown.
 */

import { errorMessage, TransportError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { ChainResult } from '../alerts/notificationChain.js';
import type { ZoneAlertEntry, ZoneStatusSummary } from '../alerts/types.js';
import { ZONE_STATUS_QUERY } from '../discovery/queries.js';
import { zoneStatusDataSchema, type ZoneStatusData } from '../discovery/schemas.js';
import { requireData, type GraphQLQueryClient, type GraphQLResult } from '../discovery/zoneApiClient.js';

export type ZoneHealth = 'online' | 'offline' | 'expired' | 'unpaired';

export interface ZoneStatusFields {
  isPaired: boolean;
  online: boolean;
  hasDevice: boolean;
  subscriptionActive: boolean;
}

export interface ZoneState {
  zoneId: string;
  name: string;
  health: ZoneHealth;
  /** Epoch ms; set only while a paired, subscribed zone is offline. */
  offlineSince?: number;
}

/** The part of NotificationChain the monitor drives. */
export interface AlertSink {
  sendAlert(key: string, entityName: string, status: ZoneStatusSummary): Promise<ChainResult>;
  reset(key: string): void;
}

export interface ZoneMonitorOptions {
  offlineThresholdSeconds?: number;
  now?: () => number;
}

export interface ZoneCheckResult {
  checked: number;
  failed: number;
  /** Zones whose alert was delivered during this check. */
  alerted: string[];
  summary: ZoneStatusSummary;
}

export const DEFAULT_OFFLINE_THRESHOLD_SECONDS = 600;

export const determineZoneHealth = (fields: ZoneStatusFields): ZoneHealth => {
  if (!fields.isPaired || !fields.hasDevice) return 'unpaired';
  if (!fields.subscriptionActive) return 'expired';
  return fields.online ? 'online' : 'offline';
};

export class ZoneMonitor {
  private readonly states = new Map<string, ZoneState>();
  private readonly offlineThresholdSeconds: number;
  private readonly now: () => number;

  constructor(
    private readonly api: GraphQLQueryClient,
    private readonly alerts: AlertSink,
    private readonly logger: Logger,
    opts: ZoneMonitorOptions = {}
  ) {
    this.offlineThresholdSeconds = opts.offlineThresholdSeconds ?? DEFAULT_OFFLINE_THRESHOLD_SECONDS;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Checks each zone in turn. A zone whose status cannot be read counts as
   * offline. Zones no longer in `zoneIds` are forgotten.
   */
  async checkZones(zoneIds: Iterable<string>): Promise<ZoneCheckResult> {
    const ids = [...new Set(zoneIds)];
    let failed = 0;

    for (const zoneId of ids) {
      try {
        const { name, health } = await this.fetchZoneStatus(zoneId);
        this.update(zoneId, name, health);
      } catch (err) {
        failed++;
        this.logger.error('zone status check failed', { zoneId, error: errorMessage(err) });
        this.update(zoneId, this.states.get(zoneId)?.name ?? zoneId, 'offline');
      }
    }

    const watched = new Set(ids);
    for (const zoneId of [...this.states.keys()]) {
      if (!watched.has(zoneId)) this.states.delete(zoneId);
    }

    const alerted = await this.alertOfflineZones();
    const summary = this.summary();
    this.logger.info('zone status check complete', {
      checked: ids.length,
      failed,
      offline: summary.offline.length,
      expired: summary.expired.length,
      unpaired: summary.unpaired.length,
      alerted: alerted.length,
    });
    return { checked: ids.length, failed, alerted, summary };
  }

  getZoneState(zoneId: string): ZoneState | undefined {
    return this.states.get(zoneId);
  }

  /** Zone id → whole seconds offline. */
  getOfflineZones(): Map<string, number> {
    const offline = new Map<string, number>();
    for (const state of this.states.values()) {
      if (state.offlineSince !== undefined) offline.set(state.zoneId, this.secondsSince(state.offlineSince));
    }
    return offline;
  }

  summary(): ZoneStatusSummary {
    const summary: ZoneStatusSummary = { offline: [], expired: [], unpaired: [] };
    for (const state of this.states.values()) {
      const entry: ZoneAlertEntry = { id: state.zoneId, name: state.name };
      if (state.health === 'offline') {
        summary.offline.push({
          ...entry,
          offlineSeconds: state.offlineSince === undefined ? 0 : this.secondsSince(state.offlineSince),
        });
      } else if (state.health === 'expired') {
        summary.expired.push(entry);
      } else if (state.health === 'unpaired') {
        summary.unpaired.push(entry);
      }
    }
    return summary;
  }

  private async fetchZoneStatus(zoneId: string): Promise<{ name: string; health: ZoneHealth }> {
    const res: GraphQLResult<ZoneStatusData> = await this.api.query(
      ZONE_STATUS_QUERY,
      { zoneId },
      zoneStatusDataSchema
    );
    const zone = requireData(res, `zone status query failed for ${zoneId}`).soundZone;
    if (!zone) throw new TransportError(`zone ${zoneId} not found`);

    const health = determineZoneHealth({
      isPaired: zone.isPaired ?? false,
      online: zone.online ?? false,
      hasDevice: Boolean(zone.device),
      subscriptionActive: zone.subscription?.isActive ?? true,
    });
    this.logger.debug('zone status read', { zoneId, health });
    return { name: zone.name ?? zoneId, health };
  }

  private update(zoneId: string, name: string, health: ZoneHealth): void {
    const previous = this.states.get(zoneId);
    let offlineSince = previous?.offlineSince;

    if (health === 'online') {
      if (offlineSince !== undefined) {
        this.logger.info('zone back online', { zoneId, name, offlineSeconds: this.secondsSince(offlineSince) });
        this.alerts.reset(zoneId);
      }
      offlineSince = undefined;
    } else if (health === 'offline') {
      if (offlineSince === undefined) {
        offlineSince = this.now();
        this.logger.warn(previous?.health === 'online' ? 'zone went offline' : 'zone detected offline', {
          zoneId,
          name,
        });
      }
    } else {
      offlineSince = undefined;
      if (previous?.health !== health) {
        this.logger.warn(health === 'expired' ? 'zone subscription expired' : 'zone has no paired device', {
          zoneId,
          name,
        });
      }
    }

    this.states.set(zoneId, { zoneId, name, health, offlineSince });
  }

  private async alertOfflineZones(): Promise<string[]> {
    const alerted: string[] = [];
    for (const state of this.states.values()) {
      if (state.offlineSince === undefined) continue;
      const offlineSeconds = this.secondsSince(state.offlineSince);
      if (offlineSeconds < this.offlineThresholdSeconds) continue;

      const status: ZoneStatusSummary = {
        offline: [{ id: state.zoneId, name: state.name, offlineSeconds }],
        expired: [],
        unpaired: [],
      };
      const result = await this.alerts.sendAlert(state.zoneId, state.name, status);
      if (result.delivered) alerted.push(state.zoneId);
    }
    return alerted;
  }

  private secondsSince(epochMs: number): number {
    return Math.max(0, Math.floor((this.now() - epochMs) / 1000));
  }
}
