import type { AppConfig } from './config/types.js';
import type { Logger } from './core/logger.js';
import { buildAlertChain, createChannelClients, type ChannelClients } from './alerts/channels.js';
import type { NotificationChain } from './alerts/notificationChain.js';
import { ZoneApiClient } from './discovery/zoneApiClient.js';
import { ZoneDiscovery } from './discovery/zoneDiscovery.js';
import { ZoneWatcher } from './discovery/zoneWatcher.js';
import { Scheduler } from './jobs/scheduler.js';
import { ZoneMonitor } from './monitor/zoneMonitor.js';

export const DISCOVERY_TASK = 'zone-discovery';
export const MONITOR_TASK = 'zone-monitor';

export interface App {
  clients: ChannelClients;
  alerts: NotificationChain;
  /** Absent when no zone API token is configured. */
  watcher?: ZoneWatcher;
  /** Present whenever the watcher is. */
  monitor?: ZoneMonitor;
  scheduler: Scheduler;
  start(): void;
  stop(): void;
}

/** Wires every component from one config object; nothing is global. */
export const createApp = (config: AppConfig, logger: Logger): App => {
  const clients = createChannelClients(config, logger);
  const alerts = buildAlertChain(config, clients, logger);
  const scheduler = new Scheduler(logger.child({ component: 'scheduler' }));

  let watcher: ZoneWatcher | undefined;
  let monitor: ZoneMonitor | undefined;
  if (config.zoneApi.token) {
    const api = new ZoneApiClient(
      { url: config.zoneApi.url, token: config.zoneApi.token, timeoutMs: config.requestTimeoutMs },
      logger.child({ component: 'zone-api' })
    );
    const discovery = new ZoneDiscovery(api, logger.child({ component: 'zone-discovery' }), {
      pageSize: config.zoneApi.pageSize,
    });
    watcher = new ZoneWatcher(discovery, logger.child({ component: 'zone-watcher' }), config.zoneApi.zoneIds);
    monitor = new ZoneMonitor(api, alerts, logger.child({ component: 'zone-monitor' }), {
      offlineThresholdSeconds: config.monitor.offlineThresholdSeconds,
    });
    watcher.onChange((change) => {
      logger.info('watch list changed', {
        added: change.added,
        removed: change.removed,
        size: change.size,
      });
    });
  } else {
    logger.warn('ZONE_API_TOKEN not set, zone discovery disabled');
  }

  return {
    clients,
    alerts,
    watcher,
    monitor,
    scheduler,
    start() {
      logger.info('alert chain ready', { channels: alerts.activeChannels() });
      const active = watcher;
      const zoneMonitor = monitor;
      if (!active || !zoneMonitor) return;
      scheduler.add(
        DISCOVERY_TASK,
        config.zoneApi.discoveryIntervalMs,
        async () => {
          await active.refresh();
        },
        { runImmediately: true }
      );
      scheduler.add(
        MONITOR_TASK,
        config.monitor.pollIntervalMs,
        async () => {
          await zoneMonitor.checkZones(active.zoneIds);
        },
        { runImmediately: true }
      );
    },
    stop() {
      scheduler.shutdown();
    },
  };
};
