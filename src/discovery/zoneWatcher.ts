import { errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { diffZones } from './diff.js';
import type { DiscoveryStatus, ZoneSource } from './zoneDiscovery.js';

export interface WatchListChange {
  status: DiscoveryStatus;
  added: string[];
  removed: string[];
  size: number;
}

export type WatchListListener = (change: WatchListChange) => void | Promise<void>;

/**
 * Keeps a long-lived monitor's zone list in step with discovery.
 *
 * A failed or empty discovery leaves the list untouched. A partial one only
 * adds zones: zones under an account that could not be queried are unknown,
 * not removed.
 */
export class ZoneWatcher {
  private readonly watched: Set<string>;
  private readonly listeners = new Set<WatchListListener>();

  constructor(
    private readonly source: ZoneSource,
    private readonly logger: Logger,
    initialZoneIds: Iterable<string> = []
  ) {
    this.watched = new Set(initialZoneIds);
  }

  get zoneIds(): string[] {
    return [...this.watched];
  }

  has(zoneId: string): boolean {
    return this.watched.has(zoneId);
  }

  onChange(listener: WatchListListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async refresh(): Promise<WatchListChange> {
    const result = await this.source.discoverAll();

    if (result.status === 'failed' || result.zoneIds.size === 0) {
      this.logger.warn('no zones discovered, keeping current zone list', {
        status: result.status,
        size: this.watched.size,
      });
      return { status: result.status, added: [], removed: [], size: this.watched.size };
    }

    const diff = diffZones(this.watched, result.zoneIds);
    const added = [...diff.added].sort();
    const removed = result.status === 'complete' ? [...diff.removed].sort() : [];
    if (result.status === 'partial' && diff.removed.size > 0) {
      this.logger.info('partial discovery, removals deferred', { deferred: diff.removed.size });
    }

    for (const id of added) this.watched.add(id);
    for (const id of removed) this.watched.delete(id);

    const change: WatchListChange = { status: result.status, added, removed, size: this.watched.size };
    if (added.length > 0 || removed.length > 0) {
      this.logger.info('zone list updated', { added: added.length, removed: removed.length, size: change.size });
      await this.notify(change);
    }
    return change;
  }

  private async notify(change: WatchListChange): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener(change);
      } catch (err) {
        this.logger.error('zone list listener failed', { error: errorMessage(err) });
      }
    }
  }
}
