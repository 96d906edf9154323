/**
 * Zone discovery — walks accounts → locations → zones for the configured
 * service account and returns one flat snapshot per run.
 *
 * Accounts are listed first (paged), then each account's zones are queried
 * one account at a time. A failing account is logged, recorded and skipped;
 * the run then reports `partial`. Failing to list accounts at all reports
 * `failed` with no zones, which callers treat as "no change".
 */

import { errorMessage, TransportError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { ACCOUNT_ZONES_QUERY, ACCOUNTS_QUERY } from './queries.js';
import { accountsDataSchema, accountZonesDataSchema, type AccountsData, type AccountZonesData, type PageInfo } from './schemas.js';
import { requireData, type GraphQLQueryClient, type GraphQLResult } from './zoneApiClient.js';

export interface ZoneSnapshot {
  zoneId: string;
  accountId: string;
  locationId?: string;
  name?: string;
  isPaired: boolean;
}

export interface AccountRef {
  id: string;
  name?: string;
}

export type DiscoveryStatus = 'complete' | 'partial' | 'failed';

export interface DiscoveryFailure {
  scope: 'accounts' | 'account';
  accountId?: string;
  error: string;
}

export interface DiscoveryResult {
  status: DiscoveryStatus;
  zones: ZoneSnapshot[];
  zoneIds: Set<string>;
  accountCount: number;
  failures: DiscoveryFailure[];
  discoveredAt: Date;
}

export interface ZoneSource {
  discoverAll(): Promise<DiscoveryResult>;
}

export interface ZoneDiscoveryOptions {
  pageSize?: number;
  now?: () => Date;
}

type AccountsConnection = NonNullable<AccountsData['me']>['accounts'];

const nextCursor = (pageInfo: PageInfo, current: string | null): string | null => {
  if (!pageInfo?.hasNextPage || !pageInfo.endCursor || pageInfo.endCursor === current) return null;
  return pageInfo.endCursor;
};

export class ZoneDiscovery implements ZoneSource {
  private readonly pageSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly api: GraphQLQueryClient,
    private readonly logger: Logger,
    opts: ZoneDiscoveryOptions = {}
  ) {
    this.pageSize = opts.pageSize ?? 50;
    this.now = opts.now ?? (() => new Date());
  }

  async discoverAll(): Promise<DiscoveryResult> {
    const failures: DiscoveryFailure[] = [];
    let accounts: AccountRef[];

    try {
      const listing = await this.listAccounts();
      accounts = listing.accounts;
      if (listing.failure) failures.push(listing.failure);
    } catch (err) {
      const error = errorMessage(err);
      this.logger.error('zone discovery failed', { error });
      return {
        status: 'failed',
        zones: [],
        zoneIds: new Set(),
        accountCount: 0,
        failures: [{ scope: 'accounts', error }],
        discoveredAt: this.now(),
      };
    }

    const zones = new Map<string, ZoneSnapshot>();
    for (const account of accounts) {
      try {
        for (const zone of await this.listAccountZones(account.id)) {
          if (!zones.has(zone.zoneId)) zones.set(zone.zoneId, zone);
        }
      } catch (err) {
        const error = errorMessage(err);
        this.logger.warn('zone query failed for account, skipping', { accountId: account.id, error });
        failures.push({ scope: 'account', accountId: account.id, error });
      }
    }

    const result: DiscoveryResult = {
      status: failures.length > 0 ? 'partial' : 'complete',
      zones: [...zones.values()],
      zoneIds: new Set(zones.keys()),
      accountCount: accounts.length,
      failures,
      discoveredAt: this.now(),
    };
    this.logger.info('zone discovery finished', {
      status: result.status,
      zones: result.zoneIds.size,
      accounts: accounts.length,
      failures: failures.length,
    });
    return result;
  }

  /** The first page must succeed; a later page failing keeps what was listed so far. */
  async listAccounts(): Promise<{ accounts: AccountRef[]; failure?: DiscoveryFailure }> {
    const accounts: AccountRef[] = [];
    let after: string | null = null;
    let firstPage = true;

    do {
      let connection: AccountsConnection;
      try {
        const res: GraphQLResult<AccountsData> = await this.api.query(
          ACCOUNTS_QUERY,
          { first: this.pageSize, after },
          accountsDataSchema
        );
        connection = requireData(res, 'accounts query failed').me?.accounts;
      } catch (err) {
        if (firstPage) throw err;
        return { accounts, failure: { scope: 'accounts', error: errorMessage(err) } };
      }

      for (const edge of connection?.edges ?? []) {
        const node = edge?.node;
        if (node) accounts.push({ id: node.id, name: node.businessName ?? undefined });
      }
      after = nextCursor(connection?.pageInfo, after);
      firstPage = false;
    } while (after !== null);

    return { accounts };
  }

  async listAccountZones(accountId: string): Promise<ZoneSnapshot[]> {
    const zones: ZoneSnapshot[] = [];
    let after: string | null = null;

    do {
      const res: GraphQLResult<AccountZonesData> = await this.api.query(
        ACCOUNT_ZONES_QUERY,
        { accountId, first: this.pageSize, after },
        accountZonesDataSchema
      );
      const account = requireData(res, `zones query failed for ${accountId}`).account;
      if (!account) throw new TransportError(`account ${accountId} not found`);

      for (const edge of account.locations?.edges ?? []) {
        const location = edge?.node;
        if (!location) continue;
        for (const zoneEdge of location.soundZones?.edges ?? []) {
          const zone = zoneEdge?.node;
          if (!zone) continue;
          zones.push({
            zoneId: zone.id,
            accountId,
            locationId: location.id,
            name: zone.name ?? undefined,
            isPaired: zone.isPaired ?? false,
          });
        }
      }
      after = nextCursor(account.locations?.pageInfo, after);
    } while (after !== null);

    return zones;
  }
}
