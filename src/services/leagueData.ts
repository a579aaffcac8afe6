/**
 * League Data Service
 *
 * Binds the upstream client, the normalizers and the TTL caches together.
 * Each dataset kind gets its own cache key and TTL; callers always get
 * normalized, frozen values.
 */

import { KEYS } from '../cache/keys.js';
import { TtlCache, type CacheResult, type TtlCacheOptions } from '../cache/ttlCache.js';
import { normalizeBroadcasts } from '../normalize/broadcasts.js';
import { normalizeGames } from '../normalize/games.js';
import { normalizeStandings } from '../normalize/standings.js';
import type { AppConfig } from '../core/config.js';
import type { Upstream } from '../http/nhlApiClient.js';
import type { BroadcastIndex, Game, StandingsRow } from '../models/entities.js';

export type CacheTtls = AppConfig['cacheTtlMs'];

export class LeagueData {
  private readonly schedules: TtlCache<readonly Game[]>;
  private readonly standingsCache: TtlCache<readonly StandingsRow[]>;
  private readonly broadcastsCache: TtlCache<BroadcastIndex>;

  constructor(
    private readonly upstream: Upstream,
    private readonly ttl: CacheTtls,
    cacheOptions: TtlCacheOptions = {}
  ) {
    this.schedules = new TtlCache<readonly Game[]>(cacheOptions);
    this.standingsCache = new TtlCache<readonly StandingsRow[]>(cacheOptions);
    this.broadcastsCache = new TtlCache<BroadcastIndex>(cacheOptions);
  }

  /**
   * The team's schedule, cached under the recent key
   */
  recent(team: string): Promise<CacheResult<readonly Game[]>> {
    return this.schedules.getOrRefresh(KEYS.recent(team), this.ttl.recent, async () =>
      normalizeGames(await this.upstream.fetch('recent', { team }))
    );
  }

  /**
   * The team's schedule, cached under the upcoming key
   */
  upcoming(team: string): Promise<CacheResult<readonly Game[]>> {
    return this.schedules.getOrRefresh(KEYS.upcoming(team), this.ttl.upcoming, async () =>
      normalizeGames(await this.upstream.fetch('upcoming', { team }))
    );
  }

  standings(): Promise<CacheResult<readonly StandingsRow[]>> {
    return this.standingsCache.getOrRefresh(KEYS.standings(), this.ttl.standings, async () =>
      normalizeStandings(await this.upstream.fetch('standings', {}))
    );
  }

  broadcasts(dateISO: string): Promise<CacheResult<BroadcastIndex>> {
    return this.broadcastsCache.getOrRefresh(KEYS.broadcasts(dateISO), this.ttl.broadcasts, async () =>
      normalizeBroadcasts(await this.upstream.fetch('broadcasts', { date: dateISO }))
    );
  }

  /**
   * Drops every cached dataset
   */
  clear(): void {
    this.schedules.clear();
    this.standingsCache.clear();
    this.broadcastsCache.clear();
  }
}
