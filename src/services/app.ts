/**
 * Application Service
 *
 * Wires the upstream client, caches and view service together from a
 * configuration object. Nothing here reads the environment; callers
 * pass the config in.
 */

import { logger } from '../core/logger.js';
import { NhlApiClient, type Upstream } from '../http/nhlApiClient.js';
import { LeagueData } from './leagueData.js';
import { loadTeamNames, type TeamNames } from './teamRegistry.js';
import { ViewService } from './viewService.js';
import type { AppConfig } from '../core/config.js';

export interface AppOverrides {
  /** Replaces the HTTP client, e.g. with an in-process stub */
  upstream?: Upstream;
  /** Clock in epoch milliseconds for cache freshness and view timestamps */
  now?: () => number;
  teamNames?: TeamNames;
}

export interface App {
  data: LeagueData;
  views: ViewService;
}

/**
 * Builds one application instance; each instance owns its own caches
 */
export function createApp(config: AppConfig, overrides: AppOverrides = {}): App {
  const upstream = overrides.upstream ?? new NhlApiClient(config.nhlApi);

  const data = new LeagueData(upstream, config.cacheTtlMs, {
    now: overrides.now,
    retryAttempts: config.retry.attempts,
    retryDelayMs: config.retry.delayMs
  });

  const views = new ViewService(data, {
    team: config.team,
    limits: config.limits,
    networks: config.networks,
    teamNames: overrides.teamNames ?? loadTeamNames(),
    now: overrides.now
  });

  logger.info(
    { team: config.team.code, baseUrl: config.nhlApi.baseUrl, ttlMs: config.cacheTtlMs },
    'application initialized'
  );

  return { data, views };
}
