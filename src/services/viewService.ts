/**
 * View Service
 *
 * Entry point for the presentation layer. Reads the requested datasets
 * through LeagueData, applies request overrides via the query composer
 * and returns a frozen ComposedView. A dataset with no data at all is
 * reported as an unavailable section instead of failing the view.
 */

import { logger } from '../core/logger.js';
import { NoDataAvailableError, ValidationError } from '../errors/index.js';
import { isDatasetKind, type DatasetKind, type Game, type StandingsRow } from '../models/entities.js';
import { deepFreeze } from '../util/freeze.js';
import { buildNetworkList } from './networks.js';
import {
  filterDivision,
  listDivisions,
  localDateKey,
  resolveCount,
  selectRecent,
  selectUpcoming,
  toGameView
} from './queryComposer.js';
import { resolveTeam, teamDisplayName, type TeamNames } from './teamRegistry.js';
import type { CacheResult } from '../cache/ttlCache.js';
import type { AppConfig, NetworkConfig } from '../core/config.js';
import type { ComposedView, GamesSection, Section, StandingsSection, ViewRequest } from '../models/view.js';
import type { LeagueData } from './leagueData.js';

export interface ViewServiceOptions {
  team: AppConfig['team'];
  limits: AppConfig['limits'];
  networks: NetworkConfig;
  teamNames: TeamNames;
  now?: () => number;
}

type Settled<T> =
  | { ok: true; result: CacheResult<T> }
  | { ok: false; error: NoDataAvailableError };

/**
 * Validates requested dataset kinds
 *
 * @throws ValidationError on an unknown kind
 */
export function parseDatasets(datasets: Iterable<string>): Set<DatasetKind> {
  const out = new Set<DatasetKind>();
  for (const raw of datasets) {
    const kind = raw.trim().toLowerCase();
    if (!isDatasetKind(kind)) {
      throw new ValidationError(`Unknown dataset kind: ${raw}`, 'datasets');
    }
    out.add(kind);
  }
  return out;
}

async function settle<T>(load: () => Promise<CacheResult<T>>): Promise<Settled<T>> {
  try {
    return { ok: true, result: await load() };
  } catch (err) {
    if (err instanceof NoDataAvailableError) return { ok: false, error: err };
    throw err;
  }
}

function unavailable(error: NoDataAvailableError): { status: 'unavailable'; error: { code: string; message: string } } {
  return { status: 'unavailable', error: { code: error.code, message: error.message } };
}

function meta<T>(result: CacheResult<T>): { wasStale: boolean; fetchedAt: string } {
  return { wasStale: result.wasStale, fetchedAt: result.fetchedAt.toISOString() };
}

export class ViewService {
  private readonly now: () => number;

  constructor(
    private readonly data: LeagueData,
    private readonly options: ViewServiceOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async getView(request: ViewRequest): Promise<ComposedView> {
    const wanted = parseDatasets(request.datasets);
    const wantStandings = wanted.has('standings') && request.includeStandings !== false;

    // a requested team is checked against the standings before its games load
    const known = request.team !== undefined ? await settle(() => this.data.standings()) : null;
    const team = resolveTeam(request.team, this.options.team.code, known?.ok ? known.result.value : null);
    logger.debug({ team, datasets: [...wanted], wantStandings }, 'composing view');

    const [standings, upcoming, recent] = await Promise.all([
      known ?? (wantStandings ? settle(() => this.data.standings()) : null),
      wanted.has('upcoming') ? this.upcomingSection(team, request.counts?.upcoming) : undefined,
      wanted.has('recent') ? this.recentSection(team, request.counts?.recent) : undefined
    ]);
    const rows = standings?.ok ? standings.result.value : null;

    const view: ComposedView = {
      generatedAt: new Date(this.now()).toISOString(),
      team,
      teamName: teamDisplayName(team, this.options.teamNames, rows),
      theme: request.theme ?? null
    };
    if (upcoming) view.upcoming = upcoming;
    if (recent) view.recent = recent;
    if (wantStandings && standings) view.standings = this.standingsSection(standings, request.division);

    return deepFreeze(view);
  }

  private async upcomingSection(team: string, rawCount: unknown): Promise<Section<GamesSection>> {
    const { defaultUpcoming, maxUpcoming } = this.options.limits;
    const settled = await settle(() => this.data.upcoming(team));
    if (!settled.ok) return unavailable(settled.error);

    const selected = selectUpcoming(settled.result.value, resolveCount(rawCount, defaultUpcoming, maxUpcoming));
    const games = await Promise.all(
      selected.map(async game =>
        toGameView(game, team, this.options.team.timeZone, await this.networksFor(game))
      )
    );
    return { status: 'ok', ...meta(settled.result), games };
  }

  private async recentSection(team: string, rawCount: unknown): Promise<Section<GamesSection>> {
    const { defaultRecent, maxRecent } = this.options.limits;
    const settled = await settle(() => this.data.recent(team));
    if (!settled.ok) return unavailable(settled.error);

    const selected = selectRecent(settled.result.value, resolveCount(rawCount, defaultRecent, maxRecent));
    const games = selected.map(game => toGameView(game, team, this.options.team.timeZone));
    return { status: 'ok', ...meta(settled.result), games };
  }

  private standingsSection(
    settled: Settled<readonly StandingsRow[]>,
    divisionOverride: string | undefined
  ): Section<StandingsSection> {
    if (!settled.ok) return unavailable(settled.error);

    const division = divisionOverride?.trim() || this.options.team.defaultDivision;
    const rows = settled.result.value;
    return {
      status: 'ok',
      ...meta(settled.result),
      division,
      divisions: listDivisions(rows),
      rows: filterDivision(rows, division)
    };
  }

  /**
   * Display networks for an upcoming game, falling back to the TV schedule
   * of its local date when the schedule entry carries none
   */
  private async networksFor(game: Game): Promise<readonly string[]> {
    let raw = game.broadcasts;
    if (raw.length === 0) {
      const dateKey = localDateKey(game.startTime, this.options.team.timeZone);
      const index = await settle(() => this.data.broadcasts(dateKey));
      raw = index.ok ? index.result.value[game.id] ?? [] : [];
    }
    return buildNetworkList(raw, this.options.networks);
  }
}
