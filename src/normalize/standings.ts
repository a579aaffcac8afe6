/**
 * Standings Normalizer
 *
 * Converts the /v1/standings/now payload into typed StandingsRow entities.
 * Points are always recomputed from the counters.
 */

import { POINTS } from '../core/constants.js';
import { SchemaMismatchError } from '../errors/index.js';
import { isJsonObject } from '../util/validation.js';
import { describeValue, firstDefined, readInt, readLocalized, readOptionalInt, readString } from './fields.js';
import type { StandingsRow } from '../models/entities.js';
import type { JsonObject } from '../types/api.js';

/**
 * League points for a record
 */
export function pointsFor(wins: number, otLosses: number): number {
  return wins * POINTS.WIN + otLosses * POINTS.OT_LOSS;
}

/**
 * Share of available points earned, rounded to three places
 */
export function pointsPctFor(points: number, gamesPlayed: number): number {
  if (gamesPlayed <= 0) return 0;
  return Math.round((points / (gamesPlayed * POINTS.WIN)) * 1000) / 1000;
}

function formatRecord(wins: number, losses: number, otLosses: number): string {
  return wins || losses || otLosses ? `${wins}-${losses}-${otLosses}` : '';
}

/**
 * Builds a compact streak string such as "W3" from code + count
 */
function readStreak(row: JsonObject): string {
  const code = readString(row, ['streakCode', 'streak']);
  const count = readOptionalInt(row, ['streakCount']);
  if (code && count !== null) return `${code}${count}`;
  return code ?? '';
}

export function normalizeStandingsRow(raw: unknown, path: string): StandingsRow {
  if (!isJsonObject(raw)) {
    throw new SchemaMismatchError(`Expected a standings row, got ${describeValue(raw)}`, path);
  }

  const teamCode = readLocalized(raw.teamAbbrev);
  if (!teamCode) {
    throw new SchemaMismatchError('Expected a team abbreviation', `${path}.teamAbbrev`);
  }

  const divisionName = readString(raw, ['divisionName']);
  const divisionAbbrev = readString(raw, ['divisionAbbrev']);
  if (!divisionName && !divisionAbbrev) {
    throw new SchemaMismatchError('Expected a division name', `${path}.divisionName`);
  }

  const wins = readInt(raw, ['wins'], path);
  const losses = readInt(raw, ['losses'], path);
  const otLosses = readInt(raw, ['otLosses', 'overtimeLosses'], path);
  const gamesPlayed = readInt(raw, ['gamesPlayed'], path, wins + losses + otLosses);
  const points = pointsFor(wins, otLosses);

  const goalsFor = readInt(raw, ['goalFor', 'goalsFor', 'gf'], path);
  const goalsAgainst = readInt(raw, ['goalAgainst', 'goalsAgainst', 'ga'], path);
  const goalDifferential = firstDefined(raw, ['goalDifferential', 'goalDiff', 'diff'])
    ? readInt(raw, ['goalDifferential', 'goalDiff', 'diff'], path)
    : goalsFor - goalsAgainst;

  return {
    teamCode,
    teamName: readLocalized(raw.teamName) ?? readLocalized(raw.teamCommonName) ?? teamCode,
    divisionName: divisionName ?? divisionAbbrev ?? '',
    divisionAbbrev: divisionAbbrev ?? '',
    conferenceName: readString(raw, ['conferenceName']),
    gamesPlayed,
    wins,
    losses,
    otLosses,
    points,
    pointsPct: pointsPctFor(points, gamesPlayed),
    regulationWins: readInt(raw, ['regulationWins', 'regWins', 'rw'], path),
    regulationPlusOtWins: readInt(raw, ['regulationPlusOtWins', 'regulationPlusOvertimeWins', 'row'], path),
    goalsFor,
    goalsAgainst,
    goalDifferential,
    streak: readStreak(raw),
    homeRecord: formatRecord(
      readInt(raw, ['homeWins'], path),
      readInt(raw, ['homeLosses'], path),
      readInt(raw, ['homeOtLosses', 'homeOTLosses'], path)
    ),
    roadRecord: formatRecord(
      readInt(raw, ['roadWins', 'awayWins'], path),
      readInt(raw, ['roadLosses', 'awayLosses'], path),
      readInt(raw, ['roadOtLosses', 'awayOtLosses', 'awayOTLosses'], path)
    )
  };
}

/**
 * Normalizes a league standings payload
 *
 * @throws SchemaMismatchError if `standings` is not a list or a row lacks required fields
 */
export function normalizeStandings(payload: unknown): StandingsRow[] {
  if (!isJsonObject(payload)) {
    throw new SchemaMismatchError(`Expected a standings object, got ${describeValue(payload)}`, '$');
  }
  const rows = payload.standings;
  if (!Array.isArray(rows)) {
    throw new SchemaMismatchError(`Expected a standings list, got ${describeValue(rows)}`, 'standings');
  }
  return rows.map((raw, i) => normalizeStandingsRow(raw, `standings[${i}]`));
}
