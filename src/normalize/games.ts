/**
 * Game Normalizer
 *
 * Converts a team season schedule payload into typed Game entities.
 * Pure: no I/O, same payload in, same games out.
 */

import { SchemaMismatchError } from '../errors/index.js';
import { isJsonObject } from '../util/validation.js';
import { extractEmbeddedNetworks } from './broadcasts.js';
import {
  describeValue,
  firstDefined,
  readLocalized,
  readObject,
  readOptionalInt,
  readString
} from './fields.js';
import type { Game, GameStatus, LiveDetail, PeriodType, Score, TeamRef } from '../models/entities.js';
import type { JsonObject } from '../types/api.js';

/** Containers the schedule endpoint sometimes nests games under */
const NESTED_GAME_KEYS = ['gameWeek', 'weeks', 'months', 'gamesByMonth', 'gamesByDate'] as const;

const STATE_KEYS = ['gameState', 'gameScheduleState', 'gameStatus', 'state'] as const;

const LIVE_STATES = new Set(['LIVE', 'CRIT', 'CRITICAL', 'IN_PROGRESS', 'INPROGRESS', 'ACTIVE', 'ONGOING']);
const FINAL_STATES = new Set(['FINAL', 'OFF', 'COMPLETED', 'DONE', 'FINISHED']);

/**
 * Maps a provider state token onto a game status
 *
 * Anything not recognisably live or finished (FUT, PRE, PPD, missing) is scheduled.
 */
export function statusFromState(state: string | null): GameStatus {
  const token = (state ?? '').toUpperCase();
  if (LIVE_STATES.has(token)) return 'live';
  if (FINAL_STATES.has(token)) return 'final';
  return 'scheduled';
}

/**
 * Parses an instant; strings without an offset are taken as UTC
 */
export function parseInstant(value: string): Date | null {
  const text = value.trim();
  const hasTime = text.includes('T');
  const hasOffset = /(Z|[+-]\d{2}:?\d{2})$/i.test(text);
  const ms = Date.parse(hasTime && !hasOffset ? `${text}Z` : text);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * Flattens the schedule payload into a list of raw game entries
 */
function extractGameList(payload: JsonObject): unknown[] {
  if (Array.isArray(payload.games)) return payload.games;

  let sawContainer = false;
  for (const key of NESTED_GAME_KEYS) {
    const node = payload[key];
    if (!Array.isArray(node)) continue;
    sawContainer = true;

    const out: unknown[] = [];
    for (const entry of node) {
      if (isJsonObject(entry) && Array.isArray(entry.games)) out.push(...entry.games);
    }
    if (out.length > 0) return out;
  }

  if (!sawContainer) {
    throw new SchemaMismatchError('Expected a games list', 'games');
  }
  return [];
}

function readId(game: JsonObject, path: string): string {
  const value = firstDefined(game, ['id', 'gameId', 'gamePK'])?.value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'string' && value.trim()) return value.trim();
  throw new SchemaMismatchError(`Expected a game id, got ${describeValue(value)}`, `${path}.id`);
}

function readStartTime(game: JsonObject, path: string): string {
  for (const key of ['startTimeUTC', 'startTime', 'gameDate']) {
    const value = game[key];
    if (typeof value !== 'string' || !value) continue;
    const date = parseInstant(value);
    if (date) return date.toISOString();
  }
  throw new SchemaMismatchError('Expected a parseable start time', `${path}.startTimeUTC`);
}

function readTeam(game: JsonObject, key: 'homeTeam' | 'awayTeam', path: string): TeamRef {
  const team = game[key];
  if (!isJsonObject(team)) {
    throw new SchemaMismatchError(`Expected a team object, got ${describeValue(team)}`, `${path}.${key}`);
  }
  const code = readLocalized(team.abbrev) ?? readLocalized(team.teamAbbrev);
  if (!code) {
    throw new SchemaMismatchError('Expected a team abbreviation', `${path}.${key}.abbrev`);
  }
  return {
    code,
    name: readLocalized(team.placeName) ?? readLocalized(team.name)
  };
}

function readScoreValue(value: unknown, path: string): number | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value);
  throw new SchemaMismatchError(`Expected an integer score, got ${describeValue(value)}`, path);
}

/**
 * Reads the score from the team objects, falling back to a top-level { home, away }
 */
function readScore(game: JsonObject, path: string): Score | null {
  const homeTeam = readObject(game, 'homeTeam');
  const awayTeam = readObject(game, 'awayTeam');
  const fallback = readObject(game, 'score');

  const home = readScoreValue(homeTeam.score, `${path}.homeTeam.score`)
    ?? readScoreValue(fallback.home, `${path}.score.home`);
  const away = readScoreValue(awayTeam.score, `${path}.awayTeam.score`)
    ?? readScoreValue(fallback.away, `${path}.score.away`);

  return home === null || away === null ? null : { home, away };
}

function toPeriodType(value: string | null): PeriodType | null {
  switch ((value ?? '').toUpperCase()) {
    case 'REG':
    case 'REGULATION':
      return 'REG';
    case 'OT':
    case 'OVERTIME':
      return 'OT';
    case 'SO':
    case 'SHOOTOUT':
      return 'SO';
    default:
      return null;
  }
}

function readLiveDetail(game: JsonObject): LiveDetail {
  const clock = readObject(game, 'clock');
  const descriptor = readObject(game, 'periodDescriptor');
  const timeKeys = ['timeRemaining', 'timeRemainingInPeriod'];

  const intermission = typeof game.inIntermission === 'boolean' ? game.inIntermission : clock.inIntermission;

  return {
    period: readOptionalInt(descriptor, ['number', 'periodNumber']) ?? readOptionalInt(game, ['period', 'currentPeriod']),
    periodType: toPeriodType(readString(descriptor, ['periodType', 'type']) ?? readString(game, ['periodType'])),
    clock: readString(clock, timeKeys) ?? readString(game, timeKeys),
    inIntermission: intermission === true
  };
}

/**
 * Normalizes one schedule entry
 */
export function normalizeGame(raw: unknown, path: string): Game {
  if (!isJsonObject(raw)) {
    throw new SchemaMismatchError(`Expected a game object, got ${describeValue(raw)}`, path);
  }

  const base = {
    id: readId(raw, path),
    homeTeam: readTeam(raw, 'homeTeam', path),
    awayTeam: readTeam(raw, 'awayTeam', path),
    startTime: readStartTime(raw, path),
    broadcasts: extractEmbeddedNetworks(raw)
  };
  const status = statusFromState(readString(raw, STATE_KEYS));

  switch (status) {
    case 'scheduled':
      return { ...base, status: 'scheduled', score: null, live: null };
    case 'live':
      return { ...base, status: 'live', score: readScore(raw, path), live: readLiveDetail(raw) };
    case 'final': {
      const score = readScore(raw, path);
      if (!score) {
        throw new SchemaMismatchError('Final game without a score', `${path}.homeTeam.score`);
      }
      return { ...base, status: 'final', score, live: null };
    }
  }
}

/**
 * Normalizes a team season schedule payload
 *
 * @throws SchemaMismatchError if the payload has no games list or any game lacks required fields
 */
export function normalizeGames(payload: unknown): Game[] {
  if (!isJsonObject(payload)) {
    throw new SchemaMismatchError(`Expected a schedule object, got ${describeValue(payload)}`, '$');
  }
  return extractGameList(payload).map((raw, i) => normalizeGame(raw, `games[${i}]`));
}
