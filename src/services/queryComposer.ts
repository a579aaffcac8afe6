/**
 * Query Composer
 *
 * Pure functions that turn cached, normalized datasets plus request
 * overrides into response sections. Inputs are never mutated; every
 * list returned is a new array.
 */

import type { Game, StandingsRow } from '../models/entities.js';
import type { GameView } from '../models/view.js';

/**
 * Resolves a raw count override against a default and a ceiling
 *
 * Missing, blank, negative, fractional or non-numeric values fall back to
 * the default; anything above `max` is clamped.
 *
 * @example
 * resolveCount('3', 8, 25)   // 3
 * resolveCount('-1', 8, 25)  // 8
 * resolveCount(100, 8, 25)   // 25
 */
export function resolveCount(raw: unknown, fallback: number, max: number): number {
  let n: number | null = null;
  if (typeof raw === 'number' && Number.isInteger(raw)) {
    n = raw;
  } else if (typeof raw === 'string' && /^\s*-?\d+\s*$/.test(raw)) {
    n = Number(raw);
  }

  if (n === null || n < 0) n = fallback;
  return Math.max(0, Math.min(n, max));
}

const startMs = (game: Game): number => Date.parse(game.startTime);

/**
 * Live and finished games, newest first
 */
export function selectRecent(games: readonly Game[], count: number): Game[] {
  return games
    .filter(g => g.status === 'live' || g.status === 'final')
    .sort((a, b) => startMs(b) - startMs(a))
    .slice(0, count);
}

/**
 * Scheduled games, soonest first
 */
export function selectUpcoming(games: readonly Game[], count: number): Game[] {
  return games
    .filter(g => g.status === 'scheduled')
    .sort((a, b) => startMs(a) - startMs(b))
    .slice(0, count);
}

/**
 * Standings order: points, then points percentage, then regulation wins
 */
export function compareStandings(a: StandingsRow, b: StandingsRow): number {
  return b.points - a.points || b.pointsPct - a.pointsPct || b.regulationWins - a.regulationWins;
}

/**
 * Rows of one division, matched case-insensitively on name or abbreviation
 *
 * A division that matches nothing yields an empty list.
 */
export function filterDivision(rows: readonly StandingsRow[], division: string): StandingsRow[] {
  const wanted = division.trim().toLowerCase();
  return rows
    .filter(r => r.divisionName.toLowerCase() === wanted || r.divisionAbbrev.toLowerCase() === wanted)
    .sort(compareStandings);
}

export function listDivisions(rows: readonly StandingsRow[]): string[] {
  return [...new Set(rows.map(r => r.divisionName).filter(Boolean))].sort();
}

/**
 * Calendar date of an instant in a time zone, as YYYY-MM-DD
 */
export function localDateKey(instant: string | Date, timeZone: string): string {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  });

  const parts = formatter.formatToParts(typeof instant === 'string' ? new Date(instant) : instant);
  const year = parts.find(p => p.type === 'year')?.value;
  const month = parts.find(p => p.type === 'month')?.value;
  const day = parts.find(p => p.type === 'day')?.value;

  return `${year}-${month}-${day}`;
}

/**
 * Short in-game label: INT, SO, OT 3:21, P2 12:34
 */
export function liveLabel(game: Game): string {
  if (game.status !== 'live') return '';
  const { period, periodType, clock, inIntermission } = game.live;

  if (inIntermission) return 'INT';
  if (periodType === 'SO') return 'SO';
  if (periodType === 'OT') return clock ? `OT ${clock}` : 'OT';
  if (period !== null) return clock ? `P${period} ${clock}` : `P${period}`;
  return clock ?? '';
}

/**
 * Win or loss from the team's side; empty for ties, unfinished games
 * or games the team is not part of
 */
export function gameResult(game: Game, team: string): 'W' | 'L' | '' {
  if (game.status !== 'final') return '';
  const { home, away } = game.score;
  if (home === away) return '';

  if (game.homeTeam.code === team) return home > away ? 'W' : 'L';
  if (game.awayTeam.code === team) return away > home ? 'W' : 'L';
  return '';
}

/**
 * Builds the team-centric view of a game
 */
export function toGameView(
  game: Game,
  team: string,
  timeZone: string,
  networks: readonly string[] = []
): GameView {
  const isAway = game.awayTeam.code === team;
  const opponent = isAway ? game.homeTeam : game.awayTeam;

  return {
    id: game.id,
    status: game.status,
    startTime: game.startTime,
    dateKey: localDateKey(game.startTime, timeZone),
    homeTeam: game.homeTeam,
    awayTeam: game.awayTeam,
    score: game.score,
    opponent: opponent.name ?? opponent.code,
    opponentCode: opponent.code,
    homeAway: isAway ? '@' : 'vs',
    result: gameResult(game, team),
    liveLabel: liveLabel(game),
    networks
  };
}
