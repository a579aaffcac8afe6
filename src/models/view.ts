/**
 * View Models
 *
 * Request and response shapes of the view service. A ComposedView is a
 * read-only snapshot handed to the presentation layer.
 */

import type { GameStatus, Score, StandingsRow, TeamRef } from './entities.js';

export interface ViewRequest {
  /** Subset of recent | upcoming | standings */
  datasets: Iterable<string>;
  /** Raw count overrides, e.g. straight from a query string */
  counts?: { upcoming?: unknown; recent?: unknown };
  division?: string;
  /** Defaults to true */
  includeStandings?: boolean;
  team?: string;
  /** Passed through untouched */
  theme?: string;
}

/**
 * One game as seen from the selected team
 */
export interface GameView {
  id: string;
  status: GameStatus;
  startTime: string;
  /** Local calendar date (YYYY-MM-DD) in the configured time zone */
  dateKey: string;
  homeTeam: TeamRef;
  awayTeam: TeamRef;
  score: Score | null;
  opponent: string;
  opponentCode: string;
  homeAway: 'vs' | '@';
  /** W or L for finished games; empty otherwise */
  result: 'W' | 'L' | '';
  /** e.g. "P2 12:34", "OT", "INT"; empty unless live */
  liveLabel: string;
  /** Display names; only resolved for upcoming games */
  networks: readonly string[];
}

export interface SectionError {
  code: string;
  message: string;
}

export type Section<T> =
  | ({ status: 'ok'; wasStale: boolean; fetchedAt: string } & T)
  | { status: 'unavailable'; error: SectionError };

export interface GamesSection {
  games: readonly GameView[];
}

export interface StandingsSection {
  /** Division the rows were filtered by */
  division: string;
  /** Every division present in the data, sorted */
  divisions: readonly string[];
  rows: readonly StandingsRow[];
}

export interface ComposedView {
  generatedAt: string;
  team: string;
  teamName: string;
  theme: string | null;
  upcoming?: Section<GamesSection>;
  recent?: Section<GamesSection>;
  standings?: Section<StandingsSection>;
}
