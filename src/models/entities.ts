/**
 * Domain Entities
 *
 * Normalized, typed shapes produced by the normalizers. Everything
 * downstream of the cache works with these, never with raw payloads.
 */

/** Request-facing dataset kinds */
export const DATASET_KINDS = ['recent', 'upcoming', 'standings'] as const;

export type DatasetKind = (typeof DATASET_KINDS)[number];

export function isDatasetKind(value: string): value is DatasetKind {
  return (DATASET_KINDS as readonly string[]).includes(value);
}

export interface TeamRef {
  /** Three-letter abbreviation, e.g. MIN */
  code: string;
  /** Place name when the payload carries one, e.g. Minnesota */
  name: string | null;
}

export interface Score {
  home: number;
  away: number;
}

export type PeriodType = 'REG' | 'OT' | 'SO';

/**
 * In-game detail, only present while a game is live
 */
export interface LiveDetail {
  period: number | null;
  periodType: PeriodType | null;
  /** Time remaining in the period, e.g. "12:34" */
  clock: string | null;
  inIntermission: boolean;
}

interface GameBase {
  id: string;
  homeTeam: TeamRef;
  awayTeam: TeamRef;
  /** UTC instant, ISO-8601 */
  startTime: string;
  /** Network names embedded in the schedule entry */
  broadcasts: readonly string[];
}

export interface ScheduledGame extends GameBase {
  status: 'scheduled';
  score: null;
  live: null;
}

export interface LiveGame extends GameBase {
  status: 'live';
  score: Score | null;
  live: LiveDetail;
}

export interface FinalGame extends GameBase {
  status: 'final';
  score: Score;
  live: null;
}

export type Game = ScheduledGame | LiveGame | FinalGame;

export type GameStatus = Game['status'];

export interface StandingsRow {
  teamCode: string;
  teamName: string;
  divisionName: string;
  divisionAbbrev: string;
  conferenceName: string | null;
  gamesPlayed: number;
  wins: number;
  losses: number;
  otLosses: number;
  /** Derived from wins and otLosses, see pointsFor() */
  points: number;
  pointsPct: number;
  regulationWins: number;
  regulationPlusOtWins: number;
  goalsFor: number;
  goalsAgainst: number;
  goalDifferential: number;
  /** e.g. "W3"; empty when unknown */
  streak: string;
  /** "W-L-OTL"; empty when unknown */
  homeRecord: string;
  roadRecord: string;
}

/**
 * Network names by game id, built from a TV schedule payload
 */
export type BroadcastIndex = Readonly<Record<string, readonly string[]>>;
