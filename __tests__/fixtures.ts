import type {
  FinalGame,
  LiveDetail,
  LiveGame,
  ScheduledGame,
  StandingsRow,
  TeamRef
} from '../src/models/entities.js';

export const team = (code: string, name: string | null = null): TeamRef => ({ code, name });

export function scheduledGame(id: string, startTime: string, home: TeamRef, away: TeamRef): ScheduledGame {
  return { id, startTime, homeTeam: home, awayTeam: away, broadcasts: [], status: 'scheduled', score: null, live: null };
}

export function finalGame(
  id: string,
  startTime: string,
  home: TeamRef,
  away: TeamRef,
  score: { home: number; away: number }
): FinalGame {
  return { id, startTime, homeTeam: home, awayTeam: away, broadcasts: [], status: 'final', score, live: null };
}

export function liveGame(id: string, startTime: string, live: Partial<LiveDetail> = {}): LiveGame {
  return {
    id,
    startTime,
    homeTeam: team('MIN'),
    awayTeam: team('CHI'),
    broadcasts: [],
    status: 'live',
    score: { home: 1, away: 0 },
    live: { period: null, periodType: null, clock: null, inIntermission: false, ...live }
  };
}

export function standingsRow(overrides: Partial<StandingsRow> & { teamCode: string }): StandingsRow {
  return {
    teamName: overrides.teamCode,
    divisionName: 'Central',
    divisionAbbrev: 'C',
    conferenceName: 'Western',
    gamesPlayed: 0,
    wins: 0,
    losses: 0,
    otLosses: 0,
    points: 0,
    pointsPct: 0,
    regulationWins: 0,
    regulationPlusOtWins: 0,
    goalsFor: 0,
    goalsAgainst: 0,
    goalDifferential: 0,
    streak: '',
    homeRecord: '',
    roadRecord: '',
    ...overrides
  };
}
