import { describe, it, expect } from 'vitest';
import { normalizeStandings, pointsFor, pointsPctFor } from '../../src/normalize/standings.js';
import { SchemaMismatchError } from '../../src/errors/index.js';

const fullRow = {
  teamAbbrev: { default: 'MIN' },
  teamName: { default: 'Minnesota Wild' },
  divisionName: 'Central',
  divisionAbbrev: 'C',
  conferenceName: 'Western',
  gamesPlayed: 40,
  wins: 25,
  losses: 10,
  otLosses: 5,
  points: 999,
  regulationWins: 20,
  regulationPlusOtWins: 23,
  goalFor: 130,
  goalAgainst: 100,
  goalDifferential: 30,
  streakCode: 'W',
  streakCount: 3,
  homeWins: 14,
  homeLosses: 4,
  homeOtLosses: 2,
  roadWins: 11,
  roadLosses: 6,
  roadOtLosses: 3
};

function mismatchOf(fn: () => unknown): SchemaMismatchError | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof SchemaMismatchError) return err;
    throw err;
  }
  return undefined;
}

describe('normalizeStandings', () => {
  it('should normalize a full row and recompute points', () => {
    const [row] = normalizeStandings({ standings: [fullRow] });

    expect(row).toEqual({
      teamCode: 'MIN',
      teamName: 'Minnesota Wild',
      divisionName: 'Central',
      divisionAbbrev: 'C',
      conferenceName: 'Western',
      gamesPlayed: 40,
      wins: 25,
      losses: 10,
      otLosses: 5,
      points: 55,
      pointsPct: 0.688,
      regulationWins: 20,
      regulationPlusOtWins: 23,
      goalsFor: 130,
      goalsAgainst: 100,
      goalDifferential: 30,
      streak: 'W3',
      homeRecord: '14-4-2',
      roadRecord: '11-6-3'
    });
  });

  it('should fall back through alternate keys and defaults', () => {
    const [row] = normalizeStandings({
      standings: [{ teamAbbrev: 'COL', divisionAbbrev: 'C', wins: '10', losses: 8, overtimeLosses: 2 }]
    });

    expect(row.teamName).toBe('COL');
    expect(row.divisionName).toBe('C');
    expect(row.conferenceName).toBeNull();
    expect(row.otLosses).toBe(2);
    expect(row.gamesPlayed).toBe(20);
    expect(row.points).toBe(22);
    expect(row.pointsPct).toBe(0.55);
    expect(row.regulationWins).toBe(0);
    expect(row.goalDifferential).toBe(0);
    expect(row.streak).toBe('');
    expect(row.homeRecord).toBe('');
  });

  it('should derive goal differential when it is absent', () => {
    const { goalDifferential: _diff, ...row } = fullRow;
    const [normalized] = normalizeStandings({ standings: [row] });

    expect(normalized.goalDifferential).toBe(30);
  });

  it('should reject a non-numeric counter', () => {
    const err = mismatchOf(() => normalizeStandings({ standings: [{ ...fullRow, wins: 'many' }] }));

    expect(err?.message).toBe('Expected an integer, got string at standings[0].wins');
  });

  it('should reject a row without a division', () => {
    const { divisionName: _name, divisionAbbrev: _abbrev, ...row } = fullRow;
    const err = mismatchOf(() => normalizeStandings({ standings: [row] }));

    expect(err?.path).toBe('standings[0].divisionName');
  });

  it('should reject a payload without a standings list', () => {
    expect(mismatchOf(() => normalizeStandings({ standings: 'soon' }))?.message).toBe(
      'Expected a standings list, got string at standings'
    );
  });

  it('should accept an empty standings list', () => {
    expect(normalizeStandings({ standings: [] })).toEqual([]);
  });
});

describe('points', () => {
  it('should award two for a win and one for an overtime loss', () => {
    expect(pointsFor(25, 5)).toBe(55);
    expect(pointsFor(0, 0)).toBe(0);
  });

  it('should be zero percent before any games are played', () => {
    expect(pointsPctFor(0, 0)).toBe(0);
    expect(pointsPctFor(10, 5)).toBe(1);
  });
});
