import { describe, it, expect } from 'vitest';
import { loadTeamNames, resolveTeam, teamDisplayName } from '../../src/services/teamRegistry.js';
import { standingsRow } from '../fixtures.js';

describe('teamRegistry', () => {
  describe('loadTeamNames', () => {
    it('should read the bundled team list', () => {
      const names = loadTeamNames();

      expect(Object.keys(names)).toHaveLength(32);
      expect(names.MIN).toBe('Minnesota Wild');
      expect(names.COL).toBe('Colorado Avalanche');
    });
  });

  describe('resolveTeam', () => {
    const rows = [standingsRow({ teamCode: 'MIN' }), standingsRow({ teamCode: 'COL' })];

    it('should upper-case a well-formed code', () => {
      expect(resolveTeam('col', 'MIN', rows)).toBe('COL');
      expect(resolveTeam(' col ', 'MIN', null)).toBe('COL');
    });

    it('should fall back for missing or malformed codes', () => {
      expect(resolveTeam(undefined, 'MIN', rows)).toBe('MIN');
      expect(resolveTeam('minnesota', 'MIN', rows)).toBe('MIN');
      expect(resolveTeam('C0L', 'MIN', null)).toBe('MIN');
    });

    it('should fall back for codes missing from known standings', () => {
      expect(resolveTeam('XYZ', 'MIN', rows)).toBe('MIN');
    });

    it('should accept any well-formed code when standings are unknown', () => {
      expect(resolveTeam('XYZ', 'MIN', null)).toBe('XYZ');
    });
  });

  describe('teamDisplayName', () => {
    const rows = [standingsRow({ teamCode: 'XYZ', teamName: 'Test Team' })];

    it('should prefer the bundled name, then standings, then the code', () => {
      expect(teamDisplayName('MIN', { MIN: 'Minnesota Wild' }, rows)).toBe('Minnesota Wild');
      expect(teamDisplayName('XYZ', {}, rows)).toBe('Test Team');
      expect(teamDisplayName('XYZ', {}, null)).toBe('XYZ');
    });
  });
});
