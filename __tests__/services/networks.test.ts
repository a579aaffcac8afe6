import { describe, it, expect } from 'vitest';
import {
  buildNetworkList,
  displayName,
  globToRegExp,
  matchesNetwork,
  orderByPreference
} from '../../src/services/networks.js';
import { loadConfig } from '../../src/core/config.js';

describe('networks', () => {
  describe('globToRegExp', () => {
    it('should support *, ? and character classes', () => {
      expect(globToRegExp('FDS*').test('FDSNNO')).toBe(true);
      expect(globToRegExp('ESPN?').test('ESPN2')).toBe(true);
      expect(globToRegExp('ESPN?').test('ESPN')).toBe(false);
      expect(globToRegExp('NBC[SX]').test('NBCS')).toBe(true);
      expect(globToRegExp('NBC[!SX]').test('NBCS')).toBe(false);
    });

    it('should match case-insensitively and treat other characters literally', () => {
      expect(globToRegExp('espn+*').test('ESPN+ Select')).toBe(true);
      expect(globToRegExp('A.B*').test('AXB')).toBe(false);
    });
  });

  describe('matchesNetwork', () => {
    it('should match plain patterns exactly or as a prefix', () => {
      expect(matchesNetwork('FDSN', 'FDSN1')).toBe(true);
      expect(matchesNetwork('tnt', 'TNT')).toBe(true);
      expect(matchesNetwork('TNT', 'truTV')).toBe(false);
    });

    it('should never match blanks', () => {
      expect(matchesNetwork('', 'TNT')).toBe(false);
      expect(matchesNetwork('TNT', ' ')).toBe(false);
    });
  });

  describe('orderByPreference', () => {
    it('should keep preferred names in preference order', () => {
      expect(orderByPreference(['FDSN1', 'ESPN', 'TNT'], ['TNT', 'FDSN*'])).toEqual(['TNT', 'FDSN1']);
    });

    it('should keep everything when nothing is preferred', () => {
      expect(orderByPreference(['NHLN', 'SN'], ['TNT'])).toEqual(['NHLN', 'SN']);
      expect(orderByPreference(['NHLN', 'NHLN'], [])).toEqual(['NHLN']);
    });
  });

  describe('displayName', () => {
    const config = {
      patterns: [['FDS*', 'FanDuel Sports North']] as const,
      nameMap: { 'ESPN Select': 'ESPN+' }
    };

    it('should prefer a pattern pair, then the exact map', () => {
      expect(displayName('FDSNNO', config)).toBe('FanDuel Sports North');
      expect(displayName('ESPN Select', config)).toBe('ESPN+');
    });

    it('should leave unknown names unchanged', () => {
      expect(displayName('NHLN', config)).toBe('NHLN');
      expect(displayName('espn select', config)).toBe('espn select');
    });
  });

  describe('buildNetworkList', () => {
    it('should order, map and de-duplicate with the default settings', () => {
      const { networks } = loadConfig({});

      expect(buildNetworkList(['FDSNNO', 'ESPN+', 'TNT'], networks)).toEqual([
        'TNT',
        'ESPN+',
        'FanDuel Sports North'
      ]);
    });

    it('should collapse feeds that map to the same display name', () => {
      const networks = { preferred: [], patterns: [['FDS*', 'FanDuel Sports North'] as const], nameMap: {} };

      expect(buildNetworkList(['FDSNNO', 'FDSNWI'], networks)).toEqual(['FanDuel Sports North']);
    });
  });
});
