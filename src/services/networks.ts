/**
 * Network Display Names
 *
 * Turns raw broadcaster strings (call signs, regional feeds) into the
 * short list shown next to an upcoming game:
 * 1. keep and order by the preferred patterns (all names if none match)
 * 2. map to display names, pattern pairs first, then the exact-name map
 * 3. drop duplicates, keeping first occurrence
 */

import type { NetworkConfig } from '../core/config.js';

const WILDCARD = /[*?[\]]/;

/**
 * Compiles a shell-style wildcard pattern (*, ?, [abc], [!abc]) to an anchored,
 * case-insensitive RegExp
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      const end = pattern.indexOf(']', i + 2);
      if (end === -1) {
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i + 1, end);
      const negate = body.startsWith('!');
      if (negate) body = body.slice(1);
      source += `[${negate ? '^' : ''}${body.replace(/[\\\]^]/g, '\\$&')}]`;
      i = end;
    } else {
      source += ch.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 'i');
}

/**
 * Case-insensitive match of a network name against a configured pattern
 *
 * Patterns without wildcards match exactly or as a prefix, so "FDSN" matches "FDSN1".
 */
export function matchesNetwork(pattern: string, name: string): boolean {
  const p = pattern.trim();
  const n = name.trim();
  if (!p || !n) return false;

  if (WILDCARD.test(p)) return globToRegExp(p).test(n);

  const lower = n.toLowerCase();
  const wanted = p.toLowerCase();
  return lower === wanted || lower.startsWith(wanted);
}

function dedupe(items: readonly string[]): string[] {
  return [...new Set(items)];
}

/**
 * Filters and orders raw names by preference
 *
 * @example
 * orderByPreference(['FDSN1', 'ESPN', 'TNT'], ['TNT', 'FDSN*'])
 * // Returns: ['TNT', 'FDSN1']
 */
export function orderByPreference(names: readonly string[], preferred: readonly string[]): string[] {
  const cleaned = names.map(n => n.trim()).filter(Boolean);
  if (cleaned.length === 0) return [];
  if (preferred.length === 0) return dedupe(cleaned);

  const picked: string[] = [];
  for (const pattern of preferred) {
    for (const name of cleaned) {
      if (matchesNetwork(pattern, name)) picked.push(name);
    }
  }

  return dedupe(picked.length > 0 ? picked : cleaned);
}

/**
 * Display name for one raw network; the first matching pattern pair wins
 */
export function displayName(name: string, config: Pick<NetworkConfig, 'patterns' | 'nameMap'>): string {
  for (const [pattern, mapped] of config.patterns) {
    if (matchesNetwork(pattern, name)) return mapped;
  }
  return Object.hasOwn(config.nameMap, name) ? config.nameMap[name] : name;
}

/**
 * Full display list for a game's raw networks
 *
 * @example
 * // preferred [], patterns [['FDS*', 'FanDuel Sports North']], nameMap { 'ESPN Select': 'ESPN+' }
 * buildNetworkList(['FDSN1', 'ESPN Select'], config)
 * // Returns: ['FanDuel Sports North', 'ESPN+']
 */
export function buildNetworkList(raw: readonly string[], config: NetworkConfig): string[] {
  return dedupe(orderByPreference(raw, config.preferred).map(n => displayName(n, config)));
}
