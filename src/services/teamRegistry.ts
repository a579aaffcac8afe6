/**
 * Team Registry
 *
 * Resolves the team a request is about and its display name. Names come
 * from the bundled data/teams.json, then from the standings payload.
 */

import { readFileSync } from 'node:fs';
import { isJsonObject, isValidTeamCode } from '../util/validation.js';
import type { StandingsRow } from '../models/entities.js';

export type TeamNames = Readonly<Record<string, string>>;

const TEAMS_FILE = new URL('../../data/teams.json', import.meta.url);

/**
 * Reads the code → name map; non-string values are skipped
 */
export function loadTeamNames(file: URL = TEAMS_FILE): TeamNames {
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
  if (!isJsonObject(parsed)) {
    throw new Error(`Expected a JSON object in ${file.pathname}`);
  }

  const names: Record<string, string> = {};
  for (const [code, name] of Object.entries(parsed)) {
    if (typeof name === 'string') names[code.toUpperCase()] = name;
  }
  return names;
}

/**
 * Picks the team for a request
 *
 * The requested code must look like a team code and, when standings are
 * known, appear in them; otherwise the configured team is used.
 */
export function resolveTeam(
  requested: string | undefined,
  fallback: string,
  standings: readonly StandingsRow[] | null
): string {
  const code = requested?.trim().toUpperCase() ?? '';
  if (!isValidTeamCode(code)) return fallback;
  if (standings && !standings.some(r => r.teamCode === code)) return fallback;
  return code;
}

export function teamDisplayName(
  code: string,
  names: TeamNames,
  standings: readonly StandingsRow[] | null
): string {
  if (Object.hasOwn(names, code)) return names[code];
  return standings?.find(r => r.teamCode === code)?.teamName ?? code;
}
