/**
 * Configuration Module
 *
 * Centralizes all application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 */

import 'dotenv/config';
import { CACHE_TTL, LIMITS, UPSTREAM } from './constants.js';

type Env = Record<string, string | undefined>;

/** Pattern → display name pair for network mapping */
export type NetworkPattern = readonly [pattern: string, name: string];

export interface NetworkConfig {
  /** Ordering and filtering of raw network names; supports wildcards */
  preferred: readonly string[];
  /** First-match mapping to display names; supports wildcards */
  patterns: readonly NetworkPattern[];
  /** Exact-name mapping to display names */
  nameMap: Readonly<Record<string, string>>;
}

export interface AppConfig {
  nhlApi: {
    baseUrl: string;
    timeoutMs: number;
    userAgent: string;
  };
  team: {
    code: string;
    defaultDivision: string;
    timeZone: string;
  };
  /** Per-dataset TTLs in milliseconds */
  cacheTtlMs: {
    recent: number;
    upcoming: number;
    standings: number;
    broadcasts: number;
  };
  retry: {
    attempts: number;
    delayMs: number;
  };
  limits: {
    defaultUpcoming: number;
    defaultRecent: number;
    maxUpcoming: number;
    maxRecent: number;
  };
  networks: NetworkConfig;
  logLevel: string;
}

const DEFAULT_NETWORKS: NetworkConfig = {
  preferred: ['TNT', 'TruTV', 'ESPN*', 'FDSN*', 'FDS*', 'Prime*', 'ESPN Select'],
  patterns: [['FDS*', 'FanDuel Sports North']],
  nameMap: {
    'ESPN Select': 'ESPN+',
    ESPN: 'ESPN',
    TNT: 'TNT',
    TruTV: 'TruTV',
    Prime: 'Prime Video'
  }
};

/**
 * Reads a non-negative integer, falling back to the default on missing or invalid values
 */
function intFromEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}

function stringFromEnv(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

/**
 * Keeps an IANA zone name only if Intl accepts it
 */
function timeZoneFromEnv(env: Env, name: string, fallback: string): string {
  const zone = stringFromEnv(env, name, fallback);
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return zone;
  } catch {
    return fallback;
  }
}

/**
 * Parses a JSON variable; undefined when unset or not valid JSON
 */
function jsonFromEnv(env: Env, name: string): unknown {
  const raw = env[name];
  if (!raw) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Reads a comma-delimited list, e.g. PREFERRED_NETWORK_NAMES="TNT,ESPN*,FDS*"
 */
function listFromEnv(env: Env, name: string, fallback: readonly string[]): readonly string[] {
  const raw = env[name];
  if (!raw) return fallback;
  const out = raw.split(',').map(x => x.trim()).filter(Boolean);
  return out.length > 0 ? out : fallback;
}

/**
 * Preferred networks from PREFERRED_NETWORK_NAMES_JSON='["TNT","FDSN*"]',
 * then from the comma-delimited PREFERRED_NETWORK_NAMES
 */
function preferredFromEnv(env: Env, fallback: readonly string[]): readonly string[] {
  const parsed = jsonFromEnv(env, 'PREFERRED_NETWORK_NAMES_JSON');
  if (Array.isArray(parsed) && parsed.every((x): x is string => typeof x === 'string')) return parsed;
  return listFromEnv(env, 'PREFERRED_NETWORK_NAMES', fallback);
}

/**
 * Reads a semicolon-delimited PATTERN=NAME list,
 * e.g. NETWORK_NAME_PATTERNS="FDS*=FanDuel Sports North;Prime*=Prime Video"
 */
function pairsFromEnv(env: Env, name: string, fallback: readonly NetworkPattern[]): readonly NetworkPattern[] {
  const raw = env[name];
  if (!raw) return fallback;

  const pairs: NetworkPattern[] = [];
  for (const part of raw.split(';')) {
    const idx = part.indexOf('=');
    if (idx === -1) continue;
    const pattern = part.slice(0, idx).trim();
    const value = part.slice(idx + 1).trim();
    if (pattern && value) pairs.push([pattern, value]);
  }
  return pairs.length > 0 ? pairs : fallback;
}

/**
 * Network patterns from NETWORK_NAME_PATTERNS_JSON='[["FDS*","FanDuel Sports North"]]',
 * then from the delimited NETWORK_NAME_PATTERNS
 *
 * A JSON list wins even when none of its items are usable; those fall back to the defaults.
 */
function patternsFromEnv(env: Env, fallback: readonly NetworkPattern[]): readonly NetworkPattern[] {
  const parsed = jsonFromEnv(env, 'NETWORK_NAME_PATTERNS_JSON');
  if (!Array.isArray(parsed)) return pairsFromEnv(env, 'NETWORK_NAME_PATTERNS', fallback);

  const pairs: NetworkPattern[] = [];
  for (const item of parsed) {
    if (!Array.isArray(item) || item.length !== 2) continue;
    const [pattern, value] = item;
    if (typeof pattern === 'string' && typeof value === 'string') pairs.push([pattern, value]);
  }
  return pairs.length > 0 ? pairs : fallback;
}

/**
 * Reads a JSON object of string values, e.g. NETWORK_NAME_MAP_JSON='{"ESPN Select":"ESPN+"}'
 */
function stringRecordFromEnv(
  env: Env,
  name: string,
  fallback: Readonly<Record<string, string>>
): Readonly<Record<string, string>> {
  const parsed = jsonFromEnv(env, name);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return fallback;

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(parsed)) {
    if (typeof v !== 'string') return fallback;
    out[k] = v;
  }
  return out;
}

/**
 * Builds the application configuration from an environment record
 *
 * All values have defaults; invalid numbers and time zones fall back silently.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    nhlApi: {
      baseUrl: stringFromEnv(env, 'NHL_API_BASE', 'https://api-web.nhle.com').replace(/\/+$/, ''),
      timeoutMs: intFromEnv(env, 'UPSTREAM_TIMEOUT_MS', UPSTREAM.TIMEOUT_MS),
      userAgent: UPSTREAM.USER_AGENT
    },
    team: {
      code: stringFromEnv(env, 'TEAM_CODE', 'MIN').toUpperCase(),
      defaultDivision: stringFromEnv(env, 'DEFAULT_DIVISION', 'Central'),
      timeZone: timeZoneFromEnv(env, 'TZ_NAME', 'America/Chicago')
    },
    cacheTtlMs: {
      recent: intFromEnv(env, 'RECENT_CACHE_TTL_SECONDS', CACHE_TTL.RECENT_SECONDS) * 1000,
      upcoming: intFromEnv(env, 'UPCOMING_CACHE_TTL_SECONDS', CACHE_TTL.UPCOMING_SECONDS) * 1000,
      standings: intFromEnv(env, 'STANDINGS_CACHE_TTL_SECONDS', CACHE_TTL.STANDINGS_SECONDS) * 1000,
      broadcasts: intFromEnv(env, 'BROADCASTS_CACHE_TTL_SECONDS', CACHE_TTL.BROADCASTS_SECONDS) * 1000
    },
    retry: {
      attempts: intFromEnv(env, 'UPSTREAM_RETRY_ATTEMPTS', UPSTREAM.RETRY_ATTEMPTS),
      delayMs: intFromEnv(env, 'UPSTREAM_RETRY_DELAY_MS', UPSTREAM.RETRY_DELAY_MS)
    },
    limits: {
      defaultUpcoming: intFromEnv(env, 'LIMIT_UPCOMING', LIMITS.DEFAULT_UPCOMING),
      defaultRecent: intFromEnv(env, 'LIMIT_RECENT', LIMITS.DEFAULT_RECENT),
      maxUpcoming: intFromEnv(env, 'MAX_UPCOMING', LIMITS.MAX_UPCOMING),
      maxRecent: intFromEnv(env, 'MAX_RECENT', LIMITS.MAX_RECENT)
    },
    networks: {
      preferred: preferredFromEnv(env, DEFAULT_NETWORKS.preferred),
      patterns: patternsFromEnv(env, DEFAULT_NETWORKS.patterns),
      nameMap: stringRecordFromEnv(env, 'NETWORK_NAME_MAP_JSON', DEFAULT_NETWORKS.nameMap)
    },
    logLevel: stringFromEnv(env, 'LOG_LEVEL', 'info') // trace, debug, info, warn, error, fatal, silent
  };
}

/**
 * Application configuration read once from process.env
 *
 * Only the entry point and the logger read this; core objects get
 * their configuration passed in.
 */
export const cfg = loadConfig();
