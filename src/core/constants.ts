/**
 * Application Constants
 *
 * Centralized location for all magic numbers and configuration defaults.
 * Environment overrides are applied in config.ts.
 */

/**
 * Cache TTL defaults (in seconds)
 */
export const CACHE_TTL = {
  /** Recent games (live + final) change during games, keep short */
  RECENT_SECONDS: 60,

  /** Upcoming schedule */
  UPCOMING_SECONDS: 60,

  /** League standings only move after games end */
  STANDINGS_SECONDS: 300,

  /** TV schedule per date */
  BROADCASTS_SECONDS: 60,
} as const;

/**
 * Result count defaults and ceilings for game lists
 */
export const LIMITS = {
  DEFAULT_UPCOMING: 8,
  DEFAULT_RECENT: 5,
  MAX_UPCOMING: 25,
  MAX_RECENT: 25,
} as const;

/**
 * Upstream provider settings
 */
export const UPSTREAM = {
  /** Per-request timeout (10 seconds) */
  TIMEOUT_MS: 10000,

  /** Extra loader attempts on a cold miss */
  RETRY_ATTEMPTS: 1,

  /** Delay between loader attempts */
  RETRY_DELAY_MS: 250,

  USER_AGENT: 'league-ticker/1.0',
} as const;

/**
 * League points rules
 */
export const POINTS = {
  WIN: 2,
  OT_LOSS: 1,
} as const;

/** Three-letter team abbreviation, e.g. MIN */
export const TEAM_CODE_PATTERN = /^[A-Z]{3}$/;
