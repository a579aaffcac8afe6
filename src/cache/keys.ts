/**
 * Cache Key Generators
 *
 * Centralized key generation for TTL cache entries.
 * Ensures consistent key naming across the application.
 */

/**
 * Generates keys for each dataset kind and scope
 */
export const KEYS = {
  /** Live and finished games from a team's season schedule */
  recent: (team: string) => `recent:${team.toUpperCase()}`,

  /** Scheduled games from a team's season schedule */
  upcoming: (team: string) => `upcoming:${team.toUpperCase()}`,

  /** League-wide standings table; divisions are filtered at query time */
  standings: () => 'standings:league',

  /** TV schedule for one calendar date */
  broadcasts: (dateISO: string) => `broadcasts:${dateISO}`,
};
