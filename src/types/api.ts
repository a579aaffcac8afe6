/**
 * Provider API Type Definitions
 *
 * Raw payloads from the NHL web API are loosely shaped and vary between
 * endpoints, so they enter the system as plain JSON objects and are only
 * trusted after passing through the normalizers in src/normalize.
 */

export type JsonObject = { [key: string]: unknown };

/**
 * Parsed response body from one upstream call
 */
export type RawPayload = JsonObject;

/**
 * Datasets the provider can be asked for
 *
 * `recent` and `upcoming` both come from the team season schedule;
 * they are cached separately so they can expire on their own schedules.
 */
export type UpstreamKind = 'recent' | 'upcoming' | 'standings' | 'broadcasts';

/**
 * Narrowing context for an upstream call
 */
export interface Scope {
  /** Three-letter team code; required for recent/upcoming */
  team?: string;
  /** YYYY-MM-DD; required for broadcasts */
  date?: string;
}
