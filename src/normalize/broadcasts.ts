/**
 * Broadcast Normalizer
 *
 * Extracts TV network names from schedule entries and from the
 * /v1/network/tv-schedule/{date} payload, whose shape varies.
 */

import { SchemaMismatchError } from '../errors/index.js';
import { isJsonObject } from '../util/validation.js';
import type { BroadcastIndex } from '../models/entities.js';
import type { JsonObject } from '../types/api.js';

const NAME_KEYS = ['network', 'name', 'callSign', 'callsign', 'displayName', 'shortName'] as const;
const GAME_ID_KEYS = ['gameId', 'id', 'gamePK'] as const;
const TV_LIST_KEYS = ['broadcasts', 'tvBroadcasts', 'networks', 'channels'] as const;
const TV_DIRECT_KEYS = ['network', 'callSign', 'callsign'] as const;
const TV_LIST_KEY_SET: ReadonlySet<string> = new Set(TV_LIST_KEYS);

/**
 * Adds a network name from a string or from a broadcast object's name fields
 */
function collectName(value: unknown, into: Set<string>): void {
  if (typeof value === 'string') {
    const name = value.trim();
    if (name) into.add(name);
    return;
  }
  if (isJsonObject(value)) {
    for (const key of NAME_KEYS) {
      const v = value[key];
      if (typeof v === 'string' && v.trim()) into.add(v.trim());
    }
  }
}

function collectList(value: unknown, into: Set<string>): void {
  if (Array.isArray(value)) {
    for (const item of value) collectName(item, into);
  }
}

/**
 * Drops placeholder names and returns a sorted list
 */
function cleanNames(names: Set<string>): string[] {
  return [...names].filter(n => !['null', 'none'].includes(n.toLowerCase())).sort();
}

/**
 * Networks embedded directly on a schedule game entry
 */
export function extractEmbeddedNetworks(game: JsonObject): string[] {
  const names = new Set<string>();

  collectList(game.tvBroadcasts, names);
  collectList(game.broadcasts, names);
  collectList(game.tvBroadcast, names);
  collectList(game.tv, names);

  const nested = isJsonObject(game.broadcast) ? game.broadcast : game.broadcastInfo;
  if (isJsonObject(nested)) {
    collectList(nested.tvBroadcasts, names);
    collectList(nested.broadcasts, names);
    collectName(nested.network, names);
  }

  return cleanNames(names);
}

function gameIdsOf(node: JsonObject): string[] {
  const ids: string[] = [];
  for (const key of GAME_ID_KEYS) {
    const v = node[key];
    if (typeof v === 'string' && v) ids.push(v);
    if (typeof v === 'number') ids.push(String(v));
  }
  return ids;
}

/**
 * Builds a game id → networks index from a TV schedule payload
 *
 * The payload is walked recursively; any object carrying a game id
 * contributes the networks listed on it. Broadcast lists under such an
 * object are not searched for further games.
 */
export function normalizeBroadcasts(payload: unknown): BroadcastIndex {
  if (!isJsonObject(payload)) {
    throw new SchemaMismatchError('Expected a TV schedule object', '$');
  }

  const found = new Map<string, Set<string>>();

  const walk = (node: unknown): void => {
    if (Array.isArray(node)) {
      for (const item of node) walk(item);
      return;
    }
    if (!isJsonObject(node)) return;

    const ids = gameIdsOf(node);
    for (const id of ids) {
      const names = found.get(id) ?? new Set<string>();
      for (const key of TV_LIST_KEYS) {
        const value = node[key];
        if (Array.isArray(value)) collectList(value, names);
        else if (isJsonObject(value)) collectName(value, names);
      }
      for (const key of TV_DIRECT_KEYS) collectName(node[key], names);
      if (names.size > 0) found.set(id, names);
    }

    for (const [key, value] of Object.entries(node)) {
      // a game's broadcast entries carry their own ids; they are not games
      if (ids.length > 0 && TV_LIST_KEY_SET.has(key)) continue;
      walk(value);
    }
  };

  walk(payload);

  const index: Record<string, readonly string[]> = {};
  for (const [id, names] of found) {
    const cleaned = cleanNames(names);
    if (cleaned.length > 0) index[id] = cleaned;
  }
  return index;
}
