/**
 * Field readers shared by the normalizers
 *
 * Provider payloads spell the same field several ways (otLosses vs
 * overtimeLosses, abbrev vs teamAbbrev) and sometimes wrap strings as
 * { default: "..." }. These helpers pick the first spelling present and
 * raise SchemaMismatchError with a JSON path when a value has the wrong shape.
 */

import { SchemaMismatchError } from '../errors/index.js';
import { isJsonObject } from '../util/validation.js';
import type { JsonObject } from '../types/api.js';

export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Returns the first key whose value is neither null nor undefined
 */
export function firstDefined(obj: JsonObject, keys: readonly string[]): { key: string; value: unknown } | undefined {
  for (const key of keys) {
    const value = obj[key];
    if (value !== undefined && value !== null) return { key, value };
  }
  return undefined;
}

function toInt(value: unknown): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return Number(value);
  return null;
}

/**
 * Reads an integer counter; absent means the fallback, a wrong type is a mismatch
 */
export function readInt(obj: JsonObject, keys: readonly string[], path: string, fallback = 0): number {
  const found = firstDefined(obj, keys);
  if (!found) return fallback;

  const n = toInt(found.value);
  if (n === null) {
    throw new SchemaMismatchError(`Expected an integer, got ${describeValue(found.value)}`, `${path}.${found.key}`);
  }
  return n;
}

/**
 * Reads an integer where a missing or odd value simply means unknown
 */
export function readOptionalInt(obj: JsonObject, keys: readonly string[]): number | null {
  const found = firstDefined(obj, keys);
  return found ? toInt(found.value) : null;
}

/**
 * Reads the first non-blank string among the keys
 */
export function readString(obj: JsonObject, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = obj[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return null;
}

/**
 * Reads a plain or localized string: "COL" or { default: "COL" }
 */
export function readLocalized(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() || null;
  if (isJsonObject(value) && typeof value.default === 'string') return value.default.trim() || null;
  return null;
}

/**
 * Reads a nested object, treating absence as an empty object
 */
export function readObject(obj: JsonObject, key: string): JsonObject {
  const value = obj[key];
  return isJsonObject(value) ? value : {};
}
