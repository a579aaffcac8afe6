/**
 * Validation Utilities
 *
 * Functions for validating external inputs to prevent invalid data
 * from propagating through the system.
 */

import { TEAM_CODE_PATTERN } from '../core/constants.js';
import type { JsonObject } from '../types/api.js';

export { ValidationError } from '../errors/index.js';

/**
 * Validates a date string in ISO format (YYYY-MM-DD)
 *
 * @param dateISO - Date string to validate
 * @returns True if valid, false otherwise
 */
export function isValidDateISO(dateISO: string): boolean {
  const regex = /^\d{4}-\d{2}-\d{2}$/;
  if (!regex.test(dateISO)) {
    return false;
  }

  const [year, month, day] = dateISO.split('-').map(Number);

  // JavaScript Date is lenient: '2025-02-30' becomes March 2nd, so compare components
  const date = new Date(year, month - 1, day);
  return (
    !isNaN(date.getTime()) &&
    date.getFullYear() === year &&
    date.getMonth() === month - 1 &&
    date.getDate() === day
  );
}

/**
 * Validates a three-letter team code (already upper-cased)
 */
export function isValidTeamCode(code: string): boolean {
  return TEAM_CODE_PATTERN.test(code);
}

/**
 * Validates a URL string
 *
 * @param url - URL to validate
 * @returns True if valid URL, false otherwise
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Type guard for plain JSON objects (not arrays, not null)
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
