/**
 * Input validation shared by the flag parser, the menu and the actions
 */

import { ValidationError } from './errors.js';

const DIGITS = /^[0-9]+$/;
const SEASON = /^[0-9]{4}$/;

const NON_ZERO = /[1-9]/;

/**
 * Validate a --limit value: digits only, greater than zero. The digit string
 * is returned as given so any length reaches the child unchanged.
 */
export function parseLimit(raw: string): string {
  if (!DIGITS.test(raw) || !NON_ZERO.test(raw)) {
    throw new ValidationError(`Invalid value for --limit: ${raw} (must be an integer > 0)`, raw);
  }
  return raw;
}

/**
 * Validate a league ID: digits only. The string form is kept as given.
 */
export function parseLeagueId(raw: string): string {
  if (!DIGITS.test(raw)) {
    throw new ValidationError(`Invalid league ID: ${raw} (digits only)`, raw);
  }
  return raw;
}

export function parseSeason(raw: string): string {
  if (!SEASON.test(raw)) {
    throw new ValidationError(`Invalid season: ${raw} (expected a four-digit year)`, raw);
  }
  return raw;
}
