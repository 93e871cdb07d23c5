// src/parser/horodate.ts

import { HORODATE_CENTURY, HORODATE_DIGITS, HORODATE_LENGTH } from '../constants/constants.js';
import type { Horodate, HorodateSeason } from '../types/teleinfo-types.js';

const DIGITS_PATTERN = /^[0-9]{12}$/;

function isSeason(char: string): char is HorodateSeason {
  return char === 'H' || char === 'E' || char === 'h' || char === 'e' || char === ' ';
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Parses a 13-character horodate token: season marker followed by YYMMDDHHMMSS.
 * @param candidate - exactly the token; longer input is rejected
 * @returns the horodate, or null when the token is not a valid date
 */
export function parseHorodate(candidate: string): Horodate | null {
  if (candidate.length !== HORODATE_LENGTH) return null;

  const season = candidate.charAt(0);
  if (!isSeason(season)) return null;

  const digits = candidate.slice(1);
  if (digits.length !== HORODATE_DIGITS || !DIGITS_PATTERN.test(digits)) return null;

  const pair = (offset: number): number => Number.parseInt(digits.slice(offset, offset + 2), 10);
  const yy = pair(0);
  const mm = pair(2);
  const dd = pair(4);
  const hh = pair(6);
  const mi = pair(8);
  const ss = pair(10);

  if (mm < 1 || mm > 12 || dd < 1 || hh > 23 || mi > 59 || ss > 59) return null;

  const year = HORODATE_CENTURY + yy;
  const date = new Date(year, mm - 1, dd, hh, mi, ss);
  // Date rolls 31/02 over into March
  if (date.getFullYear() !== year || date.getMonth() !== mm - 1 || date.getDate() !== dd) {
    return null;
  }

  return { season, date, rawValue: candidate };
}

/**
 * Formats a season and a local date back into the 13-character wire token.
 */
export function formatHorodate(horodate: Pick<Horodate, 'season' | 'date'>): string {
  const { season, date } = horodate;
  return (
    season +
    pad2(date.getFullYear() % 100) +
    pad2(date.getMonth() + 1) +
    pad2(date.getDate()) +
    pad2(date.getHours()) +
    pad2(date.getMinutes()) +
    pad2(date.getSeconds())
  );
}
