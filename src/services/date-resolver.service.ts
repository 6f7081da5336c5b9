import { MissingColumnError } from '../core/errors';
import { firstPresentColumn } from '../utils/columns';
import type { Table } from '../types';

export const DATE_COLUMN_CANDIDATES = ['Activity Date', 'Activity_DateOnly', 'Date'] as const;

// Year-first dates with `-` or `/`, an optional time and an optional Z, ±HH, ±HHMM or ±HH:MM offset
const YEAR_FIRST = /^(\d{4})([-/])(\d{1,2})\2(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([AaPp][Mm])?)?$/;

function utcInstant(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  millis = 0
): Date | null {
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) return null;

  const instant = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  // Date.UTC rolls 2024-02-30 over into March
  if (instant.getUTCMonth() !== month - 1 || instant.getUTCDate() !== day) return null;
  return instant;
}

/** Offset east of UTC in minutes, or null when out of range */
function offsetMinutes(offset: string | undefined): number | null {
  if (!offset || offset.toUpperCase() === 'Z') return 0;
  const hours = Number(offset.slice(1, 3));
  const minutes = Number(offset.slice(3).replace(':', '') || 0);
  if (hours > 23 || minutes > 59) return null;
  const sign = offset.startsWith('-') ? -1 : 1;
  return sign * (hours * 60 + minutes);
}

function to24Hour(hour: number, meridiem: string | undefined): number {
  if (!meridiem) return hour;
  const pm = meridiem.toLowerCase() === 'pm';
  if (hour === 12) return pm ? 12 : 0;
  return pm ? hour + 12 : hour;
}

/**
 * Parse an activity date cell into a UTC-anchored instant.
 *
 * Date-only and naive date-time values are read as UTC; values carrying an
 * offset keep it. Impossible calendar dates and times (Feb 30, 24:00) and
 * anything else unrecognised yield null.
 */
export function parseInstant(value: string | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  const text = value.trim();
  if (!text) return null;

  let match = YEAR_FIRST.exec(text);
  if (match) {
    const offset = offsetMinutes(match[9]);
    if (offset === null) return null;

    const millis = match[8] ? Number(match[8].slice(0, 3).padEnd(3, '0')) : 0;
    const wallClock = utcInstant(
      Number(match[1]),
      Number(match[3]),
      Number(match[4]),
      Number(match[5] ?? 0),
      Number(match[6] ?? 0),
      Number(match[7] ?? 0),
      millis
    );
    return wallClock === null ? null : new Date(wallClock.getTime() - offset * 60000);
  }

  match = US_DATE.exec(text);
  if (match) {
    const hour = match[4] ? to24Hour(Number(match[4]), match[7]) : 0;
    return utcInstant(
      Number(match[3]),
      Number(match[1]),
      Number(match[2]),
      hour,
      Number(match[5] ?? 0),
      Number(match[6] ?? 0)
    );
  }

  return null;
}

/**
 * First candidate date column present in the table, or null.
 */
export function resolveDateColumn(
  table: Pick<Table, 'columns'>,
  candidates: readonly string[] = DATE_COLUMN_CANDIDATES
): string | null {
  return firstPresentColumn(table, candidates);
}

export function requireDateColumn(
  table: Pick<Table, 'columns'>,
  candidates: readonly string[] = DATE_COLUMN_CANDIDATES
): string {
  const column = resolveDateColumn(table, candidates);
  if (column === null) {
    throw new MissingColumnError([...candidates], 'No date column found');
  }
  return column;
}
