import { ValidationError } from '../core/errors';
import { isContactStatus, STATUS_COLORS } from '../services/engagement.service';
import { parseInstant } from '../services/date-resolver.service';
import type { ActivityFilters, ContactFilters, ContactStatus, DateRange, StatusColor } from '../types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isStatusColor(value: string): value is StatusColor {
  return Object.values(STATUS_COLORS).some(color => color === value);
}

function stringList(value: unknown, field: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value ? [value] : [];
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  throw new ValidationError(`"${field}" must be a string or a list of strings`, { field });
}

function dateBound(value: unknown, field: string): Date | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`"${field}" must be a date string`, { field });
  }
  const instant = parseInstant(value);
  if (instant === null) {
    throw new ValidationError(`"${field}" is not a valid date: ${value}`, { field });
  }
  return instant;
}

export function parseBody(body: unknown): Record<string, unknown> {
  if (body === undefined || body === null) return {};
  if (!isRecord(body)) throw new ValidationError('Request body must be a JSON object');
  return body;
}

/**
 * Activity filters from a request body: `types`, `accounts`, `start`, `end`.
 */
export function parseActivityFilters(input: unknown): ActivityFilters {
  const body = parseBody(input);
  const filters: ActivityFilters = {};

  const types = stringList(body.types, 'types');
  if (types) filters.types = types;

  const accounts = stringList(body.accounts, 'accounts');
  if (accounts) filters.accounts = accounts;

  const start = dateBound(body.start, 'start');
  const end = dateBound(body.end, 'end');
  if (start && end && start > end) {
    throw new ValidationError('"start" must not be after "end"', { start: body.start, end: body.end });
  }
  if (start || end) {
    const range: DateRange = {};
    if (start) range.start = start;
    if (end) range.end = end;
    filters.dateRange = range;
  }

  return filters;
}

/**
 * Contact filters: `statuses` (status names or card colors) and `search`.
 */
export function parseContactFilters(input: unknown): ContactFilters {
  const body = parseBody(input);
  const filters: ContactFilters = {};

  const statuses = stringList(body.statuses, 'statuses');
  if (statuses) {
    const parsed: Array<ContactStatus | StatusColor> = [];
    for (const status of statuses) {
      if (isContactStatus(status) || isStatusColor(status)) {
        parsed.push(status);
      } else {
        throw new ValidationError(`Unknown contact status: ${status}`, { field: 'statuses' });
      }
    }
    filters.statuses = parsed;
  }

  if (body.search !== undefined && body.search !== null) {
    if (typeof body.search !== 'string') {
      throw new ValidationError('"search" must be a string', { field: 'search' });
    }
    filters.search = body.search;
  }

  return filters;
}

export function parseLimit(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') return fallback;
  const limit = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError('"limit" must be a positive integer', { field: 'limit' });
  }
  return limit;
}
