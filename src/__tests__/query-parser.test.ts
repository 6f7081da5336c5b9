import { ValidationError } from '../core/errors';
import { parseActivityFilters, parseBody, parseContactFilters, parseLimit } from '../utils/query-parser';

describe('parseActivityFilters', () => {
  test('should accept single values and lists', () => {
    expect(parseActivityFilters({ types: 'Meeting', accounts: ['Acme', 'Globex'] })).toEqual({
      types: ['Meeting'],
      accounts: ['Acme', 'Globex'],
    });
  });

  test('should parse date bounds as UTC instants', () => {
    const filters = parseActivityFilters({ start: '2024-01-05', end: '1/31/2024' });

    expect(filters.dateRange?.start?.toISOString()).toBe('2024-01-05T00:00:00.000Z');
    expect(filters.dateRange?.end?.toISOString()).toBe('2024-01-31T00:00:00.000Z');
  });

  test('should reject a start after the end', () => {
    expect(() => parseActivityFilters({ start: '2024-02-01', end: '2024-01-01' }))
      .toThrow('"start" must not be after "end"');
  });

  test('should reject non-string list items', () => {
    expect(() => parseActivityFilters({ types: ['Meeting', 3] })).toThrow(ValidationError);
  });
});

describe('parseContactFilters', () => {
  test('should accept status names and colors', () => {
    expect(parseContactFilters({ statuses: ['engaged', 'purple'], search: 'jan' })).toEqual({
      statuses: ['engaged', 'purple'],
      search: 'jan',
    });
  });

  test('should reject a non-string search', () => {
    expect(() => parseContactFilters({ search: 5 })).toThrow('"search" must be a string');
  });
});

describe('parseBody and parseLimit', () => {
  test('should treat a missing body as empty and reject arrays', () => {
    expect(parseBody(undefined)).toEqual({});
    expect(() => parseBody([1])).toThrow('Request body must be a JSON object');
  });

  test('should fall back and validate limits', () => {
    expect(parseLimit(undefined, 10)).toBe(10);
    expect(parseLimit('5', 10)).toBe(5);
    expect(() => parseLimit(0, 10)).toThrow('"limit" must be a positive integer');
    expect(() => parseLimit(2.5, 10)).toThrow(ValidationError);
  });
});
