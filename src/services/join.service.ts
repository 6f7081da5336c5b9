import { JoinKeyMissing, NoJoinKey } from '../core/errors';
import { logger } from '../core/logger';
import { firstPresentColumn, hasColumn } from '../utils/columns';
import { normalizeIdentifier } from '../utils/identifier';
import { ACCOUNT_KEY_COLUMN, ACTIVITY_COLUMNS, CONTACT_COLUMNS, CONTACT_KEY_ALIASES } from './records.service';
import type { Cell, Row, Table } from '../types';

/** Appended to firmographic columns whose name is already used by the activity table */
export const FIRMOGRAPHIC_SUFFIX = '_DB';

/**
 * Left outer join of activity rows against firmographic rows on `key`.
 *
 * Every activity row is kept. A row with several firmographic matches is
 * repeated once per match, with no deduplication. Unmatched rows get null in
 * every firmographic column. Keys compare by raw value; empty keys never match.
 */
export function joinAccounts(activity: Table, firmographics: Table, key: string = ACCOUNT_KEY_COLUMN): Table {
  if (!hasColumn(activity, key)) throw new JoinKeyMissing(key, 'activity');
  if (!hasColumn(firmographics, key)) throw new JoinKeyMissing(key, 'firmographics');

  const taken = new Set(activity.columns);
  const renamed = new Map<string, string>();
  for (const column of firmographics.columns) {
    if (column === key) continue;
    renamed.set(column, taken.has(column) ? `${column}${FIRMOGRAPHIC_SUFFIX}` : column);
  }

  const byKey = new Map<string, Row[]>();
  for (const row of firmographics.rows) {
    const value = row[key];
    if (value === null || value === undefined) continue;
    const bucket = byKey.get(value);
    if (bucket) {
      bucket.push(row);
    } else {
      byKey.set(value, [row]);
    }
  }

  const rows: Row[] = [];
  for (const left of activity.rows) {
    const value = left[key];
    const matches = value === null || value === undefined ? undefined : byKey.get(value);

    if (!matches) {
      const joined: Record<string, Cell> = { ...left };
      renamed.forEach(target => {
        joined[target] = null;
      });
      rows.push(Object.freeze(joined));
      continue;
    }

    for (const right of matches) {
      const joined: Record<string, Cell> = { ...left };
      renamed.forEach((target, source) => {
        joined[target] = right[source] ?? null;
      });
      rows.push(Object.freeze(joined));
    }
  }

  return Object.freeze({
    columns: Object.freeze([...activity.columns, ...renamed.values()]),
    rows: Object.freeze(rows),
  });
}

/**
 * Normalized, non-null account identifiers of one account's activity rows.
 */
export function accountKeySet(activity: Table, accountName: string): Set<string> {
  if (!hasColumn(activity, ACCOUNT_KEY_COLUMN)) throw new JoinKeyMissing(ACCOUNT_KEY_COLUMN, 'activity');

  const keys = new Set<string>();
  for (const row of activity.rows) {
    if (row[ACTIVITY_COLUMNS.accountName] !== accountName) continue;
    const normalized = normalizeIdentifier(row[ACCOUNT_KEY_COLUMN]);
    if (normalized !== null) keys.add(normalized);
  }
  return keys;
}

/**
 * Semi-join: the contacts whose normalized party key is in `accountKeys`.
 * The only column added is the normalized key itself.
 */
export function joinContacts(
  contacts: Table,
  accountKeys: ReadonlySet<string>,
  aliases: readonly string[] = CONTACT_KEY_ALIASES
): Table {
  const keyColumn = firstPresentColumn(contacts, aliases);
  if (keyColumn === null) throw new NoJoinKey(aliases);

  const derived = CONTACT_COLUMNS.normalizedKey;
  const rows: Row[] = [];
  for (const row of contacts.rows) {
    const normalized = normalizeIdentifier(row[keyColumn]);
    if (normalized !== null && accountKeys.has(normalized)) {
      rows.push(Object.freeze({ ...row, [derived]: normalized }));
    }
  }

  logger.debug('Contacts semi-join', {
    keyColumn,
    accountKeys: accountKeys.size,
    contacts: contacts.rows.length,
    retained: rows.length,
  });

  const columns = contacts.columns.includes(derived) ? [...contacts.columns] : [...contacts.columns, derived];
  return Object.freeze({
    columns: Object.freeze(columns),
    rows: Object.freeze(rows),
  });
}
