import { firstPresentColumn } from '../utils/columns';
import { normalizeIdentifier } from '../utils/identifier';
import { parseInstant } from './date-resolver.service';
import type {
  ActivityRecord,
  ContactRecord,
  FirmographicCategory,
  FirmographicRecord,
  Row,
  Table,
} from '../types';

export const ACCOUNT_KEY_COLUMN = 'CustomerId_NAR';

export const ACTIVITY_COLUMNS = {
  accountName: 'Account Name',
  accountId: ACCOUNT_KEY_COLUMN,
  firstName: 'First Name',
  lastName: 'Last Name',
  buyingRole: 'Buying Role',
  type: 'Type',
  details: 'Details',
} as const;

export const CONTACT_KEY_ALIASES = ['party_number', 'Party_Number', 'party_id', 'Party_ID'] as const;

export const CONTACT_COLUMNS = {
  displayName: 'party_unique_name',
  jobTitle: 'job_title',
  affinityCode: 'sales_affinity_code',
  normalizedKey: 'party_number_clean',
} as const;

// Firmographic sources carry at most this many `<category>_matches` / `_summary` pairs
const MAX_FIRMOGRAPHIC_CATEGORIES = 12;

function cell(row: Row, column: string): string | null {
  return row[column] ?? null;
}

export function toActivityRecords(table: Table, dateColumn: string | null): ActivityRecord[] {
  return table.rows.map(row => ({
    accountName: cell(row, ACTIVITY_COLUMNS.accountName),
    accountId: cell(row, ACTIVITY_COLUMNS.accountId),
    firstName: cell(row, ACTIVITY_COLUMNS.firstName),
    lastName: cell(row, ACTIVITY_COLUMNS.lastName),
    buyingRole: cell(row, ACTIVITY_COLUMNS.buyingRole),
    type: cell(row, ACTIVITY_COLUMNS.type),
    details: cell(row, ACTIVITY_COLUMNS.details),
    timestamp: dateColumn ? parseInstant(row[dateColumn]) : null,
    row,
  }));
}

/**
 * Categories named by `<category>_matches` / `<category>_summary` columns, in
 * column order.
 */
export function firmographicCategories(table: Pick<Table, 'columns'>): string[] {
  const categories: string[] = [];
  for (const column of table.columns) {
    const match = /^(.+)_(matches|summary)$/.exec(column);
    if (match && !categories.includes(match[1])) {
      categories.push(match[1]);
    }
  }
  return categories.slice(0, MAX_FIRMOGRAPHIC_CATEGORIES);
}

export function toFirmographicRecords(table: Table): FirmographicRecord[] {
  const categories = firmographicCategories(table);

  return table.rows.map(row => ({
    accountId: cell(row, ACCOUNT_KEY_COLUMN),
    accountName: cell(row, 'Account Name'),
    technographics: cell(row, 'Technographics'),
    categories: categories.map((category): FirmographicCategory => ({
      category,
      matches: cell(row, `${category}_matches`),
      summary: cell(row, `${category}_summary`),
    })),
    row,
  }));
}

/**
 * Typed contacts. `normalizedKey` is taken from the column added by the
 * contacts semi-join when present, otherwise computed from the raw key.
 */
export function toContactRecords(table: Table): ContactRecord[] {
  const keyColumn = firstPresentColumn(table, CONTACT_KEY_ALIASES);

  return table.rows.map(row => {
    const partyKey = keyColumn ? cell(row, keyColumn) : null;
    const derived = cell(row, CONTACT_COLUMNS.normalizedKey);
    return {
      partyKey,
      normalizedKey: derived ?? normalizeIdentifier(partyKey),
      displayName: cell(row, CONTACT_COLUMNS.displayName),
      jobTitle: cell(row, CONTACT_COLUMNS.jobTitle),
      affinityCode: cell(row, CONTACT_COLUMNS.affinityCode),
      row,
    };
  });
}

/** A named engagement is an activity with a non-blank first name */
export function isNamedActivity(activity: Pick<ActivityRecord, 'firstName'>): boolean {
  return activity.firstName !== null && activity.firstName.trim() !== '';
}
