import type {
  ActivityFilters,
  ActivityRecord,
  ClassifiedContact,
  ContactFilters,
  ContactStatus,
  StatusColor,
} from '../types';
import { CONTACT_STATUSES, STATUS_COLORS, isContactStatus } from './engagement.service';

export type RowPredicate<T> = (row: T) => boolean;

/**
 * Conjunction of independent predicates. Evaluation order does not change
 * the result.
 */
export function applyFilters<T>(rows: readonly T[], predicates: ReadonlyArray<RowPredicate<T>>): T[] {
  if (predicates.length === 0) return [...rows];
  return rows.filter(row => predicates.every(predicate => predicate(row)));
}

export function activityPredicates(filters: ActivityFilters): RowPredicate<ActivityRecord>[] {
  const predicates: RowPredicate<ActivityRecord>[] = [];

  if (filters.types && filters.types.length > 0) {
    const types = new Set(filters.types);
    predicates.push(activity => activity.type !== null && types.has(activity.type));
  }

  if (filters.accounts && filters.accounts.length > 0) {
    const accounts = new Set(filters.accounts);
    predicates.push(activity => activity.accountName !== null && accounts.has(activity.accountName));
  }

  const start = filters.dateRange?.start?.getTime();
  const end = filters.dateRange?.end?.getTime();
  if (start !== undefined || end !== undefined) {
    predicates.push(activity => {
      if (activity.timestamp === null) return false;
      const at = activity.timestamp.getTime();
      return (start === undefined || at >= start) && (end === undefined || at <= end);
    });
  }

  return predicates;
}

function toStatus(value: ContactStatus | StatusColor): ContactStatus | undefined {
  if (isContactStatus(value)) return value;
  return CONTACT_STATUSES.find(status => STATUS_COLORS[status] === value);
}

export function contactPredicates(filters: ContactFilters): RowPredicate<ClassifiedContact>[] {
  const predicates: RowPredicate<ClassifiedContact>[] = [];

  // An empty status list selects no contacts
  if (filters.statuses !== undefined) {
    const statuses = new Set(filters.statuses.map(toStatus));
    predicates.push(contact => statuses.has(contact.status));
  }

  const search = filters.search?.trim().toLowerCase() ?? '';
  if (search) {
    predicates.push(contact => (contact.displayName ?? '').toLowerCase().includes(search));
  }

  return predicates;
}

export function filterActivities(activities: readonly ActivityRecord[], filters: ActivityFilters): ActivityRecord[] {
  return applyFilters(activities, activityPredicates(filters));
}

export function filterContacts(contacts: readonly ClassifiedContact[], filters: ContactFilters): ClassifiedContact[] {
  return applyFilters(contacts, contactPredicates(filters));
}
