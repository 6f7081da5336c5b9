import { isNamedActivity } from './records.service';
import type {
  ActivityRecord,
  ClassifiedContact,
  ContactRecord,
  ContactStatus,
  EngagedPairs,
  StatusColor,
} from '../types';

export const CONTACT_STATUSES: readonly ContactStatus[] = ['affinity', 'engaged', 'unengaged'];

export const STATUS_COLORS: Readonly<Record<ContactStatus, StatusColor>> = {
  affinity: 'purple',
  engaged: 'yellow',
  unengaged: 'red',
};

export function isContactStatus(value: string): value is ContactStatus {
  return CONTACT_STATUSES.some(status => status === value);
}

function pairKey(first: string, last: string): string {
  return `${first}\u0000${last}`;
}

/**
 * (first, last) name pairs of every named activity in scope, trimmed and
 * lower-cased.
 */
export function buildEngagedPairs(activities: readonly ActivityRecord[]): EngagedPairs {
  const pairs = new Set<string>();
  for (const activity of activities) {
    if (!isNamedActivity(activity)) continue;
    const first = (activity.firstName ?? '').trim().toLowerCase();
    const last = (activity.lastName ?? '').trim().toLowerCase();
    pairs.add(pairKey(first, last));
  }
  return pairs;
}

/**
 * Only the first and last whitespace-separated tokens of the display name are
 * compared; middle names and suffixes are ignored.
 */
export function isEngagedName(displayName: string | null, pairs: EngagedPairs): boolean {
  if (displayName === null) return false;
  const parts = displayName.trim().split(/\s+/).filter(Boolean);
  if (parts.length < 2) return false;
  return pairs.has(pairKey(parts[0].toLowerCase(), parts[parts.length - 1].toLowerCase()));
}

/**
 * Affinity tagging outranks observed engagement.
 */
export function statusFor(affinityCode: string | null, isEngaged: boolean): ContactStatus {
  if (affinityCode !== null && affinityCode.trim() !== '') return 'affinity';
  if (isEngaged) return 'engaged';
  return 'unengaged';
}

export function classifyContact(
  contact: Pick<ContactRecord, 'displayName' | 'affinityCode'>,
  pairs: EngagedPairs
): { isEngaged: boolean; status: ContactStatus } {
  const isEngaged = isEngagedName(contact.displayName, pairs);
  return { isEngaged, status: statusFor(contact.affinityCode, isEngaged) };
}

export function classifyContacts(contacts: readonly ContactRecord[], pairs: EngagedPairs): ClassifiedContact[] {
  return contacts.map(contact => {
    const { isEngaged, status } = classifyContact(contact, pairs);
    return { ...contact, isEngaged, status, color: STATUS_COLORS[status] };
  });
}
