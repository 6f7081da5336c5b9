import { config, SourceConfig } from '../core/config';
import { isViewScopedError, JoinKeyMissing, MissingColumnError } from '../core/errors';
import { logger } from '../core/logger';
import { SnapshotCache, CacheStats } from '../utils/cache-manager';
import { firstPresentColumn, hasColumn } from '../utils/columns';
import { DATE_COLUMN_CANDIDATES, resolveDateColumn } from './date-resolver.service';
import { buildEngagedPairs, classifyContacts } from './engagement.service';
import { filterActivities, filterContacts } from './filter.service';
import { accountKeySet, joinAccounts, joinContacts } from './join.service';
import { TableLoaderService, tableLoader } from './loader.service';
import {
  ACCOUNT_KEY_COLUMN,
  ACTIVITY_COLUMNS,
  CONTACT_KEY_ALIASES,
  isNamedActivity,
  toActivityRecords,
  toContactRecords,
  toFirmographicRecords,
} from './records.service';
import type {
  ActivityFilters,
  ActivityRecord,
  ContactFilters,
  ContactStatus,
  FirmographicCategory,
  Row,
  SessionContext,
  StatusColor,
  Table,
  ViewResult,
} from '../types';

export const FIRMOGRAPHIC_PANEL_COLUMNS = [
  'Account Name', 'Technographics',
  'f5_core_adc_matches', 'f5_core_adc_summary',
  'f5_security_matches', 'f5_security_summary',
  'f5_cloud_services_matches', 'f5_cloud_services_summary',
  'complementary_cloud_matches', 'complementary_cloud_summary',
  'complementary_identity_matches', 'complementary_identity_summary',
  'complementary_workspace_matches', 'complementary_workspace_summary',
] as const;

export interface DashboardSnapshot {
  activity: Table;
  firmographics: Table;
  contacts: Table;
  /** Resolved date axis of the activity table; null when no candidate column exists */
  dateColumn: string | null;
  activities: ActivityRecord[];
  /** Missing column requirements, reported once per load */
  issues: string[];
  loadedAt: Date;
}

export interface FilterOptions {
  types: string[];
  accounts: string[];
  dateBounds: { start: Date; end: Date } | null;
}

export interface ActivityQueryResult {
  total: number;
  rows: ActivityRecord[];
}

export interface AccountEngagementCount {
  account: string;
  activityCount: number;
}

export interface TimelineEntry {
  timestamp: Date | null;
  label: string;
  firstName: string | null;
  lastName: string | null;
  buyingRole: string | null;
  type: string | null;
  details: string | null;
}

export interface FirmographicsPanel {
  columns: string[];
  rows: Row[];
  /** Categories with a non-empty `_matches` cell, across the account's rows */
  highlights: FirmographicCategory[];
}

export interface ContactCard {
  name: string;
  title: string | null;
  affinityCode: string | null;
  isEngaged: boolean;
  status: ContactStatus;
  color: StatusColor;
  partyKey: string | null;
  normalizedKey: string | null;
}

export interface ContactCardsResult {
  account: string;
  /** Contacts of the account before status/search filters */
  total: number;
  counts: Record<ContactStatus, number>;
  contacts: ContactCard[];
}

export interface DashboardView {
  account: string | null;
  options: FilterOptions;
  activity: ViewResult<ActivityQueryResult>;
  topAccounts: ViewResult<AccountEngagementCount[]>;
  timeline: ViewResult<TimelineEntry[]> | null;
  firmographics: ViewResult<FirmographicsPanel> | null;
  contacts: ViewResult<ContactCardsResult> | null;
}

/**
 * Run a view and turn column/join-key failures into an "unavailable" result,
 * so one broken panel does not take down the others.
 */
export function toView<T>(view: string, build: () => T): ViewResult<T> {
  try {
    return { available: true, data: build() };
  } catch (error) {
    if (isViewScopedError(error)) {
      logger.warn('View unavailable', { view, code: error.code, reason: error.message });
      return { available: false, code: error.code, reason: error.message };
    }
    throw error;
  }
}

function sortedDistinct(values: Iterable<string | null>): string[] {
  const distinct = new Set<string>();
  for (const value of values) {
    if (value !== null) distinct.add(value);
  }
  return [...distinct].sort();
}

function timelineLabel(activity: ActivityRecord): string {
  const name = [activity.firstName, activity.lastName]
    .map(part => (part ?? '').trim())
    .filter(Boolean)
    .join(' ');
  const role = activity.buyingRole?.trim();
  return role ? `${name} - ${role}` : name;
}

function checkColumns(activity: Table, firmographics: Table, contacts: Table): string[] {
  const issues: string[] = [];

  if (resolveDateColumn(activity) === null) {
    issues.push(`No date column found (expected one of: ${DATE_COLUMN_CANDIDATES.join(', ')})`);
  }
  if (!hasColumn(activity, ACTIVITY_COLUMNS.accountName)) {
    issues.push(`No "${ACTIVITY_COLUMNS.accountName}" column in the activity source`);
  }
  if (!hasColumn(activity, ACCOUNT_KEY_COLUMN) || !hasColumn(firmographics, ACCOUNT_KEY_COLUMN)) {
    issues.push(`"${ACCOUNT_KEY_COLUMN}" must be present in both the activity and firmographic sources`);
  }
  if (firstPresentColumn(contacts, CONTACT_KEY_ALIASES) === null) {
    issues.push(`No contact join key found (expected one of: ${CONTACT_KEY_ALIASES.join(', ')})`);
  }

  issues.forEach(issue => logger.warn('Source column requirement not met', { issue }));
  return issues;
}

export class DashboardService {
  private tables = new SnapshotCache<Table>();
  private snapshots = new SnapshotCache<DashboardSnapshot>();

  constructor(
    private sources: SourceConfig = config.sources,
    private loader: TableLoaderService = tableLoader
  ) {}

  private loadSource(source: string): Promise<Table> {
    return this.tables.getOrLoad(source, () => this.loader.loadTable(source, this.sources.encodings));
  }

  /**
   * Load (or reuse) the three source tables and derive the typed activity
   * records. A load failure rejects the whole snapshot.
   */
  async getSnapshot(): Promise<DashboardSnapshot> {
    const { activity, firmographics, contacts } = this.sources;
    const key = [activity, firmographics, contacts].join('|');

    return this.snapshots.getOrLoad(key, async () => {
      const [activityTable, firmographicTable, contactTable] = await Promise.all([
        this.loadSource(activity),
        this.loadSource(firmographics),
        this.loadSource(contacts),
      ]);

      const dateColumn = resolveDateColumn(activityTable);
      const snapshot: DashboardSnapshot = {
        activity: activityTable,
        firmographics: firmographicTable,
        contacts: contactTable,
        dateColumn,
        activities: toActivityRecords(activityTable, dateColumn),
        issues: checkColumns(activityTable, firmographicTable, contactTable),
        loadedAt: new Date(),
      };

      logger.info('Dashboard snapshot ready', {
        activityRows: activityTable.rows.length,
        firmographicRows: firmographicTable.rows.length,
        contactRows: contactTable.rows.length,
        dateColumn,
        issues: snapshot.issues.length,
      });

      return snapshot;
    });
  }

  /** Drop every cached table and load the sources again */
  async reload(): Promise<DashboardSnapshot> {
    this.tables.clear();
    this.snapshots.clear();
    return this.getSnapshot();
  }

  cacheStats(): { tables: CacheStats; snapshots: CacheStats } {
    return { tables: this.tables.getStats(), snapshots: this.snapshots.getStats() };
  }

  private requireDateAxis(snapshot: DashboardSnapshot, view: string): void {
    if (snapshot.dateColumn === null) {
      throw new MissingColumnError([...DATE_COLUMN_CANDIDATES], `${view} needs a date column`);
    }
  }

  private scoped(snapshot: DashboardSnapshot, filters: ActivityFilters, view: string): ActivityRecord[] {
    if (filters.dateRange) this.requireDateAxis(snapshot, view);
    return filterActivities(snapshot.activities, filters);
  }

  filterOptions(snapshot: DashboardSnapshot): FilterOptions {
    let start: Date | null = null;
    let end: Date | null = null;
    for (const { timestamp } of snapshot.activities) {
      if (timestamp === null) continue;
      if (start === null || timestamp < start) start = timestamp;
      if (end === null || timestamp > end) end = timestamp;
    }

    return {
      types: sortedDistinct(snapshot.activities.map(activity => activity.type)),
      accounts: sortedDistinct(snapshot.activities.map(activity => activity.accountName)),
      dateBounds: start !== null && end !== null ? { start, end } : null,
    };
  }

  /**
   * Filtered activity rows with firmographic columns attached by the
   * account join.
   */
  queryActivity(
    snapshot: DashboardSnapshot,
    filters: ActivityFilters,
    limit: number = config.query.resultLimit
  ): ViewResult<ActivityQueryResult> {
    return toView('activity', () => {
      if (filters.dateRange) this.requireDateAxis(snapshot, 'Activity query');
      const joined = joinAccounts(snapshot.activity, snapshot.firmographics);
      const rows = filterActivities(toActivityRecords(joined, snapshot.dateColumn), filters);
      return { total: rows.length, rows: rows.slice(0, limit) };
    });
  }

  topAccounts(
    snapshot: DashboardSnapshot,
    filters: ActivityFilters,
    limit: number = config.query.topAccounts
  ): ViewResult<AccountEngagementCount[]> {
    return toView('topAccounts', () => {
      const counts = new Map<string, number>();
      for (const activity of this.scoped(snapshot, filters, 'Top accounts')) {
        if (!isNamedActivity(activity) || activity.accountName === null) continue;
        counts.set(activity.accountName, (counts.get(activity.accountName) ?? 0) + 1);
      }

      return [...counts.entries()]
        .map(([account, activityCount]) => ({ account, activityCount }))
        .sort((a, b) => b.activityCount - a.activityCount || (a.account < b.account ? -1 : a.account > b.account ? 1 : 0))
        .slice(0, limit);
    });
  }

  accountTimeline(
    snapshot: DashboardSnapshot,
    account: string,
    filters: ActivityFilters = {}
  ): ViewResult<TimelineEntry[]> {
    return toView('timeline', () => {
      this.requireDateAxis(snapshot, 'Engagement timeline');

      return this.scoped(snapshot, { ...filters, accounts: [account] }, 'Engagement timeline')
        .filter(isNamedActivity)
        .map(activity => ({
          timestamp: activity.timestamp,
          label: timelineLabel(activity),
          firstName: activity.firstName,
          lastName: activity.lastName,
          buyingRole: activity.buyingRole,
          type: activity.type,
          details: activity.details,
        }));
    });
  }

  firmographicsPanel(snapshot: DashboardSnapshot, account: string): ViewResult<FirmographicsPanel> {
    return toView('firmographics', () => {
      if (!hasColumn(snapshot.activity, ACCOUNT_KEY_COLUMN)) throw new JoinKeyMissing(ACCOUNT_KEY_COLUMN, 'activity');
      if (!hasColumn(snapshot.firmographics, ACCOUNT_KEY_COLUMN)) {
        throw new JoinKeyMissing(ACCOUNT_KEY_COLUMN, 'firmographics');
      }

      const accountIds = new Set<string>();
      for (const activity of snapshot.activities) {
        if (activity.accountName === account && activity.accountId !== null) accountIds.add(activity.accountId);
      }

      const columns = FIRMOGRAPHIC_PANEL_COLUMNS.filter(column => hasColumn(snapshot.firmographics, column));
      const records = toFirmographicRecords(snapshot.firmographics)
        .filter(record => record.accountId !== null && accountIds.has(record.accountId));

      const rows = records.map(({ row }) => {
        const projected: Record<string, string | null> = {};
        for (const column of columns) projected[column] = row[column] ?? null;
        return projected;
      });
      const highlights = records.flatMap(record => record.categories.filter(category => category.matches !== null));

      return { columns, rows, highlights };
    });
  }

  /**
   * Contacts of one account, classified against the named engagements in
   * the current activity scope, then narrowed by status and name search.
   */
  contactCards(
    snapshot: DashboardSnapshot,
    account: string,
    contactFilters: ContactFilters = {},
    activityFilters: ActivityFilters = {}
  ): ViewResult<ContactCardsResult> {
    return toView('contacts', () => {
      const keys = accountKeySet(snapshot.activity, account);
      const contacts = toContactRecords(joinContacts(snapshot.contacts, keys));

      const inScope = this.scoped(snapshot, { ...activityFilters, accounts: [account] }, 'Contact engagement');
      const classified = classifyContacts(contacts, buildEngagedPairs(inScope));

      const counts: Record<ContactStatus, number> = { affinity: 0, engaged: 0, unengaged: 0 };
      classified.forEach(contact => {
        counts[contact.status]++;
      });

      return {
        account,
        total: classified.length,
        counts,
        contacts: filterContacts(classified, contactFilters).map(contact => ({
          name: contact.displayName ?? 'Unknown',
          title: contact.jobTitle,
          affinityCode: contact.affinityCode,
          isEngaged: contact.isEngaged,
          status: contact.status,
          color: contact.color,
          partyKey: contact.partyKey,
          normalizedKey: contact.normalizedKey,
        })),
      };
    });
  }

  /**
   * Every panel for one session context: one full recompute pass.
   */
  render(snapshot: DashboardSnapshot, context: Pick<SessionContext, 'account' | 'activity' | 'contacts'>): DashboardView {
    const { account } = context;

    return {
      account,
      options: this.filterOptions(snapshot),
      activity: this.queryActivity(snapshot, context.activity),
      topAccounts: this.topAccounts(snapshot, context.activity),
      timeline: account ? this.accountTimeline(snapshot, account, context.activity) : null,
      firmographics: account ? this.firmographicsPanel(snapshot, account) : null,
      contacts: account ? this.contactCards(snapshot, account, context.contacts, context.activity) : null,
    };
  }
}

export const dashboardService = new DashboardService();
