/**
 * Schema-light table as it comes out of the loader. Cells stay strings;
 * an empty cell is null.
 */
export type Cell = string | null;

export type Row = Readonly<Record<string, Cell>>;

export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

export interface ActivityRecord {
  accountName: string | null;
  accountId: string | null;
  firstName: string | null;
  lastName: string | null;
  buyingRole: string | null;
  type: string | null;
  details: string | null;
  timestamp: Date | null;
  /** Source row, including any firmographic columns attached by the account join */
  row: Row;
}

export interface FirmographicCategory {
  category: string;
  matches: string | null;
  summary: string | null;
}

export interface FirmographicRecord {
  accountId: string | null;
  accountName: string | null;
  technographics: string | null;
  categories: FirmographicCategory[];
  row: Row;
}

export interface ContactRecord {
  partyKey: string | null;
  normalizedKey: string | null;
  displayName: string | null;
  jobTitle: string | null;
  affinityCode: string | null;
  row: Row;
}

export type ContactStatus = 'affinity' | 'engaged' | 'unengaged';

export type StatusColor = 'purple' | 'yellow' | 'red';

export interface ClassifiedContact extends ContactRecord {
  isEngaged: boolean;
  status: ContactStatus;
  color: StatusColor;
}

/** (first, last) lower-cased, joined as `first\u0000last` so the set compares by value */
export type EngagedPairs = ReadonlySet<string>;

export interface DateRange {
  start?: Date;
  end?: Date;
}

export interface ActivityFilters {
  types?: string[];
  accounts?: string[];
  dateRange?: DateRange;
}

export interface ContactFilters {
  statuses?: Array<ContactStatus | StatusColor>;
  search?: string;
}

export interface SessionContext {
  sessionId: string;
  account: string | null;
  activity: ActivityFilters;
  contacts: ContactFilters;
  updatedAt: Date;
}

export type ViewResult<T> =
  | { available: true; data: T }
  | { available: false; code: string; reason: string };
