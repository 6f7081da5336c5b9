import type { Table } from '../types';

/**
 * First name in `candidates` that is a column of `table`, in the caller's
 * priority order. No pattern matching on near-miss names.
 */
export function firstPresentColumn(table: Pick<Table, 'columns'>, candidates: readonly string[]): string | null {
  const present = new Set(table.columns);
  return candidates.find(candidate => present.has(candidate)) ?? null;
}

export function hasColumn(table: Pick<Table, 'columns'>, column: string): boolean {
  return table.columns.includes(column);
}

