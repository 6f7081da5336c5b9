import { readFile } from 'fs/promises';
import axios from 'axios';
import Papa from 'papaparse';
import { config } from '../core/config';
import { LoadError } from '../core/errors';
import { logger } from '../core/logger';
import { secureLog } from '../utils/security';
import type { Cell, Row, Table } from '../types';

export type RemoteFetcher = (url: string) => Promise<Buffer>;

export interface DecodedText {
  text: string;
  encoding: string;
}

const REMOTE_SOURCE = /^https?:\/\//i;

// Parser faults that mean the file cannot be trusted. Short rows are padded
// with nulls instead.
const FATAL_PARSE_CODES = new Set(['MissingQuotes', 'InvalidQuotes', 'TooManyFields']);

async function fetchWithAxios(url: string): Promise<Buffer> {
  const response = await axios.get<ArrayBuffer>(url, {
    responseType: 'arraybuffer',
    timeout: config.sources.fetchTimeout,
  });
  return Buffer.from(response.data);
}

function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP ${error.response.status}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Decode `bytes` with the first encoding that accepts them. Decoders run in
 * fatal mode, so a malformed UTF-8 sequence moves on to the next encoding
 * instead of producing replacement characters.
 */
export function decodeBytes(bytes: Uint8Array, encodings: readonly string[]): DecodedText | null {
  for (const encoding of encodings) {
    try {
      const decoder = new TextDecoder(encoding, { fatal: true });
      return { text: decoder.decode(bytes), encoding };
    } catch (error) {
      // RangeError: unknown label, TypeError: bytes invalid for this encoding
      logger.debug('Encoding rejected', { encoding, reason: describeError(error) });
    }
  }
  return null;
}

/**
 * Parse delimited text into a frozen table. Column names are trimmed and
 * every cell stays a string; empty cells become null.
 */
export function parseTable(text: string, source: string): Table {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header: string) => header.trim(),
  });

  const columns = (parsed.meta.fields ?? []).filter(column => column !== '');
  if (columns.length === 0) {
    throw new LoadError(source, 'no header row');
  }

  const fatal = parsed.errors.find(error => FATAL_PARSE_CODES.has(error.code));
  if (fatal) {
    const where = fatal.row !== undefined ? ` (row ${fatal.row + 1})` : '';
    throw new LoadError(source, `${fatal.message}${where}`);
  }

  const rows = parsed.data.map((record): Row => {
    const row: Record<string, Cell> = {};
    for (const column of columns) {
      const value = record[column];
      row[column] = value === undefined || value === '' ? null : value;
    }
    return Object.freeze(row);
  });

  return Object.freeze({
    columns: Object.freeze([...columns]),
    rows: Object.freeze(rows),
  });
}

export class TableLoaderService {
  constructor(private fetchRemote: RemoteFetcher = fetchWithAxios) {}

  async loadTable(source: string, encodings: readonly string[] = config.sources.encodings): Promise<Table> {
    if (!source) {
      throw new LoadError('(unset)', 'no source location configured');
    }

    const bytes = await this.readSource(source);

    const decoded = decodeBytes(bytes, encodings);
    if (!decoded) {
      throw new LoadError(source, `could not decode with any of: ${encodings.join(', ')}`);
    }

    // Drop BOM
    const text = decoded.text.charCodeAt(0) === 0xfeff ? decoded.text.slice(1) : decoded.text;
    const table = parseTable(text, source);

    secureLog('Source loaded', {
      source,
      encoding: decoded.encoding,
      rows: table.rows.length,
      columns: table.columns.length,
    });

    return table;
  }

  private async readSource(source: string): Promise<Buffer> {
    try {
      return REMOTE_SOURCE.test(source) ? await this.fetchRemote(source) : await readFile(source);
    } catch (error) {
      const cause = describeError(error);
      secureLog('Source unreachable', { source, cause }, 'error');
      throw new LoadError(source, cause);
    }
  }
}

export const tableLoader = new TableLoaderService();
