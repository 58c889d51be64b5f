/**
 * Observation Table
 *
 * Turns raw per-entity, per-date records (CSV rows or JSON objects) into the
 * immutable table the aggregation engine reads. Only the identifier and date
 * columns are fixed; every other column whose cells are all numeric becomes a
 * feature.
 */

import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { InvalidTableError } from '../src/errors.js';
import type {
  ObservationRow,
  ObservationTable,
  RawCell,
  RawRecord,
  TableLayout,
} from '../src/types/index.js';

const NON_FINITE_LITERALS: Record<string, number> = {
  'nan': NaN,
  'inf': Infinity,
  '+inf': Infinity,
  '-inf': -Infinity,
  'infinity': Infinity,
  '+infinity': Infinity,
  '-infinity': -Infinity,
};

type ParsedCell = { kind: 'number'; value: number } | { kind: 'empty' } | { kind: 'text' };

/**
 * Build a table from raw records.
 * Throws InvalidTableError when the identifier or date column is absent.
 */
export function createObservationTable(
  records: readonly RawRecord[],
  layout: TableLayout,
): ObservationTable {
  const header = collectColumns(records);
  const missing = [layout.idColumn, layout.dateColumn].filter(c => !header.includes(c));
  if (records.length > 0 && missing.length > 0) {
    throw new InvalidTableError(missing);
  }

  // Pass 1: classify columns
  const candidates = header.filter(c => c !== layout.idColumn && c !== layout.dateColumn);
  const textColumns = new Set<string>();
  for (const record of records) {
    for (const col of candidates) {
      if (parseCell(record[col]).kind === 'text') textColumns.add(col);
    }
  }
  const columns = candidates.filter(c => !textColumns.has(c));

  // Pass 2: build rows
  const rows: ObservationRow[] = [];
  for (const record of records) {
    const id = record[layout.idColumn];
    if (id === undefined || id === null || String(id).trim() === '') continue;

    const values: Record<string, number> = {};
    for (const col of columns) {
      const cell = parseCell(record[col]);
      if (cell.kind === 'number') values[col] = cell.value;
    }

    rows.push(Object.freeze({
      entityId: String(id).trim(),
      date: parseDate(record[layout.dateColumn]),
      values: Object.freeze(values),
    }));
  }

  return Object.freeze({
    layout,
    columns: Object.freeze(columns),
    rows: Object.freeze(rows),
  });
}

/**
 * Load a CSV file into a table
 */
export async function loadObservationCsv(
  filepath: string,
  layout: TableLayout,
): Promise<ObservationTable> {
  const content = await readFile(filepath, 'utf-8');
  const table = parseObservationCsv(content, layout);
  console.log(`[observations] Loaded ${table.rows.length} rows, ${table.columns.length} feature columns from ${filepath}`);
  return table;
}

export function parseObservationCsv(csvContent: string, layout: TableLayout): ObservationTable {
  const records: Record<string, string>[] = parse(csvContent, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  return createObservationTable(records, layout);
}

/**
 * Rows of one entity, in table order
 */
export function rowsForEntity(table: ObservationTable, entityId: string): ObservationRow[] {
  return table.rows.filter(r => r.entityId === entityId);
}

/**
 * Distinct entity ids, sorted
 */
export function entityIds(table: ObservationTable): string[] {
  return [...new Set(table.rows.map(r => r.entityId))].sort(compareIds);
}

export function groupByEntity(rows: readonly ObservationRow[]): Map<string, ObservationRow[]> {
  const groups = new Map<string, ObservationRow[]>();
  for (const row of rows) {
    let arr = groups.get(row.entityId);
    if (!arr) {
      arr = [];
      groups.set(row.entityId, arr);
    }
    arr.push(row);
  }
  return groups;
}

/** Stable identifier order: numeric ids numerically, everything else lexically */
export function compareIds(a: string, b: string): number {
  const na = Number(a);
  const nb = Number(b);
  if (a !== '' && b !== '' && !isNaN(na) && !isNaN(nb) && na !== nb) return na - nb;
  return a < b ? -1 : a > b ? 1 : 0;
}

// ─── Helpers ───

function collectColumns(records: readonly RawRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) seen.add(key);
  }
  return [...seen];
}

export function parseCell(raw: RawCell): ParsedCell {
  if (raw === undefined || raw === null) return { kind: 'empty' };
  if (typeof raw === 'number') return { kind: 'number', value: raw };

  const s = raw.trim();
  if (s === '') return { kind: 'empty' };

  const literal = NON_FINITE_LITERALS[s.toLowerCase()];
  if (literal !== undefined) return { kind: 'number', value: literal };

  const n = Number(s);
  return isNaN(n) ? { kind: 'text' } : { kind: 'number', value: n };
}

/**
 * Accepts YYYY-MM-DD, YYYYMMDD, full ISO strings and Date objects.
 * Calendar dates are pinned to UTC midnight. Anything else gives an invalid Date.
 */
export function parseDate(raw: RawCell | Date): Date {
  if (raw instanceof Date) return new Date(raw.getTime());
  if (raw === undefined || raw === null) return new Date(NaN);

  const s = String(raw).trim();

  const compact = /^(\d{4})(\d{2})(\d{2})$/.exec(s);
  if (compact) return utcDate(Number(compact[1]), Number(compact[2]), Number(compact[3]));

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(s);
  if (iso) return utcDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  if (s === '') return new Date(NaN);
  return new Date(s);
}

function utcDate(year: number, month: number, day: number): Date {
  const d = new Date(Date.UTC(year, month - 1, day));
  // Reject overflow such as 2024-02-31
  if (d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return new Date(NaN);
  return d;
}

/** YYYY-MM-DD of a UTC calendar date */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
