/**
 * @sift/search — Result shaping
 *
 * Hits become rows of `_source` data; rows become flat records with
 * dot-notation keys for tabular consumers.
 */

import type { SearchHit } from './types.js';

export type Row = Record<string, unknown>;

export interface HitOptions {
  includeScore?: boolean;
  includeId?: boolean;
}

export function hitToRow(hit: SearchHit, options: HitOptions = {}): Row {
  const row: Row = { ...hit._source };
  if (options.includeScore) row._score = hit._score;
  if (options.includeId) row._id = hit._id;
  return row;
}

export function hitsToRows(hits: Iterable<SearchHit>, options: HitOptions = {}): Row[] {
  return Array.from(hits, (hit) => hitToRow(hit, options));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Flatten nested objects to dot-notation keys:
 * `{ stats: { visits: 5 } }` becomes `{ 'stats.visits': 5 }`.
 * Arrays and dates are kept as values.
 */
export function flattenRow(row: Row, prefix = ''): Row {
  const flat: Row = {};
  for (const [key, value] of Object.entries(row)) {
    const name = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value)) {
      Object.assign(flat, flattenRow(value, name));
    } else {
      flat[name] = value;
    }
  }
  return flat;
}

export interface RecordTable {
  /** Every key seen across the records, sorted */
  columns: string[];
  records: Row[];
}

export function toRecordTable(rows: Iterable<Row>): RecordTable {
  const records = Array.from(rows, (row) => flattenRow(row));
  const columns = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) columns.add(key);
  }
  return { columns: [...columns].sort(), records };
}
