/**
 * CSV serialization (RFC 4180: CRLF rows, fields quoted when they need it)
 */

import type { TableRecord } from '../types/index.js';

const CRLF = '\r\n';

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toCsvLine(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(',');
}

/**
 * One line per table row, header row included when the table has one
 */
export function tableToCsv(table: TableRecord): string {
  return table.rows.map(toCsvLine).join(CRLF) + CRLF;
}

/**
 * Header line of column names, then one line per record.
 * Numbers are written as-is; missing values become empty fields.
 *
 * @example
 * ```typescript
 * recordsToCsv(links, ['url', 'text', 'type']);
 * ```
 */
export function recordsToCsv<T extends object, K extends keyof T & string>(
  records: readonly T[],
  columns: readonly K[]
): string {
  const lines = [toCsvLine(columns)];
  for (const record of records) {
    lines.push(toCsvLine(columns.map((column) => formatValue(record[column]))));
  }
  return lines.join(CRLF) + CRLF;
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}
