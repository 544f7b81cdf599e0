import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';

export type CsvRow = string[];

const RECORD_DELIMITER = '\r\n';

export function parseCsv(text: string): CsvRow[] {
  if (text.trim().length === 0) return [];
  const records: unknown = parse(text, {
    relax_column_count: true,
    skip_empty_lines: true,
    bom: true,
  });
  if (!Array.isArray(records)) return [];
  return records.map(record =>
    Array.isArray(record) ? record.map(cell => String(cell)) : [],
  );
}

export function formatCsv(rows: CsvRow[]): string {
  if (rows.length === 0) return '';
  // Any line break inside a field is quoted, whatever the record delimiter
  return stringify(rows, { record_delimiter: RECORD_DELIMITER, quoted_match: /[\r\n]/ });
}

/** Splits a CSV document into its header and data rows, checking the header. */
export function readTable(name: string, text: string | null, header: readonly string[]): CsvRow[] {
  if (text === null) return [];
  const [first, ...rows] = parseCsv(text);
  if (first === undefined) return [];
  if (first.join(',') !== header.join(',')) {
    throw new Error(`${name} has unexpected header "${first.join(',')}"`);
  }
  return rows;
}

export function writeTable(header: readonly string[], rows: CsvRow[]): string {
  return formatCsv([[...header], ...rows]);
}

/** Decimal text with at least one fractional digit: 4 -> "4.0", 3.75 -> "3.75". */
export function formatDecimal(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function formatFlag(value: boolean): string {
  return value ? 'True' : 'False';
}
