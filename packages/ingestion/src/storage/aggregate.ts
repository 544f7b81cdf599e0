import { formatDecimal, formatCsv, readTable, writeTable, type CsvRow } from './csv';

export const AGGREGATE_HEADER = [
  'guid',
  'username',
  'brewery',
  'beer',
  'location',
  'comment',
  'rating',
  'date',
  'url',
] as const;

export interface AggregateRow {
  guid: number;
  username: string;
  brewery: string;
  beer: string;
  /** Venue named in the post title, empty when the check-in has none. */
  location: string;
  comment: string;
  rating: number | null;
  date: string;
  url: string;
}

export function toCsvRow(row: AggregateRow): CsvRow {
  return [
    String(row.guid),
    row.username,
    row.brewery,
    row.beer,
    row.location,
    row.comment,
    row.rating === null ? '' : formatDecimal(row.rating),
    row.date,
    row.url,
  ];
}

/**
 * The append-only aggregate table, held as serialized text with an index of
 * the guids it contains.
 */
export class AggregateTable {
  private readonly guids = new Set<number>();

  private constructor(private text: string) {}

  static fromCsv(raw: string | null): AggregateTable {
    const rows = readTable('Aggregate dataset', raw, AGGREGATE_HEADER);
    const text = raw === null || raw.trim().length === 0 ? writeTable(AGGREGATE_HEADER, []) : raw;
    const table = new AggregateTable(text.endsWith('\n') ? text : `${text}\r\n`);
    for (const row of rows) {
      const guid = Number(row[0]);
      if (Number.isSafeInteger(guid)) table.guids.add(guid);
    }
    return table;
  }

  has(guid: number): boolean {
    return this.guids.has(guid);
  }

  get size(): number {
    return this.guids.size;
  }

  /** Appends the row unless its guid is already present. */
  append(row: AggregateRow): boolean {
    if (this.guids.has(row.guid)) return false;
    this.text += formatCsv([toCsvRow(row)]);
    this.guids.add(row.guid);
    return true;
  }

  toCsv(): string {
    return this.text;
  }
}
