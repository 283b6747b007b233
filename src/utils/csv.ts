import { parse } from 'csv-parse/sync';
import type { CellValue, Table, TableRow } from '../types/hmda.js';
import { ParseError } from './errors.js';
import { setCell } from './table.js';

// Plain decimals only: "01001" stays a string so census tracts and FIPS codes keep their zeros
const NUMERIC_PATTERN = /^-?(0|[1-9]\d*)(\.\d+)?$/;

// The number must print back as the same text, so long identifiers and "3.50" stay strings
function isExactNumber(value: string): boolean {
  if (!NUMERIC_PATTERN.test(value)) return false;
  const number = Number(value);
  if (String(number) !== value) return false;
  return !Number.isInteger(number) || Number.isSafeInteger(number);
}

function isNumericColumn(values: string[]): boolean {
  let seen = false;
  for (const value of values) {
    if (value === '') continue;
    if (!isExactNumber(value)) return false;
    seen = true;
  }
  return seen;
}

/**
 * Coerce raw string cells column by column. A column becomes numeric when
 * every non-empty cell converts to a number without loss; empty cells become null.
 */
export function coerceColumns(columns: string[], raw: string[][]): TableRow[] {
  const numeric = columns.map((_column, index) => isNumericColumn(raw.map((row) => row[index] ?? '')));

  return raw.map((row) => {
    const out: TableRow = {};
    columns.forEach((column, index) => {
      const value = row[index] ?? '';
      let cell: CellValue;
      if (value === '') {
        cell = null;
      } else if (numeric[index]) {
        cell = Number(value);
      } else {
        cell = value;
      }
      setCell(out, column, cell);
    });
    return out;
  });
}

export function parseCsvTable(csvText: string): Table {
  let records: unknown;

  try {
    // Arrays rather than objects; the parser still rejects rows whose length differs from the header
    records = parse(csvText, {
      skip_empty_lines: true,
      trim: true
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Malformed CSV response: ${reason}`, csvText, error);
  }

  if (!Array.isArray(records)) {
    throw new ParseError('CSV parser returned no records', csvText);
  }

  const lines: string[][] = [];
  for (const record of records) {
    if (!Array.isArray(record)) {
      throw new ParseError('CSV parser returned an unexpected record', csvText);
    }
    lines.push(record.map((value) => (typeof value === 'string' ? value : String(value))));
  }

  const [columns, ...raw] = lines;
  if (!columns || columns.length === 0) {
    throw new ParseError('CSV response has no header row', csvText);
  }
  if (new Set(columns).size !== columns.length) {
    throw new ParseError('CSV response has duplicate column names', csvText);
  }

  return { columns, rows: coerceColumns(columns, raw) };
}
