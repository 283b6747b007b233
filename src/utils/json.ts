import type { CellValue, Table, TableRow } from '../types/hmda.js';
import { ParseError } from './errors.js';
import { setCell } from './table.js';

function isCellValue(value: unknown): value is CellValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Materialize the array stored under `key` of a JSON body as a table.
 * Columns are the union of row keys in first-seen order.
 */
export function parseJsonTable(body: string, key: string): Table {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Malformed JSON response: ${reason}`, body, error);
  }

  if (!isPlainObject(data)) {
    throw new ParseError('JSON response is not an object', body);
  }

  const items = data[key];
  if (!Array.isArray(items)) {
    throw new ParseError(`JSON response has no "${key}" array`, body);
  }

  const columns: string[] = [];
  const known = new Set<string>();
  const entries: Map<string, CellValue>[] = [];

  items.forEach((item: unknown, index) => {
    if (!isPlainObject(item)) {
      throw new ParseError(`"${key}[${index}]" is not an object`, body);
    }
    const entry = new Map<string, CellValue>();
    for (const [column, value] of Object.entries(item)) {
      if (!isCellValue(value)) {
        throw new ParseError(`"${key}[${index}].${column}" is not a scalar value`, body);
      }
      if (!known.has(column)) {
        known.add(column);
        columns.push(column);
      }
      entry.set(column, value);
    }
    entries.push(entry);
  });

  const rows: TableRow[] = entries.map((entry) => {
    const row: TableRow = {};
    for (const column of columns) {
      setCell(row, column, entry.get(column) ?? null);
    }
    return row;
  });

  return { columns, rows };
}
