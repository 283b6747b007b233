import type { CellValue, TableRow } from '../types/hmda.js';

/**
 * Define a cell as an own data property, so column names such as
 * `__proto__` are stored rather than hitting the prototype setter.
 */
export function setCell(row: TableRow, column: string, value: CellValue): void {
  Object.defineProperty(row, column, { value, enumerable: true, writable: true, configurable: true });
}
