/**
 * Line Producer
 *
 * Lazily yields the lines of an export: optional `sep=` hint, optional
 * header, then one line per row. Every export surface is built on this.
 */

import type { CsvFormatOptions, CsvTableView } from './types';
import { formatCell } from './formatter';

/**
 * Yield the export lines of a table, one at a time, without line terminators.
 *
 * Rows are read, never modified: a column a row never set reads as null.
 * Lines are computed as they are consumed, so a caller that stops early
 * does no work for the rest of the table.
 */
export function* produceLines(
  table: CsvTableView,
  options: CsvFormatOptions
): Generator<string, void, undefined> {
  const { delimiter } = options;

  if (options.includeSeparatorHint) {
    yield `sep=${delimiter}`;
  }

  if (options.includeHeader) {
    const names = options.escapeHeader
      ? table.columns.map((column) => formatCell(column, delimiter))
      : table.columns;
    yield names.join(delimiter);
  }

  for (const row of table.rows()) {
    yield table.columns
      .map((column) => formatCell(row.get(column) ?? null, delimiter))
      .join(delimiter);
  }
}
