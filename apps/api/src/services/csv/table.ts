/**
 * CSV Table
 *
 * Rows are built one at a time and cells are set by column name; the
 * column list grows in first-seen order. Three output surfaces share
 * one lazy line producer.
 */

import { DEFAULT_ENCODING, NoCurrentRowError } from '@csvgrid/shared';
import type {
  CsvCellValue,
  CsvEncoding,
  CsvFormatOptions,
  CsvTableView,
  FieldExtractor,
  LineDestination,
} from './types';
import { produceLines } from './lines';
import { resolveFormatOptions } from './validator';
import { resolveEncoding } from './encoding';
import { fileDestination } from './destination';
import { propertyFieldExtractor, toCellValue } from './extractors';

/**
 * In-memory table with a dynamic, first-seen column order.
 *
 * Not safe for concurrent use: one writer at a time, and an export reads
 * whatever the table holds as its lines are consumed. Mutating the table
 * while an export is in progress has no defined result.
 *
 * @example
 * ```typescript
 * const csv = new CsvTable();
 *
 * csv.startRow();
 * csv.setCell('Region', 'New York, USA');
 * csv.setCell('Sales', 100000);
 * csv.setCell('Date Opened', new Date(2003, 11, 31));
 *
 * const text = csv.exportText();
 * csv.exportToFile('sales.csv');
 * const bytes = csv.exportBytes();
 * ```
 */
export class CsvTable implements CsvTableView {
  private readonly columnNames: string[] = [];
  private readonly knownColumns = new Set<string>();
  private readonly rowData: Map<string, CsvCellValue>[] = [];

  /** Column names in first-seen order */
  get columns(): readonly string[] {
    return this.columnNames;
  }

  get rowCount(): number {
    return this.rowData.length;
  }

  /** Rows in insertion order; the backing list itself is never handed out */
  *rows(): Generator<ReadonlyMap<string, CsvCellValue>> {
    yield* this.rowData;
  }

  /**
   * Start a new, empty row. Subsequent setCell calls target it.
   */
  startRow(): void {
    this.rowData.push(new Map());
  }

  /**
   * Set a cell on the current row, registering the column if it is new
   *
   * @throws NoCurrentRowError when no row has been started
   */
  setCell(columnName: string, value: CsvCellValue): void {
    const current = this.rowData[this.rowData.length - 1];
    if (!current) {
      throw new NoCurrentRowError(columnName);
    }

    if (!this.knownColumns.has(columnName)) {
      this.knownColumns.add(columnName);
      this.columnNames.push(columnName);
    }

    current.set(columnName, value);
  }

  /**
   * Read a cell; unset cells and rows past the end read as null
   */
  getCell(rowIndex: number, columnName: string): CsvCellValue {
    return this.rowData[rowIndex]?.get(columnName) ?? null;
  }

  /**
   * Add one row per record, one cell per extracted field.
   * Errors thrown while reading a field propagate.
   */
  addRows<T extends object>(
    records: Iterable<T>,
    extractor: FieldExtractor<T> = propertyFieldExtractor
  ): void {
    for (const record of records) {
      this.startRow();
      for (const [name, value] of extractor(record)) {
        this.setCell(name, toCellValue(value));
      }
    }
  }

  /**
   * Lazily produce the export lines, without terminators
   */
  lines(options?: Partial<CsvFormatOptions>): Generator<string, void, undefined> {
    return produceLines(this, resolveFormatOptions(options));
  }

  /**
   * Export the whole table as one string, every line terminated
   */
  exportText(options?: Partial<CsvFormatOptions>): string {
    const resolved = resolveFormatOptions(options);
    const parts: string[] = [];

    for (const line of produceLines(this, resolved)) {
      parts.push(line, resolved.newline);
    }

    return parts.join('');
  }

  /**
   * Stream the lines to a destination without building the full text
   */
  exportToDestination(
    destination: LineDestination,
    encoding: CsvEncoding | string = DEFAULT_ENCODING,
    options?: Partial<CsvFormatOptions>
  ): void {
    const resolved = resolveFormatOptions(options);
    destination.writeLines(produceLines(this, resolved), resolveEncoding(encoding), resolved.newline);
  }

  /**
   * Write the table to a file, preamble first
   */
  exportToFile(
    path: string,
    options?: Partial<CsvFormatOptions>,
    encoding: CsvEncoding | string = DEFAULT_ENCODING
  ): void {
    this.exportToDestination(fileDestination(path), encoding, options);
  }

  /**
   * Export as bytes: the encoding's preamble followed by the encoded text
   */
  exportBytes(
    encoding: CsvEncoding | string = DEFAULT_ENCODING,
    options?: Partial<CsvFormatOptions>
  ): Buffer {
    const resolvedEncoding = resolveEncoding(encoding);
    const text = this.exportText(options);
    return Buffer.concat([resolvedEncoding.preamble(), resolvedEncoding.encode(text)]);
  }
}

/**
 * Build a table from records in one call
 *
 * @example
 * ```typescript
 * const csv = tableFromObjects([
 *   { name: 'Alice', score: 95 },
 *   { name: 'Bob', score: 87, team: 'Blue' },
 * ]).exportText();
 * ```
 */
export function tableFromObjects<T extends object>(
  records: Iterable<T>,
  extractor?: FieldExtractor<T>
): CsvTable {
  const table = new CsvTable();
  table.addRows(records, extractor);
  return table;
}
