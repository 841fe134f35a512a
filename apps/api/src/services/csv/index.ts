/**
 * CSV Export Module
 *
 * Serializes a dynamically populated table of named columns to CSV
 * for spreadsheet tools.
 *
 * @example
 * ```typescript
 * import { CsvTable, tableFromObjects } from './services/csv';
 *
 * // Method 1: Row by row
 * const csv = new CsvTable();
 * csv.startRow();
 * csv.setCell('Region', 'Sydney "in" Australia');
 * csv.setCell('Sales', 50000);
 * const text = csv.exportText({ delimiter: ';', includeSeparatorHint: true });
 *
 * // Method 2: From records
 * const bytes = tableFromObjects(orders).exportBytes('utf-16le');
 *
 * // Method 3: Straight to disk, line by line
 * csv.exportToFile('/tmp/report.csv');
 * ```
 */

// Types
export type {
  CsvCellValue,
  CsvEncoding,
  CsvEncodingName,
  CsvField,
  CsvFormatOptions,
  CsvNewline,
  CsvTableView,
  CsvValidationResult,
  FieldExtractor,
  LineDestination,
  NullableValue,
} from './types';

// Table model
export { CsvTable, tableFromObjects } from './table';

// Cell formatting
export {
  formatCell,
  formatDateTime,
  needsQuoting,
  quote,
  SOFT_CELL_LIMIT,
  HARD_CELL_LIMIT,
} from './formatter';

// Line production
export { produceLines } from './lines';

// Validation
export { validateFormatOptions, resolveFormatOptions, validateTable } from './validator';

// Encodings and destinations
export { getEncoding, resolveEncoding } from './encoding';
export { fileDestination, memoryDestination } from './destination';
export type { MemoryDestination } from './destination';

// Record extraction
export { propertyFieldExtractor, pickFields, toCellValue } from './extractors';
