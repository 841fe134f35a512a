/**
 * CSV Export Types
 *
 * Internal types for the serializer. Public value, option and error
 * types live in @csvgrid/shared.
 */

import type {
  CsvCellValue,
  CsvEncodingName,
  CsvFormatOptions,
  CsvNewline,
  NullableValue,
} from '@csvgrid/shared';

export type { CsvCellValue, CsvEncodingName, CsvFormatOptions, CsvNewline, NullableValue };

/**
 * Read-only view of a table, which is all line production needs
 */
export interface CsvTableView {
  /** Column names in first-seen order */
  readonly columns: readonly string[];
  /** Rows in insertion order */
  rows(): Iterable<ReadonlyMap<string, CsvCellValue>>;
}

/**
 * One named field read off a record
 */
export type CsvField = readonly [name: string, value: unknown];

/**
 * Enumerates the readable named fields of a record, in output order
 */
export type FieldExtractor<T> = (record: T) => Iterable<CsvField>;

/**
 * Text encoding capability
 */
export interface CsvEncoding {
  readonly name: CsvEncodingName;
  /** Encode text without any byte-order mark */
  encode(text: string): Buffer;
  /** Byte-order mark for this encoding; empty when it has none */
  preamble(): Buffer;
}

/**
 * Where exported lines end up. Writes every line followed by `newline`,
 * in order, and throws on the first failed write.
 */
export interface LineDestination {
  writeLines(lines: Iterable<string>, encoding: CsvEncoding, newline: CsvNewline): void;
}

/**
 * Table validation result
 */
export interface CsvValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}
