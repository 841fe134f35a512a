import { z } from 'zod';

// ============ Cell Values ============

/**
 * A typed value that may carry "no value" without being null itself,
 * e.g. a nullable database column wrapper.
 */
export interface NullableValue {
  readonly isNull: boolean;
}

/**
 * Anything a cell can hold. Missing cells read as null.
 */
export type CsvCellValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | NullableValue
  | null
  | undefined;

export function isNullableValue(value: unknown): value is NullableValue {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof Date) &&
    'isNull' in value &&
    typeof value.isNull === 'boolean'
  );
}

// ============ Format Options ============

export type CsvNewline = '\r\n' | '\n';

export const csvFormatOptionsSchema = z.object({
  /** Single character separating cells on a line */
  delimiter: z
    .string()
    .length(1, 'delimiter must be exactly one character')
    .refine((d) => d !== '"' && d !== '\r' && d !== '\n', {
      message: 'delimiter cannot be a double quote or a line break',
    }),
  /** Emit the column names as the first data line */
  includeHeader: z.boolean(),
  /** Emit a leading `sep=<delimiter>` line for spreadsheet tools */
  includeSeparatorHint: z.boolean(),
  /** Line terminator written after every line of one export */
  newline: z.enum(['\r\n', '\n']),
  /** Quote header names the way data cells are quoted */
  escapeHeader: z.boolean(),
});

export type CsvFormatOptions = z.infer<typeof csvFormatOptionsSchema>;

export const DEFAULT_FORMAT_OPTIONS: Readonly<CsvFormatOptions> = Object.freeze<CsvFormatOptions>({
  delimiter: ',',
  includeHeader: true,
  includeSeparatorHint: false,
  newline: '\r\n',
  escapeHeader: false,
});

// ============ Encodings ============

export const CSV_ENCODING_NAMES = [
  'utf-8',
  'utf-8-no-bom',
  'utf-16le',
  'utf-16be',
  'latin1',
  'ascii',
] as const;

export type CsvEncodingName = (typeof CSV_ENCODING_NAMES)[number];

export const DEFAULT_ENCODING: CsvEncodingName = 'utf-8';

// ============ Errors ============

export class NoCurrentRowError extends RangeError {
  constructor(public readonly columnName: string) {
    super(`Cannot set "${columnName}": call startRow() before setting cells`);
    this.name = 'NoCurrentRowError';
  }
}

export class InvalidFormatOptionsError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid CSV format options: ${issues.join('; ')}`);
    this.name = 'InvalidFormatOptionsError';
  }
}

export class UnsupportedEncodingError extends Error {
  constructor(public readonly encoding: string) {
    super(
      `Unsupported encoding "${encoding}". ` +
        `Supported encodings: ${CSV_ENCODING_NAMES.join(', ')}`
    );
    this.name = 'UnsupportedEncodingError';
  }
}
