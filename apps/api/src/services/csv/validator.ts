/**
 * Export Validator
 *
 * Checks format options before an export and flags header names
 * that will not survive the unescaped header line.
 */

import {
  csvFormatOptionsSchema,
  DEFAULT_FORMAT_OPTIONS,
  InvalidFormatOptionsError,
} from '@csvgrid/shared';
import type { CsvFormatOptions, CsvTableView, CsvValidationResult } from './types';
import { needsQuoting } from './formatter';

/**
 * Validate a complete set of format options
 */
export function validateFormatOptions(options: unknown): CsvValidationResult {
  const parsed = csvFormatOptionsSchema.safeParse(options);
  const warnings: string[] = [];

  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      ),
      warnings,
    };
  }

  const { delimiter } = parsed.data;
  if (/^[\p{L}\p{N}]$/u.test(delimiter)) {
    warnings.push(`Delimiter "${delimiter}" is a letter or digit; most cells will be quoted`);
  }

  return { valid: true, errors: [], warnings };
}

/**
 * Fill every option the caller left out, or passed as undefined, from the defaults
 */
function withDefaults(options: Partial<CsvFormatOptions> = {}): CsvFormatOptions {
  return {
    delimiter: options.delimiter ?? DEFAULT_FORMAT_OPTIONS.delimiter,
    includeHeader: options.includeHeader ?? DEFAULT_FORMAT_OPTIONS.includeHeader,
    includeSeparatorHint: options.includeSeparatorHint ?? DEFAULT_FORMAT_OPTIONS.includeSeparatorHint,
    newline: options.newline ?? DEFAULT_FORMAT_OPTIONS.newline,
    escapeHeader: options.escapeHeader ?? DEFAULT_FORMAT_OPTIONS.escapeHeader,
  };
}

/**
 * Merge partial options over the defaults and validate the result
 *
 * @throws InvalidFormatOptionsError listing every problem found
 */
export function resolveFormatOptions(options?: Partial<CsvFormatOptions>): CsvFormatOptions {
  const resolved = withDefaults(options);
  const result = validateFormatOptions(resolved);

  if (!result.valid) {
    throw new InvalidFormatOptionsError(result.errors);
  }

  return resolved;
}

/**
 * Validate a table against the options it is about to be exported with.
 * Header names are written raw unless `escapeHeader` is set, so names
 * containing the delimiter, quotes or line breaks shift the header line.
 */
export function validateTable(
  table: CsvTableView,
  options?: Partial<CsvFormatOptions>
): CsvValidationResult {
  const resolved = withDefaults(options);
  const optionsResult = validateFormatOptions(resolved);

  if (!optionsResult.valid) {
    return optionsResult;
  }

  const warnings = [...optionsResult.warnings];

  if (table.columns.length === 0) {
    warnings.push('Table has no columns');
  }

  if (resolved.includeHeader && !resolved.escapeHeader) {
    for (const column of table.columns) {
      if (needsQuoting(column, resolved.delimiter)) {
        warnings.push(
          `Column "${column}" contains the delimiter, a quote or a line break and is written unescaped in the header`
        );
      }
    }
  }

  return { valid: true, errors: [], warnings };
}
