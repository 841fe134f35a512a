/**
 * Cell Formatter
 *
 * Converts a single cell value to its CSV text: null handling,
 * date formatting, quoting and the spreadsheet cell-length caps.
 */

import { format } from 'date-fns';
import { isNullableValue } from '@csvgrid/shared';
import type { CsvCellValue } from './types';

/**
 * Cells longer than this are cropped (spreadsheet import limit)
 */
export const SOFT_CELL_LIMIT = 30000;

/**
 * Absolute cell length ceiling of legacy spreadsheet tools
 */
export const HARD_CELL_LIMIT = 32767;

/**
 * Format a date as `yyyy-MM-dd`, or `yyyy-MM-dd HH:mm:ss` when it has a time of day
 */
export function formatDateTime(value: Date): string {
  const isMidnight =
    value.getHours() === 0 &&
    value.getMinutes() === 0 &&
    value.getSeconds() === 0 &&
    value.getMilliseconds() === 0;

  return format(value, isMidnight ? 'yyyy-MM-dd' : 'yyyy-MM-dd HH:mm:ss');
}

/**
 * Whether a cell string must be wrapped in quotes
 */
export function needsQuoting(text: string, delimiter: string): boolean {
  return (
    text.includes(delimiter) ||
    text.includes('"') ||
    text.includes('\n') ||
    text.includes('\r')
  );
}

/**
 * Wrap in quotes, doubling embedded quotes
 * Eg: "Dangerous Dan" McGrew -> """Dangerous Dan"" McGrew"
 */
export function quote(text: string): string {
  return `"${text.replace(/"/g, '""')}"`;
}

function toText(value: CsvCellValue): string {
  if (value === null || value === undefined) return '';
  if (isNullableValue(value)) return value.isNull ? '' : String(value);
  if (value instanceof Date) return formatDateTime(value);
  return String(value);
}

/**
 * Convert a value to how it should appear in a CSV cell
 *
 * @example
 * formatCell('Sydney, Australia', ',') // '"Sydney, Australia"'
 * formatCell(new Date(2003, 11, 31), ',') // '2003-12-31'
 */
export function formatCell(value: CsvCellValue, delimiter: string): string {
  let output = toText(value);

  if (needsQuoting(output, delimiter)) {
    output = quote(output);
  }

  if (output.length > SOFT_CELL_LIMIT) {
    output = output.endsWith('"')
      ? output.substring(0, SOFT_CELL_LIMIT) + '"'
      : output.substring(0, SOFT_CELL_LIMIT);
  }

  return output.length <= HARD_CELL_LIMIT ? output : output.substring(0, HARD_CELL_LIMIT);
}
