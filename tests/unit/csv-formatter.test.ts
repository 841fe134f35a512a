/**
 * Cell Formatter Tests
 *
 * Quoting, null handling, date formats and cell-length caps.
 */

import { describe, it, expect } from 'vitest';
import {
  formatCell,
  formatDateTime,
  needsQuoting,
  quote,
  SOFT_CELL_LIMIT,
  HARD_CELL_LIMIT,
} from '../../apps/api/src/services/csv';

/**
 * Standard CSV unquoting: strip surrounding quotes, turn "" back into "
 */
function unquote(cell: string): string {
  if (cell.length >= 2 && cell.startsWith('"') && cell.endsWith('"')) {
    return cell.slice(1, -1).replace(/""/g, '"');
  }
  return cell;
}

class SqlText {
  constructor(private readonly text: string | null) {}

  get isNull(): boolean {
    return this.text === null;
  }

  toString(): string {
    return this.text ?? '';
  }
}

describe('formatCell', () => {
  describe('Plain values', () => {
    it('should return plain text unchanged', () => {
      expect(formatCell('hello', ',')).toBe('hello');
    });

    it('should not quote spaces', () => {
      expect(formatCell('  padded  ', ',')).toBe('  padded  ');
    });

    it('should format numbers with default decimal formatting', () => {
      expect(formatCell(100000, ',')).toBe('100000');
      expect(formatCell(1.5, ',')).toBe('1.5');
      expect(formatCell(-42, ',')).toBe('-42');
    });

    it('should format booleans and bigints', () => {
      expect(formatCell(true, ',')).toBe('true');
      expect(formatCell(12345678901234567890n, ',')).toBe('12345678901234567890');
    });
  });

  describe('Null values', () => {
    it('should return empty string for null and undefined', () => {
      expect(formatCell(null, ',')).toBe('');
      expect(formatCell(undefined, ',')).toBe('');
    });

    it('should return empty string for a null sentinel', () => {
      expect(formatCell(new SqlText(null), ',')).toBe('');
      expect(formatCell({ isNull: true }, ',')).toBe('');
    });

    it('should use the string form of a non-null sentinel', () => {
      expect(formatCell(new SqlText('ready, set'), ',')).toBe('"ready, set"');
    });
  });

  describe('Dates', () => {
    it('should format midnight as a date only', () => {
      expect(formatCell(new Date(2003, 11, 31), ',')).toBe('2003-12-31');
    });

    it('should include the time when it is not midnight', () => {
      expect(formatCell(new Date(2005, 0, 1, 9, 30, 0), ',')).toBe('2005-01-01 09:30:00');
    });

    it('should treat milliseconds past midnight as a time of day', () => {
      expect(formatDateTime(new Date(2005, 0, 1, 0, 0, 0, 500))).toBe('2005-01-01 00:00:00');
    });

    it('should throw on an invalid date', () => {
      expect(() => formatCell(new Date('not a date'), ',')).toThrow(RangeError);
    });
  });

  describe('Quoting', () => {
    it('should quote values containing the delimiter', () => {
      expect(formatCell('New York, USA', ',')).toBe('"New York, USA"');
    });

    it('should double embedded quotes', () => {
      expect(formatCell('Sydney "in" Australia', ',')).toBe('"Sydney ""in"" Australia"');
      expect(formatCell('"Dangerous Dan" McGrew', ',')).toBe('"""Dangerous Dan"" McGrew"');
    });

    it('should quote values containing line breaks', () => {
      expect(formatCell('line1\nline2', ',')).toBe('"line1\nline2"');
      expect(formatCell('a\rb', ',')).toBe('"a\rb"');
    });

    it('should only look for the active delimiter', () => {
      expect(formatCell('a,b', ';')).toBe('a,b');
      expect(formatCell('a;b', ';')).toBe('"a;b"');
      expect(formatCell('a\tb', '\t')).toBe('"a\tb"');
    });

    it('should quote a number whose text contains the delimiter', () => {
      expect(formatCell(1.5, '.')).toBe('"1.5"');
    });

    it('should expose the quoting helpers', () => {
      expect(needsQuoting('plain', ',')).toBe(false);
      expect(needsQuoting('with "quote"', ',')).toBe(true);
      expect(quote('say "hi"')).toBe('"say ""hi"""');
    });

    it('should round-trip through standard unquoting', () => {
      const values = ['plain', 'a,b', 'say "hi"', '"', '""', 'multi\r\nline', ',', ''];
      for (const value of values) {
        expect(unquote(formatCell(value, ','))).toBe(value);
      }
    });
  });

  describe('Length caps', () => {
    it('should expose the spreadsheet limits', () => {
      expect(SOFT_CELL_LIMIT).toBe(30000);
      expect(HARD_CELL_LIMIT).toBe(32767);
    });

    it('should crop long unquoted values to the soft limit', () => {
      const output = formatCell('x'.repeat(40000), ',');
      expect(output).toBe('x'.repeat(30000));
      expect(output.length).toBeLessThanOrEqual(HARD_CELL_LIMIT);
    });

    it('should leave a value at exactly the soft limit alone', () => {
      expect(formatCell('x'.repeat(30000), ',')).toBe('x'.repeat(30000));
    });

    it('should re-append the closing quote after cropping a quoted value', () => {
      const output = formatCell('a,' + 'x'.repeat(30000), ',');
      expect(output).toBe('"a,' + 'x'.repeat(29997) + '"');
      expect(output).toHaveLength(30001);
    });

    it('should crop when quoting pushes a value over the soft limit', () => {
      const output = formatCell('"' + 'y'.repeat(29998), ',');
      // quoted: " + "" + 29998 y + " = 30002 characters
      expect(output).toBe('"""' + 'y'.repeat(29997) + '"');
    });
  });
});
