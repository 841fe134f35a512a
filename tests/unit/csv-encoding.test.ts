/**
 * Encoding and Byte Export Tests
 */

import { describe, it, expect } from 'vitest';
import { UnsupportedEncodingError } from '@csvgrid/shared';
import { CsvTable, getEncoding, resolveEncoding } from '../../apps/api/src/services/csv';

function smallTable(): CsvTable {
  const table = new CsvTable();
  table.startRow();
  table.setCell('A', 1);
  return table;
}

describe('Encodings', () => {
  it('should mark utf-8 with a byte-order mark', () => {
    const utf8 = getEncoding('utf-8');
    expect([...utf8.preamble()]).toEqual([0xef, 0xbb, 0xbf]);
    expect([...utf8.encode('é')]).toEqual([0xc3, 0xa9]);
  });

  it('should offer utf-8 without a preamble', () => {
    expect(getEncoding('utf-8-no-bom').preamble()).toHaveLength(0);
  });

  it('should encode utf-16 in both byte orders', () => {
    const le = getEncoding('utf-16le');
    const be = getEncoding('utf-16be');

    expect([...le.preamble()]).toEqual([0xff, 0xfe]);
    expect([...le.encode('A')]).toEqual([0x41, 0x00]);
    expect([...be.preamble()]).toEqual([0xfe, 0xff]);
    expect([...be.encode('A')]).toEqual([0x00, 0x41]);
  });

  it('should encode single-byte charsets without a preamble', () => {
    expect(getEncoding('latin1').preamble()).toHaveLength(0);
    expect([...getEncoding('latin1').encode('é')]).toEqual([0xe9]);
    expect(getEncoding('ascii').preamble()).toHaveLength(0);
  });

  it('should accept aliases regardless of case', () => {
    expect(getEncoding('UTF8').name).toBe('utf-8');
    expect(getEncoding(' UCS2 ').name).toBe('utf-16le');
    expect(getEncoding('ISO-8859-1').name).toBe('latin1');
  });

  it('should reject unknown encodings', () => {
    expect(() => getEncoding('ebcdic')).toThrow(UnsupportedEncodingError);

    try {
      getEncoding('constructor');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedEncodingError);
      expect(error instanceof UnsupportedEncodingError && error.encoding).toBe('constructor');
    }
  });

  it('should pass encoding objects through', () => {
    const utf8 = getEncoding('utf-8');
    expect(resolveEncoding(utf8)).toBe(utf8);
  });
});

describe('Byte Export', () => {
  it('should default to utf-8 with a byte-order mark', () => {
    const bytes = smallTable().exportBytes();

    expect([...bytes.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
    expect(bytes.subarray(3).toString('utf8')).toBe('A\r\n1\r\n');
  });

  it('should prefix utf-16 output with its preamble', () => {
    const bytes = smallTable().exportBytes('utf-16le');

    expect(bytes.equals(Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from('A\r\n1\r\n', 'utf16le')]))).toBe(true);
  });

  it('should emit only the text when the encoding has no preamble', () => {
    expect(smallTable().exportBytes('utf-8-no-bom').toString('utf8')).toBe('A\r\n1\r\n');
  });

  it('should apply format options to the bytes', () => {
    const bytes = smallTable().exportBytes('ascii', { delimiter: ';', includeSeparatorHint: true, newline: '\n' });
    expect(bytes.toString('ascii')).toBe('sep=;\nA\n1\n');
  });

  it('should fail on an unsupported encoding', () => {
    expect(() => smallTable().exportBytes('klingon')).toThrow(UnsupportedEncodingError);
  });
});
