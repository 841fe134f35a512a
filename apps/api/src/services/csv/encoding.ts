/**
 * Encodings
 *
 * Text-to-bytes codecs with their byte-order marks, on top of Node's Buffer.
 */

import { UnsupportedEncodingError } from '@csvgrid/shared';
import type { CsvEncoding, CsvEncodingName } from './types';

const EMPTY = Buffer.alloc(0);

function createEncoding(
  name: CsvEncodingName,
  encode: (text: string) => Buffer,
  bom: readonly number[] = []
): CsvEncoding {
  return Object.freeze({
    name,
    encode,
    preamble: () => (bom.length > 0 ? Buffer.from(bom) : EMPTY),
  });
}

const ENCODINGS: Record<CsvEncodingName, CsvEncoding> = {
  'utf-8': createEncoding('utf-8', (text) => Buffer.from(text, 'utf8'), [0xef, 0xbb, 0xbf]),
  'utf-8-no-bom': createEncoding('utf-8-no-bom', (text) => Buffer.from(text, 'utf8')),
  'utf-16le': createEncoding('utf-16le', (text) => Buffer.from(text, 'utf16le'), [0xff, 0xfe]),
  'utf-16be': createEncoding(
    'utf-16be',
    (text) => Buffer.from(text, 'utf16le').swap16(),
    [0xfe, 0xff]
  ),
  latin1: createEncoding('latin1', (text) => Buffer.from(text, 'latin1')),
  ascii: createEncoding('ascii', (text) => Buffer.from(text, 'ascii')),
};

/**
 * Alternative spellings accepted by getEncoding
 */
const ALIASES = new Map<string, CsvEncodingName>([
  ['utf8', 'utf-8'],
  ['utf-8-bom', 'utf-8'],
  ['utf8-no-bom', 'utf-8-no-bom'],
  ['utf-16', 'utf-16le'],
  ['utf16le', 'utf-16le'],
  ['ucs2', 'utf-16le'],
  ['ucs-2', 'utf-16le'],
  ['utf16be', 'utf-16be'],
  ['iso-8859-1', 'latin1'],
  ['binary', 'latin1'],
  ['us-ascii', 'ascii'],
]);

function isEncodingName(name: string): name is CsvEncodingName {
  return Object.prototype.hasOwnProperty.call(ENCODINGS, name);
}

/**
 * Look up an encoding by name (case-insensitive, common aliases accepted)
 *
 * @throws UnsupportedEncodingError for unknown names
 */
export function getEncoding(name: string): CsvEncoding {
  const normalized = name.trim().toLowerCase();

  if (isEncodingName(normalized)) {
    return ENCODINGS[normalized];
  }

  const alias = ALIASES.get(normalized);
  if (alias) {
    return ENCODINGS[alias];
  }

  throw new UnsupportedEncodingError(name);
}

/**
 * Accept either an encoding or its name
 */
export function resolveEncoding(encoding: CsvEncoding | string): CsvEncoding {
  return typeof encoding === 'string' ? getEncoding(encoding) : encoding;
}
