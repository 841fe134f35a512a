/**
 * Line Destinations
 *
 * Synchronous sinks that write export lines one at a time, so the full
 * text is never built in memory.
 */

import fs from 'fs';
import type { CsvEncoding, CsvNewline, LineDestination } from './types';

function writeAll(fd: number, bytes: Buffer): void {
  let offset = 0;
  while (offset < bytes.length) {
    offset += fs.writeSync(fd, bytes, offset, bytes.length - offset);
  }
}

/**
 * Write lines to a file path (created or truncated) or to an already open
 * file descriptor. The encoding's preamble is written first.
 *
 * A descriptor passed in is left open; a file opened here is always closed.
 * Write errors propagate as-is and may leave a partial file behind.
 */
export function fileDestination(target: string | number): LineDestination {
  return {
    writeLines(lines: Iterable<string>, encoding: CsvEncoding, newline: CsvNewline): void {
      const ownsFile = typeof target === 'string';
      const fd = typeof target === 'string' ? fs.openSync(target, 'w') : target;

      try {
        writeAll(fd, encoding.preamble());
        for (const line of lines) {
          writeAll(fd, encoding.encode(line + newline));
        }
      } finally {
        if (ownsFile) {
          fs.closeSync(fd);
        }
      }
    },
  };
}

/**
 * In-memory destination collecting the encoded bytes line by line
 */
export interface MemoryDestination extends LineDestination {
  /** Number of lines written so far */
  readonly lineCount: number;
  /** Everything written so far, preamble included */
  toBuffer(): Buffer;
}

export function memoryDestination(): MemoryDestination {
  const chunks: Buffer[] = [];
  let lineCount = 0;

  return {
    get lineCount() {
      return lineCount;
    },

    writeLines(lines: Iterable<string>, encoding: CsvEncoding, newline: CsvNewline): void {
      chunks.push(encoding.preamble());
      for (const line of lines) {
        chunks.push(encoding.encode(line + newline));
        lineCount++;
      }
    },

    toBuffer(): Buffer {
      return Buffer.concat(chunks);
    },
  };
}
