/**
 * CSV Routes
 * Turns JSON records into downloadable CSV
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { isValid, parseISO } from 'date-fns';
import {
  csvFormatOptionsSchema,
  InvalidFormatOptionsError,
  UnsupportedEncodingError,
} from '@csvgrid/shared';
import type { CsvEncodingName, CsvFormatOptions } from '@csvgrid/shared';
import { tableFromObjects, getEncoding } from '../services/csv';
import type { CsvTable } from '../services/csv';
import { getConfig } from '../services/config';

const csv = new Hono();

const CHARSETS: Record<CsvEncodingName, string> = {
  'utf-8': 'utf-8',
  'utf-8-no-bom': 'utf-8',
  'utf-16le': 'utf-16le',
  'utf-16be': 'utf-16be',
  latin1: 'iso-8859-1',
  ascii: 'us-ascii',
};

// `$date` carries no zone and is read as local wall-clock time
const LOCAL_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d{1,3})?)?)?$/;

// Validation schemas
const cellSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z
    .object({
      $date: z
        .string()
        .regex(LOCAL_DATE_PATTERN, 'Dates must be YYYY-MM-DD or YYYY-MM-DDTHH:mm[:ss[.SSS]] without a zone')
        .refine((value) => isValid(parseISO(value)), 'Invalid date'),
    })
    .transform((value) => parseISO(value.$date)),
]);

const exportRequestSchema = z.object({
  rows: z.array(z.record(cellSchema)),
  options: csvFormatOptionsSchema.partial().optional(),
  encoding: z.string().min(1).optional(),
  filename: z
    .string()
    .regex(/^[\w .-]+$/, 'Filename may only contain letters, digits, spaces, dots, dashes and underscores')
    .optional(),
});

type ExportRequest = z.infer<typeof exportRequestSchema>;

const validateExportRequest = zValidator('json', exportRequestSchema, (result, c) => {
  if (!result.success) {
    return c.json(
      {
        error: {
          code: 'INVALID_REQUEST',
          message: result.error.issues
            .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
            .join('; '),
        },
      },
      400
    );
  }
});

function logInfo(message: string): void {
  const { level } = getConfig().logging;
  if (level === 'debug' || level === 'info') {
    console.log(`[CsvExport] ${message}`);
  }
}

/**
 * Format options for a request: configured defaults, then the request's own
 */
function requestOptions(request: ExportRequest): CsvFormatOptions {
  const { delimiter, includeHeader, includeSeparatorHint, newline, escapeHeader } = getConfig().csv;
  return {
    delimiter,
    includeHeader,
    includeSeparatorHint,
    newline,
    escapeHeader,
    ...request.options,
  };
}

/**
 * Build the table, or an error response when the request is too large
 */
function buildTable(c: Context, request: ExportRequest): CsvTable | Response {
  const { maxRows } = getConfig().csv;
  if (request.rows.length > maxRows) {
    return c.json(
      {
        error: {
          code: 'TOO_MANY_ROWS',
          message: `Export is limited to ${maxRows} rows, got ${request.rows.length}`,
        },
      },
      413
    );
  }
  return tableFromObjects(request.rows);
}

function errorResponse(c: Context, error: unknown): Response {
  if (error instanceof UnsupportedEncodingError) {
    return c.json({ error: { code: 'UNSUPPORTED_ENCODING', message: error.message } }, 400);
  }
  if (error instanceof InvalidFormatOptionsError) {
    return c.json({ error: { code: 'INVALID_OPTIONS', message: error.message } }, 400);
  }
  throw error;
}

/**
 * POST /api/csv/export
 * Export records as a CSV download
 */
csv.post('/export', validateExportRequest, (c) => {
  const request = c.req.valid('json');
  const table = buildTable(c, request);
  if (table instanceof Response) {
    return table;
  }

  try {
    const encoding = getEncoding(request.encoding ?? getConfig().csv.encoding);
    const bytes = table.exportBytes(encoding, requestOptions(request));
    const filename = request.filename ?? 'export.csv';

    logInfo(
      `${table.rowCount} rows x ${table.columns.length} columns -> ${bytes.length} bytes (${encoding.name})`
    );

    c.header('Content-Type', `text/csv; charset=${CHARSETS[encoding.name]}`);
    c.header('Content-Disposition', `attachment; filename="${filename}"`);
    c.header('Content-Length', bytes.length.toString());
    c.header('Cache-Control', 'no-cache');

    return c.body(new Uint8Array(bytes));
  } catch (error) {
    return errorResponse(c, error);
  }
});

/**
 * POST /api/csv/preview?limit=20
 * Return the first lines of the export as JSON
 */
csv.post('/preview', validateExportRequest, (c) => {
  const request = c.req.valid('json');
  const limit = Number(c.req.query('limit') ?? 20);

  if (!Number.isInteger(limit) || limit < 1) {
    return c.json(
      { error: { code: 'INVALID_LIMIT', message: 'limit must be a positive integer' } },
      400
    );
  }

  const table = buildTable(c, request);
  if (table instanceof Response) {
    return table;
  }

  try {
    const lines: string[] = [];
    let truncated = false;

    for (const line of table.lines(requestOptions(request))) {
      if (lines.length === limit) {
        truncated = true;
        break;
      }
      lines.push(line);
    }

    return c.json({ columns: [...table.columns], lines, truncated });
  } catch (error) {
    return errorResponse(c, error);
  }
});

export { csv as csvRoutes };
