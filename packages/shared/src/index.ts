// ============ CSV Types ============
export {
  isNullableValue,
  csvFormatOptionsSchema,
  DEFAULT_FORMAT_OPTIONS,
  CSV_ENCODING_NAMES,
  DEFAULT_ENCODING,
  NoCurrentRowError,
  InvalidFormatOptionsError,
  UnsupportedEncodingError,
} from './csv';

export type {
  NullableValue,
  CsvCellValue,
  CsvNewline,
  CsvFormatOptions,
  CsvEncodingName,
} from './csv';
