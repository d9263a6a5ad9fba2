/**
 * CSV Reader - decode a sales CSV file and resolve its rows against the header
 *
 * Handles:
 * - UTF-8 with a Windows-1252 fallback for legacy exports
 * - UTF-8 BOM stripping
 * - Auto-detection of delimiter (comma, semicolon, tab)
 * - Windows (\r\n), old Mac (\r) and Unix (\n) line endings
 * - Quoted fields with embedded delimiters, quotes and newlines
 */

import { readFileSync } from 'fs';
import { TextDecoder } from 'util';
import iconv from 'iconv-lite';
import { createLogger } from '../utils/logger.js';
import {
  EncodingError,
  FileNotFoundError,
  FileReadError,
  MalformedHeaderError,
} from '../sales/errors.js';
import type { RawRow, SalesSchema } from '../sales/types.js';
import { detectSchema, REQUIRED_COLUMNS } from './schema-detector.js';
import type { CsvReadResult, Delimiter, ReadOptions, TextEncoding } from './types.js';

const logger = createLogger('csv-reader');

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

/** Bytes Windows-1252 leaves unassigned */
const UNDEFINED_CP1252_BYTES = new Set([0x81, 0x8d, 0x8f, 0x90, 0x9d]);

export interface DecodedText {
  text: string;
  encoding: TextEncoding;
}

/**
 * Decode as UTF-8, falling back to Windows-1252. Two attempts only; this
 * is not general encoding detection.
 */
export function decodeCsvBuffer(buffer: Uint8Array, path: string): DecodedText {
  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    return { text, encoding: 'utf-8' };
  } catch (err) {
    if (!(err instanceof TypeError)) throw err;
    logger.debug({ path }, 'Not valid UTF-8, retrying as windows-1252');
  }

  if (buffer.some((byte) => UNDEFINED_CP1252_BYTES.has(byte))) {
    throw new EncodingError(path, ['utf-8', 'windows-1252']);
  }
  // TextDecoder can hand back C1 controls for 0x80-0x9F; iconv-lite maps them
  return { text: iconv.decode(Buffer.from(buffer), 'win1252'), encoding: 'windows-1252' };
}

// ---------------------------------------------------------------------------
// Delimiter detection
// ---------------------------------------------------------------------------

const DELIMITER_MAP: Record<Exclude<Delimiter, 'auto'>, string> = {
  comma: ',',
  semicolon: ';',
  tab: '\t',
};

/**
 * Auto-detect delimiter by counting unquoted occurrences in the first
 * few lines. Prefers comma > semicolon > tab if scores are equal.
 */
export function detectDelimiter(text: string): string {
  const sampleLines = text.split(/\r\n|\r|\n/).slice(0, 10).filter((line) => line.trim().length > 0);
  if (sampleLines.length === 0) return ',';

  let bestDelimiter = ',';
  let bestScore = -1;

  for (const delim of Object.values(DELIMITER_MAP)) {
    const counts = sampleLines.map((line) => {
      let count = 0;
      let inQuotes = false;
      for (const ch of line) {
        if (ch === '"') {
          inQuotes = !inQuotes;
        } else if (ch === delim && !inQuotes) {
          count++;
        }
      }
      return count;
    });

    const avgCount = counts.reduce((a, b) => a + b, 0) / counts.length;
    // Same count on every line is a strong signal
    const consistencyBonus = new Set(counts).size === 1 ? 10 : 0;
    const score = avgCount + consistencyBonus;

    if (score > bestScore && avgCount > 0) {
      bestScore = score;
      bestDelimiter = delim;
    }
  }

  return bestDelimiter;
}

// ---------------------------------------------------------------------------
// Record parser (handles quoted fields)
// ---------------------------------------------------------------------------

/**
 * Split CSV text into records of trimmed fields. A quote opens a quoted
 * field only at the start of a field; inside it, "" is a literal quote and
 * line breaks belong to the field. Blank lines are dropped; a line of empty
 * cells (",,") is kept so that validation can reject it.
 */
export function parseRecords(text: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;

  const endField = () => {
    fields.push(current.trim());
    current = '';
  };
  const endRecord = () => {
    endField();
    const blank = fields.length === 1 && fields[0] === '';
    if (!blank) records.push(fields);
    fields = [];
  };

  let i = 0;
  while (i < text.length) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      current += ch;
      i++;
      continue;
    }

    if (ch === '"' && current.trim().length === 0) {
      current = '';
      inQuotes = true;
    } else if (ch === delimiter) {
      endField();
    } else if (ch === '\r' || ch === '\n') {
      endRecord();
      if (ch === '\r' && text[i + 1] === '\n') i++;
    } else {
      current += ch;
    }
    i++;
  }

  if (current.length > 0 || fields.length > 0) endRecord();
  return records;
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toRawRows(records: string[][], schema: SalesSchema): RawRow[] {
  const { headers, columns, dateColumn } = schema;
  const productIndex = headers.indexOf(columns.product);
  const quantityIndex = headers.indexOf(columns.quantity);
  const unitPriceIndex = headers.indexOf(columns.unitPrice);
  const dateIndex = dateColumn === undefined ? -1 : headers.indexOf(dateColumn);

  const cell = (fields: string[], index: number): string => fields[index] ?? '';

  return records.map((fields, i) => {
    const row: RawRow = {
      row: i + 1,
      product: cell(fields, productIndex),
      quantity: cell(fields, quantityIndex),
      unitPrice: cell(fields, unitPriceIndex),
    };
    if (dateIndex !== -1) {
      row.saleDate = cell(fields, dateIndex);
    }
    return row;
  });
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

export interface ParsedSalesCsv {
  rows: RawRow[];
  schema: SalesSchema;
  delimiter: string;
}

/**
 * Parse decoded CSV text. The first non-blank record is the header and
 * must name every required column.
 */
export function parseSalesCsv(text: string, options: ReadOptions = {}): ParsedSalesCsv {
  const { delimiter: delimiterOption = 'auto' } = options;

  // TextDecoder drops a BOM, but text can come from elsewhere
  const data = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  const delimiter =
    delimiterOption === 'auto' ? detectDelimiter(data) : DELIMITER_MAP[delimiterOption];

  const [headerFields, ...dataRecords] = parseRecords(data, delimiter);
  if (headerFields === undefined) {
    throw new MalformedHeaderError(
      Object.values(REQUIRED_COLUMNS),
      'File is empty: no header row found',
    );
  }

  const { schema, missing } = detectSchema(headerFields);
  if (missing.length > 0) {
    logger.warn({ headers: headerFields, missing }, 'Required columns missing from header');
    throw new MalformedHeaderError(missing);
  }

  logger.debug(
    { delimiter: delimiter === '\t' ? 'tab' : delimiter, columns: schema.columns, dateColumn: schema.dateColumn },
    'Header resolved',
  );

  return { rows: toRawRows(dataRecords, schema), schema, delimiter };
}

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

/**
 * Read and parse a sales CSV file from disk.
 */
export function readSalesCsv(path: string, options: ReadOptions = {}): CsvReadResult {
  let buffer: Buffer;
  try {
    buffer = readFileSync(path);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') throw new FileNotFoundError(path, err);
    throw new FileReadError(path, err);
  }

  const { text, encoding } = decodeCsvBuffer(buffer, path);
  logger.info({ path, encoding, bytes: buffer.length }, 'Reading CSV');

  const parsed = parseSalesCsv(text, options);

  logger.info(
    { rows: parsed.rows.length, hasDateColumn: parsed.schema.hasDateColumn },
    'CSV read complete',
  );

  return { ...parsed, encoding };
}
