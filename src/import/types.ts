/**
 * CSV Import Types
 */

import type { RawRow, SalesSchema } from '../sales/types.js';

export type Delimiter = 'auto' | 'comma' | 'semicolon' | 'tab';

export const DELIMITERS = ['auto', 'comma', 'semicolon', 'tab'] as const satisfies readonly Delimiter[];

export type TextEncoding = 'utf-8' | 'windows-1252';

export interface ReadOptions {
  delimiter?: Delimiter;
}

export interface CsvReadResult {
  rows: RawRow[];
  schema: SalesSchema;
  encoding: TextEncoding;
  /** The delimiter character actually used */
  delimiter: string;
}
