/**
 * Sales Report Types
 */

import type { Decimal } from './decimal.js';
import type { IsoDate } from './dates.js';

// =============================================================================
// INPUT
// =============================================================================

/** Canonical fields every sales CSV must provide. */
export type SalesField = 'product' | 'quantity' | 'unitPrice';

export interface SalesSchema {
  /** Header cells as they appear in the file */
  headers: string[];
  /** CSV column name that feeds each canonical field */
  columns: Record<SalesField, string>;
  hasDateColumn: boolean;
  dateColumn?: string;
}

/**
 * One CSV data line resolved against the header. Values are trimmed
 * strings; a cell missing from a short line reads as ''.
 */
export interface RawRow {
  /** 1-based data-row index (header excluded, blank lines skipped) */
  row: number;
  product: string;
  quantity: string;
  unitPrice: string;
  /** Present only when the header has a date column */
  saleDate?: string;
}

// =============================================================================
// VALIDATED
// =============================================================================

export interface SaleRecord {
  row: number;
  product: string;
  quantity: number;
  unitPrice: Decimal;
  saleDate?: IsoDate;
}

export interface ValidationIssue {
  row: number;
  /** CSV column the problem was found in */
  column: string;
  value: string;
  message: string;
}

export interface DateRange {
  start: IsoDate;
  end: IsoDate;
}

// =============================================================================
// AGGREGATED
// =============================================================================

export interface ProductTotals {
  product: string;
  /** Summed as bigint: per-row quantities are safe integers, their sum may not be */
  quantity: bigint;
  revenue: Decimal;
}

export interface BestSeller {
  product: string;
  quantity: bigint;
}

export interface AggregationResult {
  /** Keyed by product name, in first-seen order */
  products: ReadonlyMap<string, ProductTotals>;
  total: Decimal;
  bestSeller: BestSeller | null;
}
