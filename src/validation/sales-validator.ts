/**
 * Sales Validator - turn raw CSV rows into sale records
 *
 * Every row ends up either as a SaleRecord or as exactly one
 * ValidationIssue carrying the first reason it failed. Nothing here throws
 * for a bad row.
 */

import { createLogger } from '../utils/logger.js';
import { isPositiveDecimal, parseDecimal, type Decimal } from '../sales/decimal.js';
import { parseIsoDate } from '../sales/dates.js';
import type { RawRow, SaleRecord, SalesSchema, ValidationIssue } from '../sales/types.js';

const logger = createLogger('sales-validator');

export interface ValidateOptions {
  /**
   * Accept rows without constraint checks. Quantity and unit price must
   * still be numbers; an unparseable sale date is dropped.
   */
  skipValidation?: boolean;
}

export interface ValidationOutcome {
  records: SaleRecord[];
  issues: ValidationIssue[];
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

type Check<T> = { ok: true; value: T } | { ok: false; issue: ValidationIssue };

function fail<T>(row: RawRow, column: string, value: string, message: string): Check<T> {
  return { ok: false, issue: { row: row.row, column, value, message } };
}

function checkQuantity(row: RawRow, column: string, strict: boolean): Check<number> {
  const raw = row.quantity;
  if (raw.length === 0) return fail(row, column, raw, 'Quantity is missing or empty');
  if (!INTEGER_PATTERN.test(raw)) return fail(row, column, raw, 'Quantity must be an integer');

  const quantity = Number(raw);
  if (!Number.isSafeInteger(quantity)) return fail(row, column, raw, 'Quantity is too large');
  if (strict && quantity <= 0) return fail(row, column, raw, 'Quantity must be greater than zero');
  return { ok: true, value: quantity };
}

function checkUnitPrice(row: RawRow, column: string, strict: boolean): Check<Decimal> {
  const raw = row.unitPrice;
  if (raw.length === 0) return fail(row, column, raw, 'Unit price is missing or empty');

  const price = parseDecimal(raw);
  if (!price) return fail(row, column, raw, 'Unit price must be a decimal number');
  if (strict && !isPositiveDecimal(price)) {
    return fail(row, column, raw, 'Unit price must be greater than zero');
  }
  return { ok: true, value: price };
}

function checkSaleDate(row: RawRow, column: string): Check<string> {
  const raw = row.saleDate ?? '';
  if (raw.length === 0) return fail(row, column, raw, 'Sale date is missing or empty');

  const date = parseIsoDate(raw);
  if (!date) return fail(row, column, raw, 'Sale date must be a valid YYYY-MM-DD date');
  return { ok: true, value: date };
}

function validateRow(row: RawRow, schema: SalesSchema): Check<SaleRecord> {
  const { columns } = schema;

  if (row.product.length === 0) {
    return fail(row, columns.product, row.product, 'Product is missing or empty');
  }

  const quantity = checkQuantity(row, columns.quantity, true);
  if (!quantity.ok) return quantity;

  const unitPrice = checkUnitPrice(row, columns.unitPrice, true);
  if (!unitPrice.ok) return unitPrice;

  const record: SaleRecord = {
    row: row.row,
    product: row.product,
    quantity: quantity.value,
    unitPrice: unitPrice.value,
  };

  if (schema.hasDateColumn && schema.dateColumn !== undefined) {
    const saleDate = checkSaleDate(row, schema.dateColumn);
    if (!saleDate.ok) return saleDate;
    record.saleDate = saleDate.value;
  }

  return { ok: true, value: record };
}

function acceptRow(row: RawRow, schema: SalesSchema): Check<SaleRecord> {
  const quantity = checkQuantity(row, schema.columns.quantity, false);
  if (!quantity.ok) return quantity;

  const unitPrice = checkUnitPrice(row, schema.columns.unitPrice, false);
  if (!unitPrice.ok) return unitPrice;

  const record: SaleRecord = {
    row: row.row,
    product: row.product,
    quantity: quantity.value,
    unitPrice: unitPrice.value,
  };

  const saleDate = row.saleDate === undefined ? undefined : parseIsoDate(row.saleDate);
  if (saleDate !== undefined) record.saleDate = saleDate;

  return { ok: true, value: record };
}

/**
 * Validate every row independently and collect all findings.
 */
export function validateRows(
  rows: RawRow[],
  schema: SalesSchema,
  options: ValidateOptions = {},
): ValidationOutcome {
  const { skipValidation = false } = options;
  const check = skipValidation ? acceptRow : validateRow;

  const records: SaleRecord[] = [];
  const issues: ValidationIssue[] = [];

  for (const row of rows) {
    const result = check(row, schema);
    if (result.ok) {
      records.push(result.value);
    } else {
      issues.push(result.issue);
    }
  }

  logger.info(
    { total: rows.length, valid: records.length, rejected: issues.length, skipValidation },
    'Validation complete',
  );

  return { records, issues };
}
