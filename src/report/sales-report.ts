/**
 * Sales Report - read, validate, filter, aggregate and render in one call
 */

import { createLogger } from '../utils/logger.js';
import { readSalesCsv } from '../import/csv-reader.js';
import type { Delimiter } from '../import/types.js';
import { validateRows } from '../validation/sales-validator.js';
import { filterByDateRange } from '../filters/date-filter.js';
import { aggregateSales } from '../analytics/sales-aggregator.js';
import { createFormatter } from '../export/formatter-factory.js';
import type { ReportFormat } from '../export/types.js';
import type { AggregationResult, DateRange, ValidationIssue } from '../sales/types.js';

const logger = createLogger('sales-report');

export interface ReportOptions {
  filePath: string;
  format?: ReportFormat;
  dateRange?: DateRange;
  skipValidation?: boolean;
  delimiter?: Delimiter;
}

export interface ReportSummary {
  totalRows: number;
  validRecords: number;
  rejectedRows: number;
  /** Records left after the date filter (equal to validRecords without one) */
  reportedRecords: number;
}

export interface SalesReport {
  output: string;
  result: AggregationResult;
  issues: ValidationIssue[];
  summary: ReportSummary;
}

/**
 * Run the whole pipeline over one file. Row-level problems come back in
 * `issues`; anything fatal (missing file, bad header, inverted range) is
 * thrown.
 */
export function generateReport(options: ReportOptions): SalesReport {
  const { filePath, format = 'text', dateRange, skipValidation = false, delimiter } = options;

  // Resolve the formatter first so a bad format fails before any I/O
  const formatter = createFormatter(format);

  const { rows, schema } = readSalesCsv(filePath, { delimiter });
  const { records, issues } = validateRows(rows, schema, { skipValidation });

  for (const issue of issues) {
    logger.warn({ row: issue.row, column: issue.column, value: issue.value }, issue.message);
  }

  if (dateRange && !schema.hasDateColumn) {
    logger.warn('Date range given but the file has no date column; nothing will match');
  }
  const filtered = filterByDateRange(records, dateRange);

  const result = aggregateSales(filtered);
  const output = formatter.render(result);

  const summary: ReportSummary = {
    totalRows: rows.length,
    validRecords: records.length,
    rejectedRows: issues.length,
    reportedRecords: filtered.length,
  };
  logger.info(summary, 'Report generated');

  return { output, result, issues, summary };
}
