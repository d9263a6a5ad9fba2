/**
 * Library entry point for sales-report
 */

export { generateReport } from './report/sales-report.js';
export type { ReportOptions, ReportSummary, SalesReport } from './report/sales-report.js';

export { readSalesCsv, parseSalesCsv, decodeCsvBuffer } from './import/csv-reader.js';
export { detectSchema } from './import/schema-detector.js';
export type { CsvReadResult, Delimiter, ReadOptions, TextEncoding } from './import/types.js';

export { validateRows } from './validation/sales-validator.js';
export type { ValidateOptions, ValidationOutcome } from './validation/sales-validator.js';

export { createDateRange, filterByDateRange } from './filters/date-filter.js';
export { aggregateSales } from './analytics/sales-aggregator.js';

export { createFormatter, availableFormats } from './export/formatter-factory.js';
export { TextFormatter } from './export/text-formatter.js';
export { JsonFormatter, toJsonReport } from './export/json-formatter.js';
export type { ReportFormat, ReportFormatter, SalesJsonReport } from './export/types.js';

export { parseDecimal, formatDecimal } from './sales/decimal.js';
export type { Decimal } from './sales/decimal.js';
export { parseIsoDate } from './sales/dates.js';
export * from './sales/errors.js';
export type * from './sales/types.js';
