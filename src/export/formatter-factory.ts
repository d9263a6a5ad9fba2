/**
 * Formatter registry keyed by output format.
 */

import { UnsupportedFormatError } from '../sales/errors.js';
import { JsonFormatter } from './json-formatter.js';
import { TextFormatter } from './text-formatter.js';
import { REPORT_FORMATS, type ReportFormat, type ReportFormatter } from './types.js';

const FORMATTERS: Record<ReportFormat, () => ReportFormatter> = {
  text: () => new TextFormatter(),
  json: () => new JsonFormatter(),
};

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export function availableFormats(): ReportFormat[] {
  return [...REPORT_FORMATS];
}

export function createFormatter(format: string): ReportFormatter {
  if (!isReportFormat(format)) {
    throw new UnsupportedFormatError(format, REPORT_FORMATS);
  }
  return FORMATTERS[format]();
}
