/**
 * Schema Detector - map CSV header names to sales fields
 *
 * Header names are matched trimmed and lower-cased. The first header that
 * matches a field wins; later duplicates are ignored.
 */

import { createLogger } from '../utils/logger.js';
import type { SalesField, SalesSchema } from '../sales/types.js';

const logger = createLogger('schema-detector');

// ---------------------------------------------------------------------------
// Column name aliases -> canonical field
// ---------------------------------------------------------------------------

/** Names reported when a required column is missing */
export const REQUIRED_COLUMNS: Record<SalesField, string> = {
  product: 'produto',
  quantity: 'quantidade',
  unitPrice: 'preco_unitario',
};

const SALES_FIELDS: readonly SalesField[] = ['product', 'quantity', 'unitPrice'];

const COLUMN_ALIASES = new Map<string, SalesField>([
  // product
  ['produto', 'product'],
  ['product', 'product'],

  // quantity
  ['quantidade', 'quantity'],
  ['quantity', 'quantity'],
  ['qtd', 'quantity'],

  // unitPrice
  ['preco_unitario', 'unitPrice'],
  ['unit_price', 'unitPrice'],
  ['preco', 'unitPrice'],
]);

/** Preferred date column names, best first */
const DATE_COLUMN_CANDIDATES = [
  'data_venda',
  'data',
  'date',
  'data_pedido',
  'data_compra',
  'timestamp',
  'created_at',
];

function normalizeHeader(header: string): string {
  return header.trim().toLowerCase();
}

function detectDateColumn(headers: string[], taken: Set<string>): string | undefined {
  const free = headers.filter((h) => !taken.has(h));
  const normalized = free.map(normalizeHeader);

  for (const candidate of DATE_COLUMN_CANDIDATES) {
    const index = normalized.indexOf(candidate);
    if (index !== -1) return free[index];
  }

  const fuzzy = normalized.findIndex((h) => h.includes('data') || h.includes('date'));
  return fuzzy === -1 ? undefined : free[fuzzy];
}

export interface SchemaDetection {
  schema: SalesSchema;
  /** Required column names absent from the header */
  missing: string[];
}

export function detectSchema(headers: string[]): SchemaDetection {
  const columns: Partial<Record<SalesField, string>> = {};

  for (const header of headers) {
    const field = COLUMN_ALIASES.get(normalizeHeader(header));
    if (field && columns[field] === undefined) {
      columns[field] = header;
    }
  }

  const product = columns.product ?? REQUIRED_COLUMNS.product;
  const quantity = columns.quantity ?? REQUIRED_COLUMNS.quantity;
  const unitPrice = columns.unitPrice ?? REQUIRED_COLUMNS.unitPrice;

  const missing = SALES_FIELDS
    .filter((field) => columns[field] === undefined)
    .map((field) => REQUIRED_COLUMNS[field]);

  const dateColumn = detectDateColumn(headers, new Set([product, quantity, unitPrice]));

  if (dateColumn) {
    logger.debug({ dateColumn }, 'Date column detected');
  } else {
    logger.debug('No date column detected');
  }

  return {
    schema: {
      headers,
      columns: { product, quantity, unitPrice },
      hasDateColumn: dateColumn !== undefined,
      dateColumn,
    },
    missing,
  };
}
