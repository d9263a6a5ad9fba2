/**
 * Sales Aggregator - revenue and quantity per product
 */

import { createLogger } from '../utils/logger.js';
import { addDecimal, multiplyDecimal, sumDecimals } from '../sales/decimal.js';
import type { AggregationResult, BestSeller, ProductTotals, SaleRecord } from '../sales/types.js';

const logger = createLogger('sales-aggregator');

/**
 * Fold records into per-product totals.
 *
 * Products keep first-seen order. Revenue is exact (quantity x unit
 * price, no rounding). The best seller is the product with the highest
 * total quantity; on a tie the product seen first wins.
 */
export function aggregateSales(records: readonly SaleRecord[]): AggregationResult {
  const products = new Map<string, ProductTotals>();

  for (const record of records) {
    const revenue = multiplyDecimal(record.unitPrice, record.quantity);
    const quantity = BigInt(record.quantity);
    const current = products.get(record.product);
    if (current) {
      current.quantity += quantity;
      current.revenue = addDecimal(current.revenue, revenue);
    } else {
      products.set(record.product, {
        product: record.product,
        quantity,
        revenue,
      });
    }
  }

  let bestSeller: BestSeller | null = null;
  for (const totals of products.values()) {
    if (bestSeller === null || totals.quantity > bestSeller.quantity) {
      bestSeller = { product: totals.product, quantity: totals.quantity };
    }
  }

  const total = sumDecimals([...products.values()].map((totals) => totals.revenue));

  if (products.size === 0) {
    logger.warn('No records to aggregate');
  } else {
    logger.debug({ products: products.size, bestSeller: bestSeller?.product }, 'Aggregation complete');
  }

  return { products, total, bestSeller };
}
