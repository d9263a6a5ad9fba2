/**
 * JSON report.
 *
 * `toJsonReport` gives the document as plain data; `render` writes the same
 * document as text with every amount carrying exactly two fraction digits,
 * which JSON.stringify cannot do for numbers like 149.7.
 */

import { decimalToNumber, formatDecimal } from '../sales/decimal.js';
import type { AggregationResult } from '../sales/types.js';
import { jsonObject, jsonString } from './formats.js';
import type { ReportFormatter, SalesJsonReport } from './types.js';

export function toJsonReport(result: AggregationResult): SalesJsonReport {
  return {
    vendas_por_produto: Object.fromEntries(
      [...result.products.values()].map((totals) => [totals.product, decimalToNumber(totals.revenue)]),
    ),
    total_vendas: decimalToNumber(result.total),
    produto_mais_vendido: result.bestSeller
      ? { nome: result.bestSeller.product, quantidade: Number(result.bestSeller.quantity) }
      : null,
  };
}

export class JsonFormatter implements ReportFormatter {
  readonly format = 'json' as const;

  render(result: AggregationResult): string {
    const sales = jsonObject(
      [...result.products.values()].map((totals): [string, string] => [
        totals.product,
        formatDecimal(totals.revenue),
      ]),
      1,
    );

    const bestSeller = result.bestSeller
      ? jsonObject(
          [
            ['nome', jsonString(result.bestSeller.product)],
            ['quantidade', String(result.bestSeller.quantity)],
          ],
          1,
        )
      : 'null';

    return jsonObject([
      ['vendas_por_produto', sales],
      ['total_vendas', formatDecimal(result.total)],
      ['produto_mais_vendido', bestSeller],
    ]);
  }
}
