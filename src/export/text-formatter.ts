/**
 * Text report: revenue table sorted by revenue, grand total, best seller.
 */

import { compareDecimal, formatDecimal } from '../sales/decimal.js';
import type { AggregationResult } from '../sales/types.js';
import { renderTable } from './formats.js';
import type { ReportFormatter } from './types.js';

export const EMPTY_REPORT_MESSAGE = 'Nenhum dado de vendas disponível para exibição.';

export class TextFormatter implements ReportFormatter {
  readonly format = 'text' as const;

  render(result: AggregationResult): string {
    if (result.products.size === 0) {
      return EMPTY_REPORT_MESSAGE;
    }

    // Array.prototype.sort is stable: equal revenues keep first-seen order
    const rows = [...result.products.values()]
      .sort((a, b) => compareDecimal(b.revenue, a.revenue))
      .map((totals) => [totals.product, formatDecimal(totals.revenue)]);

    const lines = [
      'Total de vendas por produto:',
      renderTable(
        [
          { header: 'Produto', align: 'left' },
          { header: 'Total (R$)', align: 'right' },
        ],
        rows,
      ),
      '',
      `Valor total de todas as vendas: R$ ${formatDecimal(result.total)}`,
    ];

    if (result.bestSeller) {
      lines.push(
        `Produto mais vendido: ${result.bestSeller.product} (${result.bestSeller.quantity} unidades)`,
      );
    }

    return lines.join('\n');
  }
}
