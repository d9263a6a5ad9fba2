/**
 * Report Output Types
 */

import type { AggregationResult } from '../sales/types.js';

export const REPORT_FORMATS = ['text', 'json'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface ReportFormatter {
  readonly format: ReportFormat;
  render(result: AggregationResult): string;
}

export type ColumnAlign = 'left' | 'right';

export interface TableColumn {
  header: string;
  align?: ColumnAlign;
}

/** JSON report document. Keys follow the published report schema. */
export interface SalesJsonReport {
  vendas_por_produto: Record<string, number>;
  total_vendas: number;
  produto_mais_vendido: {
    nome: string;
    quantidade: number;
  } | null;
}
