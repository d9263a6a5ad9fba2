/**
 * Output Formats - fixed-width tables and JSON text helpers
 *
 * Pure TypeScript, no external dependencies.
 */

import type { ColumnAlign, TableColumn } from './types.js';

// =============================================================================
// FIXED-WIDTH TABLE
// =============================================================================

/** Width in code points of the NFC form: "Te\u0302nis" and "Tênis" are both 5. */
function textWidth(text: string): number {
  return [...text.normalize('NFC')].length;
}

function pad(cell: string, width: number, align: ColumnAlign = 'left'): string {
  const fill = ' '.repeat(Math.max(0, width - textWidth(cell)));
  return align === 'right' ? fill + cell : cell + fill;
}

/**
 * Render rows as a plain-text table: header line, a dashed rule under each
 * column, then one line per row. Columns are as wide as their widest cell
 * and separated by two spaces.
 */
export function renderTable(columns: TableColumn[], rows: string[][]): string {
  const widths = columns.map((column, i) =>
    Math.max(textWidth(column.header), ...rows.map((row) => textWidth(row[i] ?? ''))),
  );

  function renderLine(cells: string[]): string {
    return columns
      .map((column, i) => pad(cells[i] ?? '', widths[i], column.align))
      .join('  ')
      .trimEnd();
  }

  const lines = [
    renderLine(columns.map((column) => column.header)),
    widths.map((width) => '-'.repeat(width)).join('  '),
    ...rows.map(renderLine),
  ];
  return lines.join('\n');
}

// =============================================================================
// JSON TEXT
// =============================================================================

/** A JSON string literal; non-ASCII characters are kept as they are. */
export function jsonString(value: string): string {
  return JSON.stringify(value);
}

/**
 * Render `{ key: value }` entries whose values are already JSON text, one
 * per line, at the given nesting depth with two-space indentation.
 */
export function jsonObject(entries: Array<[string, string]>, depth = 0): string {
  if (entries.length === 0) return '{}';
  const pad = '  '.repeat(depth + 1);
  const body = entries.map(([key, value]) => `${pad}${jsonString(key)}: ${value}`).join(',\n');
  return `{\n${body}\n${'  '.repeat(depth)}}`;
}
