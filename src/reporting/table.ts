/**
 * Plain terminal table renderer.
 *
 * Column widths start from the content (capped by each column's maxWidth)
 * and the widest column is narrowed one character at a time until the table
 * fits the terminal. Cells wrap on spaces; styles are applied after wrapping.
 */

import chalk from 'chalk';

import { centerVisible, padVisible, visibleLength, wrapText, type Style } from '../utils/text.js';

export interface TableColumn {
  header: string;
  maxWidth?: number;
  minWidth?: number;
  style?: Style;
}

export interface TableOptions {
  /** Total width available, normally the terminal width. */
  width: number;
  title?: string;
  titleStyle?: Style;
  headerStyle?: Style;
  /** Draw a rule between body rows, not only under the header. */
  showLines?: boolean;
}

const GAP = 2;
const EDGE = 1;
const DEFAULT_MIN_WIDTH = 4;

/**
 * Compute the rendered width of each column for the given table width.
 */
export function layoutColumnWidths(columns: TableColumn[], rows: string[][], width: number): number[] {
  const widths = columns.map((column, i) => {
    const longest = Math.max(
      visibleLength(column.header),
      ...rows.map((row) => longestLine(row[i] ?? '')),
    );
    return Math.max(1, Math.min(longest, column.maxWidth ?? Number.POSITIVE_INFINITY));
  });

  const overhead = EDGE + GAP * Math.max(0, columns.length - 1);
  let excess = overhead + widths.reduce((sum, w) => sum + w, 0) - width;

  while (excess > 0) {
    let widest = -1;
    for (let i = 0; i < widths.length; i++) {
      const min = columns[i].minWidth ?? DEFAULT_MIN_WIDTH;
      if (widths[i] > min && (widest === -1 || widths[i] > widths[widest])) {
        widest = i;
      }
    }
    if (widest === -1) break;
    widths[widest]--;
    excess--;
  }

  return widths;
}

export function renderTable(columns: TableColumn[], rows: string[][], options: TableOptions): string {
  const widths = layoutColumnWidths(columns, rows, options.width);
  const tableWidth = EDGE + widths.reduce((sum, w) => sum + w, 0) + GAP * Math.max(0, widths.length - 1);
  const rule = chalk.dim('─'.repeat(tableWidth));
  const headerStyle = options.headerStyle ?? chalk.bold;
  const lines: string[] = [];

  if (options.title) {
    const titleStyle = options.titleStyle ?? chalk.italic;
    for (const titleLine of wrapText(options.title, tableWidth)) {
      lines.push(titleStyle(centerVisible(titleLine, tableWidth).trimEnd()));
    }
  }

  lines.push(...renderRow(columns.map((c) => c.header), widths, () => headerStyle));
  lines.push(rule);

  rows.forEach((row, index) => {
    if (index > 0 && options.showLines) lines.push(rule);
    lines.push(...renderRow(row, widths, (i) => columns[i].style));
  });

  return lines.join('\n');
}

function renderRow(cells: string[], widths: number[], styleFor: (column: number) => Style | undefined): string[] {
  const wrapped = widths.map((width, i) => wrapText(cells[i] ?? '', width));
  const height = Math.max(1, ...wrapped.map((cellLines) => cellLines.length));
  const lines: string[] = [];

  for (let lineIndex = 0; lineIndex < height; lineIndex++) {
    const parts = widths.map((width, i) => {
      const text = wrapped[i][lineIndex] ?? '';
      const style = styleFor(i);
      const styled = style && text.length > 0 ? style(text) : text;
      return padVisible(styled, width);
    });
    lines.push((' '.repeat(EDGE) + parts.join(' '.repeat(GAP))).trimEnd());
  }

  return lines;
}

function longestLine(text: string): number {
  return Math.max(0, ...text.split('\n').map((line) => visibleLength(line)));
}
