/**
 * Table Formatting Utility
 *
 * Box-drawn tables for `docrag list` and similar listings.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column {
  /** Header text */
  header: string;
  /** Key looked up in each row */
  key: string;
  /** Alignment (default: left) */
  align?: Alignment;
  /** Cells longer than this are cut and end in "…" */
  maxWidth?: number;
}

export type Row = Record<string, string | number | null | undefined>;

const BOX = {
  top: ['┌', '┬', '┐'],
  middle: ['├', '┼', '┤'],
  bottom: ['└', '┴', '┘'],
  horizontal: '─',
  vertical: '│',
} as const;

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '');
}

function cellText(column: Column, row: Row): string {
  const value = row[column.key];
  const text = value === null || value === undefined ? '' : String(value);
  if (column.maxWidth !== undefined && text.length > column.maxWidth) {
    return text.slice(0, Math.max(0, column.maxWidth - 1)) + '…';
  }
  return text;
}

function pad(str: string, width: number, align: Alignment): string {
  const padding = Math.max(0, width - stripAnsi(str).length);
  return align === 'right' ? ' '.repeat(padding) + str : str + ' '.repeat(padding);
}

/**
 * Format rows as a table.
 *
 * @example
 * ```ts
 * formatTable(
 *   [{ header: 'ID', key: 'id', align: 'right' }, { header: 'Name', key: 'name' }],
 *   [{ id: 1, name: 'guide.md' }]
 * );
 * // ┌────┬──────────┐
 * // │ ID │ Name     │
 * // ├────┼──────────┤
 * // │  1 │ guide.md │
 * // └────┴──────────┘
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const cells = rows.map((row) => columns.map((column) => cellText(column, row)));
  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...cells.map((line) => stripAnsi(line[i] ?? '').length))
  );

  const rule = ([left, middle, right]: readonly [string, string, string]): string =>
    left + widths.map((w) => BOX.horizontal.repeat(w + 2)).join(middle) + right;

  const line = (values: string[], header = false): string => {
    const padded = columns.map((column, i) => {
      const text = pad(values[i] ?? '', widths[i] ?? 0, column.align ?? 'left');
      return header ? chalk.bold(text) : text;
    });
    return BOX.vertical + padded.map((c) => ` ${c} `).join(BOX.vertical) + BOX.vertical;
  };

  return [
    rule(BOX.top),
    line(columns.map((c) => c.header), true),
    rule(BOX.middle),
    ...cells.map((values) => line(values)),
    rule(BOX.bottom),
  ].join('\n');
}
