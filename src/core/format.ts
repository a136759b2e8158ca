/**
 * Text rendering of a grid: one line per row.
 *
 * @example
 * formatGrid(JaggedGrid.fromRows([[1, 2], [], [3]]));
 * // '1,2\n\n3\n'
 */

import type { FormatOptions, RowSource } from '../types';

export function formatGrid<T>(source: RowSource<T>, options: FormatOptions<T> = {}): string {
  const delimiter = options.delimiter ?? ',';
  const lineBreak = options.lineBreak ?? '\n';
  const trailing = options.trailingDelimiter ?? false;
  const stringify = options.stringify ?? String;

  let out = '';
  const rowCount = source.getRowCount();
  for (let row = 0; row < rowCount; row++) {
    const parts: string[] = [];
    for (const value of source.rowValues(row)) {
      parts.push(stringify(value));
    }
    out += parts.join(delimiter);
    if (trailing && parts.length > 0) {
      out += delimiter;
    }
    out += lineBreak;
  }
  return out;
}
