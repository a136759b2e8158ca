/**
 * TableAdapter - moves data between arquero tables and jagged grids
 *
 * A long-format table (one record per value) maps naturally onto a jagged
 * grid: group the records by a key and every group becomes a row, however
 * many values it has.
 *
 * @example
 * const orders = aq.table({
 *   customer: ['ann', 'bob', 'ann'],
 *   item:     ['tea', 'jam', 'rye'],
 * });
 *
 * const grid = gridFromTable(orders, { groupBy: 'customer', values: 'item' });
 * grid.toRows(); // [['tea', 'rye'], ['jam']]
 *
 * gridToTable(grid).objects();
 * // [{ row: 0, col: 0, value: 'tea' }, { row: 0, col: 1, value: 'rye' }, ...]
 */

import * as aq from 'arquero';
import type { CellValue, TableExportOptions, TableGroupingOptions } from '../types';
import { JaggedGrid } from '../core/JaggedGrid';
import { GridError } from '../core/errors';

/** Column table as produced by `aq.table` / `aq.from` */
export type Table = ReturnType<typeof aq.table>;

/** Rollup output column, kept apart from any user column name */
const GROUP_VALUES = '__grid_values__';

/**
 * One row per distinct `groupBy` value, holding that group's `values` entries
 * in table order
 *
 * Rows follow the order in which each key first appears, or key order when
 * `sortGroups` is set. A group exists only where a record does, so empty rows
 * written by gridToTable do not come back.
 *
 * @throws GridError (UNKNOWN_COLUMN) when a named column is missing
 */
export function gridFromTable(
  table: Table,
  options: TableGroupingOptions
): JaggedGrid<CellValue> {
  const { groupBy, values } = options;
  const columns = table.columnNames();
  for (const name of [groupBy, values]) {
    if (!columns.includes(name)) {
      throw GridError.unknownColumn(name, columns);
    }
  }

  let grouped = table
    .groupby(groupBy)
    .rollup({ [GROUP_VALUES]: aq.op.array_agg(values) });

  if (options.sortGroups) {
    grouped = grouped.orderby(groupBy);
  }

  const rows: unknown[] = Array.from(grouped.array(GROUP_VALUES));
  return JaggedGrid.fromRows(
    rows.map((entry) => (Array.isArray(entry) ? entry.map(toCellValue) : []))
  );
}

/**
 * Flatten a grid into a long-format table, one record per element in
 * row-major order
 *
 * Empty rows produce no records and are lost on the way back through
 * gridFromTable.
 *
 * @throws GridError (DUPLICATE_COLUMN) when two output columns share a name
 */
export function gridToTable<T extends CellValue>(
  grid: JaggedGrid<T>,
  options: TableExportOptions = {}
): Table {
  const rowColumn = options.rowColumn ?? 'row';
  const colColumn = options.colColumn ?? 'col';
  const valueColumn = options.valueColumn ?? 'value';

  const seen = new Set<string>();
  for (const name of [rowColumn, colColumn, valueColumn]) {
    if (seen.has(name)) {
      throw GridError.duplicateColumn(name);
    }
    seen.add(name);
  }

  const rows: number[] = [];
  const cols: number[] = [];
  const cells: T[] = [];
  for (const [row, col, value] of grid.entries()) {
    rows.push(row);
    cols.push(col);
    cells.push(value);
  }

  return aq.table({
    [rowColumn]: rows,
    [colColumn]: cols,
    [valueColumn]: cells,
  });
}

// Table cells may be undefined; grid cells may not
function toCellValue(value: unknown): CellValue {
  return value ?? null;
}
