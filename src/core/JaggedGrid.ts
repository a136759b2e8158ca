/**
 * JaggedGrid - row-major grid with rows of independent length
 *
 * Every row lives in one flat array. A second, much smaller array holds the
 * offset at which each row starts:
 *
 *   rows:       [10, 5, 4] [3, 9] [1] [7, 6, 2, 8]
 *   elements:   10 5 4 3 9 1 7 6 2 8
 *   rowStarts:  0 3 5 6
 *
 * Row `i` occupies `elements[rowStarts[i] .. rowStarts[i + 1])`, the last row
 * runs to the end of `elements`. Rows may be empty.
 *
 * Layout rules, restored by every public method before it returns:
 * 1. `rowStarts` is non-decreasing
 * 2. `rowStarts[0] === 0` when there is at least one row
 * 3. no row start lies past `elements.length`
 *
 * Queries answer `undefined` for coordinates outside the grid. Edits throw a
 * GridError instead, before anything is modified.
 *
 * @example
 * const grid = JaggedGrid.fromRows([[10, 5, 4], [3, 9], [1], [7, 6, 2, 8]]);
 *
 * grid.insert(2, 1, 99);   // row 2 is now [1, 99]
 * grid.get(3, 0);          // 7, row 3 moved one slot right with its content
 * grid.push(11);           // [3, 4]
 * grid.get(10, 0);         // undefined
 */

import type {
  CellRef,
  CellValue,
  Duplicate,
  FormatOptions,
  Position,
  RowSource,
} from '../types';
import { EmptyGridError, GridBoundsError, GridShapeError, StaleHandleError } from './errors';
import { formatGrid } from './format';

/**
 * Jagged grid over a single flat buffer
 *
 * @template T - element type; `undefined` is reserved for "no such cell"
 */
export class JaggedGrid<T extends CellValue> implements Iterable<T>, RowSource<T> {
  /** All elements, row after row */
  private elements: T[] = [];

  /** Index into `elements` where each row begins */
  private rowStarts: number[] = [];

  /** Bumped whenever elements move between slots; handles check it */
  private layoutVersion = 0;

  // ==========================================================================
  // Construction
  // ==========================================================================

  /**
   * Grid with no rows
   */
  static empty<T extends CellValue>(): JaggedGrid<T> {
    return new JaggedGrid<T>();
  }

  /**
   * `rows` rows of `cols` copies of `value`
   *
   * @param duplicate - copies `value` for each cell (default: plain assignment,
   *   so object values are shared)
   *
   * @example
   * JaggedGrid.filled(2, 3, 0).toRows(); // [[0, 0, 0], [0, 0, 0]]
   * JaggedGrid.filled(2, 2, { hits: 0 }, (v) => ({ ...v }));
   */
  static filled<T extends CellValue>(
    rows: number,
    cols: number,
    value: T,
    duplicate: Duplicate<T> = (v) => v
  ): JaggedGrid<T> {
    if (!isCount(rows) || !isCount(cols)) {
      throw new GridShapeError(rows, cols);
    }

    const grid = new JaggedGrid<T>();
    for (let row = 0; row < rows; row++) {
      grid.rowStarts.push(row * cols);
      for (let col = 0; col < cols; col++) {
        grid.elements.push(duplicate(value));
      }
    }
    return grid;
  }

  /**
   * Flatten a sequence of rows; rows may differ in length, including zero
   *
   * @example
   * const grid = JaggedGrid.fromRows([['a', 'b'], [], ['c']]);
   * grid.getRowSize(1); // 0
   */
  static fromRows<T extends CellValue>(rows: Iterable<Iterable<T>>): JaggedGrid<T> {
    const grid = new JaggedGrid<T>();
    for (const row of rows) {
      grid.rowStarts.push(grid.elements.length);
      for (const value of row) {
        grid.elements.push(value);
      }
    }
    return grid;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getRowCount(): number {
    return this.rowStarts.length;
  }

  /**
   * Total number of elements across all rows
   */
  getSize(): number {
    return this.elements.length;
  }

  /**
   * No elements at all; empty rows may still exist
   */
  isEmpty(): boolean {
    return this.elements.length === 0;
  }

  /**
   * Length of a row, or undefined if the row does not exist
   */
  getRowSize(row: number): number | undefined {
    return this.isRow(row) ? this.sizeOf(row) : undefined;
  }

  /**
   * Offset of a row's first slot in the flat buffer
   */
  getRowStart(row: number): number | undefined {
    return this.isRow(row) ? this.startOf(row) : undefined;
  }

  /**
   * Offset of a cell in the flat buffer
   */
  flatIndexOf(row: number, col: number): number | undefined {
    return this.isCell(row, col) ? this.startOf(row) + col : undefined;
  }

  has(row: number, col: number): boolean {
    return this.isCell(row, col);
  }

  /**
   * Value at a cell
   *
   * @returns the value, or undefined when the cell is outside the grid
   *
   * @example
   * const value = grid.get(1, 1);
   * if (value !== undefined) {
   *   render(value);
   * }
   */
  get(row: number, col: number): T | undefined {
    if (!this.isCell(row, col)) {
      return undefined;
    }
    return this.elementAt(this.startOf(row) + col);
  }

  /**
   * Writable handle on a cell, or undefined when the cell is outside the grid
   *
   * @example
   * const cell = grid.getCell(3, 4);
   * if (cell) {
   *   cell.value = 5;
   * }
   */
  getCell(row: number, col: number): CellRef<T> | undefined {
    if (!this.isCell(row, col)) {
      return undefined;
    }
    return this.cellRef(row, col, this.startOf(row) + col, this.layoutVersion);
  }

  /**
   * Position of the last element of the last row, if it has one
   */
  lastPosition(): Position | undefined {
    const row = this.rowStarts.length - 1;
    if (row < 0) {
      return undefined;
    }
    const size = this.sizeOf(row);
    return size > 0 ? [row, size - 1] : undefined;
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  /**
   * Replace the value at an existing cell
   *
   * @returns false when the cell is outside the grid (nothing changes)
   */
  set(row: number, col: number, value: T): boolean {
    if (!this.isCell(row, col)) {
      return false;
    }
    this.elements[this.startOf(row) + col] = value;
    return true;
  }

  /**
   * Append to the end of the last row
   *
   * @returns position of the new element
   * @throws EmptyGridError when the grid has no rows
   */
  push(value: T): Position {
    const row = this.rowStarts.length - 1;
    if (row < 0) {
      throw new EmptyGridError('push');
    }
    this.elements.push(value);
    this.layoutVersion++;
    return [row, this.sizeOf(row) - 1];
  }

  /**
   * Start a new row holding just `value`
   */
  pushNewRow(value: T): Position {
    this.rowStarts.push(this.elements.length);
    this.elements.push(value);
    this.layoutVersion++;
    return [this.rowStarts.length - 1, 0];
  }

  /**
   * Append to the end of a given row
   *
   * @throws GridBoundsError when the row does not exist
   */
  pushAtRow(row: number, value: T): Position {
    this.requireRow('pushAtRow', row);
    const col = this.sizeOf(row);
    this.insertAt(row, col, value);
    return [row, col];
  }

  /**
   * Insert `value` at column `col` of `row`, shifting the rest of the row and
   * every later row one slot to the right
   *
   * `col` may equal the row size, which appends.
   *
   * @throws GridBoundsError when the row does not exist or `col` is past the end
   */
  insert(row: number, col: number, value: T): void {
    this.requireRow('insert', row);
    const size = this.sizeOf(row);
    if (!isIndexBelow(col, size + 1)) {
      throw GridBoundsError.column('insert', row, col, size + 1);
    }
    this.insertAt(row, col, value);
  }

  /**
   * Insert a whole row before row `row`; `row` equal to the row count appends
   *
   * @throws GridBoundsError when `row` is past the row count
   */
  insertRow(row: number, values: Iterable<T> = []): void {
    const rowCount = this.rowStarts.length;
    if (!isIndexBelow(row, rowCount + 1)) {
      throw GridBoundsError.row('insertRow', row, rowCount + 1);
    }

    const items = [...values];
    const start = this.startOf(row);
    this.elements = this.elements.slice(0, start).concat(items, this.elements.slice(start));
    this.rowStarts.splice(row, 0, start);
    this.shiftRowStarts(row + 1, items.length);
    this.layoutVersion++;
  }

  /**
   * Exchange two cells. Row sizes and offsets are untouched.
   *
   * @throws GridBoundsError when either position is outside the grid
   */
  swap(first: Position, second: Position): void {
    const a = this.requireCell('swap', first[0], first[1]);
    const b = this.requireCell('swap', second[0], second[1]);
    const held = this.elementAt(a);
    this.elements[a] = this.elementAt(b);
    this.elements[b] = held;
  }

  /**
   * Take out the value at a cell, closing the gap
   *
   * @throws GridBoundsError when the cell is outside the grid
   */
  removeAt(row: number, col: number): T {
    const index = this.requireCell('removeAt', row, col);
    const value = this.elementAt(index);
    this.elements.splice(index, 1);
    this.shiftRowStarts(row + 1, -1);
    this.layoutVersion++;
    return value;
  }

  /**
   * Take out the last element of the last row
   *
   * The row itself stays, even if it ends up empty. Only removeRow deletes rows.
   *
   * @returns the removed value, or undefined when there are no rows or the
   *   last row is already empty
   */
  remove(): T | undefined {
    const last = this.lastPosition();
    if (!last) {
      return undefined;
    }
    return this.removeAt(last[0], last[1]);
  }

  /**
   * Delete a row and its elements; later rows move up
   *
   * @returns the removed row's values
   * @throws GridBoundsError when the row does not exist
   */
  removeRow(row: number): T[] {
    this.requireRow('removeRow', row);
    const start = this.startOf(row);
    const size = this.sizeOf(row);

    const removed = this.elements.splice(start, size);
    this.rowStarts.splice(row, 1);
    this.shiftRowStarts(row, -size);
    this.layoutVersion++;
    return removed;
  }

  /**
   * Drop every row
   */
  clear(): void {
    this.elements = [];
    this.rowStarts = [];
    this.layoutVersion++;
  }

  // ==========================================================================
  // Iteration
  // ==========================================================================

  [Symbol.iterator](): Iterator<T> {
    return this.values();
  }

  /**
   * Every element, row-major. Each call starts a fresh pass.
   */
  *values(): IterableIterator<T> {
    const version = this.layoutVersion;
    for (let i = 0; i < this.elements.length; i++) {
      this.requireLayout('values', version);
      yield this.elementAt(i);
    }
  }

  /**
   * Writable handle on every cell, row-major
   *
   * @example
   * for (const cell of grid.cells()) {
   *   cell.value = cell.value * 2;
   * }
   */
  *cells(): IterableIterator<CellRef<T>> {
    const version = this.layoutVersion;
    for (let row = 0; row < this.rowStarts.length; row++) {
      this.requireLayout('cells', version);
      const start = this.startOf(row);
      const size = this.sizeOf(row);
      for (let col = 0; col < size; col++) {
        this.requireLayout('cells', version);
        yield this.cellRef(row, col, start + col, version);
      }
    }
  }

  /**
   * Elements of one row, in column order
   *
   * @throws GridBoundsError (at call time) when the row does not exist
   */
  rowValues(row: number): IterableIterator<T> {
    this.requireRow('rowValues', row);
    return this.slotValues(this.startOf(row), this.sizeOf(row), this.layoutVersion);
  }

  /**
   * Writable handles on one row's cells
   *
   * @throws GridBoundsError (at call time) when the row does not exist
   */
  rowCells(row: number): IterableIterator<CellRef<T>> {
    this.requireRow('rowCells', row);
    return this.slotCells(row, this.startOf(row), this.sizeOf(row), this.layoutVersion);
  }

  /**
   * Every row as a fresh array
   */
  *rows(): IterableIterator<T[]> {
    for (let row = 0; row < this.rowStarts.length; row++) {
      const start = this.startOf(row);
      yield this.elements.slice(start, start + this.sizeOf(row));
    }
  }

  /**
   * `[row, col, value]` for every cell, row-major
   */
  *entries(): IterableIterator<[number, number, T]> {
    const version = this.layoutVersion;
    for (let row = 0; row < this.rowStarts.length; row++) {
      const start = this.startOf(row);
      const size = this.sizeOf(row);
      for (let col = 0; col < size; col++) {
        this.requireLayout('entries', version);
        yield [row, col, this.elementAt(start + col)];
      }
    }
  }

  toRows(): T[][] {
    return [...this.rows()];
  }

  /**
   * Same shape, every value transformed
   */
  map<U extends CellValue>(fn: (value: T, row: number, col: number) => U): JaggedGrid<U> {
    const result = new JaggedGrid<U>();
    result.rowStarts = [...this.rowStarts];
    for (const [row, col, value] of this.entries()) {
      result.elements.push(fn(value, row, col));
    }
    return result;
  }

  clone(duplicate: Duplicate<T> = (v) => v): JaggedGrid<T> {
    return this.map((value) => duplicate(value));
  }

  /**
   * One line per row, elements joined by the delimiter
   *
   * @example
   * JaggedGrid.fromRows([[1, 2], [3]]).toString(); // '1,2\n3\n'
   */
  toString(options?: FormatOptions<T>): string {
    return formatGrid(this, options);
  }

  // ==========================================================================
  // Internal helpers
  // ==========================================================================

  /**
   * Start of a row; `row === rowCount` yields the buffer length, the start a
   * row appended at the end would get
   */
  private startOf(row: number): number {
    return this.rowStarts[row] ?? this.elements.length;
  }

  private sizeOf(row: number): number {
    return this.startOf(row + 1) - this.startOf(row);
  }

  /**
   * Move every row start from `firstRow` onward by `delta`
   *
   * The one place offsets change after an edit: a row that grows or shrinks
   * moves all rows behind it, not only its neighbour.
   */
  private shiftRowStarts(firstRow: number, delta: number): void {
    if (delta === 0) return;
    for (let row = firstRow; row < this.rowStarts.length; row++) {
      this.rowStarts[row] = this.startOf(row) + delta;
    }
  }

  private insertAt(row: number, col: number, value: T): void {
    this.elements.splice(this.startOf(row) + col, 0, value);
    this.shiftRowStarts(row + 1, 1);
    this.layoutVersion++;
  }

  private elementAt(index: number): T {
    const value = this.elements[index];
    if (value === undefined) {
      throw new RangeError(
        `[JaggedGrid] slot ${index} is outside the buffer (length ${this.elements.length})`
      );
    }
    return value;
  }

  private isRow(row: number): boolean {
    return isIndexBelow(row, this.rowStarts.length);
  }

  private isCell(row: number, col: number): boolean {
    return this.isRow(row) && isIndexBelow(col, this.sizeOf(row));
  }

  private requireRow(operation: string, row: number): void {
    if (!this.isRow(row)) {
      throw GridBoundsError.row(operation, row, this.rowStarts.length);
    }
  }

  /**
   * @returns flat index of the cell
   */
  private requireCell(operation: string, row: number, col: number): number {
    this.requireRow(operation, row);
    const size = this.sizeOf(row);
    if (!isIndexBelow(col, size)) {
      throw GridBoundsError.column(operation, row, col, size);
    }
    return this.startOf(row) + col;
  }

  /**
   * @throws StaleHandleError when elements moved since `version` was taken
   */
  private requireLayout(operation: string, version: number): void {
    if (version !== this.layoutVersion) {
      throw new StaleHandleError(operation);
    }
  }

  private *slotValues(start: number, size: number, version: number): IterableIterator<T> {
    for (let i = start; i < start + size; i++) {
      this.requireLayout('rowValues', version);
      yield this.elementAt(i);
    }
  }

  private *slotCells(
    row: number,
    start: number,
    size: number,
    version: number
  ): IterableIterator<CellRef<T>> {
    for (let col = 0; col < size; col++) {
      this.requireLayout('rowCells', version);
      yield this.cellRef(row, col, start + col, version);
    }
  }

  /**
   * Live handle on one slot, valid until the layout next changes
   */
  private cellRef(row: number, col: number, index: number, version: number): CellRef<T> {
    const read = (): T => {
      this.requireLayout(`cell (${row}, ${col})`, version);
      return this.elementAt(index);
    };
    const write = (value: T): void => {
      this.requireLayout(`cell (${row}, ${col})`, version);
      this.elementAt(index);
      this.elements[index] = value;
    };
    return {
      row,
      col,
      get value(): T {
        return read();
      },
      set value(value: T) {
        write(value);
      },
    };
  }
}

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function isIndexBelow(index: number, limit: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < limit;
}
