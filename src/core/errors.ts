/**
 * Grid errors
 *
 * A grid reports two kinds of failure:
 * - absence: a query asked for a cell that is not there. Queries return
 *   `undefined` and never throw.
 * - contract violation: an edit was given a coordinate its precondition rules
 *   out. The edit throws one of the errors below and leaves the grid untouched.
 *
 * @example
 * try {
 *   grid.insert(9, 0, 'x');
 * } catch (error) {
 *   if (error instanceof GridBoundsError) {
 *     console.warn(error.axis, error.index, error.limit);
 *   }
 * }
 */

export type GridErrorCode =
  | 'OUT_OF_BOUNDS'
  | 'EMPTY_GRID'
  | 'INVALID_SHAPE'
  | 'UNKNOWN_COLUMN'
  | 'DUPLICATE_COLUMN'
  | 'STALE_HANDLE';

/**
 * Base class of every error thrown by the library
 */
export class GridError extends Error {
  readonly code: GridErrorCode;
  readonly timestamp: number;

  constructor(code: GridErrorCode, message: string) {
    super(message);
    this.name = 'GridError';
    this.code = code;
    this.timestamp = Date.now();
  }

  static unknownColumn(column: string, available: readonly string[]): GridError {
    return new GridError(
      'UNKNOWN_COLUMN',
      `Unknown column "${column}" (available: ${available.join(', ') || 'none'})`
    );
  }

  static duplicateColumn(column: string): GridError {
    return new GridError('DUPLICATE_COLUMN', `Column "${column}" is named more than once`);
  }
}

export type GridAxis = 'row' | 'col';

/**
 * Index outside the range an operation accepts.
 *
 * The valid range is `0..limit - 1`; `limit` is 0 when nothing is valid.
 */
export class GridBoundsError extends GridError {
  readonly operation: string;
  readonly axis: GridAxis;
  readonly index: number;
  readonly limit: number;
  /** Row the column index was checked against (column faults only) */
  readonly row: number | undefined;

  constructor(
    operation: string,
    axis: GridAxis,
    index: number,
    limit: number,
    row?: number
  ) {
    const where = axis === 'row'
      ? `row ${index} out of bounds`
      : `column ${index} out of bounds for row ${row}`;
    super('OUT_OF_BOUNDS', `${operation}: ${where} (${describeRange(limit)})`);
    this.name = 'GridBoundsError';
    this.operation = operation;
    this.axis = axis;
    this.index = index;
    this.limit = limit;
    this.row = row;
  }

  static row(operation: string, index: number, rowCount: number): GridBoundsError {
    return new GridBoundsError(operation, 'row', index, rowCount);
  }

  static column(
    operation: string,
    row: number,
    index: number,
    limit: number
  ): GridBoundsError {
    return new GridBoundsError(operation, 'col', index, limit, row);
  }
}

/**
 * `push` needs a last row to append to
 */
export class EmptyGridError extends GridError {
  readonly operation: string;

  constructor(operation: string) {
    super('EMPTY_GRID', `${operation}: grid has no rows; add one with pushNewRow first`);
    this.name = 'EmptyGridError';
    this.operation = operation;
  }
}

/**
 * Bulk constructor given dimensions that are not non-negative integers
 */
export class GridShapeError extends GridError {
  readonly rows: number;
  readonly cols: number;

  constructor(rows: number, cols: number) {
    super(
      'INVALID_SHAPE',
      `Grid shape must be non-negative integers, got ${rows} x ${cols}`
    );
    this.name = 'GridShapeError';
    this.rows = rows;
    this.cols = cols;
  }
}

/**
 * A cell handle or row iterator used after the grid's layout changed
 *
 * Inserting or removing elements or rows moves cells to other slots, so
 * handles taken before the edit no longer name the cell they were made for.
 */
export class StaleHandleError extends GridError {
  readonly operation: string;

  constructor(operation: string) {
    super(
      'STALE_HANDLE',
      `${operation}: the grid layout changed after this handle was created`
    );
    this.name = 'StaleHandleError';
    this.operation = operation;
  }
}

function describeRange(limit: number): string {
  return limit > 0 ? `valid: 0..${limit - 1}` : 'no valid index';
}
