/**
 * Grid type definitions
 *
 * Value and coordinate types shared by the grid, its editor and the adapters.
 */

// ============================================================================
// Values
// ============================================================================

/**
 * Anything a cell may hold.
 *
 * `undefined` is excluded so that it only ever means "no such cell".
 */
export type CellValue = NonNullable<unknown> | null;

/**
 * Produces an independent copy of a value (used by fill constructors and clone)
 */
export type Duplicate<T> = (value: T) => T;

// ============================================================================
// Coordinates
// ============================================================================

/**
 * Cell coordinate as `[row, col]`
 *
 * @example
 * const position: Position = [3, 4];
 */
export type Position = readonly [row: number, col: number];

/**
 * Live handle on one cell.
 *
 * Writing `value` replaces the element in place. Any insert or removal
 * afterwards makes the handle stale, and reading or writing it then throws
 * StaleHandleError.
 */
export interface CellRef<T> {
  readonly row: number;
  readonly col: number;
  value: T;
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Text rendering options
 */
export interface FormatOptions<T> {
  /** Separator between elements (default: ',') */
  delimiter?: string;

  /** Row terminator (default: '\n') */
  lineBreak?: string;

  /** Write the delimiter after every element, including the last (default: false) */
  trailingDelimiter?: boolean;

  /** Element to text (default: String) */
  stringify?: (value: T) => string;
}

/**
 * Anything that can hand out its rows one by one
 */
export interface RowSource<T> {
  getRowCount(): number;
  rowValues(row: number): Iterable<T>;
}
