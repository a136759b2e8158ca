/**
 * Table interop options
 */

/**
 * Turning a long-format table into a jagged grid
 */
export interface TableGroupingOptions {
  /** Column whose distinct values become rows */
  groupBy: string;

  /** Column whose entries fill each row */
  values: string;

  /** Order rows by group key instead of first appearance (default: false) */
  sortGroups?: boolean;
}

/**
 * Column names for a grid flattened into a table
 */
export interface TableExportOptions {
  /** default: 'row' */
  rowColumn?: string;

  /** default: 'col' */
  colColumn?: string;

  /** default: 'value' */
  valueColumn?: string;
}
