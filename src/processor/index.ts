/**
 * Processor module
 *
 * Conversions between grids and arquero tables.
 */

export { gridFromTable, gridToTable } from './TableAdapter';
export type { Table } from './TableAdapter';
