/**
 * GridMutator - applies one structural edit and announces it
 *
 * Commands never touch the grid directly: they call the mutator, which runs
 * the edit on the JaggedGrid and, once it has succeeded, emits the matching
 * event. Undo and redo therefore publish the same events as the original edit.
 */

import type { CellValue, Position } from '../types';
import type { EventEmitter } from './EventEmitter';
import type { JaggedGrid } from './JaggedGrid';
import { GridBoundsError } from './errors';

export class GridMutator<T extends CellValue> {
  constructor(
    private readonly grid: JaggedGrid<T>,
    private readonly events: EventEmitter<T>
  ) {}

  insertCell(position: Position, value: T): void {
    const [row, col] = position;
    this.grid.insert(row, col, value);
    this.events.emit('cell:inserted', { position: [row, col], value });
  }

  removeCell(position: Position): T {
    const [row, col] = position;
    const value = this.grid.removeAt(row, col);
    this.events.emit('cell:removed', { position: [row, col], value });
    return value;
  }

  /**
   * @returns the value that was replaced
   * @throws GridBoundsError when the cell is outside the grid
   */
  updateCell(position: Position, value: T): T {
    const [row, col] = position;
    const oldValue = this.grid.get(row, col);
    if (oldValue === undefined || !this.grid.set(row, col, value)) {
      throw this.cellFault('set', row, col);
    }
    this.events.emit('cell:updated', { position: [row, col], oldValue, newValue: value });
    return oldValue;
  }

  swapCells(first: Position, second: Position): void {
    this.grid.swap(first, second);
    this.events.emit('cells:swapped', { first, second });
  }

  insertRow(row: number, values: readonly T[]): void {
    this.grid.insertRow(row, values);
    this.events.emit('row:inserted', { row, values: [...values] });
  }

  removeRow(row: number): T[] {
    const values = this.grid.removeRow(row);
    this.events.emit('row:removed', { row, values });
    return values;
  }

  /**
   * @returns the rows that were dropped, for restore()
   */
  clear(): T[][] {
    const rows = this.grid.toRows();
    const size = this.grid.getSize();
    this.grid.clear();
    this.events.emit('grid:cleared', { rowCount: rows.length, size });
    return rows;
  }

  /**
   * Append rows to the end (used to undo clear)
   */
  restore(rows: readonly T[][]): void {
    for (const values of rows) {
      this.insertRow(this.grid.getRowCount(), values);
    }
  }

  private cellFault(operation: string, row: number, col: number): GridBoundsError {
    const size = this.grid.getRowSize(row);
    return size === undefined
      ? GridBoundsError.row(operation, row, this.grid.getRowCount())
      : GridBoundsError.column(operation, row, col, size);
  }
}
