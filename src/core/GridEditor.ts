/**
 * GridEditor - editing facade over a JaggedGrid
 *
 * Runs every edit as an undoable command and publishes what changed.
 *
 * Structure:
 * - JaggedGrid: the data
 * - GridMutator: edit + event, used by the commands
 * - UndoStack: history of executed commands
 * - EventEmitter: change notifications
 *
 * @example
 * const editor = new GridEditor(JaggedGrid.fromRows([[10, 5, 4], [3, 9]]));
 *
 * editor.on('row:removed', (event) => {
 *   console.log(`row ${event.payload.row} gone`);
 * });
 *
 * editor.removeRow(0);
 * editor.undo();          // row 0 is back
 *
 * editor.beginBatch('append pair');
 * editor.push(1);
 * editor.push(2);
 * editor.endBatch();
 * editor.undo();          // both pushes reverted
 */

import type {
  CellValue,
  Command,
  FormatOptions,
  GridEventHandler,
  GridEventType,
  Position,
  Unsubscribe,
  UndoStackEvents,
} from '../types';
import { EventEmitter } from './EventEmitter';
import { GridMutator } from './GridMutator';
import { JaggedGrid } from './JaggedGrid';
import { UndoStack } from './UndoStack';
import {
  ClearGridCommand,
  InsertCellCommand,
  InsertRowCommand,
  RemoveCellCommand,
  RemoveRowCommand,
  SwapCellsCommand,
  UpdateCellCommand,
} from './commands';
import { EmptyGridError, GridBoundsError, GridError } from './errors';

/**
 * GridEditor options
 */
export interface GridEditorOptions {
  /** Undo steps kept (default: 100) */
  maxHistory?: number;

  /** Record edits for undo (default: true). When false edits run unrecorded. */
  trackHistory?: boolean;
}

export class GridEditor<T extends CellValue> {
  private readonly grid: JaggedGrid<T>;
  private readonly events = new EventEmitter<T>();
  private readonly history: UndoStack;
  private readonly mutator: GridMutator<T>;
  private readonly trackHistory: boolean;

  /**
   * @param grid - grid to edit (default: a new empty grid)
   */
  constructor(grid: JaggedGrid<T> = JaggedGrid.empty<T>(), options: GridEditorOptions = {}) {
    this.grid = grid;
    this.history = new UndoStack({ maxSize: options.maxHistory ?? 100 });
    this.trackHistory = options.trackHistory ?? true;
    this.mutator = new GridMutator(this.grid, this.events);
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  on<K extends GridEventType>(type: K, handler: GridEventHandler<T, K>): Unsubscribe {
    return this.events.on(type, handler);
  }

  once<K extends GridEventType>(type: K, handler: GridEventHandler<T, K>): Unsubscribe {
    return this.events.once(type, handler);
  }

  off<K extends GridEventType>(type: K, handler: GridEventHandler<T, K>): void {
    this.events.off(type, handler);
  }

  onAny(handler: GridEventHandler<T, GridEventType>): Unsubscribe {
    return this.events.onAny(handler);
  }

  /**
   * Notified whenever canUndo / canRedo may have changed
   */
  onHistoryChange(handler: (state: UndoStackEvents['stateChange']) => void): Unsubscribe {
    return this.history.on('stateChange', handler);
  }

  // ==========================================================================
  // Reading
  // ==========================================================================

  /**
   * The edited grid. Changes made on it directly skip history and events.
   */
  getGrid(): JaggedGrid<T> {
    return this.grid;
  }

  getRowCount(): number {
    return this.grid.getRowCount();
  }

  getRowSize(row: number): number | undefined {
    return this.grid.getRowSize(row);
  }

  get(row: number, col: number): T | undefined {
    return this.grid.get(row, col);
  }

  toString(options?: FormatOptions<T>): string {
    return this.grid.toString(options);
  }

  // ==========================================================================
  // Editing
  // ==========================================================================

  /**
   * Append to the last row
   *
   * @throws EmptyGridError when there are no rows
   */
  push(value: T): Position {
    const row = this.grid.getRowCount() - 1;
    if (row < 0) {
      return this.fail(new EmptyGridError('push'));
    }
    return this.pushAtRow(row, value);
  }

  pushNewRow(value: T): Position {
    const row = this.grid.getRowCount();
    this.run(new InsertRowCommand(this.mutator, row, [value]));
    return [row, 0];
  }

  /**
   * @throws GridBoundsError when the row does not exist
   */
  pushAtRow(row: number, value: T): Position {
    const size = this.grid.getRowSize(row);
    if (size === undefined) {
      return this.fail(GridBoundsError.row('pushAtRow', row, this.grid.getRowCount()));
    }
    const position: Position = [row, size];
    this.run(new InsertCellCommand(this.mutator, position, value));
    return position;
  }

  insert(row: number, col: number, value: T): void {
    this.run(new InsertCellCommand(this.mutator, [row, col], value));
  }

  insertRow(row: number, values: Iterable<T> = []): void {
    this.run(new InsertRowCommand(this.mutator, row, values));
  }

  /**
   * Replace a value
   *
   * @throws GridBoundsError when the cell is outside the grid
   */
  set(row: number, col: number, value: T): void {
    this.run(new UpdateCellCommand(this.mutator, [row, col], value));
  }

  swap(first: Position, second: Position): void {
    this.run(new SwapCellsCommand(this.mutator, first, second));
  }

  removeAt(row: number, col: number): T {
    const command = new RemoveCellCommand(this.mutator, [row, col]);
    this.run(command);
    return command.getRemoved();
  }

  /**
   * Remove the last element of the last row; leaves no history entry when
   * there is nothing to remove
   */
  remove(): T | undefined {
    const last = this.grid.lastPosition();
    if (!last) {
      return undefined;
    }
    return this.removeAt(last[0], last[1]);
  }

  removeRow(row: number): T[] {
    const command = new RemoveRowCommand(this.mutator, row);
    this.run(command);
    return [...command.getRemoved()];
  }

  clear(): void {
    if (this.grid.getRowCount() === 0) {
      return;
    }
    this.run(new ClearGridCommand(this.mutator));
  }

  // ==========================================================================
  // History
  // ==========================================================================

  undo(): boolean {
    return this.history.undo();
  }

  redo(): boolean {
    return this.history.redo();
  }

  get canUndo(): boolean {
    return this.history.canUndo;
  }

  get canRedo(): boolean {
    return this.history.canRedo;
  }

  /**
   * Edits until endBatch() undo as one step
   */
  beginBatch(description?: string): void {
    this.history.beginBatch(description);
  }

  endBatch(): void {
    this.history.endBatch();
  }

  clearHistory(): void {
    this.history.clear();
  }

  destroy(): void {
    this.events.destroy();
    this.history.destroy();
  }

  // ==========================================================================
  // Internal
  // ==========================================================================

  /**
   * Execute a command; a rejected edit is published as an 'error' event and
   * rethrown
   */
  private run(command: Command): void {
    try {
      if (this.trackHistory) {
        this.history.push(command);
      } else {
        this.history.executeOnly(command);
      }
    } catch (error) {
      if (error instanceof GridError) {
        this.report(error);
      }
      throw error;
    }
  }

  private fail(error: GridError): never {
    this.report(error);
    throw error;
  }

  private report(error: GridError): void {
    this.events.emit('error', {
      code: error.code,
      message: error.message,
      details: error,
    });
  }
}
