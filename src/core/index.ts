/**
 * Core module
 *
 * The grid itself plus its editing layer. No framework dependencies.
 */

// Data structure
export { JaggedGrid } from './JaggedGrid';
export { formatGrid } from './format';

// Errors
export {
  GridError,
  GridBoundsError,
  EmptyGridError,
  GridShapeError,
  StaleHandleError,
} from './errors';
export type { GridErrorCode, GridAxis } from './errors';

// Editing facade
export { GridEditor } from './GridEditor';
export type { GridEditorOptions } from './GridEditor';

// Lower-level pieces (advanced use)
export { EventEmitter } from './EventEmitter';
export { SimpleEventEmitter } from './SimpleEventEmitter';
export { GridMutator } from './GridMutator';
export { UndoStack } from './UndoStack';
export type { UndoStackOptions } from './UndoStack';
export {
  InsertCellCommand,
  RemoveCellCommand,
  UpdateCellCommand,
  SwapCellsCommand,
  InsertRowCommand,
  RemoveRowCommand,
  ClearGridCommand,
  BatchCommand,
} from './commands';
