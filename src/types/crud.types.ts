/**
 * Edit history types
 *
 * Types used by UndoStack and the Command implementations.
 */

// ============================================================================
// Command pattern
// ============================================================================

/**
 * Command kinds
 */
export type CommandType =
  | 'insertCell'
  | 'removeCell'
  | 'updateCell'
  | 'swapCells'
  | 'insertRow'
  | 'removeRow'
  | 'clear'
  | 'batch';

/**
 * An edit that can be undone and redone
 */
export interface Command {
  readonly type: CommandType;

  execute(): void;

  undo(): void;

  /** Human readable summary, for debugging */
  readonly description: string;
}

// ============================================================================
// UndoStack events
// ============================================================================

export interface UndoStackEvents {
  'push': { command: Command };

  'undo': { command: Command };

  'redo': { command: Command };

  'clear': void;

  /** canUndo / canRedo changed */
  'stateChange': { canUndo: boolean; canRedo: boolean };
}
