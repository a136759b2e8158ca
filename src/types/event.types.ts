/**
 * Event type definitions
 *
 * Events published by GridEditor whenever an edit changes the grid.
 * UI layers subscribe to these to refresh only what moved.
 *
 * @example
 * const unsubscribe = editor.on('cell:inserted', (event) => {
 *   const [row, col] = event.payload.position;
 *   redrawRowFrom(row, col);
 * });
 */

import type { Position } from './grid.types';

// ============================================================================
// Event types
// ============================================================================

/**
 * Every event a grid editor can publish
 *
 * Names follow "category:action".
 */
export type GridEventType =
  | 'cell:inserted'  // a value entered a row, later cells shifted right
  | 'cell:removed'   // a value left a row, later cells shifted left
  | 'cell:updated'   // a value was replaced in place
  | 'cells:swapped'  // two values exchanged places
  | 'row:inserted'   // a whole row was added
  | 'row:removed'    // a whole row was deleted
  | 'grid:cleared'   // every row was dropped
  | 'error';         // an edit was rejected

// ============================================================================
// Payloads
// ============================================================================

/**
 * Payload per event type
 *
 * @template T - element type of the grid
 */
export interface GridEventPayloads<T> {
  'cell:inserted': {
    position: Position;
    value: T;
  };

  'cell:removed': {
    position: Position;
    value: T;
  };

  'cell:updated': {
    position: Position;
    oldValue: T;
    newValue: T;
  };

  'cells:swapped': {
    first: Position;
    second: Position;
  };

  'row:inserted': {
    row: number;
    values: readonly T[];
  };

  'row:removed': {
    row: number;
    values: readonly T[];
  };

  'grid:cleared': {
    rowCount: number;
    size: number;
  };

  'error': {
    code: string;
    message: string;
    details?: unknown;
  };
}

// ============================================================================
// Event object
// ============================================================================

/**
 * What a handler receives
 */
export interface GridEvent<T, K extends GridEventType> {
  type: K;
  payload: GridEventPayloads<T>[K];
  /** Unix timestamp (ms) */
  timestamp: number;
}

/**
 * Handler for one event type
 */
export type GridEventHandler<T, K extends GridEventType> = (
  event: GridEvent<T, K>
) => void;

/**
 * Returned by every subscription; call it to unsubscribe
 */
export type Unsubscribe = () => void;
