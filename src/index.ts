/**
 * flatgrid - jagged grid on a single flat buffer
 *
 * Rows of any length, stored back to back in one array with a small table of
 * row offsets, plus an undoable editing layer and arquero interop.
 */

// Types
export * from './types';

// Grid, editor, errors
export * from './core';

// arquero interop
export * from './processor';
