/**
 * Type definitions
 *
 * Every shared type, importable from one place.
 *
 * @example
 * import type { Position, CellRef, GridEventType } from '@/types';
 */

// Grid values and coordinates
export type {
  CellValue,
  Duplicate,
  Position,
  CellRef,
  FormatOptions,
  RowSource,
} from './grid.types';

// Events
export type {
  GridEventType,
  GridEventPayloads,
  GridEvent,
  GridEventHandler,
  Unsubscribe,
} from './event.types';

// Edit history
export type {
  CommandType,
  Command,
  UndoStackEvents,
} from './crud.types';

// Table interop
export type {
  TableGroupingOptions,
  TableExportOptions,
} from './table.types';
