/**
 * GridEditor tests
 *
 * Edits, their events, and undo/redo over the sample grid.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GridEditor } from '../../src/core/GridEditor';
import { JaggedGrid } from '../../src/core/JaggedGrid';
import { EmptyGridError, GridBoundsError } from '../../src/core/errors';
import { createSampleGrid, expectValidLayout, sampleRows } from '../fixtures/sampleGrids';

describe('GridEditor', () => {
  let editor: GridEditor<number>;

  beforeEach(() => {
    editor = new GridEditor(createSampleGrid());
  });

  afterEach(() => {
    editor.destroy();
  });

  // ===========================================================================
  // Edits and events
  // ===========================================================================

  describe('edits', () => {
    it('push() appends to the last row and reports the insert', () => {
      const inserted = vi.fn();
      editor.on('cell:inserted', inserted);

      expect(editor.push(11)).toEqual([3, 4]);
      expect(editor.get(3, 4)).toBe(11);
      expect(inserted.mock.calls[0]?.[0].payload).toEqual({ position: [3, 4], value: 11 });
    });

    it('insert() reports position and value', () => {
      const inserted = vi.fn();
      editor.on('cell:inserted', inserted);

      editor.insert(2, 1, 99);

      expect(editor.getGrid().toRows()).toEqual([[10, 5, 4], [3, 9], [1, 99], [7, 6, 2, 8]]);
      expect(inserted.mock.calls[0]?.[0].payload).toEqual({ position: [2, 1], value: 99 });
    });

    it('pushNewRow() reports a row insert', () => {
      const rows = vi.fn();
      editor.on('row:inserted', rows);

      expect(editor.pushNewRow(4)).toEqual([4, 0]);
      expect(editor.getRowSize(4)).toBe(1);
      expect(rows.mock.calls[0]?.[0].payload).toEqual({ row: 4, values: [4] });
    });

    it('set() reports old and new value', () => {
      const updated = vi.fn();
      editor.on('cell:updated', updated);

      editor.set(1, 0, 30);

      expect(editor.get(1, 0)).toBe(30);
      expect(updated.mock.calls[0]?.[0].payload).toEqual({
        position: [1, 0],
        oldValue: 3,
        newValue: 30,
      });
    });

    it('swap() exchanges values', () => {
      editor.swap([0, 1], [3, 2]);

      expect(editor.get(0, 1)).toBe(2);
      expect(editor.get(3, 2)).toBe(5);
    });

    it('removeRow() returns the values and reports them', () => {
      const removed = vi.fn();
      editor.on('row:removed', removed);

      expect(editor.removeRow(0)).toEqual([10, 5, 4]);
      expect(editor.getRowCount()).toBe(3);
      expect(removed.mock.calls[0]?.[0].payload).toEqual({ row: 0, values: [10, 5, 4] });
    });

    it('remove() takes the last element', () => {
      expect(editor.remove()).toBe(8);
      expect(editor.getRowSize(3)).toBe(3);
    });

    it('clear() reports the dropped shape', () => {
      const cleared = vi.fn();
      editor.on('grid:cleared', cleared);

      editor.clear();

      expect(editor.getRowCount()).toBe(0);
      expect(cleared.mock.calls[0]?.[0].payload).toEqual({ rowCount: 4, size: 10 });
    });

    it('toString() renders the grid', () => {
      expect(editor.toString()).toBe('10,5,4\n3,9\n1\n7,6,2,8\n');
    });

    it('toString() passes format options through', () => {
      expect(editor.toString({ delimiter: ' ', trailingDelimiter: true })).toBe(
        '10 5 4 \n3 9 \n1 \n7 6 2 8 \n'
      );
    });
  });

  // ===========================================================================
  // Rejected edits
  // ===========================================================================

  describe('rejected edits', () => {
    it('throws, publishes an error event and records nothing', () => {
      const errors = vi.fn();
      editor.on('error', errors);

      expect(() => editor.insert(9, 0, 1)).toThrow(GridBoundsError);

      expect(errors).toHaveBeenCalledTimes(1);
      expect(errors.mock.calls[0]?.[0].payload).toMatchObject({
        code: 'OUT_OF_BOUNDS',
        message: 'insert: row 9 out of bounds (valid: 0..3)',
      });
      expect(editor.canUndo).toBe(false);
      expect(editor.getGrid().toRows()).toEqual(sampleRows());
    });

    it('set() outside the grid throws', () => {
      expect(() => editor.set(1, 2, 0)).toThrow(
        'set: column 2 out of bounds for row 1 (valid: 0..1)'
      );
      expect(() => editor.set(7, 0, 0)).toThrow('set: row 7 out of bounds (valid: 0..3)');
    });

    it('pushAtRow() on a missing row throws', () => {
      expect(() => editor.pushAtRow(4, 1)).toThrow(GridBoundsError);
    });

    it('push() with no rows throws EmptyGridError', () => {
      const empty = new GridEditor<number>();
      const errors = vi.fn();
      empty.on('error', errors);

      expect(() => empty.push(1)).toThrow(EmptyGridError);
      expect(errors.mock.calls[0]?.[0].payload.code).toBe('EMPTY_GRID');
      empty.destroy();
    });

    it('remove() with nothing to remove leaves no history entry', () => {
      const grid = JaggedGrid.fromRows<number>([[1], []]);
      const local = new GridEditor(grid);

      expect(local.remove()).toBeUndefined();
      expect(local.canUndo).toBe(false);
      local.destroy();
    });
  });

  // ===========================================================================
  // Undo / redo
  // ===========================================================================

  describe('undo / redo', () => {
    it('undo() reverts an insert and redo() replays it', () => {
      editor.insert(0, 0, 42);
      expect(editor.undo()).toBe(true);
      expect(editor.getGrid().toRows()).toEqual(sampleRows());

      expect(editor.redo()).toBe(true);
      expect(editor.get(0, 0)).toBe(42);
      expect(editor.getGrid().getRowStart(3)).toBe(7);
      expectValidLayout(editor.getGrid());
    });

    it('undo() restores a removed row in place', () => {
      editor.removeRow(1);
      editor.undo();

      expect(editor.getGrid().toRows()).toEqual(sampleRows());
      expectValidLayout(editor.getGrid());
    });

    it('undo() of push and pushNewRow', () => {
      editor.push(11);
      editor.pushNewRow(12);
      editor.undo();
      expect(editor.getRowCount()).toBe(4);
      editor.undo();
      expect(editor.getGrid().toRows()).toEqual(sampleRows());
    });

    it('consecutive set() calls undo one at a time', () => {
      editor.set(0, 0, 1);
      editor.set(0, 0, 2);

      editor.undo();
      expect(editor.get(0, 0)).toBe(1);
      editor.undo();
      expect(editor.get(0, 0)).toBe(10);
    });

    it('undo() of swap, removeAt, remove and clear', () => {
      editor.swap([0, 0], [3, 3]);
      editor.removeAt(1, 1);
      editor.remove();
      editor.clear();

      editor.undo();
      editor.undo();
      editor.undo();
      editor.undo();

      expect(editor.getGrid().toRows()).toEqual(sampleRows());
      expect(editor.canUndo).toBe(false);
      expect(editor.canRedo).toBe(true);
    });

    it('undo() republishes events', () => {
      const removed = vi.fn();
      editor.insert(1, 0, 5);
      editor.on('cell:removed', removed);

      editor.undo();

      expect(removed.mock.calls[0]?.[0].payload).toEqual({ position: [1, 0], value: 5 });
    });

    it('a batch undoes as one step', () => {
      editor.beginBatch('append pair');
      editor.push(1);
      editor.push(2);
      editor.endBatch();

      expect(editor.getRowSize(3)).toBe(6);
      editor.undo();
      expect(editor.getGrid().toRows()).toEqual(sampleRows());
      editor.redo();
      expect([...editor.getGrid().rowValues(3)]).toEqual([7, 6, 2, 8, 1, 2]);
    });

    it('onHistoryChange() follows canUndo / canRedo', () => {
      const states = vi.fn();
      editor.onHistoryChange(states);

      editor.push(1);
      editor.undo();

      expect(states).toHaveBeenNthCalledWith(1, { canUndo: true, canRedo: false });
      expect(states).toHaveBeenNthCalledWith(2, { canUndo: false, canRedo: true });
    });

    it('clearHistory() forgets everything', () => {
      editor.push(1);
      editor.clearHistory();

      expect(editor.canUndo).toBe(false);
      expect(editor.undo()).toBe(false);
    });
  });

  // ===========================================================================
  // Options
  // ===========================================================================

  describe('options', () => {
    it('trackHistory: false runs edits without recording them', () => {
      const untracked = new GridEditor(createSampleGrid(), { trackHistory: false });

      untracked.push(1);

      expect(untracked.getRowSize(3)).toBe(5);
      expect(untracked.canUndo).toBe(false);
      untracked.destroy();
    });

    it('maxHistory bounds the undo depth', () => {
      const shallow = new GridEditor(createSampleGrid(), { maxHistory: 2 });

      shallow.push(1);
      shallow.push(2);
      shallow.push(3);
      shallow.undo();
      shallow.undo();

      expect(shallow.undo()).toBe(false);
      expect([...shallow.getGrid().rowValues(3)]).toEqual([7, 6, 2, 8, 1]);
      shallow.destroy();
    });

    it('destroy() detaches listeners', () => {
      const any = vi.fn();
      editor.onAny(any);

      editor.destroy();
      editor.push(1);

      expect(any).not.toHaveBeenCalled();
    });
  });
});
