/**
 * formatGrid tests
 */

import { describe, it, expect } from 'vitest';
import { formatGrid } from '../../src/core/format';
import { JaggedGrid } from '../../src/core/JaggedGrid';
import type { RowSource } from '../../src/types';
import { createSampleGrid } from '../fixtures/sampleGrids';

describe('formatGrid', () => {
  it('defaults to commas and newlines', () => {
    expect(formatGrid(createSampleGrid())).toBe('10,5,4\n3,9\n1\n7,6,2,8\n');
  });

  it('writes an empty line for an empty row', () => {
    const grid = JaggedGrid.fromRows([[1], [], [2]]);

    expect(formatGrid(grid)).toBe('1\n\n2\n');
  });

  it('trailingDelimiter ends every element with the delimiter', () => {
    const grid = JaggedGrid.fromRows([[1, 2], [], [3]]);

    expect(formatGrid(grid, { trailingDelimiter: true })).toBe('1,2,\n\n3,\n');
  });

  it('stringify controls how values print', () => {
    const grid = JaggedGrid.fromRows([[1.5, 2.25]]);

    expect(formatGrid(grid, { stringify: (v) => v.toFixed(1) })).toBe('1.5,2.3\n');
  });

  it('null prints as "null"', () => {
    const grid = JaggedGrid.fromRows<string | null>([['a', null]]);

    expect(formatGrid(grid, { delimiter: '\t' })).toBe('a\tnull\n');
  });

  it('works on any row source', () => {
    const source: RowSource<string> = {
      getRowCount: () => 2,
      rowValues: (row) => (row === 0 ? ['x', 'y'] : ['z']),
    };

    expect(formatGrid(source, { lineBreak: '\r\n' })).toBe('x,y\r\nz\r\n');
  });
});
