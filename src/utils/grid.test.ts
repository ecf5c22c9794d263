/**
 * Tests for grid normalization
 */

import { describe, it, expect } from 'vitest';
import { cellToString, toRectangularGrid } from './grid.js';

describe('cellToString', () => {
  it('keeps strings', () => {
    expect(cellToString('hola')).toBe('hola');
  });

  it('stringifies numbers and booleans', () => {
    expect(cellToString(42.5)).toBe('42.5');
    expect(cellToString(true)).toBe('true');
  });

  it('maps null and undefined to empty string', () => {
    expect(cellToString(null)).toBe('');
    expect(cellToString(undefined)).toBe('');
  });
});

describe('toRectangularGrid', () => {
  it('pads short rows to the widest row', () => {
    const grid = toRectangularGrid([
      ['a', 'b', 'c'],
      ['1'],
      ['2', '3'],
    ]);

    expect(grid).toEqual([
      ['a', 'b', 'c'],
      ['1', '', ''],
      ['2', '3', ''],
    ]);
  });

  it('pads the header when a data row is wider', () => {
    const grid = toRectangularGrid([
      ['a'],
      ['1', '2'],
    ]);

    expect(grid).toEqual([
      ['a', ''],
      ['1', '2'],
    ]);
  });

  it('keeps empty rows as blank cells', () => {
    expect(toRectangularGrid([['a', 'b'], []])).toEqual([['a', 'b'], ['', '']]);
  });

  it('returns an empty grid unchanged', () => {
    expect(toRectangularGrid([])).toEqual([]);
  });

  it('stringifies non-string cells', () => {
    expect(toRectangularGrid([[1, null, false]])).toEqual([['1', '', 'false']]);
  });
});
