/**
 * Unit tests for ParameterGrid
 */

import { describe, it, expect } from 'vitest';
import { GridSpecError } from '@stellar-grid/utils';
import { countGridPoints, expandGrid } from '../../src/grid/parameter-grid.js';
import type { Axis } from '../../src/types.js';

describe('expandGrid', () => {
  it('should enumerate in odometer order with the last axis fastest', () => {
    const grid = expandGrid({ m1: [10, 20], q: [0.5, 0.9] });

    expect(grid.points.map((p) => p.parameters)).toEqual([
      { m1: 10, q: 0.5 },
      { m1: 10, q: 0.9 },
      { m1: 20, q: 0.5 },
      { m1: 20, q: 0.9 },
    ]);
    expect(grid.points.map((p) => p.ordinal)).toEqual([0, 1, 2, 3]);
    expect(grid.total).toBe(4);
  });

  it('should treat scalars as length-1 axes', () => {
    const grid = expandGrid({ m1: [10, 20], m2: 15, period: 100 });

    expect(grid.points).toHaveLength(2);
    expect(grid.points[0]?.parameters).toEqual({ m1: 10, m2: 15, period: 100 });
    expect(grid.points[1]?.parameters).toEqual({ m1: 20, m2: 15, period: 100 });
    expect(grid.axes.map((a) => a.varying)).toEqual([true, false, false]);
  });

  it('should accept axis lists directly', () => {
    const axes: Axis[] = [
      { name: 'm1', values: [1, 2, 3], varying: true, namelist: 'binary_controls' },
      { name: 'initial_z', values: [0.02], varying: false, namelist: 'controls' },
    ];

    const grid = expandGrid(axes);

    expect(grid.points.map((p) => p.parameters.m1)).toEqual([1, 2, 3]);
    expect(grid.axes).toBe(axes);
  });

  it('should be deterministic across calls', () => {
    const spec = { a: [3, 1, 2], b: ['x', 'y'], c: true };
    expect(expandGrid(spec).points).toEqual(expandGrid(spec).points);
  });

  it('should reject an empty value list', () => {
    expect(() => expandGrid({ m1: [], m2: 15 })).toThrow(GridSpecError);
    expect(() => expandGrid({ m1: [], m2: 15 })).toThrow("Axis 'm1' has an empty value list");
  });

  it('should reject an empty specification', () => {
    expect(() => expandGrid({})).toThrow('Grid specification has no axes');
  });

  it('should reject duplicate axis names', () => {
    const axes: Axis[] = [
      { name: 'm1', values: [1], varying: false, namelist: 'binary_controls' },
      { name: 'm1', values: [2], varying: false, namelist: 'controls' },
    ];
    expect(() => expandGrid(axes)).toThrow("Axis 'm1' is declared more than once");
  });

  it('should reject grids above the ceiling before enumerating', () => {
    expect(() => expandGrid({ a: [1, 2, 3], b: [1, 2, 3] }, { maxGridPoints: 8 })).toThrow(
      'Grid has 9 combinations, above the limit of 8'
    );
  });

  it('should drop filtered combinations and keep ordinals dense', () => {
    const grid = expandGrid(
      { m1: [10, 20, 30], m2: [15, 25] },
      { filters: [(p) => Number(p.m2) < Number(p.m1)] }
    );

    expect(grid.points).toEqual([
      { ordinal: 0, parameters: { m1: 20, m2: 15 } },
      { ordinal: 1, parameters: { m1: 30, m2: 15 } },
      { ordinal: 2, parameters: { m1: 30, m2: 25 } },
    ]);
    expect(grid.total).toBe(6);
  });

  it('should fail when every combination is filtered out', () => {
    expect(() => expandGrid({ m1: [1, 2] }, { filters: [() => false] })).toThrow(GridSpecError);
  });
});

describe('countGridPoints', () => {
  it('should multiply list lengths and ignore scalars', () => {
    expect(countGridPoints({ a: [1, 2], b: 3, c: ['x', 'y', 'z'] })).toBe(6);
  });
});
