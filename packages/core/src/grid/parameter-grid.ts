/**
 * ParameterGrid
 *
 * Expands axes into their Cartesian product in odometer order: axes iterate
 * outer-to-inner in declaration order, the last axis varies fastest.
 *
 * Input:
 *   m1: [10, 20]
 *   q: [0.5, 0.9]
 *   period: 100
 *
 * Output (ordinal: parameters):
 *   0: { m1: 10, q: 0.5, period: 100 }
 *   1: { m1: 10, q: 0.9, period: 100 }
 *   2: { m1: 20, q: 0.5, period: 100 }
 *   3: { m1: 20, q: 0.9, period: 100 }
 */

import { GridSpecError, createLogger } from '@stellar-grid/utils';
import type { Axis, GridPoint, ParameterSet, ParameterValue } from '../types.js';
import { assertUniqueAxisNames, axesFromSpec, type GridSpecInput } from './grid-spec.js';

const logger = createLogger('@stellar-grid/core');

export const DEFAULT_MAX_GRID_POINTS = 100_000;

/**
 * Keeps a combination when it returns true.
 */
export type GridFilter = (parameters: ParameterSet) => boolean;

export interface ExpandGridOptions {
  maxGridPoints?: number;
  filters?: readonly GridFilter[];
}

export interface ExpandedGrid {
  readonly axes: readonly Axis[];
  readonly points: readonly GridPoint[];
  /** Size of the unfiltered product */
  readonly total: number;
}

function isScalar(value: unknown): value is ParameterValue {
  return (
    (typeof value === 'number' && Number.isFinite(value)) ||
    typeof value === 'string' ||
    typeof value === 'boolean'
  );
}

function normalizeAxes(spec: GridSpecInput | readonly Axis[]): readonly Axis[] {
  const axes = isAxisList(spec) ? spec : axesFromSpec(spec);

  if (axes.length === 0) {
    throw new GridSpecError('Grid specification has no axes');
  }
  assertUniqueAxisNames(axes);

  for (const axis of axes) {
    if (axis.values.length === 0) {
      throw new GridSpecError(`Axis '${axis.name}' has an empty value list`, { axis: axis.name });
    }
    const bad = axis.values.find((v) => !isScalar(v));
    if (bad !== undefined) {
      throw new GridSpecError(`Axis '${axis.name}' has a non-scalar value: ${String(bad)}`, {
        axis: axis.name,
      });
    }
  }
  return axes;
}

function isAxisList(spec: GridSpecInput | readonly Axis[]): spec is readonly Axis[] {
  return Array.isArray(spec);
}

/**
 * Number of combinations without enumerating them.
 */
export function countGridPoints(spec: GridSpecInput | readonly Axis[]): number {
  return normalizeAxes(spec).reduce((product, axis) => product * axis.values.length, 1);
}

/**
 * Expand a grid specification into ordered grid points.
 */
export function expandGrid(
  spec: GridSpecInput | readonly Axis[],
  options: ExpandGridOptions = {}
): ExpandedGrid {
  const axes = normalizeAxes(spec);
  const maxGridPoints = options.maxGridPoints ?? DEFAULT_MAX_GRID_POINTS;
  const filters = options.filters ?? [];

  const total = axes.reduce((product, axis) => product * axis.values.length, 1);
  if (total > maxGridPoints) {
    throw new GridSpecError(
      `Grid has ${total} combinations, above the limit of ${maxGridPoints}`,
      { total, maxGridPoints }
    );
  }

  const points: GridPoint[] = [];
  const indices = axes.map(() => 0);

  for (let n = 0; n < total; n++) {
    const parameters: Record<string, ParameterValue> = {};
    axes.forEach((axis, i) => {
      const value = axis.values[indices[i] ?? 0];
      if (value !== undefined) {
        parameters[axis.name] = value;
      }
    });

    if (filters.every((keep) => keep(parameters))) {
      points.push({ ordinal: points.length, parameters });
    }

    // advance the odometer, last axis first
    for (let i = axes.length - 1; i >= 0; i--) {
      const axis = axes[i];
      const next = (indices[i] ?? 0) + 1;
      if (axis && next < axis.values.length) {
        indices[i] = next;
        break;
      }
      indices[i] = 0;
    }
  }

  if (points.length === 0) {
    throw new GridSpecError('Every grid combination was rejected by the grid filters', {
      total,
      filters: filters.length,
    });
  }

  logger.info('Expanded parameter grid', {
    axisCount: axes.length,
    varyingAxes: axes.filter((a) => a.varying).map((a) => a.name),
    total,
    kept: points.length,
  });

  return { axes, points, total };
}
