/**
 * RunNamer
 *
 * run name = `<axis>_<value>` for each varying axis, joined with '_'.
 * Scalar axes never appear; a grid without varying axes has the single name `run_0`.
 */

import { NamingCollisionError } from '@stellar-grid/utils';
import type { Axis, GridPoint, ParameterSet, ParameterValue, RunSpec } from '../types.js';

export const RUN_NAME_SEPARATOR = '_';
export const FALLBACK_RUN_NAME = 'run_0';

export interface RunNamerOptions {
  /** Significant digits numbers are rounded to before rendering */
  precision?: number;
}

const UNSAFE_CHARS = /[^A-Za-z0-9._+-]/g;

/**
 * Canonical text of a value inside a run name.
 *
 * Numbers use the shortest round-trip decimal form, so 1.5 renders as "1.5"
 * on every platform.
 */
export function formatNameValue(value: ParameterValue, options: RunNamerOptions = {}): string {
  if (typeof value === 'number') {
    const rounded =
      options.precision !== undefined ? Number(value.toPrecision(options.precision)) : value;
    // -0 and 0 name the same run
    return String(Object.is(rounded, -0) ? 0 : rounded);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  return value.replace(UNSAFE_CHARS, '-');
}

export function deriveRunName(
  axes: readonly Axis[],
  parameters: ParameterSet,
  options: RunNamerOptions = {}
): string {
  const segments: string[] = [];
  for (const axis of axes) {
    if (!axis.varying) continue;
    const value = parameters[axis.name];
    if (value === undefined) continue;
    segments.push(`${axis.name.replace(UNSAFE_CHARS, '-')}${RUN_NAME_SEPARATOR}${formatNameValue(value, options)}`);
  }
  return segments.length > 0 ? segments.join(RUN_NAME_SEPARATOR) : FALLBACK_RUN_NAME;
}

/**
 * Name every grid point. All names are derived first, then checked for
 * uniqueness as a set.
 */
export function nameRuns(
  axes: readonly Axis[],
  points: readonly GridPoint[],
  options: RunNamerOptions = {}
): RunSpec[] {
  const runs = points.map((point) => ({
    ...point,
    runName: deriveRunName(axes, point.parameters, options),
  }));

  const names = new Set(runs.map((r) => r.runName));
  if (names.size !== runs.length) {
    const byName = new Map<string, number[]>();
    for (const run of runs) {
      byName.set(run.runName, [...(byName.get(run.runName) ?? []), run.ordinal]);
    }
    const collisions = [...byName.entries()]
      .filter(([, ordinals]) => ordinals.length > 1)
      .map(([runName, ordinals]) => ({ runName, ordinals }));
    throw new NamingCollisionError(collisions, { precision: options.precision });
  }

  return runs;
}
