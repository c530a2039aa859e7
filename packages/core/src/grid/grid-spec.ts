/**
 * Grid specification parsing
 *
 * A grid file is either flat (axis -> value | list) or grouped by namelist
 * (namelist -> axis -> value | list). Both forms flatten to an ordered Axis
 * list in declaration order.
 */

import { z } from 'zod';
import { GridSpecError } from '@stellar-grid/utils';
import type { Axis, ParameterValue } from '../types.js';

export type AxisInput = ParameterValue | readonly ParameterValue[];

export type GridSpecInput = Readonly<Record<string, AxisInput>>;

export const ParameterValueSchema = z.union([z.number().finite(), z.string(), z.boolean()]);

const AxisInputSchema = z.union([ParameterValueSchema, z.array(ParameterValueSchema)]);

const NamelistGroupSchema = z.record(AxisInputSchema);

export const GridDocumentSchema = z
  .record(z.union([AxisInputSchema, NamelistGroupSchema]))
  .refine((doc) => Object.keys(doc).length > 0, 'grid specification has no axes');

export type GridDocument = z.infer<typeof GridDocumentSchema>;

function isValueList(input: AxisInput): input is readonly ParameterValue[] {
  return Array.isArray(input);
}

function toAxis(name: string, input: AxisInput, namelist?: string): Axis {
  if (isValueList(input)) {
    return { name, values: [...input], varying: true, namelist };
  }
  return { name, values: [input], varying: false, namelist };
}

function isAxisInput(value: AxisInput | Readonly<Record<string, AxisInput>>): value is AxisInput {
  return Array.isArray(value) || typeof value !== 'object';
}

/**
 * Axes from an in-memory mapping, in key order.
 */
export function axesFromSpec(spec: GridSpecInput, namelist?: string): Axis[] {
  return Object.entries(spec).map(([name, input]) => toAxis(name, input, namelist));
}

/**
 * Axes from a parsed grid file (flat or grouped).
 */
export function parseGridDocument(document: unknown): Axis[] {
  const parsed = GridDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const msg = parsed.error.issues
      .map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
      .join('; ');
    throw new GridSpecError(`Invalid grid specification: ${msg}`, { issues: parsed.error.issues });
  }

  const axes: Axis[] = [];
  for (const [key, value] of Object.entries(parsed.data)) {
    if (isAxisInput(value)) {
      axes.push(toAxis(key, value));
    } else {
      axes.push(...axesFromSpec(value, key));
    }
  }

  assertUniqueAxisNames(axes);
  return axes;
}

export function assertUniqueAxisNames(axes: readonly Axis[]): void {
  const seen = new Map<string, Axis>();
  for (const axis of axes) {
    const previous = seen.get(axis.name);
    if (previous) {
      throw new GridSpecError(`Axis '${axis.name}' is declared more than once`, {
        axis: axis.name,
        namelists: [previous.namelist, axis.namelist],
      });
    }
    seen.set(axis.name, axis);
  }
}
