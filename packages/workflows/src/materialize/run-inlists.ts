/**
 * Per-run namelist inputs
 *
 * Grid parameters are grouped by namelist and written next to the copied
 * template. Star namelists point back at the template's inlist_project
 * through the placeholder, which substitution then resolves.
 */

import {
  isBinaryNamelist,
  renderNamelistFile,
  type Axis,
  type NamelistEntries,
  type ParameterSet,
  type ParameterValue,
} from '@stellar-grid/core';
import { TEMPLATE_PLACEHOLDER } from './placeholder.js';

export const BINARY_INLIST = 'inlist_binary';
export const STAR_INLIST = 'inlist_star';
export const STAR1_INLIST = 'inlist1';
export const STAR2_INLIST = 'inlist2';
export const PROJECT_INLIST = 'inlist_project';

export interface InlistFile {
  readonly filename: string;
  readonly content: string;
}

type NamelistGroups = Map<string, Array<readonly [string, ParameterValue]>>;

export function defaultNamelist(isBinaryEvolution: boolean): string {
  return isBinaryEvolution ? 'binary_controls' : 'controls';
}

/**
 * Group a run's parameters by namelist, keeping axis order.
 */
export function groupParameters(
  axes: readonly Axis[],
  parameters: ParameterSet,
  isBinaryEvolution: boolean
): NamelistGroups {
  const groups: NamelistGroups = new Map();
  for (const axis of axes) {
    const value = parameters[axis.name];
    if (value === undefined) continue;
    const namelist = axis.namelist ?? defaultNamelist(isBinaryEvolution);
    const entries = groups.get(namelist) ?? [];
    entries.push([axis.name, value]);
    groups.set(namelist, entries);
  }
  return groups;
}

function withProjectPointer(namelist: string, entries: NamelistEntries): NamelistEntries {
  return [
    ...entries,
    [`read_extra_${namelist}_inlist1`, true],
    [`extra_${namelist}_inlist1_name`, `${TEMPLATE_PLACEHOLDER}/${PROJECT_INLIST}`],
  ];
}

/**
 * Namelists of one star of a binary: always controls (with its own log
 * directory) and pgstar, since the external code expects both.
 */
function starOfBinary(
  starGroups: ReadonlyArray<readonly [string, NamelistEntries]>,
  logDirectory: string
): Array<readonly [string, NamelistEntries]> {
  const groups = new Map<string, NamelistEntries>(starGroups);

  const controls = groups.get('controls') ?? [];
  groups.set(
    'controls',
    controls.some(([key]) => key === 'log_directory')
      ? controls
      : [...controls, ['log_directory', logDirectory]]
  );
  if (!groups.has('pgstar')) {
    groups.set('pgstar', []);
  }

  return [...groups.entries()].map(([name, entries]) => [name, withProjectPointer(name, entries)]);
}

export function buildRunInlists(
  axes: readonly Axis[],
  parameters: ParameterSet,
  isBinaryEvolution: boolean
): InlistFile[] {
  const groups = [...groupParameters(axes, parameters, isBinaryEvolution).entries()];

  if (!isBinaryEvolution) {
    return [
      {
        filename: STAR_INLIST,
        content: renderNamelistFile(
          groups.map(([name, entries]) => [name, withProjectPointer(name, entries)])
        ),
      },
    ];
  }

  const binaryGroups = groups.filter(([name]) => isBinaryNamelist(name));
  const starGroups = groups.filter(([name]) => !isBinaryNamelist(name));

  return [
    { filename: BINARY_INLIST, content: renderNamelistFile(binaryGroups) },
    { filename: STAR1_INLIST, content: renderNamelistFile(starOfBinary(starGroups, 'LOGS1')) },
    { filename: STAR2_INLIST, content: renderNamelistFile(starOfBinary(starGroups, 'LOGS2')) },
  ];
}
