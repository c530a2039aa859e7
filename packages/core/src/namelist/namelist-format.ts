/**
 * Fortran namelist rendering
 *
 *   &controls
 *      initial_mass = 1.5000000000d+00
 *      log_directory = 'LOGS1'
 *   / ! end of controls namelist
 */

import type { ParameterValue } from '../types.js';

export type NamelistEntries = ReadonlyArray<readonly [string, ParameterValue]>;

export const BINARY_NAMELIST_PREFIX = 'binary_';

export function isBinaryNamelist(name: string): boolean {
  return name.startsWith(BINARY_NAMELIST_PREFIX);
}

/**
 * %.10e with a 'd' exponent marker and at least two exponent digits.
 */
function formatReal(value: number): string {
  const [mantissa = '', exponent = '+0'] = value.toExponential(10).split('e');
  const sign = exponent.startsWith('-') ? '-' : '+';
  const digits = exponent.replace(/^[+-]/, '').padStart(2, '0');
  return `${mantissa}d${sign}${digits}`;
}

export function formatNamelistValue(value: ParameterValue): string {
  if (typeof value === 'boolean') {
    return value ? '.true.' : '.false.';
  }
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? String(value) : formatReal(value);
  }
  return `'${value.replace(/'/g, "''")}'`;
}

export function renderNamelist(name: string, entries: NamelistEntries): string {
  const lines = [`&${name}`];
  for (const [key, value] of entries) {
    lines.push(`   ${key} = ${formatNamelistValue(value)}`);
  }
  lines.push(`/ ! end of ${name} namelist`);
  return lines.join('\n') + '\n';
}

/**
 * Render several namelists into one file body, in the given order.
 */
export function renderNamelistFile(
  namelists: ReadonlyArray<readonly [string, NamelistEntries]>
): string {
  return namelists.map(([name, entries]) => renderNamelist(name, entries)).join('');
}
