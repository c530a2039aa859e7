/**
 * Unit tests for per-run namelist inputs
 */

import { describe, it, expect } from 'vitest';
import type { Axis } from '@stellar-grid/core';
import { buildRunInlists, groupParameters } from '../../src/materialize/run-inlists.js';

const POINTER = (namelist: string) =>
  `   read_extra_${namelist}_inlist1 = .true.\n` +
  `   extra_${namelist}_inlist1_name = '#{template}/inlist_project'\n`;

describe('groupParameters', () => {
  it('should group by namelist and keep axis order', () => {
    const axes: Axis[] = [
      { name: 'm1', values: [10], varying: true },
      { name: 'initial_z', values: [0.02], varying: false, namelist: 'controls' },
      { name: 'm2', values: [15], varying: false },
    ];

    const groups = groupParameters(axes, { m1: 10, initial_z: 0.02, m2: 15 }, true);

    expect([...groups.entries()]).toEqual([
      [
        'binary_controls',
        [
          ['m1', 10],
          ['m2', 15],
        ],
      ],
      ['controls', [['initial_z', 0.02]]],
    ]);
  });
});

describe('buildRunInlists', () => {
  it('should write one inlist_star for single-star evolution', () => {
    const axes: Axis[] = [
      { name: 'initial_mass', values: [1, 2], varying: true },
      { name: 'initial_z', values: [0.02], varying: false },
    ];

    const files = buildRunInlists(axes, { initial_mass: 1, initial_z: 0.02 }, false);

    expect(files).toEqual([
      {
        filename: 'inlist_star',
        content:
          '&controls\n' +
          '   initial_mass = 1\n' +
          '   initial_z = 2.0000000000d-02\n' +
          POINTER('controls') +
          '/ ! end of controls namelist\n',
      },
    ]);
  });

  it('should split binary parameters from per-star parameters', () => {
    const axes: Axis[] = [
      { name: 'm1', values: [10, 20], varying: true },
      { name: 'initial_z', values: [0.02], varying: false, namelist: 'controls' },
    ];

    const files = buildRunInlists(axes, { m1: 10, initial_z: 0.02 }, true);

    expect(files.map((f) => f.filename)).toEqual(['inlist_binary', 'inlist1', 'inlist2']);
    expect(files[0]?.content).toBe('&binary_controls\n   m1 = 10\n/ ! end of binary_controls namelist\n');
    expect(files[1]?.content).toBe(
      '&controls\n' +
        '   initial_z = 2.0000000000d-02\n' +
        "   log_directory = 'LOGS1'\n" +
        POINTER('controls') +
        '/ ! end of controls namelist\n' +
        '&pgstar\n' +
        POINTER('pgstar') +
        '/ ! end of pgstar namelist\n'
    );
    expect(files[2]?.content).toContain("   log_directory = 'LOGS2'\n");
  });

  it('should keep a log_directory set by the grid', () => {
    const axes: Axis[] = [
      { name: 'm1', values: [10], varying: false },
      { name: 'log_directory', values: ['custom'], varying: false, namelist: 'controls' },
    ];

    const [, star1] = buildRunInlists(axes, { m1: 10, log_directory: 'custom' }, true);

    expect(star1?.content).toContain("   log_directory = 'custom'\n");
    expect(star1?.content).not.toContain('LOGS1');
  });
});
