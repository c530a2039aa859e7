/**
 * Entries every run copies from the template root. A trailing '/' marks a directory.
 */

const COMMON_ENTRIES = ['inlist', 'inlist_project', 'make/', 'mk', 'rn', 're', 'clean'] as const;

export const STAR_MANIFEST: readonly string[] = [
  ...COMMON_ENTRIES,
  'src/run.f90',
  'src/run_star_extras.f90',
];

export const BINARY_MANIFEST: readonly string[] = [
  ...COMMON_ENTRIES,
  'src/binary_run.f90',
  'src/run_binary_extras.f90',
  'src/run_star_extras.f90',
];

export function templateManifest(isBinaryEvolution: boolean): readonly string[] {
  return isBinaryEvolution ? BINARY_MANIFEST : STAR_MANIFEST;
}

export function isDirectoryEntry(entry: string): boolean {
  return entry.endsWith('/');
}
