/**
 * Recursive copy that keeps file modes and symlinks.
 */

import { copyFile, lstat, mkdir, readdir, readlink, rm, symlink } from 'fs/promises';
import { dirname, join } from 'path';

export async function copyTree(source: string, destination: string): Promise<string[]> {
  const written: string[] = [];
  await mkdir(destination, { recursive: true });

  for (const entry of await readdir(source, { withFileTypes: true })) {
    const from = join(source, entry.name);
    const to = join(destination, entry.name);
    if (entry.isDirectory()) {
      written.push(...(await copyTree(from, to)));
    } else if (entry.isSymbolicLink()) {
      await rm(to, { force: true });
      await symlink(await readlink(from), to);
      written.push(to);
    } else {
      await copyFile(from, to);
      written.push(to);
    }
  }
  return written;
}

/**
 * Copy a file or directory to an exact destination path. An existing
 * directory at the destination is replaced, an existing file overwritten.
 */
export async function copyEntry(source: string, destination: string): Promise<string[]> {
  const stats = await lstat(source);
  await mkdir(dirname(destination), { recursive: true });
  if (stats.isDirectory()) {
    await rm(destination, { recursive: true, force: true });
    return copyTree(source, destination);
  }
  await copyFile(source, destination);
  return [destination];
}
