/**
 * Decides which source files belong to the managed format family.
 * Pure: works on relative path strings only.
 */

import path from 'node:path';
import type { ManagedFamily } from '@footage-archive/contracts';

export type Classification =
  | { kind: 'managed' }
  | { kind: 'ignored'; reason: 'not-managed-format' | 'excluded-folder' };

function toSegments(relativePath: string): string[] {
  return relativePath.split(/[\\/]+/).filter(Boolean);
}

export function isManagedFilename(filename: string, family: ManagedFamily): boolean {
  const lowered = filename.toLowerCase();
  if (family.managedNames.some(name => name.toLowerCase() === lowered)) {
    return true;
  }

  const extension = path.posix.extname(lowered);
  return extension !== '' && family.extensions.some(ext => ext.toLowerCase() === extension);
}

/**
 * Returns the first excluded folder name found among the directory segments.
 */
export function findExcludedFolder(relativePath: string, family: ManagedFamily): string | undefined {
  const directories = toSegments(relativePath).slice(0, -1);
  return directories.find(segment => family.excludedFolders.includes(segment));
}

export function classify(relativePath: string, family: ManagedFamily): Classification {
  const segments = toSegments(relativePath);
  const filename = segments[segments.length - 1] ?? '';

  if (!isManagedFilename(filename, family)) {
    return { kind: 'ignored', reason: 'not-managed-format' };
  }

  if (findExcludedFolder(relativePath, family) !== undefined) {
    return { kind: 'ignored', reason: 'excluded-folder' };
  }

  return { kind: 'managed' };
}
