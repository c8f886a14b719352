/**
 * Retrofits archives that predate the managed-subfolder convention.
 *
 * Produces a bash script that moves managed files found anywhere in a date
 * folder into `{dateFolder}/{managedSubfolder}/`. The script is text; running
 * it is up to the user.
 */

import path from 'node:path';
import type { ManagedFamily, RepairMove } from '@footage-archive/contracts';
import { isDateFolderName } from './date-folder.js';
import { classify } from './file-classifier.js';

export interface ArchiveChild {
  name: string;
  isDirectory: boolean;
  /** Files under this child, relative to it, `/`-separated. */
  files: string[];
}

export interface ArchiveListing {
  root: string;
  children: ArchiveChild[];
}

export interface RepairPlan {
  scriptLines: string[];
  warnings: string[];
  moves: RepairMove[];
}

export const SCRIPT_HEADER = ['#!/usr/bin/env bash', 'set -x'];

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function isCompliant(relativeToDateFolder: string, managedSubfolder: string): boolean {
  const segments = relativeToDateFolder.split('/');
  return segments.length === 2 && segments[0] === managedSubfolder;
}

export function scan(listing: ArchiveListing, family: ManagedFamily): RepairPlan {
  const warnings: string[] = [];
  const moves: RepairMove[] = [];
  const children = [...listing.children].sort((left, right) => left.name.localeCompare(right.name));

  for (const child of children) {
    if (!child.isDirectory) {
      continue;
    }

    if (!isDateFolderName(child.name)) {
      warnings.push(`Warning: non-compliant folder in archive root, skipped: ${child.name}`);
      continue;
    }

    const managed = [...child.files]
      .sort()
      .filter(relative => classify(relative, family).kind === 'managed');
    const claimed = new Set(
      managed
        .filter(relative => isCompliant(relative, family.managedSubfolder))
        .map(relative => path.posix.basename(relative)),
    );

    for (const relative of managed) {
      if (isCompliant(relative, family.managedSubfolder)) {
        continue;
      }

      const filename = path.posix.basename(relative);
      const from = path.join(listing.root, child.name, ...relative.split('/'));
      const to = path.join(listing.root, child.name, family.managedSubfolder, filename);

      if (claimed.has(filename)) {
        warnings.push(`Warning: ${to} already taken, not moving ${from}`);
        continue;
      }

      claimed.add(filename);
      moves.push({ from, to });
    }
  }

  return { scriptLines: renderScript(moves), warnings, moves };
}

export function renderScript(moves: readonly RepairMove[]): string[] {
  if (moves.length === 0) {
    return [];
  }

  const directories = [...new Set(moves.map(move => path.dirname(move.to)))].sort();

  return [
    ...SCRIPT_HEADER,
    '',
    ...directories.map(directory => `mkdir -p ${shellQuote(directory)}`),
    '',
    ...moves.map(move => `mv ${shellQuote(move.from)} ${shellQuote(move.to)}`),
  ];
}
