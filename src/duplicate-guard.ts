/**
 * Cross-card duplicate-name detection.
 *
 * Cameras reuse names across cards, so two cards copied into one source tree
 * can both hold `VID_..._001.insv`. Both would land on the same archive path.
 * The index is built over the complete source listing before any plan entry
 * exists, so nothing from an ambiguous set is ever copied.
 *
 * Names are compared case-insensitively: `VID_1.INSV` and `VID_1.insv` share
 * one path on case-insensitive archive volumes.
 */

import type { DuplicateNameError, SourceFileIndex } from '@footage-archive/contracts';

/** Subtree name for files sitting directly under the source root. */
export const ROOT_SUBTREE = '.';

export interface IndexableFile {
  relativePath: string;
  filename: string;
}

export function topLevelSubtree(relativePath: string): string {
  const segments = relativePath.split(/[\\/]+/).filter(Boolean);
  return segments.length > 1 ? segments[0] : ROOT_SUBTREE;
}

export function indexKey(filename: string): string {
  return filename.toLowerCase();
}

export function buildSourceIndex(files: Iterable<IndexableFile>): SourceFileIndex {
  const index: SourceFileIndex = new Map();

  for (const file of files) {
    const key = indexKey(file.filename);
    const entry = index.get(key) ?? { filename: file.filename, subtrees: new Set<string>() };
    entry.subtrees.add(topLevelSubtree(file.relativePath));
    index.set(key, entry);
  }

  return index;
}

export function validate(index: SourceFileIndex): DuplicateNameError[] {
  const errors: DuplicateNameError[] = [];

  for (const { filename, subtrees } of index.values()) {
    if (subtrees.size > 1) {
      errors.push({ filename, subtrees: [...subtrees].sort() });
    }
  }

  return errors.sort((left, right) => left.filename.localeCompare(right.filename));
}

export function describeDuplicate(error: DuplicateNameError): string {
  return `${error.filename} appears in ${error.subtrees.map(subtree => `${subtree}/`).join(', ')}`;
}
