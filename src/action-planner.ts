/**
 * Turns classified files into plan entries without touching the disk.
 *
 * Everything the planner knows about the archive comes in through
 * PlanningContext: a listing of the root's child folders and a probe for
 * entries already sitting at a destination path.
 */

import type {
  DuplicateNameError,
  DuplicatePolicy,
  ManagedFile,
  PlanEntry,
  RunMode,
  SourceFileIndex,
} from '@footage-archive/contracts';
import { describeAmbiguity, managedFilePath, resolveDestination } from './destination-resolver.js';
import { describeDuplicate, indexKey, validate } from './duplicate-guard.js';

export interface ExistingEntry {
  sizeBytes: number;
  /** Destination and source are the same file on disk. */
  sameFile: boolean;
}

export interface PlanningContext {
  destinationRoot: string;
  childFolderNames: readonly string[];
  managedSubfolder: string;
  mode: RunMode;
  existingAt(destinationPath: string, file: ManagedFile): ExistingEntry | undefined;
}

export interface PlanResult {
  entries: PlanEntry[];
  duplicates: DuplicateNameError[];
  aborted: boolean;
}

export function plan(file: ManagedFile, context: PlanningContext): PlanEntry {
  const resolution = resolveDestination(file.resolvedDate, context.destinationRoot, context.childFolderNames);
  if (!resolution.ok) {
    return {
      file,
      action: 'error-ambiguous-date-folder',
      reason: describeAmbiguity(resolution.error),
    };
  }

  const dateFolder = resolution.folder;
  const destinationPath = managedFilePath(dateFolder, context.managedSubfolder, file.filename);
  const existing = context.existingAt(destinationPath, file);

  if (existing && (existing.sameFile || existing.sizeBytes === file.sizeBytes)) {
    return { file, action: 'skip-identical-size', destinationPath, dateFolder };
  }

  // A same-named file of another size is overwritten. See DESIGN.md.
  const entry: PlanEntry = { file, action: context.mode, destinationPath, dateFolder };
  if (existing) {
    entry.reason = `overwrites existing file of ${existing.sizeBytes} bytes`;
  }
  return entry;
}

/**
 * Validates the whole source set first, then plans file by file in order.
 */
export function planAll(
  files: readonly ManagedFile[],
  index: SourceFileIndex,
  context: PlanningContext,
  policy: DuplicatePolicy = 'skip-affected',
): PlanResult {
  const duplicates = validate(index);
  const duplicateByName = new Map(duplicates.map(duplicate => [indexKey(duplicate.filename), duplicate]));

  const duplicateEntries = (file: ManagedFile): PlanEntry | undefined => {
    const duplicate = duplicateByName.get(indexKey(file.filename));
    return duplicate
      ? { file, action: 'error-duplicate-name', reason: describeDuplicate(duplicate) }
      : undefined;
  };

  if (policy === 'abort' && duplicates.length > 0) {
    const entries = files
      .map(duplicateEntries)
      .filter((entry): entry is PlanEntry => entry !== undefined);
    return { entries, duplicates, aborted: true };
  }

  const entries = files.map(file => duplicateEntries(file) ?? plan(file, context));
  return { entries, duplicates, aborted: false };
}
