/**
 * Filesystem adapters: everything the planners need to know about the disk,
 * gathered up front. Nothing here writes.
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';
import type { ManagedFamily, ManagedFile } from '@footage-archive/contracts';
import type { ExistingEntry } from './action-planner.js';
import { resolveDate, type FileTimestamps } from './date-resolver.js';
import { classify } from './file-classifier.js';
import { AppError, Logger } from './logger.js';
import type { ArchiveListing } from './structure-repair.js';

const logger = new Logger({ context: 'filesystem' });

export interface SourceScan {
  files: ManagedFile[];
  ignored: number;
}

function toPosixPath(value: string): string {
  return value.split(path.sep).join('/');
}

/**
 * Resolves `directory` and insists it is an existing directory.
 */
export function assertDirectory(directory: string, code: string, label: string): string {
  const resolved = path.resolve(directory);
  let stats: fs.Stats | undefined;
  try {
    stats = fs.statSync(resolved, { throwIfNoEntry: false });
  } catch (error) {
    throw new AppError(
      `${label} directory not accessible: ${resolved}`,
      code,
      { path: resolved, cause: error instanceof Error ? error.message : String(error) }
    );
  }

  if (!stats) {
    throw new AppError(`${label} directory does not exist: ${resolved}`, code, { path: resolved });
  }
  if (!stats.isDirectory()) {
    throw new AppError(`${label} path is not a directory: ${resolved}`, code, { path: resolved });
  }
  return resolved;
}

export function timestampsOf(stats: fs.Stats): FileTimestamps {
  // Platforms without birth time report the epoch.
  return {
    birthtime: stats.birthtimeMs > 0 ? stats.birthtime : undefined,
    mtime: stats.mtime,
  };
}

async function listFiles(root: string): Promise<string[]> {
  const relativePaths = await fg('**/*', {
    cwd: root,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: false,
    unique: true,
    absolute: false,
  });
  return relativePaths.map(toPosixPath).sort();
}

/**
 * Walks the whole source tree and builds ManagedFile records, sorted by
 * relative path so runs are repeatable.
 */
export async function scanSource(sourceRoot: string, family: ManagedFamily): Promise<SourceScan> {
  const files: ManagedFile[] = [];
  let ignored = 0;

  for (const relativePath of await listFiles(sourceRoot)) {
    if (classify(relativePath, family).kind !== 'managed') {
      ignored++;
      continue;
    }

    const sourcePath = path.join(sourceRoot, ...relativePath.split('/'));
    const stats = fs.statSync(sourcePath);
    const filename = path.posix.basename(relativePath);
    const resolved = resolveDate(filename, timestampsOf(stats), family);

    files.push({
      sourcePath,
      relativePath,
      filename,
      sizeBytes: stats.size,
      resolvedDate: resolved.date,
      dateSource: resolved.source,
    });
  }

  logger.debug('Scanned source tree', { root: sourceRoot, managed: files.length, ignored });
  return { files, ignored };
}

export function listChildFolders(root: string): string[] {
  return fs
    .readdirSync(root, { withFileTypes: true })
    .filter(entry => entry.isDirectory())
    .map(entry => entry.name)
    .sort();
}

/**
 * What currently sits at `destinationPath`, compared against `sourcePath`.
 */
export function probeExisting(destinationPath: string, sourcePath: string): ExistingEntry | undefined {
  const destination = fs.statSync(destinationPath, { throwIfNoEntry: false });
  if (!destination) {
    return undefined;
  }

  const source = fs.statSync(sourcePath, { throwIfNoEntry: false });
  const sameFile = source !== undefined && source.dev === destination.dev && source.ino === destination.ino;
  return { sizeBytes: destination.size, sameFile };
}

export async function listArchive(archiveRoot: string): Promise<ArchiveListing> {
  const children: ArchiveListing['children'] = [];

  for (const entry of fs.readdirSync(archiveRoot, { withFileTypes: true })) {
    if (!entry.isDirectory()) {
      children.push({ name: entry.name, isDirectory: false, files: [] });
      continue;
    }
    children.push({
      name: entry.name,
      isDirectory: true,
      files: await listFiles(path.join(archiveRoot, entry.name)),
    });
  }

  return { root: archiveRoot, children };
}
