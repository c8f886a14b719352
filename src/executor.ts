/**
 * Carries out approved plan entries, one at a time. A failing file is
 * recorded and the run moves on to the next one.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { ExecutionResult, PlanEntry } from '@footage-archive/contracts';
import { Logger, errorMessage } from './logger.js';

const logger = new Logger({ context: 'executor' });

function ensureDirectoryExists(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

function copyPreservingTimes(sourcePath: string, destinationPath: string): void {
  fs.copyFileSync(sourcePath, destinationPath);
  const stats = fs.statSync(sourcePath);
  fs.utimesSync(destinationPath, stats.atime, stats.mtime);
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

function moveFile(sourcePath: string, destinationPath: string): void {
  try {
    fs.renameSync(sourcePath, destinationPath);
  } catch (error) {
    if (!isCrossDeviceError(error)) {
      throw error;
    }
    // Card and archive on different volumes.
    copyPreservingTimes(sourcePath, destinationPath);
    fs.unlinkSync(sourcePath);
  }
}

export function executeEntry(entry: PlanEntry): ExecutionResult {
  if (entry.action !== 'copy' && entry.action !== 'move') {
    return { entry, status: 'skipped', bytes: 0 };
  }

  const destinationPath = entry.destinationPath;
  if (!destinationPath) {
    return { entry, status: 'failed', bytes: 0, error: 'plan entry has no destination' };
  }

  try {
    ensureDirectoryExists(path.dirname(destinationPath));
    if (entry.action === 'move') {
      moveFile(entry.file.sourcePath, destinationPath);
    } else {
      copyPreservingTimes(entry.file.sourcePath, destinationPath);
    }
    logger.debug(`${entry.action} applied`, { from: entry.file.sourcePath, to: destinationPath });
    return { entry, status: 'applied', bytes: entry.file.sizeBytes };
  } catch (error) {
    const message = errorMessage(error);
    logger.warn(`${entry.action} failed`, { from: entry.file.sourcePath, to: destinationPath, error: message });
    return { entry, status: 'failed', bytes: 0, error: message };
  }
}

/**
 * Without approval every entry is only marked as planned.
 */
export function executePlan(
  entries: readonly PlanEntry[],
  approved: boolean,
  onResult?: (result: ExecutionResult) => void,
): ExecutionResult[] {
  const results: ExecutionResult[] = [];

  for (const entry of entries) {
    const result: ExecutionResult = approved
      ? executeEntry(entry)
      : { entry, status: 'planned', bytes: 0 };
    results.push(result);
    onResult?.(result);
  }

  return results;
}
