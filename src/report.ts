/**
 * Text rendering for organize runs: per-entry lines and the closing summary.
 */

import type { ExecutionResult, PlanEntry, RunMode, RunSummary } from '@footage-archive/contracts';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatSize(bytes: number): string {
  let size = bytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) {
      return `${size.toFixed(1)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)} PB`;
}

const VERBS: Record<RunMode, { planned: string; applied: string; failed: string; gerund: string }> = {
  copy: { planned: 'Would copy', applied: 'Copied', failed: 'Failed to copy', gerund: 'Copying' },
  move: { planned: 'Would move', applied: 'Moved', failed: 'Failed to move', gerund: 'Moving' },
};

export function isTransfer(entry: PlanEntry): boolean {
  return entry.action === 'copy' || entry.action === 'move';
}

export function isPlanError(entry: PlanEntry): boolean {
  return entry.action === 'error-duplicate-name' || entry.action === 'error-ambiguous-date-folder';
}

/**
 * Parenthesized notes for a line: the overwrite reason, and where the date
 * came from when it was not read from the filename.
 */
function notesFor(entry: PlanEntry): string {
  const notes: string[] = [];
  if (entry.reason) {
    notes.push(entry.reason);
  }
  if (entry.file.dateSource !== 'filename') {
    notes.push(`date from ${entry.file.dateSource}`);
  }
  return notes.length > 0 ? ` (${notes.join('; ')})` : '';
}

export function describeResult(result: ExecutionResult, mode: RunMode): string {
  const { entry } = result;
  const source = entry.file.sourcePath;
  const arrow = `${source} -> ${entry.destinationPath ?? '?'}`;

  switch (entry.action) {
    case 'error-duplicate-name':
      return `Error (duplicate name): ${source}: ${entry.reason ?? ''}`;
    case 'error-ambiguous-date-folder':
      return `Error (ambiguous date folder): ${source}: ${entry.reason ?? ''}`;
    case 'skip-identical-size':
      return `Skipping (same size already present): ${arrow}${notesFor(entry)}`;
    case 'copy':
    case 'move':
      break;
  }

  const verbs = VERBS[mode];
  if (result.status === 'failed') {
    return `${verbs.failed}: ${arrow}: ${result.error ?? 'unknown error'}`;
  }
  const verb = result.status === 'applied' ? verbs.applied : verbs.planned;
  return `${verb}: ${arrow}${notesFor(entry)}`;
}

export function summarize(results: readonly ExecutionResult[], mode: RunMode, approved: boolean): RunSummary {
  const summary: RunSummary = {
    mode,
    approved,
    transferred: 0,
    skippedIdentical: 0,
    errored: 0,
    failed: 0,
    totalBytes: 0,
  };

  for (const result of results) {
    const { entry } = result;
    if (isPlanError(entry)) {
      summary.errored++;
    } else if (entry.action === 'skip-identical-size') {
      summary.skippedIdentical++;
    } else if (result.status === 'failed') {
      summary.failed++;
    } else if (result.status === 'applied') {
      summary.transferred++;
      summary.totalBytes += result.bytes;
    } else if (result.status === 'planned') {
      summary.transferred++;
      summary.totalBytes += entry.file.sizeBytes;
    }
  }

  return summary;
}

/**
 * Opening lines, computed from the plan before anything runs.
 */
export function renderHeader(entries: readonly PlanEntry[], mode: RunMode, approved: boolean): string[] {
  const transfers = entries.filter(isTransfer);
  const bytes = transfers.reduce((total, entry) => total + entry.file.sizeBytes, 0);
  const skipped = entries.filter(entry => entry.action === 'skip-identical-size').length;
  const verbs = VERBS[mode];

  const lines = approved
    ? [`${verbs.gerund} ${transfers.length} files (${formatSize(bytes)})`]
    : [`[DRY RUN] ${verbs.planned} ${transfers.length} files (${formatSize(bytes)})`];

  if (skipped > 0) {
    lines.push(`Skipping ${skipped} files (already exist with same size)`);
  }
  return lines;
}

export function renderSummary(summary: RunSummary): string[] {
  const verbs = VERBS[summary.mode];
  const transferLabel = summary.approved ? verbs.applied : verbs.planned;
  const bytesLabel = summary.approved ? 'transferred' : 'to transfer';

  const lines = [
    'Summary:',
    `  ${transferLabel}: ${summary.transferred}`,
    `  Skipped (identical size): ${summary.skippedIdentical}`,
    `  Errors: ${summary.errored}`,
  ];
  if (summary.approved) {
    lines.push(`  Failed: ${summary.failed}`);
  }
  lines.push(`  Bytes ${bytesLabel}: ${formatSize(summary.totalBytes)}`);

  if (!summary.approved && summary.transferred > 0) {
    lines.push('', `Run with --approve to ${summary.mode} files.`);
  }
  return lines;
}
