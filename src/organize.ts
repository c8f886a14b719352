/**
 * The organize run, in two phases: index and validate the complete source
 * set, then plan and (when approved) execute entry by entry.
 */

import type {
  DuplicatePolicy,
  ExecutionResult,
  ManagedFamily,
  RunMode,
  RunSummary,
} from '@footage-archive/contracts';
import { planAll, type PlanResult, type PlanningContext } from './action-planner.js';
import { buildSourceIndex } from './duplicate-guard.js';
import { executePlan } from './executor.js';
import { assertDirectory, listChildFolders, probeExisting, scanSource } from './filesystem.js';
import { Logger } from './logger.js';
import { describeResult, renderHeader, renderSummary, summarize } from './report.js';

const logger = new Logger({ context: 'organize' });

export const NO_FILES_MESSAGE = 'No managed files found in source directory.';

export interface OrganizeOptions {
  source: string;
  destination: string;
  approve: boolean;
  mode: RunMode;
  family: ManagedFamily;
  duplicatePolicy: DuplicatePolicy;
}

export interface OrganizeOutcome {
  plan: PlanResult;
  results: ExecutionResult[];
  summary: RunSummary;
  ignored: number;
  exitCode: number;
}

export type LineWriter = (line: string) => void;

export async function organize(
  options: OrganizeOptions,
  write: LineWriter = line => console.log(line),
): Promise<OrganizeOutcome> {
  const source = assertDirectory(options.source, 'INVALID_SOURCE_PATH', 'Source');
  const destination = assertDirectory(options.destination, 'INVALID_DESTINATION_PATH', 'Destination');

  // Phase 1: the complete source listing, indexed before any decision.
  const scan = await scanSource(source, options.family);
  const index = buildSourceIndex(scan.files);

  if (scan.files.length === 0) {
    write(NO_FILES_MESSAGE);
    const plan: PlanResult = { entries: [], duplicates: [], aborted: false };
    return { plan, results: [], summary: summarize([], options.mode, options.approve), ignored: scan.ignored, exitCode: 0 };
  }

  const context: PlanningContext = {
    destinationRoot: destination,
    childFolderNames: listChildFolders(destination),
    managedSubfolder: options.family.managedSubfolder,
    mode: options.mode,
    existingAt: (destinationPath, file) => probeExisting(destinationPath, file.sourcePath),
  };

  // Phase 2: per-file decisions, then execution in enumeration order.
  const plan = planAll(scan.files, index, context, options.duplicatePolicy);
  logger.info('Plan ready', {
    entries: plan.entries.length,
    duplicates: plan.duplicates.length,
    aborted: plan.aborted,
  });

  if (plan.aborted) {
    write(`Aborted: ${plan.duplicates.length} duplicate file names found across source folders; nothing was planned.`);
  } else {
    for (const line of renderHeader(plan.entries, options.mode, options.approve)) {
      write(line);
    }
  }
  write('');

  const results = executePlan(plan.entries, options.approve && !plan.aborted, result => {
    write(describeResult(result, options.mode));
  });

  const summary = summarize(results, options.mode, options.approve);
  write('');
  for (const line of renderSummary(summary)) {
    write(line);
  }

  const exitCode = summary.errored > 0 || summary.failed > 0 ? 1 : 0;
  return { plan, results, summary, ignored: scan.ignored, exitCode };
}
