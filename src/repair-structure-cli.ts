#!/usr/bin/env node
/**
 * Print a shell script that moves stray camera files into the managed subfolder
 */

import { config } from 'dotenv';
import { isDirectInvocation } from './cli-entry.js';
import { ConfigManager } from './config.js';
import { assertDirectory, listArchive } from './filesystem.js';
import { AppError, handleError, setDefaultLogLevel } from './logger.js';
import type { LineWriter } from './organize.js';
import { scan } from './structure-repair.js';

config({ override: false });

export const REPAIR_USAGE = 'Usage: repair-structure <archive_dir> [--config <file>]';

export interface RepairCliOptions {
  archive: string;
  configPath?: string;
}

export function parseArgs(argv: string[]): RepairCliOptions {
  const positional: string[] = [];
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--config') {
      configPath = argv[++i];
      if (!configPath) {
        throw new AppError('Missing value for --config', 'INVALID_ARGUMENT');
      }
      continue;
    }
    if (arg.startsWith('--')) {
      throw new AppError(`Unknown argument: ${arg}`, 'INVALID_ARGUMENT');
    }
    positional.push(arg);
  }

  if (positional.length !== 1) {
    throw new AppError(`Expected <archive_dir>, got ${positional.length} argument(s)`, 'INVALID_ARGUMENT');
  }

  return { archive: positional[0], configPath };
}

/**
 * Script lines go to `write`, warnings and notes to `warn`. Returns the exit code.
 */
export async function runRepairCli(
  argv: string[],
  write: LineWriter = line => console.log(line),
  warn: LineWriter = line => console.error(line),
): Promise<number> {
  const options = parseArgs(argv);
  const archiveConfig = new ConfigManager(ConfigManager.locate(options.configPath)).getConfig();
  setDefaultLogLevel(archiveConfig.logLevel);

  const archiveRoot = assertDirectory(options.archive, 'INVALID_ARCHIVE_PATH', 'Archive');
  const plan = scan(await listArchive(archiveRoot), archiveConfig.family);

  plan.warnings.forEach(line => warn(line));

  if (plan.moves.length === 0) {
    warn(`# All ${archiveConfig.family.managedSubfolder} files are already compliant.`);
    return 0;
  }

  plan.scriptLines.forEach(line => write(line));
  warn(`# ${plan.moves.length} files to move`);
  return 0;
}

if (isDirectInvocation(import.meta.url)) {
  runRepairCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      const appError = error instanceof AppError ? error : handleError(error);
      console.error(`❌ ${appError.message}`);
      if (appError.code === 'INVALID_ARGUMENT') {
        console.error(REPAIR_USAGE);
      }
      process.exitCode = 1;
    });
}
