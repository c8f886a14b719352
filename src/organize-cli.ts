#!/usr/bin/env node
/**
 * Organize camera files from a card into the dated archive
 */

import { config } from 'dotenv';
import type { DuplicatePolicy, RunMode } from '@footage-archive/contracts';
import { isDirectInvocation } from './cli-entry.js';
import { ConfigManager } from './config.js';
import { AppError, handleError, setDefaultLogLevel } from './logger.js';
import { organize, type LineWriter } from './organize.js';

config({ override: false });

export const ORGANIZE_USAGE = [
  'Usage: organize <source_dir> <destination_dir> [--approve] [--move] [--config <file>] [--abort-on-duplicates]',
  '',
  'Copies managed camera files into {destination}/YYYY-MM-DD[ suffix]/{subfolder}/{filename}.',
  'Without --approve nothing is written; the plan is only printed.',
  '',
  'Options:',
  '  --approve               Perform the copies (or moves)',
  '  --move                  Move instead of copy',
  '  --config <file>         YAML or JSON configuration file',
  '  --abort-on-duplicates   Plan nothing when any file name repeats across source folders',
  '  --help                  Show this message',
];

export interface OrganizeCliOptions {
  source: string;
  destination: string;
  approve: boolean;
  mode: RunMode;
  configPath?: string;
  duplicatePolicy?: DuplicatePolicy;
  help: boolean;
}

export function parseArgs(argv: string[]): OrganizeCliOptions {
  const positional: string[] = [];
  let approve = false;
  let mode: RunMode = 'copy';
  let configPath: string | undefined;
  let duplicatePolicy: DuplicatePolicy | undefined;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--approve') {
      approve = true;
      continue;
    }

    if (arg === '--move') {
      mode = 'move';
      continue;
    }

    if (arg === '--abort-on-duplicates') {
      duplicatePolicy = 'abort';
      continue;
    }

    if (arg === '--config') {
      configPath = argv[++i];
      if (!configPath) {
        throw new AppError('Missing value for --config', 'INVALID_ARGUMENT');
      }
      continue;
    }

    if (arg === '--help' || arg === '-h') {
      help = true;
      continue;
    }

    if (arg.startsWith('--')) {
      throw new AppError(`Unknown argument: ${arg}`, 'INVALID_ARGUMENT');
    }

    positional.push(arg);
  }

  if (help) {
    return { source: '', destination: '', approve, mode, configPath, duplicatePolicy, help };
  }

  if (positional.length !== 2) {
    throw new AppError(
      `Expected <source_dir> and <destination_dir>, got ${positional.length} argument(s)`,
      'INVALID_ARGUMENT'
    );
  }

  return {
    source: positional[0],
    destination: positional[1],
    approve,
    mode,
    configPath,
    duplicatePolicy,
    help,
  };
}

/**
 * Runs the CLI and returns the exit code.
 */
export async function runOrganizeCli(argv: string[], write: LineWriter = line => console.log(line)): Promise<number> {
  const options = parseArgs(argv);
  if (options.help) {
    ORGANIZE_USAGE.forEach(line => write(line));
    return 0;
  }

  const archiveConfig = new ConfigManager(ConfigManager.locate(options.configPath)).getConfig();
  setDefaultLogLevel(archiveConfig.logLevel);

  const outcome = await organize(
    {
      source: options.source,
      destination: options.destination,
      approve: options.approve,
      mode: options.mode,
      family: archiveConfig.family,
      duplicatePolicy: options.duplicatePolicy ?? archiveConfig.duplicatePolicy,
    },
    write
  );
  return outcome.exitCode;
}

if (isDirectInvocation(import.meta.url)) {
  runOrganizeCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      const appError = error instanceof AppError ? error : handleError(error);
      console.error(`❌ ${appError.message}`);
      if (appError.code === 'INVALID_ARGUMENT') {
        console.error(ORGANIZE_USAGE[0]);
      }
      process.exitCode = 1;
    });
}
