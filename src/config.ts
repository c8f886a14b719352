/**
 * Configuration system with YAML and JSON support
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import YAML from 'js-yaml';
import type { DuplicatePolicy, ManagedFamily } from '@footage-archive/contracts';
import { AppError, Logger, errorMessage, isLogLevel, type LogLevel } from './logger.js';

const logger = new Logger({ context: 'ConfigManager' });

export interface ArchiveConfig {
  family: ManagedFamily;
  duplicatePolicy: DuplicatePolicy;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG_FILE = 'footage-archive.yaml';
export const CONFIG_ENV_VAR = 'FOOTAGE_ARCHIVE_CONFIG';

export const DEFAULT_CONFIG: ArchiveConfig = {
  family: {
    extensions: ['.insv', '.insp', '.lrv'],
    managedNames: ['fileinfo_list.list'],
    excludedFolders: ['MISC'],
    datePrefixes: ['VID', 'IMG', 'LRV', 'PRO_VID', 'PRO_LRV'],
    managedSubfolder: 'insta360'
  },
  duplicatePolicy: 'skip-affected',
  logLevel: 'warn'
};

function cloneConfig(config: ArchiveConfig): ArchiveConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, path: string): AppError {
  return new AppError(`Invalid configuration: ${message}`, 'INVALID_CONFIG', { path });
}

function readStringList(value: unknown, key: string, path: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string' && item.trim() !== '')) {
    throw invalid(`${key} must be a list of non-empty strings`, path);
  }
  return value.map(item => item.trim());
}

function normalizeExtension(extension: string): string {
  const lowered = extension.toLowerCase();
  return lowered.startsWith('.') ? lowered : `.${lowered}`;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: ArchiveConfig;
  private readonly configPath?: string;

  constructor(configPath?: string) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Explicit path, then the environment, then ./footage-archive.yaml if present
   */
  static locate(explicitPath?: string): string | undefined {
    if (explicitPath?.trim()) {
      return resolve(explicitPath.trim());
    }

    const configured = process.env[CONFIG_ENV_VAR]?.trim();
    if (configured) {
      return resolve(configured);
    }

    const local = resolve(DEFAULT_CONFIG_FILE);
    return existsSync(local) ? local : undefined;
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): ArchiveConfig {
    if (!this.configPath) {
      return cloneConfig(DEFAULT_CONFIG);
    }

    if (!existsSync(this.configPath)) {
      logger.debug(`Config file not found: ${this.configPath}, using defaults`, { path: this.configPath });
      return cloneConfig(DEFAULT_CONFIG);
    }

    let parsed: unknown;
    try {
      const content = readFileSync(this.configPath, 'utf-8');
      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }
    } catch (error) {
      throw new AppError(
        `Failed to load config: ${errorMessage(error)}`,
        'INVALID_CONFIG',
        { path: this.configPath }
      );
    }

    logger.info(`Loaded configuration from ${this.configPath}`);

    // An empty file parses to undefined.
    if (parsed === undefined || parsed === null) {
      return cloneConfig(DEFAULT_CONFIG);
    }

    return this.mergeConfigs(cloneConfig(DEFAULT_CONFIG), parsed, this.configPath);
  }

  /**
   * Merge user config with defaults (user config takes precedence)
   */
  private mergeConfigs(defaults: ArchiveConfig, user: unknown, path: string): ArchiveConfig {
    if (!isRecord(user)) {
      throw invalid('top level must be a mapping', path);
    }

    const merged = defaults;

    const family = user.family;
    if (family !== undefined && family !== null) {
      if (!isRecord(family)) {
        throw invalid('family must be a mapping', path);
      }

      if (family.extensions !== undefined) {
        merged.family.extensions = readStringList(family.extensions, 'family.extensions', path).map(normalizeExtension);
      }
      if (family.managedNames !== undefined) {
        merged.family.managedNames = readStringList(family.managedNames, 'family.managedNames', path);
      }
      if (family.excludedFolders !== undefined) {
        merged.family.excludedFolders = readStringList(family.excludedFolders, 'family.excludedFolders', path);
      }
      if (family.datePrefixes !== undefined) {
        merged.family.datePrefixes = readStringList(family.datePrefixes, 'family.datePrefixes', path);
      }
      if (family.managedSubfolder !== undefined) {
        const subfolder = family.managedSubfolder;
        if (typeof subfolder !== 'string' || subfolder.trim() === '' || /[\\/]/.test(subfolder)) {
          throw invalid('family.managedSubfolder must be a single folder name', path);
        }
        merged.family.managedSubfolder = subfolder.trim();
      }
    }

    const policy = user.duplicatePolicy;
    if (policy !== undefined) {
      if (policy !== 'skip-affected' && policy !== 'abort') {
        throw invalid('duplicatePolicy must be "skip-affected" or "abort"', path);
      }
      merged.duplicatePolicy = policy;
    }

    const logLevel = user.logLevel;
    if (logLevel !== undefined) {
      if (!isLogLevel(logLevel)) {
        throw invalid('logLevel must be one of debug, info, warn, error', path);
      }
      merged.logLevel = logLevel;
    }

    return merged;
  }

  getConfig(): ArchiveConfig {
    return cloneConfig(this.config);
  }
}
