/**
 * Library entry point: the placement engine, the repair planner and the
 * filesystem-backed runs built on them.
 */

export type * from '@footage-archive/contracts';

export { calendarDate, calendarDateFromTimestamp, formatIsoDate, isValidCalendarDate } from './calendar-date.js';
export { DATE_FOLDER_PATTERN, dateFolderMatches, isDateFolderName, parseDateFolderName } from './date-folder.js';
export { classify, isManagedFilename, type Classification } from './file-classifier.js';
export { bestCreationTimestamp, parseFilenameDate, resolveDate, type FileTimestamps, type ResolvedDate } from './date-resolver.js';
export { buildSourceIndex, indexKey, topLevelSubtree, validate } from './duplicate-guard.js';
export { managedFilePath, resolveDestination, type DestinationResolution } from './destination-resolver.js';
export { plan, planAll, type ExistingEntry, type PlanningContext, type PlanResult } from './action-planner.js';
export { renderScript, scan, shellQuote, type ArchiveListing, type RepairPlan } from './structure-repair.js';
export { executeEntry, executePlan } from './executor.js';
export { formatSize, renderHeader, renderSummary, summarize } from './report.js';
export { organize, type OrganizeOptions, type OrganizeOutcome } from './organize.js';
export { ConfigManager, DEFAULT_CONFIG, type ArchiveConfig } from './config.js';
export { AppError, Logger, logger } from './logger.js';
