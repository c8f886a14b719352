export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export type DateSource = 'filename' | 'birthtime' | 'mtime';

export interface ManagedFile {
  sourcePath: string;
  relativePath: string;
  filename: string;
  sizeBytes: number;
  resolvedDate: CalendarDate;
  dateSource: DateSource;
}

export type RunMode = 'copy' | 'move';

export type PlanAction =
  | 'copy'
  | 'move'
  | 'skip-identical-size'
  | 'error-duplicate-name'
  | 'error-ambiguous-date-folder';

export interface ArchiveDateFolder {
  date: CalendarDate;
  name: string;
  suffix?: string;
  path: string;
  exists: boolean;
}

export interface PlanEntry {
  file: ManagedFile;
  action: PlanAction;
  destinationPath?: string;
  dateFolder?: ArchiveDateFolder;
  reason?: string;
}

export interface SourceIndexEntry {
  /** First spelling seen in enumeration order */
  filename: string;
  subtrees: Set<string>;
}

/** Case-folded filename -> its top-level source subtrees */
export type SourceFileIndex = Map<string, SourceIndexEntry>;

export interface DuplicateNameError {
  filename: string;
  subtrees: string[];
}

export interface AmbiguousDateFolderError {
  date: CalendarDate;
  candidates: string[];
}

export type DuplicatePolicy = 'skip-affected' | 'abort';

export interface ManagedFamily {
  extensions: string[];
  managedNames: string[];
  excludedFolders: string[];
  datePrefixes: string[];
  managedSubfolder: string;
}

export type ExecutionStatus = 'applied' | 'skipped' | 'failed' | 'planned';

export interface ExecutionResult {
  entry: PlanEntry;
  status: ExecutionStatus;
  bytes: number;
  error?: string;
}

export interface RunSummary {
  mode: RunMode;
  approved: boolean;
  transferred: number;
  skippedIdentical: number;
  errored: number;
  failed: number;
  totalBytes: number;
}

export interface RepairMove {
  from: string;
  to: string;
}
