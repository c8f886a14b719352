/**
 * Maps a calendar date onto a folder of the archive root.
 *
 * An existing folder for the date is reused verbatim, human-added suffix and
 * all. A new folder is always the bare `YYYY-MM-DD`; suffixes only come from
 * people renaming folders later. Two folders claiming one date is an error the
 * caller has to see.
 */

import path from 'node:path';
import type {
  AmbiguousDateFolderError,
  ArchiveDateFolder,
  CalendarDate,
} from '@footage-archive/contracts';
import { formatIsoDate } from './calendar-date.js';
import { dateFolderMatches, parseDateFolderName } from './date-folder.js';

export type DestinationResolution =
  | { ok: true; folder: ArchiveDateFolder }
  | { ok: false; error: AmbiguousDateFolderError };

/**
 * @param childFolderNames - immediate child directory names of the archive root
 */
export function resolveDestination(
  date: CalendarDate,
  destinationRoot: string,
  childFolderNames: readonly string[],
): DestinationResolution {
  const matches = childFolderNames.filter(name => dateFolderMatches(name, date));

  if (matches.length > 1) {
    return { ok: false, error: { date, candidates: [...matches].sort() } };
  }

  if (matches.length === 1) {
    const name = matches[0];
    const suffix = parseDateFolderName(name)?.suffix;
    return {
      ok: true,
      folder: {
        date,
        name,
        ...(suffix ? { suffix } : {}),
        path: path.join(destinationRoot, name),
        exists: true,
      },
    };
  }

  const name = formatIsoDate(date);
  return {
    ok: true,
    folder: { date, name, path: path.join(destinationRoot, name), exists: false },
  };
}

export function managedFilePath(folder: ArchiveDateFolder, managedSubfolder: string, filename: string): string {
  return path.join(folder.path, managedSubfolder, filename);
}

export function describeAmbiguity(error: AmbiguousDateFolderError): string {
  return `${formatIsoDate(error.date)} is claimed by ${error.candidates.map(name => `"${name}"`).join(', ')}`;
}
