import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, statSync, utimesSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { ManagedFile, PlanAction, PlanEntry } from '@footage-archive/contracts';
import { executeEntry, executePlan } from './executor.js';

describe('executor', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'footage-archive-exec-'));
    mkdirSync(join(workDir, 'card'));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function sourceFile(name: string, content: string): ManagedFile {
    const sourcePath = join(workDir, 'card', name);
    writeFileSync(sourcePath, content);
    return {
      sourcePath,
      relativePath: name,
      filename: name,
      sizeBytes: content.length,
      resolvedDate: { year: 2024, month: 10, day: 11 },
      dateSource: 'filename',
    };
  }

  function entry(file: ManagedFile, action: PlanAction): PlanEntry {
    return {
      file,
      action,
      destinationPath: join(workDir, 'archive', '2024-10-11', 'insta360', file.filename),
    };
  }

  it('copies into a new date folder and keeps the source', () => {
    const file = sourceFile('VID_20241011_101500_00_001.insv', 'footage');
    const when = new Date('2024-10-11T10:15:00Z');
    utimesSync(file.sourcePath, when, when);

    const result = executeEntry(entry(file, 'copy'));

    expect(result).toMatchObject({ status: 'applied', bytes: 7 });
    const copied = join(workDir, 'archive', '2024-10-11', 'insta360', file.filename);
    expect(readFileSync(copied, 'utf-8')).toBe('footage');
    expect(statSync(copied).mtimeMs).toBe(when.getTime());
    expect(existsSync(file.sourcePath)).toBe(true);
  });

  it('moves and removes the source', () => {
    const file = sourceFile('IMG_20241011_101500_00_002.insp', 'photo');

    const result = executeEntry(entry(file, 'move'));

    expect(result.status).toBe('applied');
    expect(existsSync(file.sourcePath)).toBe(false);
    expect(existsSync(join(workDir, 'archive', '2024-10-11', 'insta360', file.filename))).toBe(true);
  });

  it('leaves skips and errors alone', () => {
    const file = sourceFile('clip.insv', 'data');

    expect(executeEntry(entry(file, 'skip-identical-size')).status).toBe('skipped');
    expect(executeEntry({ file, action: 'error-duplicate-name', reason: 'clip.insv appears in a/, b/' }).status).toBe('skipped');
    expect(existsSync(join(workDir, 'archive'))).toBe(false);
  });

  it('records a failure and continues with the next entry', () => {
    const missing = sourceFile('gone.insv', 'x');
    rmSync(missing.sourcePath);
    const present = sourceFile('here.insv', 'yy');

    const seen: string[] = [];
    const results = executePlan([entry(missing, 'copy'), entry(present, 'copy')], true, result => {
      seen.push(`${result.entry.file.filename}:${result.status}`);
    });

    expect(seen).toEqual(['gone.insv:failed', 'here.insv:applied']);
    expect(results[0].error).toContain('ENOENT');
    expect(results[0].bytes).toBe(0);
    expect(results[1].bytes).toBe(2);
  });

  it('only marks entries as planned without approval', () => {
    const file = sourceFile('clip.insv', 'data');

    const results = executePlan([entry(file, 'copy')], false);

    expect(results).toEqual([{ entry: entry(file, 'copy'), status: 'planned', bytes: 0 }]);
    expect(existsSync(join(workDir, 'archive'))).toBe(false);
  });
});
