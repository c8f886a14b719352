import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ORGANIZE_USAGE, runOrganizeCli } from '../src/organize-cli.js';

const CLIP = 'VID_20241011_101500_00_001.insv';

describe('organize CLI', () => {
  let tmpDir: string;
  let source: string;
  let destination: string;
  let lines: string[];

  const write = (line: string): void => {
    lines.push(line);
  };

  function put(root: string, relativePath: string, content: string): string {
    const fullPath = path.join(root, ...relativePath.split('/'));
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
    return fullPath;
  }

  function archived(folder: string, filename = CLIP, subfolder = 'insta360'): string {
    return path.join(destination, folder, subfolder, filename);
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'footage-archive-cli-'));
    source = path.join(tmpDir, 'card');
    destination = path.join(tmpDir, 'archive');
    fs.mkdirSync(source);
    fs.mkdirSync(destination);
    lines = [];
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('previews without touching the archive', async () => {
    const clip = put(source, `DCIM/Camera01/${CLIP}`, 'abcd');

    const code = await runOrganizeCli([source, destination], write);

    expect(code).toBe(0);
    expect(lines).toEqual([
      '[DRY RUN] Would copy 1 files (4.0 B)',
      '',
      `Would copy: ${clip} -> ${archived('2024-10-11')}`,
      '',
      'Summary:',
      '  Would copy: 1',
      '  Skipped (identical size): 0',
      '  Errors: 0',
      '  Bytes to transfer: 4.0 B',
      '',
      'Run with --approve to copy files.',
    ]);
    expect(fs.readdirSync(destination)).toEqual([]);
  });

  it('copies on approval and skips on the second run', async () => {
    const clip = put(source, `DCIM/Camera01/${CLIP}`, 'abcd');

    expect(await runOrganizeCli([source, destination, '--approve'], write)).toBe(0);
    expect(lines).toEqual([
      'Copying 1 files (4.0 B)',
      '',
      `Copied: ${clip} -> ${archived('2024-10-11')}`,
      '',
      'Summary:',
      '  Copied: 1',
      '  Skipped (identical size): 0',
      '  Errors: 0',
      '  Failed: 0',
      '  Bytes transferred: 4.0 B',
    ]);
    expect(fs.readFileSync(archived('2024-10-11'), 'utf-8')).toBe('abcd');
    expect(fs.existsSync(clip)).toBe(true);

    lines = [];
    expect(await runOrganizeCli([source, destination, '--approve'], write)).toBe(0);
    expect(lines).toEqual([
      'Copying 0 files (0.0 B)',
      'Skipping 1 files (already exist with same size)',
      '',
      `Skipping (same size already present): ${clip} -> ${archived('2024-10-11')}`,
      '',
      'Summary:',
      '  Copied: 0',
      '  Skipped (identical size): 1',
      '  Errors: 0',
      '  Failed: 0',
      '  Bytes transferred: 0.0 B',
    ]);
  });

  it('moves only when approved', async () => {
    const clip = put(source, CLIP, 'abcd');

    expect(await runOrganizeCli([source, destination, '--move'], write)).toBe(0);
    expect(lines[0]).toBe('[DRY RUN] Would move 1 files (4.0 B)');
    expect(lines[lines.length - 1]).toBe('Run with --approve to move files.');
    expect(fs.existsSync(clip)).toBe(true);
    expect(fs.existsSync(archived('2024-10-11'))).toBe(false);

    lines = [];
    expect(await runOrganizeCli([source, destination, '--move', '--approve'], write)).toBe(0);
    expect(lines).toContain(`Moved: ${clip} -> ${archived('2024-10-11')}`);
    expect(fs.existsSync(clip)).toBe(false);
    expect(fs.readFileSync(archived('2024-10-11'), 'utf-8')).toBe('abcd');
  });

  it('says when a date comes from file timestamps', async () => {
    const clip = put(source, 'clip.insv', 'abcd');

    expect(await runOrganizeCli([source, destination], write)).toBe(0);

    const line = lines.find(candidate => candidate.startsWith(`Would copy: ${clip} -> `));
    expect(line).toMatch(/ \(date from (birthtime|mtime)\)$/);
  });

  it('reuses a renamed date folder', async () => {
    put(source, CLIP, 'abcd');
    fs.mkdirSync(path.join(destination, '2024-10-11 Paris Trip'));

    expect(await runOrganizeCli([source, destination, '--approve'], write)).toBe(0);

    expect(fs.existsSync(archived('2024-10-11 Paris Trip'))).toBe(true);
    expect(fs.readdirSync(destination)).toEqual(['2024-10-11 Paris Trip']);
  });

  it('refuses to place a name shared by two cards', async () => {
    const clipA = put(source, 'cardA/clip.insv', '0123456789');
    put(source, 'cardB/clip.insv', '0123456789ab');
    put(source, `cardA/${CLIP}`, 'abcd');

    const code = await runOrganizeCli([source, destination, '--approve'], write);

    expect(code).toBe(1);
    expect(lines).toContain(`Error (duplicate name): ${clipA}: clip.insv appears in cardA/, cardB/`);
    expect(lines).toContain('  Errors: 2');
    expect(fs.readdirSync(destination)).toEqual(['2024-10-11']);
    expect(fs.readdirSync(path.join(destination, '2024-10-11', 'insta360'))).toEqual([CLIP]);
  });

  it('treats names differing only in case as duplicates', async () => {
    const upper = put(source, 'cardA/VID_20241011_101500_00_009.INSV', 'abcd');
    put(source, 'cardB/VID_20241011_101500_00_009.insv', 'abcdef');

    const code = await runOrganizeCli([source, destination, '--approve'], write);

    expect(code).toBe(1);
    expect(lines).toContain(
      `Error (duplicate name): ${upper}: VID_20241011_101500_00_009.INSV appears in cardA/, cardB/`
    );
    expect(fs.readdirSync(destination)).toEqual([]);
  });

  it('plans nothing when asked to abort on duplicates', async () => {
    put(source, 'cardA/clip.insv', '0123456789');
    put(source, 'cardB/clip.insv', '0123456789ab');
    put(source, `cardA/${CLIP}`, 'abcd');

    const code = await runOrganizeCli([source, destination, '--approve', '--abort-on-duplicates'], write);

    expect(code).toBe(1);
    expect(lines[0]).toBe('Aborted: 1 duplicate file names found across source folders; nothing was planned.');
    expect(lines.filter(line => line.startsWith('Error (duplicate name)'))).toHaveLength(2);
    expect(lines).toContain('  Copied: 0');
    expect(fs.readdirSync(destination)).toEqual([]);
  });

  it('reports a date claimed by two folders', async () => {
    const clip = put(source, CLIP, 'abcd');
    fs.mkdirSync(path.join(destination, '2024-10-11'));
    fs.mkdirSync(path.join(destination, '2024-10-11-dup'));

    const code = await runOrganizeCli([source, destination, '--approve'], write);

    expect(code).toBe(1);
    expect(lines).toContain(
      `Error (ambiguous date folder): ${clip}: 2024-10-11 is claimed by "2024-10-11", "2024-10-11-dup"`
    );
    expect(fs.readdirSync(path.join(destination, '2024-10-11'))).toEqual([]);
  });

  it('overwrites a same-named file of another size', async () => {
    const clip = put(source, CLIP, 'abcd');
    put(destination, `2024-10-11/insta360/${CLIP}`, 'xy');

    expect(await runOrganizeCli([source, destination, '--approve'], write)).toBe(0);

    expect(lines).toContain(`Copied: ${clip} -> ${archived('2024-10-11')} (overwrites existing file of 2 bytes)`);
    expect(fs.readFileSync(archived('2024-10-11'), 'utf-8')).toBe('abcd');
  });

  it('leaves unmanaged and excluded files alone', async () => {
    put(source, 'notes.txt', 'hello');
    put(source, `MISC/${CLIP}`, 'abcd');

    expect(await runOrganizeCli([source, destination, '--approve'], write)).toBe(0);

    expect(lines).toEqual(['No managed files found in source directory.']);
    expect(fs.readdirSync(destination)).toEqual([]);
  });

  it('uses the managed subfolder from a config file', async () => {
    put(source, CLIP, 'abcd');
    const configPath = put(tmpDir, 'archive.yaml', 'family:\n  managedSubfolder: x360\n');

    expect(await runOrganizeCli([source, destination, '--approve', '--config', configPath], write)).toBe(0);

    expect(fs.existsSync(archived('2024-10-11', CLIP, 'x360'))).toBe(true);
  });

  it('rejects a missing source directory', async () => {
    await expect(runOrganizeCli([path.join(tmpDir, 'nope'), destination], write)).rejects.toMatchObject({
      code: 'INVALID_SOURCE_PATH',
    });
  });

  it('rejects a destination that is a file', async () => {
    const file = put(tmpDir, 'plain.txt', 'x');
    await expect(runOrganizeCli([source, file], write)).rejects.toMatchObject({
      code: 'INVALID_DESTINATION_PATH',
    });
  });

  it('rejects unknown flags and wrong arity', async () => {
    await expect(runOrganizeCli([source, destination, '--force'], write)).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
      message: 'Unknown argument: --force',
    });
    await expect(runOrganizeCli([source], write)).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
  });

  it('prints usage for --help', async () => {
    expect(await runOrganizeCli(['--help'], write)).toBe(0);
    expect(lines).toEqual(ORGANIZE_USAGE);
  });
});
