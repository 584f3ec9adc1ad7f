import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CsvDirectoryMerger } from '../../src/CsvDirectoryMerger.js';
import type { HeaderMismatchEvent, HeaderReorderedEvent } from '../../src/domain/events/DomainEvents.js';

// --- Helpers ---

let root: string;
let outDir: string;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'csv-dir-merge-'));
  outDir = join(root, '_out');
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

function writeFiles(directory: string, files: Record<string, string>): void {
  const dir = join(root, directory);
  mkdirSync(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(dir, name), content);
  }
}

function readOutput(directory: string): string {
  return readFileSync(join(outDir, `${directory}.csv`), 'utf-8');
}

// ============================================================
// Column alignment
// ============================================================
describe('Merging a directory of CSV files', () => {
  it('should reorder columns to the header of the first file', async () => {
    writeFiles('sales', {
      '01.csv': 'id,amt\n1,10\n2,20\n',
      '02.csv': 'amt,id\n30,3\n',
    });
    const reordered: HeaderReorderedEvent[] = [];

    const summary = await new CsvDirectoryMerger({ rootDir: root, outDir })
      .on('header:reordered', (e) => reordered.push(e))
      .run();

    expect(readOutput('sales')).toBe('id,amt\n1,10\n2,20\n3,30\n');
    expect(reordered.map((e) => e.filePath)).toEqual([join(root, 'sales', '02.csv')]);
    expect(summary.outputsWritten).toBe(1);
    expect(summary.directories[0]).toMatchObject({
      directory: 'sales',
      status: 'PROMOTED',
      canonicalHeader: ['id', 'amt'],
      filesMerged: 2,
      rowsWritten: 3,
    });
  });

  it('should drop extra columns and leave missing columns empty', async () => {
    writeFiles('sales', {
      '01.csv': 'id,amt\n1,10\n',
      '02.csv': 'id,amt,region\n3,30,west\n',
      '03.csv': 'id\n4\n',
    });
    const mismatches: HeaderMismatchEvent[] = [];

    await new CsvDirectoryMerger({ rootDir: root, outDir }).on('header:mismatch', (e) => mismatches.push(e)).run();

    expect(readOutput('sales')).toBe('id,amt\n1,10\n3,30\n4,\n');
    expect(mismatches.map((e) => ({ file: e.filePath, missing: e.missing, extra: e.extra }))).toEqual([
      { file: join(root, 'sales', '02.csv'), missing: [], extra: ['region'] },
      { file: join(root, 'sales', '03.csv'), missing: ['amt'], extra: [] },
    ]);
  });

  it('should copy a file whose header matches exactly', async () => {
    writeFiles('one', { 'only.csv': 'x,y,z\n1,2,3\n"a,b",c,"d ""e"""\n' });

    await new CsvDirectoryMerger({ rootDir: root, outDir }).run();

    expect(readOutput('one')).toBe('x,y,z\n1,2,3\n"a,b",c,"d ""e"""\n');
  });

  it('should strip a byte order mark from each header', async () => {
    writeFiles('bom', {
      'a.csv': '\uFEFFid,amt\n1,10\n',
      'b.csv': '\uFEFFid,amt\n2,20\n',
    });
    const diagnostics: string[] = [];

    await new CsvDirectoryMerger({ rootDir: root, outDir })
      .on('header:mismatch', (e) => diagnostics.push(e.type))
      .on('header:reordered', (e) => diagnostics.push(e.type))
      .run();

    expect(readOutput('bom')).toBe('id,amt\n1,10\n2,20\n');
    expect(diagnostics).toEqual([]);
  });

  it('should only pick up files with a csv extension in any letter case', async () => {
    writeFiles('mixed', {
      'a.CSV': 'k\n1\n',
      'b.txt': 'k\n2\n',
      'c.csv.bak': 'k\n3\n',
      'd.Csv': 'k\n4\n',
    });

    await new CsvDirectoryMerger({ rootDir: root, outDir }).run();

    expect(readOutput('mixed')).toBe('k\n1\n4\n');
  });

  it('should ignore CSV files in nested directories', async () => {
    writeFiles('top', { 'a.csv': 'k\n1\n' });
    writeFiles(join('top', 'nested'), { 'b.csv': 'k\n2\n' });

    const summary = await new CsvDirectoryMerger({ rootDir: root, outDir }).run();

    expect(readOutput('top')).toBe('k\n1\n');
    expect(summary.directories.map((d) => d.directory)).toEqual(['top']);
  });
});

// ============================================================
// Skipped directories
// ============================================================
describe('Skipping directories', () => {
  it('should skip a subdirectory with no CSV files and produce no output', async () => {
    writeFiles('empty', { 'notes.txt': 'nothing here' });
    writeFiles('sales', { 'a.csv': 'id\n1\n' });

    const summary = await new CsvDirectoryMerger({ rootDir: root, outDir }).run();

    expect(existsSync(join(outDir, 'empty.csv'))).toBe(false);
    expect(summary.directoriesSkipped).toBe(1);
    expect(summary.outputsWritten).toBe(1);
    expect(summary.directories.map((d) => [d.directory, d.status, d.skipReason])).toEqual([
      ['empty', 'SKIPPED', 'no-csv-files'],
      ['sales', 'PROMOTED', undefined],
    ]);
  });

  it('should skip a directory whose first file has an empty header without leaving a temp file', async () => {
    writeFiles('blank', { 'a.csv': '', 'b.csv': 'id\n1\n' });

    const summary = await new CsvDirectoryMerger({ rootDir: root, outDir }).run();

    expect(summary.directories[0]).toMatchObject({ status: 'SKIPPED', skipReason: 'empty-header' });
    expect(existsSync(join(outDir, 'blank.csv'))).toBe(false);
    expect(existsSync(join(outDir, 'blank.csv.tmp'))).toBe(false);
  });

  it('should report an empty root and still create the output directory', async () => {
    const events: string[] = [];

    const summary = await new CsvDirectoryMerger({ rootDir: root, outDir }).onAny((e) => events.push(e.type)).run();

    expect(summary.directories).toEqual([]);
    expect(existsSync(outDir)).toBe(true);
    expect(events).toEqual(['run:started', 'run:empty', 'run:completed']);
  });
});
