import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFileSync, mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CsvParser } from '../../../src/infrastructure/parsers/CsvParser.js';
import type { Row } from '../../../src/domain/model/Header.js';

let testDir: string;

beforeAll(() => {
  testDir = mkdtempSync(join(tmpdir(), 'csv-dir-merge-parser-'));
});

afterAll(() => {
  rmSync(testDir, { recursive: true, force: true });
});

function writeTempFile(name: string, content: string): string {
  const filePath = join(testDir, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

async function collectRows(parser: CsvParser, filePath: string): Promise<Row[]> {
  const rows: Row[] = [];
  for await (const row of parser.rows(filePath)) {
    rows.push(row);
  }
  return rows;
}

describe('CsvParser', () => {
  const parser = new CsvParser({ delimiter: ',' });

  describe('rows()', () => {
    it('should yield the header followed by every data row', async () => {
      const filePath = writeTempFile('basic.csv', 'id,amt\n1,10\n2,20\n');

      expect(await collectRows(parser, filePath)).toEqual([
        ['id', 'amt'],
        ['1', '10'],
        ['2', '20'],
      ]);
    });

    it('should skip blank lines', async () => {
      const filePath = writeTempFile('blank-lines.csv', 'a,b\n\n1,2\n\n');

      expect(await collectRows(parser, filePath)).toEqual([
        ['a', 'b'],
        ['1', '2'],
      ]);
    });

    it('should keep a quoted empty field as a record', async () => {
      const filePath = writeTempFile('quoted-empty.csv', 'note\nx\n""\ny\n');

      expect(await collectRows(parser, filePath)).toEqual([['note'], ['x'], [''], ['y']]);
    });

    it('should tell quoted empty fields from blank lines across small chunks', async () => {
      const filePath = writeTempFile('quoted-empty-chunks.csv', 'note\n""\n\n""\nend\n');
      const smallChunks = new CsvParser({ delimiter: ',', highWaterMark: 4 });

      expect(await collectRows(smallChunks, filePath)).toEqual([['note'], [''], [''], ['end']]);
    });

    it('should handle CRLF line endings', async () => {
      const filePath = writeTempFile('crlf.csv', 'a,b\r\n1,2\r\n');

      expect(await collectRows(parser, filePath)).toEqual([
        ['a', 'b'],
        ['1', '2'],
      ]);
    });

    it('should unquote fields containing delimiters, quotes and line breaks', async () => {
      const filePath = writeTempFile('quoted.csv', 'a,b,c\n"x,y","say ""hi""","line1\nline2"\n');

      expect(await collectRows(parser, filePath)).toEqual([
        ['a', 'b', 'c'],
        ['x,y', 'say "hi"', 'line1\nline2'],
      ]);
    });

    it('should keep ragged rows as they are', async () => {
      const filePath = writeTempFile('ragged.csv', 'a,b,c\n1\n1,2,3,4\n');

      expect(await collectRows(parser, filePath)).toEqual([
        ['a', 'b', 'c'],
        ['1'],
        ['1', '2', '3', '4'],
      ]);
    });

    it('should never convert cell values', async () => {
      const filePath = writeTempFile('types.csv', 'n,b\n007,true\n');

      expect(await collectRows(parser, filePath)).toEqual([
        ['n', 'b'],
        ['007', 'true'],
      ]);
    });

    it('should use the configured delimiter', async () => {
      const filePath = writeTempFile('semicolon.csv', 'a;b\n1,5;2\n');
      const semicolon = new CsvParser({ delimiter: ';' });

      expect(await collectRows(semicolon, filePath)).toEqual([
        ['a', 'b'],
        ['1,5', '2'],
      ]);
    });

    it('should stream large files across many small chunks', async () => {
      const content = 'id,name\n' + Array.from({ length: 5000 }, (_, i) => `${String(i)},user-${String(i)}\n`).join('');
      const filePath = writeTempFile('large.csv', content);
      const smallChunks = new CsvParser({ delimiter: ',', highWaterMark: 64, maxBufferedRows: 10 });

      const rows = await collectRows(smallChunks, filePath);

      expect(rows).toHaveLength(5001);
      expect(rows[1]).toEqual(['0', 'user-0']);
      expect(rows[5000]).toEqual(['4999', 'user-4999']);
    });

    it('should reject malformed quoting with the file path', async () => {
      const filePath = writeTempFile('bad.csv', 'a,b\n1,2\n"open,3\n');

      await expect(collectRows(parser, filePath)).rejects.toThrow(/CsvParser: malformed CSV in '.*bad\.csv'/);
    });

    it('should reject a file that cannot be opened', async () => {
      const filePath = join(testDir, 'does-not-exist.csv');

      await expect(collectRows(parser, filePath)).rejects.toThrow(/CsvParser: cannot read '.*does-not-exist\.csv'/);
    });
  });

  describe('readHeader()', () => {
    it('should return the first row', async () => {
      const filePath = writeTempFile('header.csv', 'id,amt\n1,10\n');

      expect(await parser.readHeader(filePath)).toEqual(['id', 'amt']);
    });

    it('should strip a byte-order-mark from the first cell', async () => {
      const filePath = writeTempFile('bom.csv', '\uFEFFid,amt\n1,10\n');

      expect(await parser.readHeader(filePath)).toEqual(['id', 'amt']);
    });

    it('should return an empty header for an empty file', async () => {
      const filePath = writeTempFile('empty.csv', '');

      expect(await parser.readHeader(filePath)).toEqual([]);
    });

    it('should return an empty header for a file of blank lines', async () => {
      const filePath = writeTempFile('only-blank.csv', '\n\n');

      expect(await parser.readHeader(filePath)).toEqual([]);
    });
  });
});
