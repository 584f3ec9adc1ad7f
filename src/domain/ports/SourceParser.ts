import type { Header, Row } from '../model/Header.js';

/** Options shared by CSV readers and writers. */
export interface ParserOptions {
  /** Single ASCII column delimiter. */
  readonly delimiter: string;
  /** Character encoding of the files. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
}

/**
 * Port for reading CSV files row by row.
 *
 * `rows()` yields every record of a file, header included, without loading the whole file.
 * Malformed input must reject with an error naming the file.
 */
export interface SourceParser {
  /** Read only the first record of a file, BOM-stripped. Resolves with `[]` for an empty file. */
  readHeader(filePath: string): Promise<Header>;
  /** Stream every record of a file in order, starting with the header row. */
  rows(filePath: string): AsyncIterable<Row>;
}
