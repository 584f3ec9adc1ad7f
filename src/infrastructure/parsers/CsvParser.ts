import { createReadStream } from 'node:fs';
import Papa from 'papaparse';
import type { Header, Row } from '../../domain/model/Header.js';
import type { SourceParser, ParserOptions } from '../../domain/ports/SourceParser.js';
import { stripBom } from '../../domain/model/Header.js';

export interface CsvParserOptions extends ParserOptions {
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
  /** Parsed rows buffered ahead of the consumer before the file stream is paused. Default: 1000. */
  readonly maxBufferedRows?: number;
}

/**
 * CSV parser adapter using PapaParse on a Node.js file stream.
 *
 * Rows are delivered through PapaParse's `step` callback and handed to the consumer as an
 * async iterable; the file stream is paused while the consumer lags behind. Blank lines are
 * skipped, cells are never type-converted and any PapaParse error is fatal for the file.
 */
export class CsvParser implements SourceParser {
  private readonly delimiter: string;
  private readonly encoding: BufferEncoding;
  private readonly highWaterMark: number;
  private readonly maxBufferedRows: number;

  constructor(options: CsvParserOptions) {
    this.delimiter = options.delimiter;
    this.encoding = options.encoding ?? 'utf-8';
    this.highWaterMark = options.highWaterMark ?? 65536;
    this.maxBufferedRows = options.maxBufferedRows ?? 1000;
  }

  async readHeader(filePath: string): Promise<Header> {
    for await (const row of this.rows(filePath)) {
      return stripBom(row);
    }
    return [];
  }

  async *rows(filePath: string): AsyncIterable<Row> {
    const input = createReadStream(filePath, {
      encoding: this.encoding,
      highWaterMark: this.highWaterMark,
    });

    const queue: Row[] = [];
    let recordCount = 0;
    let done = false;
    let failure: Error | null = null;
    let wake: (() => void) | null = null;

    // Text read but not yet consumed by a record, starting at stream offset `consumed`.
    // Attached before PapaParse subscribes, so a chunk is buffered before it is parsed.
    let pending = '';
    let consumed = 0;
    input.on('data', (chunk: string | Buffer) => {
      pending += typeof chunk === 'string' ? chunk : chunk.toString(this.encoding);
    });

    const notify = (): void => {
      const resolve = wake;
      wake = null;
      resolve?.();
    };

    Papa.parse<string[], NodeJS.ReadableStream>(input, {
      delimiter: this.delimiter,
      header: false,
      dynamicTyping: false,
      skipEmptyLines: false,
      step: (results, parser) => {
        const raw = pending.slice(0, results.meta.cursor - consumed);
        pending = pending.slice(raw.length);
        consumed += raw.length;

        recordCount++;
        const [parseError] = results.errors;
        if (parseError) {
          failure = new Error(
            `CsvParser: malformed CSV in '${filePath}' at record ${String(recordCount)}: ${parseError.message}`,
          );
          parser.abort();
          notify();
          return;
        }
        if (isBlankLine(results.data, raw)) {
          return;
        }
        queue.push(results.data);
        if (queue.length >= this.maxBufferedRows) {
          input.pause();
        }
        notify();
      },
      complete: () => {
        done = true;
        notify();
      },
      error: (error) => {
        failure = new Error(`CsvParser: cannot read '${filePath}': ${error.message}`, { cause: error });
        done = true;
        notify();
      },
    });

    try {
      for (;;) {
        if (failure) throw failure;

        const row = queue.shift();
        if (row !== undefined) {
          if (queue.length === 0 && input.isPaused()) {
            input.resume();
          }
          yield row;
          continue;
        }

        if (done) return;
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }
    } finally {
      input.destroy();
    }
  }
}

/** A physical blank line. A quoted empty field (`""`) parses to the same cells but is a record. */
function isBlankLine(cells: readonly string[], raw: string): boolean {
  return cells.length === 1 && cells[0] === '' && !raw.includes('"');
}
