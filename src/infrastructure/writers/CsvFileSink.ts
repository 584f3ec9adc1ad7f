import { mkdir, open, rename } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { WriteStream } from 'node:fs';
import { once } from 'node:events';
import { finished } from 'node:stream/promises';
import { join, resolve } from 'node:path';
import Papa from 'papaparse';
import type { Row } from '../../domain/model/Header.js';
import type { OutputFile, OutputSink } from '../../domain/ports/OutputSink.js';

export interface CsvFileSinkOptions {
  /** Directory that receives `<name>.csv` outputs. Created on `prepare()`. */
  readonly directory: string;
  /** Single ASCII column delimiter. */
  readonly delimiter: string;
  /** Encoding of the written files. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
}

/**
 * Output sink that writes each merged directory to `<directory>/<name>.csv`.
 *
 * Rows are serialized with `Papa.unparse` and `\n` line endings into `<name>.csv.tmp` next to
 * the final file, which is renamed into place once complete. The temporary file shares the
 * output's directory, so the rename never crosses a filesystem boundary.
 */
export class CsvFileSink implements OutputSink {
  readonly directory: string;
  private readonly delimiter: string;
  private readonly encoding: BufferEncoding;

  constructor(options: CsvFileSinkOptions) {
    this.directory = resolve(options.directory);
    this.delimiter = options.delimiter;
    this.encoding = options.encoding ?? 'utf-8';
  }

  async prepare(): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new Error(`CsvFileSink: cannot create output directory '${this.directory}'`, { cause: error });
    }
  }

  async open(name: string): Promise<OutputFile> {
    const path = join(this.directory, `${name}.csv`);
    const tempPath = `${path}.tmp`;

    let handle: FileHandle;
    try {
      handle = await open(tempPath, 'w');
    } catch (error) {
      throw new Error(`CsvFileSink: cannot create '${tempPath}'`, { cause: error });
    }

    const stream = handle.createWriteStream({
      encoding: this.encoding,
      autoClose: false,
    });

    return new CsvFileWriter(path, tempPath, handle, stream, this.delimiter);
  }
}

/** Serialize one record. A lone empty field is quoted so it does not read back as a blank line. */
export function serializeRow(row: Row, delimiter: string): string {
  if (row.length === 1 && row[0] === '') {
    return '""\n';
  }
  return `${Papa.unparse([Array.from(row)], { delimiter, newline: '\n' })}\n`;
}

class CsvFileWriter implements OutputFile {
  private streamError: Error | null = null;

  constructor(
    readonly path: string,
    readonly tempPath: string,
    private readonly handle: FileHandle,
    private readonly stream: WriteStream,
    private readonly delimiter: string,
  ) {
    this.stream.on('error', (error) => {
      this.streamError ??= error;
    });
  }

  async writeRow(row: Row): Promise<void> {
    this.assertHealthy();
    if (!this.stream.write(serializeRow(row, this.delimiter))) {
      try {
        await once(this.stream, 'drain');
      } catch (error) {
        throw this.wrap('write', error);
      }
    }
  }

  async finish(): Promise<void> {
    this.assertHealthy();
    try {
      this.stream.end();
      await finished(this.stream);
      await this.handle.sync();
      await this.releaseStream();
      await this.handle.close();
    } catch (error) {
      throw this.wrap('flush', error);
    }
  }

  async promote(): Promise<void> {
    try {
      await rename(this.tempPath, this.path);
    } catch (error) {
      throw new Error(`CsvFileSink: cannot move '${this.tempPath}' -> '${this.path}'`, { cause: error });
    }
  }

  async abandon(): Promise<void> {
    await this.releaseStream();
    await this.handle.close();
  }

  // The stream holds a reference on the handle until it closes; handle.close() waits for it.
  private async releaseStream(): Promise<void> {
    if (this.stream.closed) return;
    // Stream errors are already recorded by the 'error' listener.
    await new Promise<void>((resolve) => {
      this.stream.once('close', () => resolve());
      this.stream.destroy();
    });
  }

  private assertHealthy(): void {
    if (this.streamError) {
      throw this.wrap('write', this.streamError);
    }
  }

  private wrap(operation: string, error: unknown): Error {
    return new Error(`CsvFileSink: cannot ${operation} '${this.tempPath}'`, { cause: error });
  }
}
