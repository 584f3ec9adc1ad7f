import type { Header, Row } from '../../src/domain/model/Header.js';
import type { DirectorySource } from '../../src/domain/ports/DirectorySource.js';
import type { SourceParser } from '../../src/domain/ports/SourceParser.js';
import type { OutputFile, OutputSink } from '../../src/domain/ports/OutputSink.js';
import { stripBom } from '../../src/domain/model/Header.js';

/** Directory tree keyed by directory path, each listing its CSV file paths. */
export class InMemoryDirectorySource implements DirectorySource {
  constructor(
    private readonly subdirectories: readonly string[],
    private readonly files: Readonly<Record<string, readonly string[]>>,
  ) {}

  listSubdirectories(): Promise<readonly string[]> {
    return Promise.resolve(this.subdirectories);
  }

  listCsvFiles(directory: string): Promise<readonly string[]> {
    return Promise.resolve(this.files[directory] ?? []);
  }
}

/** Parser over pre-split rows. A path listed in `failures` throws after yielding its rows. */
export class InMemoryParser implements SourceParser {
  constructor(
    private readonly contents: Readonly<Record<string, readonly Row[]>>,
    private readonly failures: Readonly<Record<string, string>> = {},
  ) {}

  async readHeader(filePath: string): Promise<Header> {
    await Promise.resolve();
    return stripBom(this.contents[filePath]?.[0] ?? []);
  }

  async *rows(filePath: string): AsyncIterable<Row> {
    for (const row of this.contents[filePath] ?? []) {
      await Promise.resolve();
      yield row;
    }
    const failure = this.failures[filePath];
    if (failure !== undefined) {
      throw new Error(failure);
    }
  }
}

export class InMemoryOutputFile implements OutputFile {
  readonly rows: Row[] = [];
  finished = false;
  promoted = false;
  abandoned = false;

  constructor(
    readonly path: string,
    readonly tempPath: string,
  ) {}

  async writeRow(row: Row): Promise<void> {
    await Promise.resolve();
    this.rows.push(row);
  }

  async finish(): Promise<void> {
    await Promise.resolve();
    this.finished = true;
  }

  async promote(): Promise<void> {
    await Promise.resolve();
    this.promoted = true;
  }

  async abandon(): Promise<void> {
    await Promise.resolve();
    this.abandoned = true;
  }
}

export class InMemoryOutputSink implements OutputSink {
  readonly outputs = new Map<string, InMemoryOutputFile>();
  prepared = false;

  constructor(readonly directory: string) {}

  async prepare(): Promise<void> {
    await Promise.resolve();
    this.prepared = true;
  }

  async open(name: string): Promise<InMemoryOutputFile> {
    await Promise.resolve();
    const output = new InMemoryOutputFile(`${this.directory}/${name}.csv`, `${this.directory}/${name}.csv.tmp`);
    this.outputs.set(name, output);
    return output;
  }
}
