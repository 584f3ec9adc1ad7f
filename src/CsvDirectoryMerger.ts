import { resolve } from 'node:path';
import type { MergeSummary } from './domain/model/MergeResult.js';
import type { DirectorySource } from './domain/ports/DirectorySource.js';
import type { OutputSink } from './domain/ports/OutputSink.js';
import type { SourceParser } from './domain/ports/SourceParser.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { HandlerErrorFn } from './application/EventBus.js';
import { parseDelimiter } from './domain/model/Delimiter.js';
import { EventBus } from './application/EventBus.js';
import { MergeContext } from './application/MergeContext.js';
import { RunMerge } from './application/usecases/RunMerge.js';
import { CsvParser } from './infrastructure/parsers/CsvParser.js';
import { CsvFileSink } from './infrastructure/writers/CsvFileSink.js';
import { FsDirectorySource } from './infrastructure/sources/FsDirectorySource.js';

export const DEFAULT_ROOT_DIR = '.';
export const DEFAULT_OUT_DIR = './_out';

/** Configuration for a merge run. */
export interface MergerConfig {
  /** Directory whose immediate subdirectories are merged. Default: `'.'`. */
  readonly rootDir?: string;
  /** Directory that receives one `<subdirectory>.csv` per merged subdirectory. Default: `'./_out'`. */
  readonly outDir?: string;
  /** Single ASCII delimiter used to read and write. Default: `','`. */
  readonly delimiter?: string;
  /** Encoding of input and output files. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
  /** Custom directory discovery. Default: `FsDirectorySource`. */
  readonly directorySource?: DirectorySource;
  /** Custom CSV reader. Default: `CsvParser`. */
  readonly parser?: SourceParser;
  /** Custom destination. Overrides `outDir`. Default: `CsvFileSink`. */
  readonly outputSink?: OutputSink;
  /** Called when an event subscriber throws. */
  readonly onHandlerError?: HandlerErrorFn;
}

/**
 * Facade that merges per-directory CSV collections into one CSV per directory.
 *
 * Delegates the run to the `RunMerge` use case and publishes progress and diagnostics as
 * domain events.
 *
 * @example
 * ```typescript
 * const merger = new CsvDirectoryMerger({ rootDir: './exports', outDir: './merged', delimiter: ';' });
 * merger.on('header:mismatch', (e) => console.warn(e.filePath, e.missing, e.extra));
 * const summary = await merger.run();
 * ```
 */
export class CsvDirectoryMerger {
  private readonly ctx: MergeContext;

  constructor(config: MergerConfig = {}) {
    const delimiter = parseDelimiter(config.delimiter);
    const encoding = config.encoding ?? 'utf-8';
    const eventBus = new EventBus(config.onHandlerError);

    this.ctx = new MergeContext(
      resolve(config.rootDir ?? DEFAULT_ROOT_DIR),
      eventBus,
      config.directorySource ??
        new FsDirectorySource({
          onSkippedEntry: (entryPath, error) => {
            eventBus.emit({
              type: 'entry:skipped',
              entryPath,
              error: error instanceof Error ? error.message : String(error),
              timestamp: Date.now(),
            });
          },
        }),
      config.parser ?? new CsvParser({ delimiter, encoding }),
      config.outputSink ?? new CsvFileSink({ directory: config.outDir ?? DEFAULT_OUT_DIR, delimiter, encoding }),
    );
  }

  /** Subscribe to a domain event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to every domain event. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Merge every subdirectory of the root. Rejects on the first fatal error. */
  async run(): Promise<MergeSummary> {
    return new RunMerge(this.ctx).execute();
  }
}
