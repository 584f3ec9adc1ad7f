import type { DirectorySource } from '../domain/ports/DirectorySource.js';
import type { OutputSink } from '../domain/ports/OutputSink.js';
import type { SourceParser } from '../domain/ports/SourceParser.js';
import type { EventBus } from './EventBus.js';

/**
 * Collaborators shared by the use cases of one merge run.
 *
 * Internal: not exported from the public API. The facade builds it once from its config.
 */
export class MergeContext {
  constructor(
    readonly rootDir: string,
    readonly eventBus: EventBus,
    readonly directorySource: DirectorySource,
    readonly parser: SourceParser,
    readonly outputSink: OutputSink,
  ) {}
}
