import type { Header } from '../model/Header.js';
import type { MergeSummary, SkipReason } from '../model/MergeResult.js';

/** Emitted when `run()` is called, before the root is listed. */
export interface RunStartedEvent {
  readonly type: 'run:started';
  readonly rootDir: string;
  readonly outDir: string;
  readonly timestamp: number;
}

/** Emitted when the root directory has no subdirectories to merge. */
export interface RunEmptyEvent {
  readonly type: 'run:empty';
  readonly rootDir: string;
  readonly timestamp: number;
}

/** Emitted after every directory has been merged or skipped. */
export interface RunCompletedEvent {
  readonly type: 'run:completed';
  readonly summary: MergeSummary;
  readonly timestamp: number;
}

/** Emitted when a fatal error aborts the run. The error is rethrown from `run()` afterwards. */
export interface RunFailedEvent {
  readonly type: 'run:failed';
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted for a directory entry left out because its metadata could not be read. */
export interface EntrySkippedEvent {
  readonly type: 'entry:skipped';
  readonly entryPath: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a directory's CSV files have been listed. */
export interface DirectoryStartedEvent {
  readonly type: 'directory:started';
  readonly directory: string;
  readonly directoryPath: string;
  readonly files: readonly string[];
  readonly timestamp: number;
}

/** Emitted when a directory produces no output. */
export interface DirectorySkippedEvent {
  readonly type: 'directory:skipped';
  readonly directory: string;
  readonly reason: SkipReason;
  /** The file whose header was empty, for `empty-header`. */
  readonly filePath?: string;
  readonly timestamp: number;
}

/** Emitted once the merged output has been renamed onto its final path. */
export interface DirectoryPromotedEvent {
  readonly type: 'directory:promoted';
  readonly directory: string;
  readonly outputPath: string;
  readonly canonicalHeader: Header;
  readonly filesMerged: number;
  readonly rowsWritten: number;
  readonly timestamp: number;
}

/** Emitted after every data row of one file has been written. */
export interface FileMergedEvent {
  readonly type: 'file:merged';
  readonly directory: string;
  readonly filePath: string;
  /** Zero-based position of the file within its directory. */
  readonly fileIndex: number;
  readonly totalFiles: number;
  readonly rowCount: number;
  readonly timestamp: number;
}

/** Emitted when a file's header differs from canonical in its set of names. */
export interface HeaderMismatchEvent {
  readonly type: 'header:mismatch';
  readonly directory: string;
  readonly filePath: string;
  readonly missing: readonly string[];
  readonly extra: readonly string[];
  readonly timestamp: number;
}

/** Emitted when a file has the canonical names in a different order. */
export interface HeaderReorderedEvent {
  readonly type: 'header:reordered';
  readonly directory: string;
  readonly filePath: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | RunStartedEvent
  | RunEmptyEvent
  | RunCompletedEvent
  | RunFailedEvent
  | EntrySkippedEvent
  | DirectoryStartedEvent
  | DirectorySkippedEvent
  | DirectoryPromotedEvent
  | FileMergedEvent
  | HeaderMismatchEvent
  | HeaderReorderedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
