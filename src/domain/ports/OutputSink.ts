import type { Row } from '../model/Header.js';

/**
 * A merged output being written.
 *
 * Rows go to `tempPath`; nothing is visible at `path` until `promote()` renames the finished
 * temporary file over it. Call order: `writeRow()*`, `finish()`, `promote()`.
 */
export interface OutputFile {
  readonly path: string;
  readonly tempPath: string;
  /** Resolves once the row is accepted, waiting for the underlying stream to drain if needed. */
  writeRow(row: Row): Promise<void>;
  /** Flush, sync and close the temporary file. */
  finish(): Promise<void>;
  /** Atomically rename the finished temporary file onto `path`. */
  promote(): Promise<void>;
  /** Close the temporary file and leave it where it is. `path` is not touched. */
  abandon(): Promise<void>;
}

/** Port for the destination of merged outputs. */
export interface OutputSink {
  /** The directory outputs are written to. */
  readonly directory: string;
  /** Create the output directory (recursively) if it does not exist. */
  prepare(): Promise<void>;
  /** Start the output for the source directory named `name`. */
  open(name: string): Promise<OutputFile>;
}
