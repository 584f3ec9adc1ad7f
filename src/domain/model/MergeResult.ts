import type { Header } from './Header.js';
import type { MergeStatus } from './MergeStatus.js';

export type SkipReason = 'no-csv-files' | 'empty-header';

/** Outcome of merging one source directory. */
export interface DirectoryMergeResult {
  readonly directory: string;
  readonly status: MergeStatus;
  /** Present once the header was established. */
  readonly canonicalHeader?: Header;
  /** Final output path. Only set when the output was promoted. */
  readonly outputPath?: string;
  readonly skipReason?: SkipReason;
  readonly filesMerged: number;
  readonly rowsWritten: number;
}

export interface MergeSummary {
  readonly rootDir: string;
  readonly outDir: string;
  readonly directories: readonly DirectoryMergeResult[];
  readonly outputsWritten: number;
  readonly directoriesSkipped: number;
  readonly elapsedMs: number;
}
