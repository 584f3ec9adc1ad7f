import { readdir, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { extname, join } from 'node:path';
import type { DirectorySource, SkippedEntryFn } from '../../domain/ports/DirectorySource.js';

export interface FsDirectorySourceOptions {
  /** Notified for every entry left out because its metadata could not be read. */
  readonly onSkippedEntry?: SkippedEntryFn;
}

/** Directory source backed by the local filesystem. Symbolic links are followed. Node.js only. */
export class FsDirectorySource implements DirectorySource {
  private readonly onSkippedEntry: SkippedEntryFn | undefined;

  constructor(options?: FsDirectorySourceOptions) {
    this.onSkippedEntry = options?.onSkippedEntry;
  }

  async listSubdirectories(root: string): Promise<readonly string[]> {
    return this.listMatching(root, (stats) => stats.isDirectory());
  }

  async listCsvFiles(directory: string): Promise<readonly string[]> {
    return this.listMatching(directory, (stats, path) => stats.isFile() && isCsvPath(path));
  }

  private async listMatching(directory: string, accept: (stats: Stats, path: string) => boolean): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(directory);
    } catch (error) {
      throw new Error(`FsDirectorySource: cannot list '${directory}'`, { cause: error });
    }

    const matches: string[] = [];
    for (const name of names.sort()) {
      const path = join(directory, name);
      const stats = await this.statEntry(path);
      if (stats && accept(stats, path)) {
        matches.push(path);
      }
    }
    return matches;
  }

  private async statEntry(path: string): Promise<Stats | null> {
    try {
      return await stat(path);
    } catch (error) {
      this.onSkippedEntry?.(path, error);
      return null;
    }
  }
}

/** True when the file extension is `csv` in any letter case. */
export function isCsvPath(path: string): boolean {
  return extname(path).slice(1).toLowerCase() === 'csv';
}
