/** Called for a directory entry whose metadata could not be read. The entry is left out. */
export type SkippedEntryFn = (entryPath: string, error: unknown) => void;

/**
 * Port for discovering what to merge.
 *
 * Both methods return paths in a deterministic order: plain code-unit comparison of names,
 * never OS enumeration order or locale collation.
 */
export interface DirectorySource {
  /** Immediate child directories of `root`. */
  listSubdirectories(root: string): Promise<readonly string[]>;
  /** Regular files directly inside `directory` whose extension is `csv`, in any letter case. */
  listCsvFiles(directory: string): Promise<readonly string[]>;
}
