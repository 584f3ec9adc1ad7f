import { resolve } from 'node:path';
import type { DirectoryMergeResult, MergeSummary } from '../../domain/model/MergeResult.js';
import { MergeStatus } from '../../domain/model/MergeStatus.js';
import type { MergeContext } from '../MergeContext.js';
import { MergeDirectory } from './MergeDirectory.js';

/**
 * Use case: merge every immediate subdirectory of the root, one at a time, in sorted order.
 *
 * The first fatal error stops the run; outputs already promoted stay in place.
 */
export class RunMerge {
  constructor(private readonly ctx: MergeContext) {}

  async execute(): Promise<MergeSummary> {
    const startedAt = Date.now();
    const outDir = this.ctx.outputSink.directory;

    this.ctx.eventBus.emit({
      type: 'run:started',
      rootDir: this.ctx.rootDir,
      outDir,
      timestamp: startedAt,
    });

    try {
      const subdirectories = await this.ctx.directorySource.listSubdirectories(this.ctx.rootDir);
      await this.ctx.outputSink.prepare();

      // An output directory nested in the root would otherwise be merged as a source.
      const directories = subdirectories.filter((dir) => resolve(dir) !== resolve(outDir));
      if (directories.length === 0) {
        this.ctx.eventBus.emit({
          type: 'run:empty',
          rootDir: this.ctx.rootDir,
          timestamp: Date.now(),
        });
      }

      const results: DirectoryMergeResult[] = [];
      for (const directoryPath of directories) {
        results.push(await new MergeDirectory(this.ctx).execute(directoryPath));
      }

      const summary: MergeSummary = {
        rootDir: this.ctx.rootDir,
        outDir,
        directories: results,
        outputsWritten: results.filter((r) => r.status === MergeStatus.PROMOTED).length,
        directoriesSkipped: results.filter((r) => r.status === MergeStatus.SKIPPED).length,
        elapsedMs: Date.now() - startedAt,
      };

      this.ctx.eventBus.emit({
        type: 'run:completed',
        summary,
        timestamp: Date.now(),
      });

      return summary;
    } catch (error) {
      this.ctx.eventBus.emit({
        type: 'run:failed',
        error: error instanceof Error ? error.message : String(error),
        timestamp: Date.now(),
      });
      throw error;
    }
  }
}
