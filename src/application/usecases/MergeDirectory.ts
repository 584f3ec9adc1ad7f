import { basename } from 'node:path';
import type { Header } from '../../domain/model/Header.js';
import type { ColumnMapping } from '../../domain/model/ColumnMapping.js';
import type { DirectoryMergeResult, SkipReason } from '../../domain/model/MergeResult.js';
import type { OutputFile } from '../../domain/ports/OutputSink.js';
import { MergeStatus, canTransition, isTerminal } from '../../domain/model/MergeStatus.js';
import { isEmptyHeader, stripBom } from '../../domain/model/Header.js';
import { mapRow } from '../../domain/model/ColumnMapping.js';
import { HeaderReconciler } from '../../domain/services/HeaderReconciler.js';
import type { MergeContext } from '../MergeContext.js';

/**
 * Use case: merge every CSV file directly inside one directory into `<name>.csv`.
 *
 * One instance per directory. Walks ENUMERATING -> HEADER_ESTABLISHED -> MERGING -> FLUSHED ->
 * PROMOTED, or ends in SKIPPED / FAILED. A failure leaves the temporary file behind and the
 * previous output untouched, then rethrows.
 */
export class MergeDirectory {
  private status: MergeStatus = MergeStatus.ENUMERATING;
  private filesMerged = 0;
  private rowsWritten = 0;

  constructor(private readonly ctx: MergeContext) {}

  getStatus(): MergeStatus {
    return this.status;
  }

  async execute(directoryPath: string): Promise<DirectoryMergeResult> {
    try {
      return await this.merge(directoryPath);
    } catch (error) {
      if (!isTerminal(this.status)) {
        this.transitionTo(MergeStatus.FAILED);
      }
      throw error;
    }
  }

  private async merge(directoryPath: string): Promise<DirectoryMergeResult> {
    const directory = basename(directoryPath);

    const files = await this.ctx.directorySource.listCsvFiles(directoryPath);
    const [firstFile] = files;
    if (firstFile === undefined) {
      return this.skip(directory, 'no-csv-files');
    }

    this.ctx.eventBus.emit({
      type: 'directory:started',
      directory,
      directoryPath,
      files,
      timestamp: Date.now(),
    });

    const canonical = await this.ctx.parser.readHeader(firstFile);
    if (isEmptyHeader(canonical)) {
      return this.skip(directory, 'empty-header', firstFile);
    }

    this.transitionTo(MergeStatus.HEADER_ESTABLISHED);
    const reconciler = new HeaderReconciler(canonical);

    const output = await this.ctx.outputSink.open(directory);

    try {
      this.transitionTo(MergeStatus.MERGING);
      await output.writeRow(canonical);

      for (const [fileIndex, filePath] of files.entries()) {
        const rowCount = await this.mergeFile(directory, filePath, reconciler, output);
        this.filesMerged++;

        this.ctx.eventBus.emit({
          type: 'file:merged',
          directory,
          filePath,
          fileIndex,
          totalFiles: files.length,
          rowCount,
          timestamp: Date.now(),
        });
      }

      await output.finish();
      this.transitionTo(MergeStatus.FLUSHED);

      await output.promote();
      this.transitionTo(MergeStatus.PROMOTED);
    } catch (error) {
      await this.release(output, error);
      throw error;
    }

    this.ctx.eventBus.emit({
      type: 'directory:promoted',
      directory,
      outputPath: output.path,
      canonicalHeader: canonical,
      filesMerged: this.filesMerged,
      rowsWritten: this.rowsWritten,
      timestamp: Date.now(),
    });

    return {
      directory,
      status: this.status,
      canonicalHeader: canonical,
      outputPath: output.path,
      filesMerged: this.filesMerged,
      rowsWritten: this.rowsWritten,
    };
  }

  private async mergeFile(
    directory: string,
    filePath: string,
    reconciler: HeaderReconciler,
    output: OutputFile,
  ): Promise<number> {
    let mapping: ColumnMapping | null = null;
    let rowCount = 0;

    for await (const row of this.ctx.parser.rows(filePath)) {
      if (mapping === null) {
        mapping = this.reconcile(directory, filePath, reconciler, stripBom(row));
        continue;
      }
      await output.writeRow(mapRow(row, mapping));
      rowCount++;
      this.rowsWritten++;
    }

    // A file with no rows at all has an empty header.
    if (mapping === null) {
      this.reconcile(directory, filePath, reconciler, []);
    }

    return rowCount;
  }

  private reconcile(directory: string, filePath: string, reconciler: HeaderReconciler, header: Header): ColumnMapping {
    const comparison = reconciler.compare(header);

    if (comparison.kind === 'mismatch') {
      this.ctx.eventBus.emit({
        type: 'header:mismatch',
        directory,
        filePath,
        missing: comparison.missing,
        extra: comparison.extra,
        timestamp: Date.now(),
      });
    } else if (comparison.kind === 'reordered') {
      this.ctx.eventBus.emit({
        type: 'header:reordered',
        directory,
        filePath,
        timestamp: Date.now(),
      });
    }

    return reconciler.mappingFor(header);
  }

  private skip(directory: string, reason: SkipReason, filePath?: string): DirectoryMergeResult {
    this.transitionTo(MergeStatus.SKIPPED);

    this.ctx.eventBus.emit({
      type: 'directory:skipped',
      directory,
      reason,
      filePath,
      timestamp: Date.now(),
    });

    return {
      directory,
      status: this.status,
      skipReason: reason,
      filesMerged: 0,
      rowsWritten: 0,
    };
  }

  private async release(output: OutputFile, cause: unknown): Promise<void> {
    try {
      await output.abandon();
    } catch (abandonError) {
      throw new AggregateError(
        [cause, abandonError],
        `MergeDirectory: failed to release '${output.tempPath}' after an error`,
      );
    }
  }

  private transitionTo(newStatus: MergeStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }
}
