import type { DomainEvent } from '../../domain/events/DomainEvents.js';

/** Minimal writable used for console output. `process.stdout` and `process.stderr` satisfy it. */
export interface TextSink {
  write(chunk: string): unknown;
}

export interface ConsoleReporterOptions {
  /** Progress and summary lines. Default: `process.stdout`. */
  readonly stdout?: TextSink;
  /** Warnings and notices. Default: `process.stderr`. */
  readonly stderr?: TextSink;
  /** Also print one line per merged file. Default: `false`. */
  readonly verbose?: boolean;
}

/** A formatted console line and the stream it belongs on. */
export interface ReportLine {
  readonly stream: 'stdout' | 'stderr';
  readonly text: string;
}

/**
 * Renders merge events as console lines: progress and the final summary on stdout, header
 * diagnostics and skip warnings on stderr. Subscribe `handle` with `onAny()`.
 */
export class ConsoleReporter {
  private readonly stdout: TextSink;
  private readonly stderr: TextSink;
  private readonly verbose: boolean;

  constructor(options?: ConsoleReporterOptions) {
    this.stdout = options?.stdout ?? process.stdout;
    this.stderr = options?.stderr ?? process.stderr;
    this.verbose = options?.verbose ?? false;
  }

  readonly handle = (event: DomainEvent): void => {
    const line = this.format(event);
    if (!line) return;
    const sink = line.stream === 'stdout' ? this.stdout : this.stderr;
    sink.write(`${line.text}\n`);
  };

  format(event: DomainEvent): ReportLine | null {
    switch (event.type) {
      case 'directory:promoted':
        return { stream: 'stdout', text: `Wrote: ${event.outputPath}` };
      case 'directory:skipped':
        return event.reason === 'no-csv-files'
          ? { stream: 'stdout', text: `Skipping '${event.directory}': no CSV files` }
          : {
              stream: 'stderr',
              text: `WARNING: Empty header in '${event.filePath ?? event.directory}'; skipping directory '${event.directory}'`,
            };
      case 'header:mismatch':
        return {
          stream: 'stderr',
          text:
            `WARNING: Header mismatch in '${event.filePath}'. ` +
            `Missing: [${event.missing.join(', ')}] | Extra: [${event.extra.join(', ')}]. ` +
            'Columns will be reordered; missing -> empty; extra -> ignored.',
        };
      case 'header:reordered':
        return { stream: 'stderr', text: `INFO: Column order differs in '${event.filePath}'. Reordering to canonical.` };
      case 'entry:skipped':
        return { stream: 'stderr', text: `WARNING: Skipping unreadable entry '${event.entryPath}': ${event.error}` };
      case 'run:empty':
        return { stream: 'stderr', text: `No subdirectories under ${event.rootDir}` };
      case 'run:completed':
        // An empty root has already been reported by run:empty.
        return event.summary.directories.length === 0
          ? null
          : { stream: 'stdout', text: `All done. Outputs in: ${event.summary.outDir}` };
      case 'file:merged':
        return this.verbose
          ? {
              stream: 'stdout',
              text: `  [${String(event.fileIndex + 1)}/${String(event.totalFiles)}] ${event.filePath}: ${String(event.rowCount)} rows`,
            }
          : null;
      case 'run:started':
      case 'run:failed':
      case 'directory:started':
        return null;
    }
  }
}
