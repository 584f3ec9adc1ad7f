import { CsvDirectoryMerger, DEFAULT_OUT_DIR, DEFAULT_ROOT_DIR } from './CsvDirectoryMerger.js';
import { DEFAULT_DELIMITER, parseDelimiter } from './domain/model/Delimiter.js';
import { ConsoleReporter } from './infrastructure/reporters/ConsoleReporter.js';
import type { TextSink } from './infrastructure/reporters/ConsoleReporter.js';

export const USAGE = `Usage: csv-dir-merge [options] [root] [outDir] [delimiter]

Merge the CSV files of every immediate subdirectory of <root> into <outDir>/<subdirectory>.csv,
aligning columns to the header of the first file (sorted by path) in each subdirectory.

Arguments:
  root        directory to scan (default: ${DEFAULT_ROOT_DIR})
  outDir      output directory, created if missing (default: ${DEFAULT_OUT_DIR})
  delimiter   single ASCII delimiter character (default: '${DEFAULT_DELIMITER}')

Options:
  -v, --verbose  print one line per merged file
  -h, --help     show this help
`;

export interface CliOptions {
  readonly rootDir: string;
  readonly outDir: string;
  readonly delimiter: string;
  readonly verbose: boolean;
  readonly help: boolean;
}

export interface CliIo {
  readonly stdout: TextSink;
  readonly stderr: TextSink;
}

/** Map command-line arguments (without the node and script paths) to options. Throws on bad input. */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const positional: string[] = [];
  let verbose = false;
  let help = false;
  let optionsEnded = false;

  for (const arg of argv) {
    if (!optionsEnded && arg.length > 1 && arg.startsWith('-')) {
      if (arg === '--') {
        optionsEnded = true;
      } else if (arg === '-h' || arg === '--help') {
        help = true;
      } else if (arg === '-v' || arg === '--verbose') {
        verbose = true;
      } else {
        throw new Error(`Unknown option '${arg}'`);
      }
      continue;
    }
    positional.push(arg);
  }

  if (positional.length > 3) {
    throw new Error(`Unexpected argument '${String(positional[3])}'`);
  }

  const [rootDir, outDir, delimiter] = positional;
  return {
    rootDir: rootDir ?? DEFAULT_ROOT_DIR,
    outDir: outDir ?? DEFAULT_OUT_DIR,
    delimiter: parseDelimiter(delimiter),
    verbose,
    help,
  };
}

/** Render an error and its chain of causes, one per line. */
export function describeError(error: unknown): string {
  const lines: string[] = [];
  let current: unknown = error;
  while (current !== undefined) {
    if (current instanceof Error) {
      lines.push(lines.length === 0 ? current.message : `  caused by: ${current.message}`);
      current = current.cause;
    } else {
      lines.push(lines.length === 0 ? String(current) : `  caused by: ${String(current)}`);
      current = undefined;
    }
  }
  return lines.join('\n');
}

/** Run the command line. Resolves with the process exit code. */
export async function runCli(
  argv: readonly string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr },
): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      io.stdout.write(USAGE);
      return 0;
    }

    const reporter = new ConsoleReporter({ stdout: io.stdout, stderr: io.stderr, verbose: options.verbose });
    const merger = new CsvDirectoryMerger({
      rootDir: options.rootDir,
      outDir: options.outDir,
      delimiter: options.delimiter,
      onHandlerError: (error, event) => {
        io.stderr.write(`WARNING: ${event.type} handler failed: ${describeError(error)}\n`);
      },
    });
    merger.onAny(reporter.handle);

    await merger.run();
    return 0;
  } catch (error) {
    io.stderr.write(`ERROR: ${describeError(error)}\n`);
    return 1;
  }
}
