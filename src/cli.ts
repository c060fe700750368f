import fs from 'fs';
import yargs from 'yargs';
import { CONFIG } from './config';
import { InvalidArgumentError, TimingLogError } from './errors';
import { FileSetReader } from './fileSetReader';
import { plotFileSet, showChart } from './plotter';
import { averageFileSet, bucketFileSet, formatSeries } from './stats';
import type { BoundaryPolicy, MalformedPolicy, ReadOptions } from './types';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: CliIo = {
  // eslint-disable-next-line no-console
  out: (line) => console.log(line),
  // eslint-disable-next-line no-console
  err: (line) => console.error(line),
};

interface CommonArgs {
  dir?: string;
  strict: boolean;
  verbose: boolean;
}

function readerFor(argv: CommonArgs, io: CliIo): { reader: FileSetReader; options: ReadOptions; skipped: () => number } {
  const malformed: MalformedPolicy = argv.strict ? 'fail' : 'skip';
  const options: ReadOptions = { directory: argv.dir, malformed };
  const reader = new FileSetReader(options);
  let skipped = 0;
  reader.on('malformed', (line) => {
    skipped++;
    if (argv.verbose) io.err(`[SKIP] ${line.path}:${line.lineNumber}: ${line.content}`);
  });
  if (argv.verbose) {
    reader.on('notice', (msg) => io.err(`[INFO] ${msg}`));
    reader.on('file', (path, count) => io.err(`[FILE] ${path}: ${count} value(s)`));
  }
  return { reader, options, skipped: () => skipped };
}

function boundaryOf(trimPartial: boolean): BoundaryPolicy {
  return trimPartial ? 'trim' : 'keep';
}

/**
 * Parses `args` (without the node and script entries) and runs one command.
 * Resolves with the exit status; a chart being displayed keeps serving after
 * this resolves.
 */
export async function runCli(args: string[], io: CliIo = consoleIo): Promise<number> {
  let run: (() => Promise<number>) | undefined;

  const parser = yargs(args)
    .scriptName('timing-logs')
    .usage('Usage: $0 <command> [options]')
    .option('dir', {
      alias: 'd',
      type: 'string',
      description: 'Directory holding the log files (default: current directory)',
    })
    .option('strict', {
      type: 'boolean',
      default: false,
      description: 'Fail on the first malformed line instead of skipping it',
    })
    .option('verbose', {
      type: 'boolean',
      default: CONFIG.verbose,
      description: 'Report files read and lines skipped on stderr',
    })
    .command(
      'average',
      'Print the mean of every value in a file set',
      (y) => y.option('filename', {
        alias: 'f',
        type: 'string',
        demandOption: true,
        description: 'Base name shared by the files',
      }),
      (argv) => {
        run = async () => {
          const { reader, options, skipped } = readerFor(argv, io);
          const result = averageFileSet(argv.filename, options, reader);
          io.out(String(result.mean));
          if (argv.verbose) io.err(`[INFO] mean of ${result.count} value(s) from ${result.files} file(s)`);
          return warnSkipped(io, skipped());
        };
      },
    )
    .command(
      'bucket',
      'Count timestamps per second across a file set',
      (y) => y
        .option('infile', {
          alias: 'i',
          type: 'string',
          demandOption: true,
          description: 'Base name shared by the timestamp files',
        })
        .option('outfile', {
          alias: 'o',
          type: 'string',
          demandOption: true,
          description: 'Destination for the counts, one per line ("-" for stdout)',
        })
        .option('trim-partial', {
          type: 'boolean',
          default: false,
          description: 'Drop the first and last second, which may be partial',
        }),
      (argv) => {
        run = async () => {
          const { reader, options, skipped } = readerFor(argv, io);
          const series = bucketFileSet(argv.infile, { ...options, boundary: boundaryOf(argv.trimPartial) }, reader);
          const text = formatSeries(series);
          if (argv.outfile === '-') {
            if (text) io.out(text.slice(0, -1));
          } else {
            fs.writeFileSync(argv.outfile, text);
          }
          if (argv.verbose) io.err(`[INFO] ${series.counts.length} bucket(s) starting at ${series.start}`);
          return warnSkipped(io, skipped());
        };
      },
    )
    .command(
      'plot',
      'Chart the per-second event rate of a file set',
      (y) => y
        .option('infile', {
          alias: 'i',
          type: 'string',
          demandOption: true,
          description: 'Base name shared by the timestamp files',
        })
        .option('outfile', {
          alias: 'o',
          type: 'string',
          description: 'Save the chart as SVG here instead of displaying it',
        })
        .option('trim-partial', {
          type: 'boolean',
          default: false,
          description: 'Drop the first and last second, which may be partial',
        }),
      (argv) => {
        run = async () => {
          const { reader, options, skipped } = readerFor(argv, io);
          const result = plotFileSet(argv.infile, {
            ...options,
            boundary: boundaryOf(argv.trimPartial),
            outfile: argv.outfile,
          }, reader);
          if (result.outfile) {
            io.err(`[PLOT] chart saved to ${result.outfile}`);
          } else {
            const { url } = await showChart(result);
            io.err(`[VIEW] chart at ${url} (Ctrl-C to stop)`);
          }
          return warnSkipped(io, skipped());
        };
      },
    )
    .demandCommand(1, 'a command is required')
    .strict()
    .help()
    .alias('help', 'h')
    .version(false)
    .exitProcess(false)
    .fail((msg, err) => {
      throw err instanceof Error ? err : new InvalidArgumentError(msg);
    });

  try {
    await parser.parseAsync();
    return run ? await run() : 0;
  } catch (e: unknown) {
    io.err(`error: ${e instanceof Error ? e.message : String(e)}`);
    if (e instanceof TimingLogError && e.cause instanceof Error) {
      io.err(`  caused by: ${e.cause.message}`);
    }
    return 1;
  }
}

function warnSkipped(io: CliIo, skipped: number): number {
  if (skipped > 0) io.err(`[WARN] skipped ${skipped} malformed line(s)`);
  return 0;
}
