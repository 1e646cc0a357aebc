#!/usr/bin/env node
/**
 * Command-line entry point: `gcode-travel-optimizer <config.json> <file.gcode>`.
 *
 * Writes `<file>_optimized.gcode` beside the input together with a run log, the list of unsupported
 * lines and a per-layer CSV report, then prints the travel statistics.
 */
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { loadOptimizerConfig } from './config';
import {
  InputError,
  describeError,
  isFatal,
  isMissingFileError,
  toOutputError,
  toResourceExhaustionError,
} from './errors';
import { ConsoleLogger, FileUnsupportedCommandSink, isLogLevel } from './logger';
import { formatLayerCsv, optimizeGcode } from './services/optimizer';
import { ProcessSolver } from './services/solver';
import { formatDistance, type MotionStats } from './services/stats';

export const USAGE = 'Usage: gcode-travel-optimizer <config.json> <file.gcode>';

export interface OutputPaths {
  program: string;
  log: string;
  unsupported: string;
  report: string;
}

/** Output files written next to the input file. */
export function resolveOutputPaths(inputPath: string): OutputPaths {
  const directory = path.dirname(inputPath);
  const base = path.basename(inputPath, path.extname(inputPath));
  const file = path.basename(inputPath);
  return {
    program: path.join(directory, `${base}_optimized.gcode`),
    log: path.join(directory, `${file}.log`),
    unsupported: path.join(directory, `${file}.unsupported.log`),
    report: path.join(directory, `${file}.csv`),
  };
}

/** Formats a duration as `1m 02.345s` or `2.345s`. */
export function formatElapsed(milliseconds: number): string {
  const totalSeconds = milliseconds / 1000;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds - minutes * 60;
  if (minutes === 0) {
    return `${seconds.toFixed(3)}s`;
  }
  return `${minutes}m ${seconds.toFixed(3).padStart(6, '0')}s`;
}

/** Reads the input program, rejecting files that cannot be optimized. */
export async function readInputProgram(inputPath: string): Promise<string> {
  if (path.extname(inputPath).toLowerCase() !== '.gcode') {
    throw new InputError(`${inputPath} is not a .gcode file.`);
  }
  let text: string;
  try {
    text = await fs.readFile(inputPath, 'utf8');
  } catch (error) {
    throw (
      toResourceExhaustionError(error, `Unable to read ${inputPath}`) ??
      new InputError(
        isMissingFileError(error) ? `${inputPath} does not exist.` : `Unable to read ${inputPath}: ${describeError(error)}`,
        { cause: error },
      )
    );
  }
  if (text.trim() === '') {
    throw new InputError(`${inputPath} is empty.`);
  }
  return text;
}

const statsLines = (label: string, stats: MotionStats): string[] => [
  `${label} travel moves: ${stats.travelMoves.toLocaleString('en-US')}`,
  `${label} extrusion moves: ${stats.extrudeMoves.toLocaleString('en-US')}`,
  `${label} travel distance: ${formatDistance(stats.travelDistance, stats.units)}`,
  `${label} extrusion distance: ${formatDistance(stats.extrusionDistance, stats.units)}`,
];

const writeOutput = async (filePath: string, contents: string): Promise<void> => {
  try {
    await fs.writeFile(filePath, contents, 'utf8');
  } catch (error) {
    throw toOutputError(error, filePath);
  }
};

interface Closable {
  close(): Promise<void>;
}

/** Closes whatever is still open after a failed run, reporting close failures on stderr. */
const closeAfterFailure = async (outputs: ReadonlyArray<Closable | null>): Promise<void> => {
  const results = await Promise.allSettled(outputs.map((output) => output?.close()));
  for (const result of results) {
    if (result.status === 'rejected') {
      // eslint-disable-next-line no-console
      console.error(describeError(result.reason));
    }
  }
};

/** Runs the optimizer for the given arguments and resolves with the process exit code. */
export async function main(argv: readonly string[]): Promise<number> {
  if (argv.length !== 2) {
    // eslint-disable-next-line no-console
    console.error(USAGE);
    return 2;
  }

  const started = Date.now();
  const [configPath, inputArgument] = argv;
  const inputPath = path.resolve(inputArgument);
  const outputs = resolveOutputPaths(inputPath);
  const level = process.env.LOG_LEVEL?.trim().toLowerCase();

  let logger: ConsoleLogger | null = null;
  let sink: FileUnsupportedCommandSink | null = null;

  try {
    const config = await loadOptimizerConfig(configPath);
    const text = await readInputProgram(inputPath);

    logger = new ConsoleLogger({ level: isLogLevel(level) ? level : 'info', filePath: outputs.log });
    sink = new FileUnsupportedCommandSink(outputs.unsupported);

    const result = await optimizeGcode(text, {
      config,
      solver: ProcessSolver.fromConfig(config),
      logger,
      sink,
      sourceName: path.basename(inputPath),
    });

    await writeOutput(outputs.program, result.program);
    await writeOutput(outputs.report, formatLayerCsv(result.metadata.layers));
    await sink.close();

    const { metadata } = result;
    const summary = [
      ...statsLines('Original', metadata.original),
      ...statsLines('Optimized', metadata.optimized),
      `Travel reduction: ${metadata.travelReductionPercent}%`,
      `Layers optimized: ${metadata.optimizedLayers} of ${metadata.layerCount} (${metadata.fallbackLayers} fell back)`,
      `Unsupported lines: ${metadata.unsupportedLines}`,
      `Output written to ${outputs.program}`,
      `Elapsed: ${formatElapsed(Date.now() - started)}`,
    ];
    for (const line of summary) {
      logger.info(line);
    }
    await logger.close();
    return 0;
  } catch (error) {
    const message = isFatal(error) ? describeError(error) : `Unexpected failure: ${describeError(error)}`;
    if (logger) {
      logger.error(message);
    } else {
      // eslint-disable-next-line no-console
      console.error(message);
    }
    await closeAfterFailure([sink, logger]);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      // eslint-disable-next-line no-console
      console.error(describeError(error));
      process.exitCode = 1;
    },
  );
}
